import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex } from "@noble/hashes/utils";
import { encEntries } from "../codec/rlp";
import type { Storage } from "../infra/storage";

export type Hex = `0x${string}`;

/* ── state root: keccak over RLP(sorted key/value pairs) ──── */
export const stateRoot = (store: Storage): Hex => {
  const entries: [string, Uint8Array][] = [];
  for (const key of [...store.keys()].sort()) {
    const value = store.get(key);
    if (value !== undefined) entries.push([key, value]);
  }
  return `0x${bytesToHex(keccak_256(encEntries(entries)))}`;
};
