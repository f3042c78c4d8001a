// RLP codecs for the persisted contract slots.

import * as rlp from "rlp";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { CurveType } from "../core/curves";
import { StorageError } from "../core/errors";
import type {
  CommonsPhase,
  CommonsPhaseConfig,
  CurveState,
  HatchConfig,
} from "../core/types";

type Decoded = Uint8Array | rlp.NestedUint8Array;

/* — helpers — */
const bnToBytes = (n: bigint): Uint8Array => {
  if (n === 0n) return new Uint8Array(0);
  const hex = n.toString(16);
  return hexToBytes(hex.length % 2 ? `0${hex}` : hex);
};
const bytesToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(`0x${bytesToHex(b)}`);

const utf8 = new TextDecoder();

const bytes = (v: Decoded | undefined, what: string): Uint8Array => {
  if (!(v instanceof Uint8Array)) throw new StorageError(`${what}: expected bytes`);
  return v;
};
const list = (v: Decoded | undefined, what: string, len?: number): Decoded[] => {
  if (v === undefined || v instanceof Uint8Array) {
    throw new StorageError(`${what}: expected list`);
  }
  if (len !== undefined && v.length !== len) {
    throw new StorageError(`${what}: expected ${len} items, got ${v.length}`);
  }
  return v;
};
const str = (v: Decoded | undefined, what: string) => utf8.decode(bytes(v, what));
const bn = (v: Decoded | undefined, what: string) => bytesToBn(bytes(v, what));
const small = (v: Decoded | undefined, what: string) => Number(bn(v, what));

const encStrings = (xs: Iterable<string>): Uint8Array[] => [...xs].sort().map(utf8ToBytes);
const decStrings = (v: Decoded | undefined, what: string): string[] =>
  list(v, what).map((x) => str(x, what));

const decodeTop = (b: Uint8Array, what: string): Decoded => {
  try {
    return rlp.decode(b);
  } catch (err) {
    throw new StorageError(`${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
};

/* — string slot — */
export const encString = (s: string): Uint8Array => rlp.encode(utf8ToBytes(s));
export const decString = (b: Uint8Array): string => str(decodeTop(b, "string"), "string");

/* — CurveState — */
export const encCurveState = (s: CurveState): Uint8Array =>
  rlp.encode([
    bnToBytes(s.reserve),
    bnToBytes(s.supply),
    utf8ToBytes(s.reserveDenom),
    [bnToBytes(BigInt(s.decimals.supply)), bnToBytes(BigInt(s.decimals.reserve))],
  ]);

export const decCurveState = (b: Uint8Array): CurveState => {
  const [reserve, supply, denom, places] = list(decodeTop(b, "curve state"), "curve state", 4);
  const [sup, res] = list(places, "decimal places", 2);
  return {
    reserve: bn(reserve, "reserve"),
    supply: bn(supply, "supply"),
    reserveDenom: str(denom, "reserve denom"),
    decimals: { supply: small(sup, "supply decimals"), reserve: small(res, "reserve decimals") },
  };
};

/* — CurveType — */
const CURVE_TAGS = ["constant", "linear", "squareRoot"] as const;

export const encCurveType = (t: CurveType): Uint8Array => {
  const amount = t.kind === "constant" ? t.value : t.slope;
  return rlp.encode([
    bnToBytes(BigInt(CURVE_TAGS.indexOf(t.kind))),
    bnToBytes(amount),
    bnToBytes(BigInt(t.scale)),
  ]);
};

export const decCurveType = (b: Uint8Array): CurveType => {
  const [tag, amount, scale] = list(decodeTop(b, "curve type"), "curve type", 3);
  const kind = CURVE_TAGS[small(tag, "curve tag")];
  const k = bn(amount, "curve parameter");
  const sc = small(scale, "curve scale");
  switch (kind) {
    case "constant":
      return { kind, value: k, scale: sc };
    case "linear":
    case "squareRoot":
      return { kind, slope: k, scale: sc };
    default:
      throw new StorageError("curve type: unknown tag");
  }
};

/* — CommonsPhaseConfig — */
export const encPhaseConfig = (c: CommonsPhaseConfig): Uint8Array => {
  const h = c.hatch;
  return rlp.encode([
    h.allowlist ? [encStrings(h.allowlist)] : [],
    [bnToBytes(h.initialRaise[0]), bnToBytes(h.initialRaise[1])],
    bnToBytes(h.initialPrice),
    bnToBytes(BigInt(h.initialAllocation)),
    bnToBytes(BigInt(h.reservePercentage)),
  ]);
};

export const decPhaseConfig = (b: Uint8Array): CommonsPhaseConfig => {
  const [allow, raise, price, allocation, pct] = list(
    decodeTop(b, "phase config"),
    "phase config",
    5,
  );
  const allowOpt = list(allow, "allowlist");
  const [min, max] = list(raise, "initial raise", 2);
  const hatch: HatchConfig = {
    initialRaise: [bn(min, "raise min"), bn(max, "raise max")],
    initialPrice: bn(price, "initial price"),
    initialAllocation: small(allocation, "initial allocation"),
    reservePercentage: small(pct, "reserve percentage"),
  };
  if (allowOpt.length > 0) hatch.allowlist = new Set(decStrings(allowOpt[0], "allowlist"));
  return { hatch };
};

/* — CommonsPhase — */
const PHASE_TAGS = ["hatch", "open", "closed"] as const;

export const encPhase = (p: CommonsPhase): Uint8Array =>
  rlp.encode([
    bnToBytes(BigInt(PHASE_TAGS.indexOf(p.kind))),
    p.kind === "hatch" ? encStrings(p.hatchers) : [],
  ]);

export const decPhase = (b: Uint8Array): CommonsPhase => {
  const [tag, hatchers] = list(decodeTop(b, "phase"), "phase", 2);
  const kind = PHASE_TAGS[small(tag, "phase tag")];
  switch (kind) {
    case "hatch":
      return { kind, hatchers: new Set(decStrings(hatchers, "hatchers")) };
    case "open":
    case "closed":
      return { kind };
    default:
      throw new StorageError("phase: unknown tag");
  }
};

/* — key/value pairs, for hashing — */
export const encEntries = (entries: [string, Uint8Array][]): Uint8Array =>
  rlp.encode(entries.map(([k, v]) => [utf8ToBytes(k), v]));
