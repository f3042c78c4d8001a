import {
  decCurveState,
  decCurveType,
  decPhase,
  decPhaseConfig,
  decString,
  encCurveState,
  encCurveType,
  encPhase,
  encPhaseConfig,
  encString,
} from "../codec/rlp";
import type { CurveType } from "../core/curves";
import { StorageError } from "../core/errors";
import type {
  CommonsPhase,
  CommonsPhaseConfig,
  ContractSnapshot,
  CurveState,
} from "../core/types";

/** Byte-valued key/value store the contract state lives in. */
export interface Storage {
  get(key: string): Uint8Array | undefined;
  set(key: string, value: Uint8Array): void;
  keys(): Iterable<string>;
}

export class MemoryStorage implements Storage {
  private readonly map = new Map<string, Uint8Array>();

  get(key: string) {
    return this.map.get(key);
  }

  set(key: string, value: Uint8Array) {
    this.map.set(key, Uint8Array.from(value));
  }

  keys() {
    return this.map.keys();
  }
}

export interface Codec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/** One typed slot in a Storage. */
export class Item<T> {
  constructor(
    readonly key: string,
    readonly codec: Codec<T>,
  ) {}

  mayLoad(store: Storage): T | undefined {
    const raw = store.get(this.key);
    return raw === undefined ? undefined : this.codec.decode(raw);
  }

  load(store: Storage): T {
    const value = this.mayLoad(store);
    if (value === undefined) throw new StorageError(`${this.key} not found`);
    return value;
  }

  save(store: Storage, value: T) {
    store.set(this.key, this.codec.encode(value));
  }
}

export const CURVE_STATE = new Item<CurveState>("curve_state", {
  encode: encCurveState,
  decode: decCurveState,
});
export const CURVE_TYPE = new Item<CurveType>("curve_type", {
  encode: encCurveType,
  decode: decCurveType,
});
export const PHASE_CONFIG = new Item<CommonsPhaseConfig>("phase_config", {
  encode: encPhaseConfig,
  decode: decPhaseConfig,
});
export const PHASE = new Item<CommonsPhase>("phase", { encode: encPhase, decode: decPhase });
export const SUPPLY_DENOM = new Item<string>("supply_denom", {
  encode: encString,
  decode: decString,
});

export const loadSnapshot = (store: Storage): ContractSnapshot => ({
  curveState: CURVE_STATE.load(store),
  curveType: CURVE_TYPE.load(store),
  phaseConfig: PHASE_CONFIG.load(store),
  phase: PHASE.load(store),
  supplyDenom: SUPPLY_DENOM.load(store),
});

/**
 * Encodes every slot first, then writes only the ones whose bytes changed.
 * Returns the keys written.
 */
export const saveSnapshot = (store: Storage, snap: ContractSnapshot): string[] => {
  const encoded: [string, Uint8Array][] = [
    [CURVE_STATE.key, CURVE_STATE.codec.encode(snap.curveState)],
    [CURVE_TYPE.key, CURVE_TYPE.codec.encode(snap.curveType)],
    [PHASE_CONFIG.key, PHASE_CONFIG.codec.encode(snap.phaseConfig)],
    [PHASE.key, PHASE.codec.encode(snap.phase)],
    [SUPPLY_DENOM.key, SUPPLY_DENOM.codec.encode(snap.supplyDenom)],
  ];
  const changed = encoded.filter(([key, bytes]) => !sameBytes(store.get(key), bytes));
  for (const [key, bytes] of changed) store.set(key, bytes);
  return changed.map(([key]) => key);
};

const sameBytes = (a: Uint8Array | undefined, b: Uint8Array) =>
  a !== undefined && a.length === b.length && a.every((x, i) => x === b[i]);
