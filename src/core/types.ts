import type { Decimal } from "../types/brands";
import type { CurveType } from "./curves";
import type { DecimalPlaces } from "./normalize";

export type Address = string;
export type Uint128 = bigint;

export type Coin = { denom: string; amount: Uint128 };

/** Who called and what they attached. */
export type MessageInfo = { sender: Address; funds: Coin[] };

export type Env = { contractAddress: Address };

/* ── tokens ──────────────────────────────────────────────── */
export type DenomUnit = { denom: string; exponent: number; aliases: string[] };

export type Metadata = {
  name?: string;
  symbol?: string;
  description?: string;
  denomUnits: DenomUnit[];
  base?: string;
  display?: string;
};

export type SupplyToken = { subdenom: string; decimals: number; metadata: Metadata };
export type ReserveToken = { denom: string; decimals: number };

/* ── persisted entities ──────────────────────────────────── */
export type CurveState = {
  reserve: Uint128;
  supply: Uint128;
  reserveDenom: string;
  decimals: DecimalPlaces;
};

export type HatchConfig = {
  allowlist?: ReadonlySet<Address>;
  /** [min, max] reserve raised during the hatch */
  initialRaise: readonly [Uint128, Uint128];
  initialPrice: Uint128;
  initialAllocation: number;
  reservePercentage: number;
};

export type CommonsPhaseConfig = { hatch: HatchConfig };

export type CommonsPhase =
  | { kind: "hatch"; hatchers: ReadonlySet<Address> }
  | { kind: "open" }
  | { kind: "closed" };

/** Everything one operation reads; the runtime persists what comes back. */
export type ContractSnapshot = {
  curveState: CurveState;
  curveType: CurveType;
  phaseConfig: CommonsPhaseConfig;
  phase: CommonsPhase;
  supplyDenom: string;
};

/* ── messages ────────────────────────────────────────────── */
export type InstantiateMsg = {
  supply: SupplyToken;
  reserve: ReserveToken;
  curveType: CurveType;
  phaseConfig: CommonsPhaseConfig;
};

export type ExecuteMsg = { type: "buy" } | { type: "burn"; amount: Uint128 };

export type QueryMsg = { type: "curveInfo" };

export type CurveInfoResponse = {
  reserve: Uint128;
  supply: Uint128;
  spotPrice: Decimal;
  reserveDenom: string;
};

/* ── side-effect intents ─────────────────────────────────── */
export type Effect =
  | { type: "createDenom"; subdenom: string; metadata: Metadata }
  | { type: "mint"; denom: string; amount: Uint128; recipient: Address }
  | { type: "burn"; denom: string; amount: Uint128; burnFrom: Address }
  | { type: "transfer"; recipient: Address; denom: string; amount: Uint128 };

export type Attribute = readonly [key: string, value: string];

export type Response = {
  effects: Effect[];
  attributes: Attribute[];
};

export type Transition = {
  snapshot: ContractSnapshot;
  response: Response;
};
