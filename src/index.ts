export * from "./core/types";
export * from "./core/errors";
export {
  type Curve,
  type CurveFn,
  type CurveType,
  spotPrice,
  reserveFor,
  supplyFor,
  toCurveFn,
  validateCurveType,
} from "./core/curves";
export { formatDecimal, parseDecimal } from "./core/decimal";
export {
  type DecimalPlaces,
  decimalPlaces,
  fromReserve,
  fromSupply,
  MAX_TOKEN_DECIMALS,
  reserveUnit,
  supplyUnit,
  toReserve,
  toSupply,
} from "./core/normalize";
export {
  assertBuyAllowed,
  initialPhase,
  maybeTransition,
  recordHatcher,
  validatePhaseConfig,
} from "./core/phase";
export {
  DEFAULT_DENOM_PREFIX,
  execute,
  executeBuy,
  executeSell,
  instantiate,
  query,
  queryCurveInfo,
  validateInstantiateMsg,
} from "./core/contract";
export { AbcContract, type RuntimeOptions } from "./core/runtime";
export { type CurveInfoJson, parseExecuteMsg, parseInstantiateMsg, parseQueryMsg } from "./schema";
export { MemoryStorage, type Storage } from "./infra/storage";
export { type ILogger, makeLogger } from "./logging";
export { type AppConfig, loadConfig } from "./config";
export type { Decimal } from "./types/brands";
