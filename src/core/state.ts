import type { DecimalPlaces } from "./normalize";
import type { CurveState } from "./types";

export const newCurveState = (reserveDenom: string, decimals: DecimalPlaces): CurveState => ({
  reserve: 0n,
  supply: 0n,
  reserveDenom,
  decimals,
});
