import type { Decimal } from "../types/brands";
import { DECIMAL_PLACES, fromAtomics, toAtomics } from "./decimal";
import { ConfigError } from "./errors";
import { pow10 } from "./uint";

export const MAX_TOKEN_DECIMALS = DECIMAL_PLACES;

/** Native precisions of the supply and reserve tokens. */
export interface DecimalPlaces {
  readonly supply: number;
  readonly reserve: number;
}

const checkPlaces = (which: string, places: number) => {
  if (!Number.isInteger(places) || places < 0 || places > MAX_TOKEN_DECIMALS) {
    throw new ConfigError(
      `${which} decimals must be an integer in [0, ${MAX_TOKEN_DECIMALS}], got ${places}`,
    );
  }
};

export const decimalPlaces = (supply: number, reserve: number): DecimalPlaces => {
  checkPlaces("supply", supply);
  checkPlaces("reserve", reserve);
  return { supply, reserve };
};

/** `10^decimals`: raw units per whole token. */
export const supplyUnit = (dp: DecimalPlaces): bigint => pow10(dp.supply);
export const reserveUnit = (dp: DecimalPlaces): bigint => pow10(dp.reserve);

/* raw token amount <-> fixed-point decimal */
export const fromSupply = (dp: DecimalPlaces, amount: bigint): Decimal =>
  fromAtomics(amount, dp.supply);

export const fromReserve = (dp: DecimalPlaces, amount: bigint): Decimal =>
  fromAtomics(amount, dp.reserve);

export const toSupply = (dp: DecimalPlaces, value: Decimal): bigint =>
  toAtomics(value, dp.supply);

export const toReserve = (dp: DecimalPlaces, value: Decimal): bigint =>
  toAtomics(value, dp.reserve);
