import { asDecimal, type Decimal } from "../types/brands";
import { DECIMAL_PLACES } from "./decimal";
import { ConfigError, CurveDomainError } from "./errors";
import { type DecimalPlaces, reserveUnit, supplyUnit } from "./normalize";
import { MAX_U128, assertU128, icbrt, isqrt, pow10 } from "./uint";

/**
 * Closed set of pricing curves. Each parameter reads as `value / 10^scale`.
 */
export type CurveType =
  | { readonly kind: "constant"; readonly value: bigint; readonly scale: number }
  | { readonly kind: "linear"; readonly slope: bigint; readonly scale: number }
  | { readonly kind: "squareRoot"; readonly slope: bigint; readonly scale: number };

/**
 * Maps supply <-> reserve <-> price over raw integer token amounts.
 * All three are monotonically non-decreasing, and
 * `supply(reserve(s)) <= s <= supply(reserve(s) + 1)`.
 */
export interface Curve {
  spotPrice(supply: bigint): Decimal;
  reserve(supply: bigint): bigint;
  supply(reserve: bigint): bigint;
}

/** Builds a curve once the token precisions are known. */
export type CurveFn = (decimals: DecimalPlaces) => Curve;

/*
 * Every formula runs over unbounded integers and floors once, at the end:
 * with x = s / 10^sd, r = R / 10^rd and k = K / 10^sc, each result is the
 * floor of the exact value.
 */

const ONE = pow10(DECIMAL_PLACES);

const coefficient = (t: CurveType): bigint => {
  const k = t.kind === "constant" ? t.value : t.slope;
  if (k <= 0n) throw new CurveDomainError(`${t.kind} curve parameter must be positive`);
  return k;
};

export const spotPrice = (t: CurveType, dp: DecimalPlaces, supply: bigint): Decimal => {
  const k = coefficient(t);
  const kScale = pow10(t.scale);
  const sUnit = supplyUnit(dp);
  switch (t.kind) {
    case "constant":
      return asDecimal(assertU128((k * ONE) / kScale, "spot price"));
    case "linear":
      return asDecimal(assertU128((k * supply * ONE) / (kScale * sUnit), "spot price"));
    // k * sqrt(x) = sqrt(k^2 * x)
    case "squareRoot":
      return asDecimal(
        assertU128(isqrt((k * k * ONE * ONE * supply) / (kScale * kScale * sUnit)), "spot price"),
      );
  }
};

export const reserveFor = (t: CurveType, dp: DecimalPlaces, supply: bigint): bigint => {
  const k = coefficient(t);
  const kScale = pow10(t.scale);
  const sUnit = supplyUnit(dp);
  const rUnit = reserveUnit(dp);
  switch (t.kind) {
    case "constant":
      return assertU128((k * supply * rUnit) / (kScale * sUnit), "reserve");
    // k * x^2 / 2
    case "linear":
      return assertU128((k * supply * supply * rUnit) / (2n * kScale * sUnit * sUnit), "reserve");
    // 2/3 * k * x^1.5 = sqrt(4k^2 * x^3 / 9)
    case "squareRoot": {
      const num = 2n * k * rUnit;
      const den = 3n * kScale;
      return assertU128(
        isqrt((num * num * supply ** 3n) / (den * den * sUnit ** 3n)),
        "reserve",
      );
    }
  }
};

export const supplyFor = (t: CurveType, dp: DecimalPlaces, reserve: bigint): bigint => {
  const k = coefficient(t);
  const kScale = pow10(t.scale);
  const sUnit = supplyUnit(dp);
  const rUnit = reserveUnit(dp);
  switch (t.kind) {
    case "constant":
      return assertU128((reserve * kScale * sUnit) / (k * rUnit), "supply");
    // (2r / k)^0.5
    case "linear":
      return assertU128(isqrt((2n * reserve * kScale * sUnit * sUnit) / (k * rUnit)), "supply");
    // (3r / 2k)^(2/3)
    case "squareRoot": {
      const num = 3n * reserve * kScale;
      const den = 2n * k * rUnit;
      return assertU128(icbrt((num * num * sUnit ** 3n) / (den * den)), "supply");
    }
  }
};

export const toCurveFn =
  (t: CurveType): CurveFn =>
  (decimals) => ({
    spotPrice: (supply) => spotPrice(t, decimals, supply),
    reserve: (supply) => reserveFor(t, decimals, supply),
    supply: (reserve) => supplyFor(t, decimals, reserve),
  });

export const validateCurveType = (t: CurveType): void => {
  const [name, amount]: [string, bigint] =
    t.kind === "constant" ? ["value", t.value] : ["slope", t.slope];
  if (amount <= 0n || amount > MAX_U128) {
    throw new ConfigError(`${t.kind} curve ${name} must be a positive 128-bit integer`);
  }
  if (!Number.isInteger(t.scale) || t.scale < 0 || t.scale > DECIMAL_PLACES) {
    throw new ConfigError(`curve scale must be an integer in [0, ${DECIMAL_PLACES}]`);
  }
};
