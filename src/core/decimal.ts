import { asDecimal, type Decimal } from "../types/brands";
import { CurveDomainError } from "./errors";
import { assertU128, checkedMul, pow10 } from "./uint";

/*
 * 18-place fixed-point values over 128-bit atomics, used for prices and
 * for reading token amounts as whole-token quantities. Conversions floor.
 */

export const DECIMAL_PLACES = 18;
const ONE = pow10(DECIMAL_PLACES);

/** `atomics / 10^places`; `places` comes from a validated `DecimalPlaces`. */
export const fromAtomics = (atomics: bigint, places: number): Decimal =>
  asDecimal(checkedMul(assertU128(atomics), pow10(DECIMAL_PLACES - places)));

/** Floors `d * 10^places` back into an integer amount. */
export const toAtomics = (d: Decimal, places: number): bigint =>
  (d * pow10(places)) / ONE;

export const formatDecimal = (d: Decimal): string => {
  const whole = d / ONE;
  const frac = (d % ONE).toString().padStart(DECIMAL_PLACES, "0").replace(/0+$/, "");
  return frac ? `${whole}.${frac}` : whole.toString();
};

export const parseDecimal = (s: string): Decimal => {
  const m = /^(\d+)(?:\.(\d{1,18}))?$/.exec(s);
  if (!m) throw new CurveDomainError(`invalid decimal: "${s}"`);
  const [, whole, frac = ""] = m;
  const atomics = BigInt(whole) * ONE + BigInt(frac.padEnd(DECIMAL_PLACES, "0"));
  return asDecimal(assertU128(atomics));
};
