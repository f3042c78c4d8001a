import { CurveDomainError, OverflowError } from "./errors";

export const MAX_U128 = 2n ** 128n - 1n;

export const assertU128 = (value: bigint, what = "amount"): bigint => {
  if (value < 0n) throw new CurveDomainError(`${what} must not be negative: ${value}`);
  if (value > MAX_U128) throw new OverflowError("range", value, MAX_U128);
  return value;
};

export const checkedAdd = (a: bigint, b: bigint): bigint => {
  const sum = a + b;
  if (sum > MAX_U128) throw new OverflowError("add", a, b);
  return sum;
};

export const checkedSub = (a: bigint, b: bigint): bigint => {
  if (b > a) throw new OverflowError("sub", a, b);
  return a - b;
};

export const checkedMul = (a: bigint, b: bigint): bigint => {
  const product = a * b;
  if (product > MAX_U128) throw new OverflowError("mul", a, b);
  return product;
};

export const pow10 = (exp: number): bigint => 10n ** BigInt(exp);

/* ── integer roots (floor) ───────────────────────────────── */

export const isqrt = (value: bigint): bigint => {
  if (value < 0n) throw new CurveDomainError("Square root of negative number");
  if (value === 0n) return 0n;

  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
};

export const icbrt = (value: bigint): bigint => {
  if (value < 0n) throw new CurveDomainError("Cube root of negative number");
  if (value === 0n) return 0n;

  // 2^ceil(bits/3) is never below the root, so the iteration descends onto floor(cbrt)
  let x = 1n << BigInt(Math.ceil(value.toString(2).length / 3));
  let y = (2n * x + value / (x * x)) / 3n;
  while (y < x) {
    x = y;
    y = (2n * x + value / (x * x)) / 3n;
  }
  return x;
};
