// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

/** 18-place fixed-point number, stored as its integer atomics. */
export type Decimal = Brand<bigint, "Decimal">;

export const asDecimal = (atomics: bigint): Decimal => atomics as Decimal;
