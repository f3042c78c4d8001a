export type AbcErrorKind =
  | "config"
  | "payment"
  | "allowlist"
  | "overflow"
  | "curve_domain"
  | "storage";

export class AbcError extends Error {
  constructor(
    readonly kind: AbcErrorKind,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid instantiation parameters or malformed messages. */
export class ConfigError extends AbcError {
  constructor(message: string) {
    super("config", message);
  }
}

export type PaymentErrorReason =
  | "no_funds"
  | "missing_denom"
  | "multiple_denoms"
  | "non_payable"
  | "amount_mismatch";

export class PaymentError extends AbcError {
  constructor(
    readonly reason: PaymentErrorReason,
    message: string,
  ) {
    super("payment", message);
  }
}

export class AllowlistError extends AbcError {
  constructor(message: string) {
    super("allowlist", message);
  }
}

export type OverflowOperation = "add" | "sub" | "mul" | "div" | "range";

export class OverflowError extends AbcError {
  constructor(
    readonly operation: OverflowOperation,
    readonly left: bigint,
    readonly right: bigint,
  ) {
    super(
      "overflow",
      operation === "range"
        ? `Value ${left} exceeds maximum ${right}`
        : `Cannot ${operation} with ${left} and ${right}`,
    );
  }
}

export class CurveDomainError extends AbcError {
  constructor(message: string) {
    super("curve_domain", message);
  }
}

/** Missing or undecodable persisted slot. */
export class StorageError extends AbcError {
  constructor(message: string) {
    super("storage", message);
  }
}
