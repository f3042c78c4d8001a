import { AllowlistError, ConfigError } from "./errors";
import type { Address, CommonsPhase, CommonsPhaseConfig } from "./types";
import { MAX_U128 } from "./uint";

export const initialPhase = (): CommonsPhase => ({ kind: "hatch", hatchers: new Set() });

export const validatePhaseConfig = (config: CommonsPhaseConfig): void => {
  const { initialRaise, initialPrice, initialAllocation, reservePercentage } = config.hatch;
  const [min, max] = initialRaise;
  if (min < 0n || max > MAX_U128) {
    throw new ConfigError("Initial raise bounds must be 128-bit unsigned integers");
  }
  if (min > max) {
    throw new ConfigError(`Initial raise minimum (${min}) exceeds maximum (${max})`);
  }
  if (initialPrice < 0n || initialPrice > MAX_U128) {
    throw new ConfigError("Initial price must be a 128-bit unsigned integer");
  }
  if (!Number.isInteger(initialAllocation) || initialAllocation < 0) {
    throw new ConfigError("Initial allocation must be a non-negative integer");
  }
  if (!Number.isInteger(reservePercentage) || reservePercentage < 0 || reservePercentage > 100) {
    throw new ConfigError(`Reserve percentage must be within [0, 100], got ${reservePercentage}`);
  }
};

/**
 * Hatch admits allowlisted buyers only (everyone when no allowlist is set),
 * open admits everyone, closed admits nobody.
 */
export const assertBuyAllowed = (
  phase: CommonsPhase,
  config: CommonsPhaseConfig,
  buyer: Address,
): void => {
  switch (phase.kind) {
    case "hatch": {
      const { allowlist } = config.hatch;
      if (allowlist && !allowlist.has(buyer)) {
        throw new AllowlistError(`Address ${buyer} is not on the hatch allowlist`);
      }
      return;
    }
    case "open":
      return;
    case "closed":
      throw new AllowlistError("Commons is closed, no further purchases are accepted");
  }
};

export const recordHatcher = (phase: CommonsPhase, buyer: Address): CommonsPhase => {
  if (phase.kind !== "hatch" || phase.hatchers.has(buyer)) return phase;
  return { kind: "hatch", hatchers: new Set([...phase.hatchers, buyer]) };
};

/** Hatch -> Open once the raised reserve reaches the upper bound. */
export const maybeTransition = (
  phase: CommonsPhase,
  config: CommonsPhaseConfig,
  reserveTotal: bigint,
): CommonsPhase =>
  phase.kind === "hatch" && reserveTotal >= config.hatch.initialRaise[1]
    ? { kind: "open" }
    : phase;
