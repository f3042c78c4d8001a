import { describe, it, expect } from "vitest";
import { AllowlistError, ConfigError } from "../src/core/errors";
import {
  assertBuyAllowed,
  initialPhase,
  maybeTransition,
  recordHatcher,
  validatePhaseConfig,
} from "../src/core/phase";
import type { CommonsPhaseConfig } from "../src/core/types";
import { BUYER, INVESTOR } from "./helpers/contract";

const config = (allowlist?: string[]): CommonsPhaseConfig => ({
  hatch: {
    ...(allowlist ? { allowlist: new Set(allowlist) } : {}),
    initialRaise: [10n, 1000n],
    initialPrice: 1n,
    initialAllocation: 10,
    reservePercentage: 10,
  },
});

describe("phase state machine", () => {
  it("starts in hatch with no hatchers", () => {
    const phase = initialPhase();
    expect(phase.kind).toBe("hatch");
    expect(phase.kind === "hatch" && phase.hatchers.size).toBe(0);
  });

  it("lets anyone buy in hatch without an allowlist", () => {
    expect(() => assertBuyAllowed(initialPhase(), config(), BUYER)).not.toThrow();
  });

  it("enforces the allowlist during hatch only", () => {
    const cfg = config([INVESTOR]);
    expect(() => assertBuyAllowed(initialPhase(), cfg, INVESTOR)).not.toThrow();
    expect(() => assertBuyAllowed(initialPhase(), cfg, BUYER)).toThrow(AllowlistError);
    expect(() => assertBuyAllowed({ kind: "open" }, cfg, BUYER)).not.toThrow();
  });

  it("treats an empty allowlist as admitting nobody", () => {
    expect(() => assertBuyAllowed(initialPhase(), config([]), INVESTOR)).toThrow(AllowlistError);
  });

  it("rejects every buyer once closed", () => {
    expect(() => assertBuyAllowed({ kind: "closed" }, config(), INVESTOR)).toThrow(
      "Commons is closed",
    );
  });

  it("records hatchers with set semantics", () => {
    const once = recordHatcher(initialPhase(), INVESTOR);
    const twice = recordHatcher(once, INVESTOR);
    expect(twice).toBe(once);
    const both = recordHatcher(twice, BUYER);
    expect(both.kind === "hatch" && [...both.hatchers].sort()).toEqual([BUYER, INVESTOR]);
    expect(recordHatcher({ kind: "open" }, INVESTOR)).toEqual({ kind: "open" });
  });

  it("opens when the raise reaches its maximum", () => {
    const hatch = recordHatcher(initialPhase(), INVESTOR);
    expect(maybeTransition(hatch, config(), 999n)).toBe(hatch);
    expect(maybeTransition(hatch, config(), 1000n)).toEqual({ kind: "open" });
    expect(maybeTransition({ kind: "open" }, config(), 0n)).toEqual({ kind: "open" });
    expect(maybeTransition({ kind: "closed" }, config(), 5000n)).toEqual({ kind: "closed" });
  });
});

describe("validatePhaseConfig", () => {
  it("accepts min == max", () => {
    const cfg = config();
    expect(() =>
      validatePhaseConfig({ hatch: { ...cfg.hatch, initialRaise: [5n, 5n] } }),
    ).not.toThrow();
  });

  it("rejects inverted raise bounds and percentages over 100", () => {
    const cfg = config();
    expect(() =>
      validatePhaseConfig({ hatch: { ...cfg.hatch, initialRaise: [6n, 5n] } }),
    ).toThrow(ConfigError);
    expect(() =>
      validatePhaseConfig({ hatch: { ...cfg.hatch, reservePercentage: 101 } }),
    ).toThrow("Reserve percentage must be within [0, 100], got 101");
  });
});
