import { beforeEach, describe, expect, it } from "vitest";
import { AbcContract } from "../src/core/runtime";
import { AllowlistError, ConfigError, PaymentError } from "../src/core/errors";
import { MemoryStorage, PHASE } from "../src/infra/storage";
import { asDecimal } from "../src/types/brands";
import { BUYER, CONTRACT, CREATOR, INVESTOR, SUPPLY_DENOM, pay } from "./helpers/contract";
import { captureLogger } from "./helpers/logger";
import { instantiateJson, testConfig } from "./helpers/wire";

const LINEAR = { linear: { slope: "1", scale: 1 } };
const SQRT = { square_root: { slope: "1", scale: 1 } };
const creator = { sender: CREATOR, funds: [] };

const fresh = (opts: { storage?: MemoryStorage } = {}) => {
  const logger = captureLogger();
  const contract = new AbcContract({
    contractAddress: CONTRACT,
    config: testConfig,
    logger,
    ...opts,
  });
  return { contract, logger };
};

describe("AbcContract", () => {
  let contract: AbcContract;
  let logger: ReturnType<typeof captureLogger>;

  beforeEach(() => {
    ({ contract, logger } = fresh());
  });

  describe("instantiate", () => {
    it("creates the supply denom and starts empty", () => {
      const res = contract.instantiate(creator, instantiateJson(SQRT));

      expect(res.effects).toHaveLength(1);
      expect(res.effects[0]).toMatchObject({ type: "createDenom", subdenom: "epoxy" });
      expect(res.attributes).toEqual([
        ["action", "instantiate"],
        ["supply_denom", SUPPLY_DENOM],
      ]);
      expect(contract.query({ curve_info: {} })).toEqual({
        reserve: "0",
        supply: "0",
        spot_price: "0",
        reserve_denom: "satoshi",
      });
    });

    it("rejects attached funds", () => {
      const err = (() => {
        try {
          contract.instantiate(pay(CREATOR, 10n), instantiateJson(SQRT));
        } catch (e) {
          return e;
        }
      })();
      expect(err).toBeInstanceOf(PaymentError);
      expect(err).toMatchObject({ reason: "non_payable" });
      expect([...contract.storage.keys()]).toEqual([]);
    });

    it("refuses to run twice", () => {
      contract.instantiate(creator, instantiateJson(SQRT));
      expect(() => contract.instantiate(creator, instantiateJson(LINEAR))).toThrow(
        "Contract is already instantiated",
      );
    });

    it("rejects a malformed message", () => {
      expect(() =>
        contract.instantiate(creator, instantiateJson({ cubic: { slope: "1", scale: 1 } })),
      ).toThrow(ConfigError);
    });
  });

  describe("execute", () => {
    it("records a tiny hatch purchase without minting", () => {
      contract.instantiate(creator, instantiateJson(SQRT));
      const res = contract.execute(pay(INVESTOR, 1n), { buy: {} });

      expect(res.effects).toEqual([
        { type: "mint", denom: SUPPLY_DENOM, amount: 0n, recipient: INVESTOR },
      ]);
      expect(contract.query({ curve_info: {} })).toMatchObject({ reserve: "1", supply: "0" });
      expect(PHASE.load(contract.storage)).toEqual({
        kind: "hatch",
        hatchers: new Set([INVESTOR]),
      });
    });

    it("buys, opens, and burns along the linear curve", () => {
      contract.instantiate(creator, instantiateJson(LINEAR));

      const first = contract.execute(pay(INVESTOR, 500_000_000n), { buy: {} });
      expect(first.attributes).toContainEqual(["phase", "open"]);
      contract.execute(pay(BUYER, 1_500_000_000n), { buy: {} });
      expect(contract.query({ curve_info: {} })).toMatchObject({
        reserve: "2000000000",
        supply: "2000",
        spot_price: "2",
      });

      const burn = contract.execute(pay(BUYER, 1000n, SUPPLY_DENOM), {
        burn: { amount: "1000" },
      });
      expect(burn.effects[1]).toEqual({
        type: "transfer",
        recipient: BUYER,
        denom: "satoshi",
        amount: 1_500_000_000n,
      });
      expect(contract.query({ curve_info: {} })).toEqual({
        reserve: "500000000",
        supply: "1000",
        spot_price: "1",
        reserve_denom: "satoshi",
      });
    });

    it("leaves storage untouched when a call is rejected", () => {
      contract.instantiate(creator, instantiateJson(LINEAR, { allowlist: [INVESTOR] }));
      const root = contract.stateRoot();

      expect(() => contract.execute(pay(BUYER, 100n), { buy: {} })).toThrow(AllowlistError);
      expect(contract.stateRoot()).toBe(root);
    });

    it("rejects purchases once closed", () => {
      contract.instantiate(creator, instantiateJson(LINEAR));
      PHASE.save(contract.storage, { kind: "closed" });
      const root = contract.stateRoot();

      expect(() => contract.execute(pay(INVESTOR, 100n), { buy: {} })).toThrow(
        "Commons is closed, no further purchases are accepted",
      );
      expect(contract.stateRoot()).toBe(root);
    });

    it("rejects a malformed execute message", () => {
      contract.instantiate(creator, instantiateJson(LINEAR));
      expect(() => contract.execute(pay(INVESTOR, 1n), { sell: {} })).toThrow(ConfigError);
      expect(() =>
        contract.execute(pay(INVESTOR, 1n), { burn: { amount: "-1" } }),
      ).toThrow(ConfigError);
    });

    it("prices with an injected curve", () => {
      const custom = new AbcContract({
        contractAddress: CONTRACT,
        config: testConfig,
        logger: captureLogger(),
        curveFn: () => ({
          spotPrice: () => asDecimal(7n * 10n ** 18n),
          reserve: (supply) => supply,
          supply: () => 500n,
        }),
      });
      custom.instantiate(creator, instantiateJson(LINEAR));
      const res = custom.execute(pay(INVESTOR, 10n), { buy: {} });

      expect(res.effects[0]).toMatchObject({ type: "mint", amount: 500n });
      expect(custom.query({ curve_info: {} })).toMatchObject({ supply: "500", spot_price: "7" });
    });
  });

  describe("state root", () => {
    it("is a keccak hex digest that follows the operations, not the instance", () => {
      const other = fresh({ storage: new MemoryStorage() }).contract;
      for (const c of [contract, other]) {
        c.instantiate(creator, instantiateJson(LINEAR));
        c.execute(pay(INVESTOR, 500_000_000n), { buy: {} });
      }

      expect(contract.stateRoot()).toMatch(/^0x[0-9a-f]{64}$/);
      expect(contract.stateRoot()).toBe(other.stateRoot());

      other.execute(pay(BUYER, 1n), { buy: {} });
      expect(contract.stateRoot()).not.toBe(other.stateRoot());
    });
  });

  describe("logging", () => {
    it("logs commits and rejections", () => {
      contract.instantiate(
        creator,
        instantiateJson(LINEAR, { allowlist: [INVESTOR], initial_raise: ["1", "1000"] }),
      );
      contract.execute(pay(INVESTOR, 100n), { buy: {} });
      expect(() => contract.execute(pay(BUYER, 100n), { buy: {} })).toThrow();

      const commits = logger.lines.filter((l) => l.msg === "commit");
      expect(commits.map((l) => l.level)).toEqual(["info", "info"]);
      expect(commits[1]?.obj).toMatchObject({
        op: "execute",
        reserve: "100",
        phase: "hatch",
        written: ["curve_state", "phase"],
      });

      const rejected = logger.lines.filter((l) => l.msg === "rejected");
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toMatchObject({
        level: "warn",
        obj: { op: "execute", sender: BUYER, kind: "allowlist" },
      });
    });
  });
});
