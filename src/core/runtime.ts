import { type AppConfig, loadConfig } from "../config";
import {
  type Storage,
  CURVE_STATE,
  MemoryStorage,
  loadSnapshot,
  saveSnapshot,
} from "../infra/storage";
import { type ILogger, makeLogger } from "../logging";
import {
  type CurveInfoJson,
  curveInfoToJson,
  parseExecuteMsg,
  parseInstantiateMsg,
  parseQueryMsg,
} from "../schema";
import { execute, instantiate, query } from "./contract";
import type { CurveFn } from "./curves";
import { AbcError, ConfigError } from "./errors";
import { type Hex, stateRoot } from "./hash";
import type { Address, MessageInfo, Response, Transition } from "./types";

export type RuntimeOptions = {
  contractAddress: Address;
  storage?: Storage;
  logger?: ILogger;
  config?: AppConfig;
  /** overrides the curve derived from the stored curve type */
  curveFn?: CurveFn;
};

/* ──────────── runtime shell ──────────── */
export class AbcContract {
  readonly storage: Storage;
  readonly contractAddress: Address;
  private readonly log: ILogger;
  private readonly config: AppConfig;
  private readonly curveFn?: CurveFn;

  constructor(opts: RuntimeOptions) {
    this.config = opts.config ?? loadConfig();
    this.contractAddress = opts.contractAddress;
    this.storage = opts.storage ?? new MemoryStorage();
    this.log = opts.logger ?? makeLogger(this.config.logLevel, this.config.prettyLogs);
    this.curveFn = opts.curveFn;
  }

  instantiate(info: MessageInfo, rawMsg: unknown): Response {
    return this.run("instantiate", info, () => {
      if (CURVE_STATE.mayLoad(this.storage) !== undefined) {
        throw new ConfigError("Contract is already instantiated");
      }
      const msg = parseInstantiateMsg(rawMsg);
      return instantiate(
        { contractAddress: this.contractAddress },
        info,
        msg,
        this.config.denomPrefix,
      );
    });
  }

  execute(info: MessageInfo, rawMsg: unknown): Response {
    return this.run("execute", info, () => {
      const msg = parseExecuteMsg(rawMsg);
      const snap = loadSnapshot(this.storage);
      return execute(snap, info, msg, this.curveFn);
    });
  }

  query(rawMsg: unknown): CurveInfoJson {
    const msg = parseQueryMsg(rawMsg);
    return curveInfoToJson(query(loadSnapshot(this.storage), msg, this.curveFn));
  }

  stateRoot(): Hex {
    return stateRoot(this.storage);
  }

  /* one call = one transaction: compute on a snapshot, write at the end */
  private run(op: string, info: MessageInfo, step: () => Transition): Response {
    this.log.debug({ op, sender: info.sender, funds: fundsToString(info) }, "call start");
    let result: Transition;
    try {
      result = step();
    } catch (err) {
      if (err instanceof AbcError) {
        this.log.warn({ op, sender: info.sender, kind: err.kind, reason: err.message }, "rejected");
      } else {
        this.log.error({ op, sender: info.sender, err }, "failed");
      }
      throw err;
    }

    const written = saveSnapshot(this.storage, result.snapshot);
    const { curveState, phase } = result.snapshot;
    this.log.info(
      {
        op,
        attributes: Object.fromEntries(result.response.attributes),
        reserve: curveState.reserve.toString(),
        supply: curveState.supply.toString(),
        phase: phase.kind,
        written,
        root: this.stateRoot(),
      },
      "commit",
    );
    return result.response;
  }
}

const fundsToString = (info: MessageInfo) =>
  info.funds.map((c) => `${c.amount}${c.denom}`).join(",");
