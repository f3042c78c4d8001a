import { type CurveFn, toCurveFn, validateCurveType } from "./curves";
import { ConfigError, PaymentError } from "./errors";
import { decimalPlaces } from "./normalize";
import { nonpayable, mustPay } from "./payment";
import {
  assertBuyAllowed,
  initialPhase,
  maybeTransition,
  recordHatcher,
  validatePhaseConfig,
} from "./phase";
import { newCurveState } from "./state";
import type {
  ContractSnapshot,
  CurveInfoResponse,
  Env,
  ExecuteMsg,
  InstantiateMsg,
  MessageInfo,
  QueryMsg,
  Transition,
} from "./types";
import { checkedAdd, checkedSub } from "./uint";

/*
 * Pure contract core. Every entry point takes the loaded snapshot and
 * returns the next one plus the intents to carry out; inputs are never
 * mutated, so a throw anywhere leaves the caller's state as it was.
 */

export const DEFAULT_DENOM_PREFIX = "factory";

export const supplyDenomFor = (prefix: string, contract: string, subdenom: string) =>
  `${prefix}/${contract}/${subdenom}`;

export const validateInstantiateMsg = (msg: InstantiateMsg): void => {
  if (msg.supply.subdenom.length === 0) {
    throw new ConfigError("Token subdenom must not be empty.");
  }
  if (msg.reserve.denom.length === 0) {
    throw new ConfigError("Reserve denom must not be empty.");
  }
  validateCurveType(msg.curveType);
  validatePhaseConfig(msg.phaseConfig);
};

export const instantiate = (
  env: Env,
  info: MessageInfo,
  msg: InstantiateMsg,
  denomPrefix: string = DEFAULT_DENOM_PREFIX,
): Transition => {
  nonpayable(info);
  validateInstantiateMsg(msg);

  const { supply, reserve, curveType, phaseConfig } = msg;
  const supplyDenom = supplyDenomFor(denomPrefix, env.contractAddress, supply.subdenom);
  const decimals = decimalPlaces(supply.decimals, reserve.decimals);

  return {
    snapshot: {
      curveState: newCurveState(reserve.denom, decimals),
      curveType,
      phaseConfig,
      phase: initialPhase(),
      supplyDenom,
    },
    response: {
      effects: [{ type: "createDenom", subdenom: supply.subdenom, metadata: supply.metadata }],
      attributes: [
        ["action", "instantiate"],
        ["supply_denom", supplyDenom],
      ],
    },
  };
};

export const executeBuy = (
  snap: ContractSnapshot,
  info: MessageInfo,
  curveFn: CurveFn = toCurveFn(snap.curveType),
): Transition => {
  const { curveState, phaseConfig } = snap;
  const payment = mustPay(info, curveState.reserveDenom);

  assertBuyAllowed(snap.phase, phaseConfig, info.sender);
  const hatched = recordHatcher(snap.phase, info.sender);

  const curve = curveFn(curveState.decimals);
  const reserve = checkedAdd(curveState.reserve, payment);
  const supply = curve.supply(reserve);
  // supply is monotonic in reserve; a shortfall means the stored state is off-curve
  const minted = checkedSub(supply, curveState.supply);

  const phase = maybeTransition(hatched, phaseConfig, reserve);
  const opened = hatched.kind === "hatch" && phase.kind === "open";

  return {
    snapshot: { ...snap, curveState: { ...curveState, reserve, supply }, phase },
    response: {
      effects: [
        { type: "mint", denom: snap.supplyDenom, amount: minted, recipient: info.sender },
      ],
      attributes: [
        ["action", "buy"],
        ["from", info.sender],
        ["reserve", payment.toString()],
        ["supply", minted.toString()],
        ...(opened ? [["phase", "open"] as const] : []),
      ],
    },
  };
};

/**
 * Burns `amount` supply tokens and releases the reserve they no longer back.
 * The attached supply-token payment must equal `amount`.
 */
export const executeSell = (
  snap: ContractSnapshot,
  info: MessageInfo,
  amount: bigint,
  curveFn: CurveFn = toCurveFn(snap.curveType),
): Transition => {
  const { curveState, supplyDenom } = snap;
  const payment = mustPay(info, supplyDenom);
  if (payment !== amount) {
    throw new PaymentError(
      "amount_mismatch",
      `Burn amount ${amount} does not match the ${payment} ${supplyDenom} attached`,
    );
  }

  const curve = curveFn(curveState.decimals);
  const supply = checkedSub(curveState.supply, amount);
  const reserve = curve.reserve(supply);
  const released = checkedSub(curveState.reserve, reserve);

  return {
    snapshot: { ...snap, curveState: { ...curveState, reserve, supply } },
    response: {
      effects: [
        { type: "burn", denom: supplyDenom, amount, burnFrom: info.sender },
        {
          type: "transfer",
          recipient: info.sender,
          denom: curveState.reserveDenom,
          amount: released,
        },
      ],
      attributes: [
        ["action", "burn"],
        ["from", info.sender],
        ["supply", amount.toString()],
        ["reserve", released.toString()],
      ],
    },
  };
};

export const execute = (
  snap: ContractSnapshot,
  info: MessageInfo,
  msg: ExecuteMsg,
  curveFn: CurveFn = toCurveFn(snap.curveType),
): Transition => {
  switch (msg.type) {
    case "buy":
      return executeBuy(snap, info, curveFn);
    case "burn":
      return executeSell(snap, info, msg.amount, curveFn);
  }
};

export const queryCurveInfo = (
  snap: ContractSnapshot,
  curveFn: CurveFn = toCurveFn(snap.curveType),
): CurveInfoResponse => {
  const { reserve, supply, reserveDenom, decimals } = snap.curveState;
  return {
    reserve,
    supply,
    spotPrice: curveFn(decimals).spotPrice(supply),
    reserveDenom,
  };
};

export const query = (
  snap: ContractSnapshot,
  msg: QueryMsg,
  curveFn: CurveFn = toCurveFn(snap.curveType),
): CurveInfoResponse => {
  switch (msg.type) {
    case "curveInfo":
      return queryCurveInfo(snap, curveFn);
  }
};
