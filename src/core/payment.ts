import { PaymentError } from "./errors";
import type { MessageInfo } from "./types";

export const nonpayable = (info: MessageInfo): void => {
  if (info.funds.length > 0) {
    throw new PaymentError("non_payable", "This message does not accept funds");
  }
};

/** Exactly one nonzero coin of `denom`; returns its amount. */
export const mustPay = (info: MessageInfo, denom: string): bigint => {
  if (info.funds.length === 0) throw new PaymentError("no_funds", "No funds sent");
  if (info.funds.length > 1) {
    throw new PaymentError("multiple_denoms", "Sent more than one denomination");
  }
  const [coin] = info.funds;
  if (coin.amount === 0n) throw new PaymentError("no_funds", "No funds sent");
  if (coin.denom !== denom) {
    throw new PaymentError("missing_denom", `Must send '${denom}' to complete this transaction`);
  }
  return coin.amount;
};
