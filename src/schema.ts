import {
  array,
  check,
  integer,
  maxValue,
  minValue,
  nullish,
  number,
  object,
  pipe,
  regex,
  safeParse,
  strictObject,
  string,
  transform,
  tuple,
  union,
  type BaseIssue,
  type GenericSchema,
  type InferOutput,
} from "valibot";
import type { CurveType } from "./core/curves";
import { ConfigError } from "./core/errors";
import { formatDecimal } from "./core/decimal";
import type {
  CurveInfoResponse,
  ExecuteMsg,
  InstantiateMsg,
  Metadata,
  QueryMsg,
} from "./core/types";
import { MAX_U128 } from "./core/uint";

/*
 * Wire (JSON) shapes: snake_case keys, Uint128 as decimal strings,
 * enum variants externally tagged: `{ "linear": { ... } }`.
 */

const uint128Schema = pipe(
  string(),
  regex(/^\d+$/, "expected an unsigned integer string"),
  transform((s) => BigInt(s)),
  check((n) => n <= MAX_U128, "exceeds 128-bit range"),
);

const u8Schema = pipe(number(), integer(), minValue(0), maxValue(255));
const optString = nullish(string());

const metadataSchema = object({
  name: optString,
  symbol: optString,
  description: optString,
  denom_units: nullish(
    array(
      object({
        denom: string(),
        exponent: pipe(number(), integer(), minValue(0)),
        aliases: nullish(array(string())),
      }),
    ),
  ),
  base: optString,
  display: optString,
});

const curveParams = object({ scale: u8Schema });

const curveTypeSchema = union([
  strictObject({ constant: object({ ...curveParams.entries, value: uint128Schema }) }),
  strictObject({ linear: object({ ...curveParams.entries, slope: uint128Schema }) }),
  strictObject({ square_root: object({ ...curveParams.entries, slope: uint128Schema }) }),
]);

const hatchConfigSchema = object({
  allowlist: nullish(array(string())),
  initial_raise: tuple([uint128Schema, uint128Schema]),
  initial_price: uint128Schema,
  initial_allocation: u8Schema,
  reserve_percentage: u8Schema,
});

const instantiateMsgSchema = object({
  supply: object({
    subdenom: string(),
    decimals: u8Schema,
    metadata: metadataSchema,
  }),
  reserve: object({ denom: string(), decimals: u8Schema }),
  curve_type: curveTypeSchema,
  phase_config: object({ hatch: hatchConfigSchema }),
});

const executeMsgSchema = union([
  strictObject({ buy: object({}) }),
  strictObject({ burn: object({ amount: uint128Schema }) }),
]);

const queryMsgSchema = strictObject({ curve_info: object({}) });

type InstantiateMsgJson = InferOutput<typeof instantiateMsgSchema>;

/* ── wire -> core ────────────────────────────────────────── */

/** Leaf issue messages, prefixed by their dotted path. */
export const describeIssues = (issues: readonly BaseIssue<unknown>[]): string =>
  issues
    .map((i) =>
      i.issues
        ? describeIssues(i.issues)
        : `${i.path?.map((p) => String(p.key)).join(".") || "$"}: ${i.message}`,
    )
    .join("; ");

const parse = <S extends GenericSchema>(
  schema: S,
  what: string,
  input: unknown,
): InferOutput<S> => {
  const res = safeParse(schema, input);
  if (!res.success) throw new ConfigError(`Invalid ${what}: ${describeIssues(res.issues)}`);
  return res.output;
};

const toMetadata = (m: InstantiateMsgJson["supply"]["metadata"]): Metadata => ({
  name: m.name ?? undefined,
  symbol: m.symbol ?? undefined,
  description: m.description ?? undefined,
  denomUnits: (m.denom_units ?? []).map((u) => ({
    denom: u.denom,
    exponent: u.exponent,
    aliases: u.aliases ?? [],
  })),
  base: m.base ?? undefined,
  display: m.display ?? undefined,
});

const toCurveType = (c: InstantiateMsgJson["curve_type"]): CurveType => {
  if ("constant" in c) return { kind: "constant", ...c.constant };
  if ("linear" in c) return { kind: "linear", ...c.linear };
  return { kind: "squareRoot", ...c.square_root };
};

export const parseInstantiateMsg = (input: unknown): InstantiateMsg => {
  const msg = parse(instantiateMsgSchema, "instantiate message", input);
  const hatch = msg.phase_config.hatch;
  return {
    supply: {
      subdenom: msg.supply.subdenom,
      decimals: msg.supply.decimals,
      metadata: toMetadata(msg.supply.metadata),
    },
    reserve: msg.reserve,
    curveType: toCurveType(msg.curve_type),
    phaseConfig: {
      hatch: {
        ...(hatch.allowlist ? { allowlist: new Set(hatch.allowlist) } : {}),
        initialRaise: hatch.initial_raise,
        initialPrice: hatch.initial_price,
        initialAllocation: hatch.initial_allocation,
        reservePercentage: hatch.reserve_percentage,
      },
    },
  };
};

export const parseExecuteMsg = (input: unknown): ExecuteMsg => {
  const msg = parse(executeMsgSchema, "execute message", input);
  return "burn" in msg ? { type: "burn", amount: msg.burn.amount } : { type: "buy" };
};

export const parseQueryMsg = (input: unknown): QueryMsg => {
  parse(queryMsgSchema, "query message", input);
  return { type: "curveInfo" };
};

/* ── core -> wire ────────────────────────────────────────── */

export type CurveInfoJson = {
  reserve: string;
  supply: string;
  spot_price: string;
  reserve_denom: string;
};

export const curveInfoToJson = (r: CurveInfoResponse): CurveInfoJson => ({
  reserve: r.reserve.toString(),
  supply: r.supply.toString(),
  spot_price: formatDecimal(r.spotPrice),
  reserve_denom: r.reserveDenom,
});
