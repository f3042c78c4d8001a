import { object, optional, picklist, pipe, string, minLength, safeParse, transform } from "valibot";
import { DEFAULT_DENOM_PREFIX } from "./core/contract";
import { ConfigError } from "./core/errors";
import { describeIssues } from "./schema";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = object({
  LOG_LEVEL: optional(picklist(LEVELS), "info"),
  LOG_PRETTY: pipe(
    optional(picklist(["true", "false", "1", "0"]), "false"),
    transform((v) => v === "true" || v === "1"),
  ),
  ABC_DENOM_PREFIX: optional(pipe(string(), minLength(1)), DEFAULT_DENOM_PREFIX),
});

export type AppConfig = {
  logLevel: (typeof LEVELS)[number];
  prettyLogs: boolean;
  denomPrefix: string;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const res = safeParse(envSchema, env);
  if (!res.success) throw new ConfigError(`Invalid environment: ${describeIssues(res.issues)}`);
  const { LOG_LEVEL, LOG_PRETTY, ABC_DENOM_PREFIX } = res.output;
  return { logLevel: LOG_LEVEL, prettyLogs: LOG_PRETTY, denomPrefix: ABC_DENOM_PREFIX };
};
