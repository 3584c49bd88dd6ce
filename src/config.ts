import {
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  string,
  transform,
  minLength,
} from "valibot";
import { fail } from "./core/errors";
import type { LogLevel } from "./logging";
import type { TruncationPolicy } from "./core/types";

const bool = (fallback: "true" | "false") =>
  pipe(
    optional(picklist(["true", "false"]), fallback),
    transform((v) => v === "true"),
  );

const envSchema = object({
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: bool("true"),
  APPCHAIN_CHECK_PREV_BLOCK_HASH: bool("true"),
  APPCHAIN_MESSAGE_TRUNCATION: optional(picklist(["lenient", "strict"]), "lenient"),
  APPCHAIN_STATE_FILE: optional(pipe(string(), minLength(1))),
});

export type AppchainConfig = {
  logLevel: LogLevel;
  logPretty: boolean;
  checkPrevBlockHash: boolean;
  truncation: TruncationPolicy;
  stateFile?: string;
};

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): AppchainConfig => {
  const res = safeParse(envSchema, env);
  if (!res.success) {
    const keys = res.issues.map(
      (i) => i.path?.map((p) => String(p.key)).join(".") ?? "?",
    );
    return fail("InvalidConfig", `invalid environment: ${keys.join(", ")}`, {
      keys,
    });
  }
  const e = res.output;
  return {
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    checkPrevBlockHash: e.APPCHAIN_CHECK_PREV_BLOCK_HASH,
    truncation: e.APPCHAIN_MESSAGE_TRUNCATION,
    stateFile: e.APPCHAIN_STATE_FILE,
  };
};
