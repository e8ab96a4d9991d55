import { config as loadDotenvFile } from "dotenv";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { RedactionPolicyName } from "../pii/types.js";
import { resolveStateDir } from "./paths.js";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Bucket names become directory names under the uploads dir
const BUCKET_NAME = /^[a-z0-9][a-z0-9._-]{1,62}$/;

const booleanish = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  INTAKE_STATE_DIR: z.string().optional(),
  RAW_BUCKET: z.string().regex(BUCKET_NAME, "must be a lowercase bucket name").default("raw-uploads"),
  PROCESSED_BUCKET: z
    .string()
    .regex(BUCKET_NAME, "must be a lowercase bucket name")
    .default("processed-uploads"),
  REDACTION_POLICY: z.enum(["default", "strict"]).default("default"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: booleanish.default("false"),
});

export type IntakeConfig = {
  stateDir: string;
  rawBucket: string;
  processedBucket: string;
  redactionPolicy: RedactionPolicyName;
  logLevel: LogLevel;
  logPretty: boolean;
};

// Unset and blank variables both fall back to their defaults
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value.trim();
    }
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IntakeConfig {
  const parsed = EnvSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join("; ")}`, problems);
  }
  const values = parsed.data;
  return {
    stateDir: resolveStateDir(env),
    rawBucket: values.RAW_BUCKET,
    processedBucket: values.PROCESSED_BUCKET,
    redactionPolicy: values.REDACTION_POLICY,
    logLevel: values.LOG_LEVEL,
    logPretty: values.LOG_PRETTY,
  };
}

/**
 * Logging settings only. Never throws: an unusable LOG_LEVEL or LOG_PRETTY
 * falls back to its default so the logger can always be built.
 */
export function loadLoggingSettings(env: NodeJS.ProcessEnv = process.env): {
  level: LogLevel;
  pretty: boolean;
} {
  const values = definedEntries(env);
  const level = EnvSchema.shape.LOG_LEVEL.catch("info").parse(values.LOG_LEVEL);
  const pretty = booleanish.catch(false).parse(values.LOG_PRETTY);
  return { level, pretty };
}

/** Load `.env` from the working directory into process.env without overriding set values. */
export function loadDotEnv(path?: string): void {
  loadDotenvFile(path ? { path } : undefined);
}
