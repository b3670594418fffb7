import fs from "fs";
import path from "path";
import { z } from "zod";
import { InvalidArgumentError } from "../errors";
import { type LogLevel, type Logger, createLogger } from "../logging/logger";
import { type RetryPolicy, createRetryPolicy } from "../retry/policy";

const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().min(0),
    backoffMultiplier: z.number().min(1),
    maxDelayMs: z.number().min(0),
    jitter: z.boolean(),
  })
  .partial();

const waitSchema = z
  .object({
    timeoutMs: z.number().min(0),
    pollIntervalMs: z.number().positive(),
  })
  .partial();

const locateSchema = z
  .object({
    timeoutPerCandidateMs: z.number().positive(),
    totalTimeoutMs: z.number().positive(),
    pollIntervalMs: z.number().positive(),
  })
  .partial();

const optionalSchema = z
  .object({
    shortTimeoutMs: z.number().positive(),
  })
  .partial();

const extractSchema = z
  .object({
    timeoutMs: z.number().positive(),
  })
  .partial();

const configFileSchema = z
  .object({
    retry: retrySchema,
    wait: waitSchema,
    locate: locateSchema,
    optional: optionalSchema,
    extract: extractSchema,
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ResilienceConfig {
  retry: RetryPolicy;
  wait: { timeoutMs: number; pollIntervalMs: number };
  locate: { timeoutPerCandidateMs: number; totalTimeoutMs: number; pollIntervalMs: number };
  optional: { shortTimeoutMs: number };
  extract: { timeoutMs: number };
  logLevel: LogLevel;
}

export const defaultConfig: ResilienceConfig = {
  retry: createRetryPolicy(),
  wait: {
    timeoutMs: 10_000,
    pollIntervalMs: 500,
  },
  locate: {
    timeoutPerCandidateMs: 5_000,
    totalTimeoutMs: 15_000,
    pollIntervalMs: 100,
  },
  optional: {
    shortTimeoutMs: 2_000,
  },
  extract: {
    timeoutMs: 5_000,
  },
  logLevel: "info",
};

/** Validates an already-parsed config object and merges it over the defaults. */
export function parseConfig(input: unknown, source = "config"): ResilienceConfig {
  const result = configFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(source, issues);
  }
  const parsed = result.data;

  return {
    retry: createRetryPolicy({ ...defaultConfig.retry, ...(parsed.retry ?? {}) }),
    wait: {
      ...defaultConfig.wait,
      ...(parsed.wait ?? {}),
    },
    locate: {
      ...defaultConfig.locate,
      ...(parsed.locate ?? {}),
    },
    optional: {
      ...defaultConfig.optional,
      ...(parsed.optional ?? {}),
    },
    extract: {
      ...defaultConfig.extract,
      ...(parsed.extract ?? {}),
    },
    logLevel: parsed.logLevel ?? defaultConfig.logLevel,
  };
}

export function loadConfig(configPath?: string): ResilienceConfig {
  if (!configPath) {
    return defaultConfig;
  }

  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new InvalidArgumentError(resolved, `not valid JSON (${String(error)})`);
  }
  return parseConfig(json, resolved);
}

export function policyFromConfig(config: ResilienceConfig): RetryPolicy {
  return config.retry;
}

export function loggerFromConfig(config: ResilienceConfig, prefix?: string): Logger {
  return createLogger(config.logLevel, prefix);
}
