import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { env } from "./env";

const log = createLogger("config");

const fallbackTo =
  <T>(fallback: T, key: string) =>
  ({ error }: { error: z.ZodError }): T => {
    log.warn(
      { key, issue: error.issues[0]?.message ?? "invalid value" },
      "[CONFIG] Ignoring invalid override, using default",
    );
    return fallback;
  };

const positiveInt = (fallback: number, key: string) =>
  z.number().int().positive().default(fallback).catch(fallbackTo(fallback, key));

const nonNegativeInt = (fallback: number, key: string) =>
  z.number().int().nonnegative().default(fallback).catch(fallbackTo(fallback, key));

const positiveNumber = (fallback: number, key: string) =>
  z.number().positive().default(fallback).catch(fallbackTo(fallback, key));

const fraction = (fallback: number, key: string) =>
  z.number().min(0).max(1).default(fallback).catch(fallbackTo(fallback, key));

const DEFAULT_LANGUAGES: Array<"english" | "sinhala"> = ["english", "sinhala"];

const pipelineConfigurationSchema = z.object({
  requiredLanguages: z
    .array(z.enum(["english", "sinhala"]))
    .min(1)
    .transform((languages) => Array.from(new Set(languages)))
    .default(() => [...DEFAULT_LANGUAGES])
    .catch(fallbackTo(DEFAULT_LANGUAGES, "requiredLanguages")),
  batching: z
    .object({
      maxBatchSize: positiveInt(200, "batching.maxBatchSize"),
    })
    .default({}),
  provider: z
    .object({
      maxRetries: nonNegativeInt(5, "provider.maxRetries"),
      retryBaseDelayMs: nonNegativeInt(5_000, "provider.retryBaseDelayMs"),
      maxRetryDelayMs: nonNegativeInt(120_000, "provider.maxRetryDelayMs"),
      requestDelayMs: nonNegativeInt(7_000, "provider.requestDelayMs"),
      requestsPerMinute: nonNegativeInt(10, "provider.requestsPerMinute"),
      timeoutMs: positiveInt(120_000, "provider.timeoutMs"),
      maxChunkChars: positiveInt(4_000, "provider.maxChunkChars"),
    })
    .default({}),
  sanitizer: z
    .object({
      maxExpansionRatio: positiveNumber(6, "sanitizer.maxExpansionRatio"),
      expansionFloorChars: nonNegativeInt(120, "sanitizer.expansionFloorChars"),
      minScriptRatio: fraction(0.6, "sanitizer.minScriptRatio"),
    })
    .default({}),
  session: z
    .object({
      lockStaleMs: positiveInt(600_000, "session.lockStaleMs"),
    })
    .default({}),
});

export type PipelineConfiguration = z.output<typeof pipelineConfigurationSchema>;

export type ProviderSettings = PipelineConfiguration["provider"];

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Merges an override document over the defaults, section by section. */
export function resolvePipelineConfiguration(overrides: unknown = {}): PipelineConfiguration {
  if (!isPlainObject(overrides)) {
    log.warn("[CONFIG] Override document is not an object, using defaults");
    return pipelineConfigurationSchema.parse({});
  }
  const sections: Record<string, unknown> = { ...overrides };
  for (const key of ["batching", "provider", "sanitizer", "session"]) {
    if (key in sections && !isPlainObject(sections[key])) {
      log.warn({ key }, "[CONFIG] Ignoring invalid override section, using defaults");
      delete sections[key];
    }
  }
  return pipelineConfigurationSchema.parse(sections);
}

export const DEFAULT_CONFIG_PATH = path.resolve(
  process.cwd(),
  "server",
  "pipelineConfiguration.json",
);

export function loadPipelineConfiguration(
  configPath: string = env.PIPELINE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
): PipelineConfiguration {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf8");
  } catch (error) {
    log.debug(
      { configPath, err: errorMessage(error) },
      "[CONFIG] No override file, using defaults",
    );
    return resolvePipelineConfiguration();
  }

  try {
    return resolvePipelineConfiguration(JSON.parse(raw));
  } catch (error) {
    log.warn(
      { configPath, err: errorMessage(error) },
      "[CONFIG] Override file unreadable, using defaults",
    );
    return resolvePipelineConfiguration();
  }
}
