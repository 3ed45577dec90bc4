// server/config/env.ts
import "dotenv/config";
import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length ? value : undefined))
  .optional();

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  OPENAI_API_KEY: optionalString,
  TRANSLATION_MODEL: z.string().default("gpt-4o-mini"),
  DATABASE_URL: optionalString,
  PIPELINE_CONFIG_PATH: optionalString,
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);
