/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

import os from "os";
import path from "path";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  /** Server configuration */
  PORT: positiveInt(3000),
  NODE_ENV: z.string().default("development"),

  /** Redis configuration (BullMQ) */
  REDIS_URL: z.string().url(),

  /** Supabase configuration */
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  /** S3-compatible object store */
  S3_ENDPOINT: z.string().url().default("http://localhost:9000"),
  S3_PUBLIC_ENDPOINT: optionalString,
  S3_ACCESS_KEY: z.string().min(1),
  S3_SECRET_KEY: z.string().min(1),
  S3_REGION: z.string().default("us-east-1"),
  S3_BUCKET: z.string().min(1).default("v2m"),
  S3_USE_PATH_STYLE: booleanFlag,

  /** Pipeline */
  TEMP_DIR: z.string().default(path.join(os.tmpdir(), "video2audio")),
  PARSER_API_URL: z.string().url().default("http://localhost:5001"),
  FFMPEG_PATH: z.string().default("ffmpeg"),
  RESULT_URL_TTL_SECONDS: positiveInt(900),
  JOB_TIMEOUT_SECONDS: positiveInt(600),
  JOB_MAX_ATTEMPTS: positiveInt(3),
  WORKER_CONCURRENCY: positiveInt(1),

  /** HTTP surface */
  API_TOKEN: optionalString,
  CORS_ALLOW_ORIGINS: optionalString,
  RATE_LIMIT_PER_MIN: nonNegativeInt(0),

  /** Retention */
  JOB_RETENTION_DAYS: nonNegativeInt(0),
  CLEANUP_CRON: z.string().default("0 * * * *"),
  RESULT_TTL_HOURS: nonNegativeInt(0),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment map. Throws listing every invalid variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join("\n  ")}`);
  }
  return parsed.data;
}

/** Splits CORS_ALLOW_ORIGINS into a list; an empty list allows every origin. */
export function allowedOrigins(config: Pick<Env, "CORS_ALLOW_ORIGINS">): string[] {
  return (config.CORS_ALLOW_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export const env: Readonly<Env> = Object.freeze(parseEnv(process.env));
