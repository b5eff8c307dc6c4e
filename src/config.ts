/**
 * Runtime configuration from environment variables.
 *
 * Variables can also come from a `.env` file in the working directory, which
 * {@link loadEnvFile} reads without overriding what the environment already has.
 */

import * as dotenv from "dotenv";
import { z } from "zod";
import type { MailgunConfig } from "./channels/mailgun.js";
import { ConfigurationError } from "./errors.js";

export type PassKind = "ingest" | "convert" | "deliver";

export interface Config {
  databaseUrl: string;
  /** Milliseconds between pass starts */
  intervals: Record<PassKind, number>;
  /** Worker pool size per pass */
  concurrency: Record<PassKind, number>;
  unitDeadlineMs: number;
  leaseTtlMs: number;
  maxConversionAttempts: number;
  backoff: { baseMs: number; maxMs: number };
  /** Null when the email channel is not configured */
  mailgun: MailgunConfig | null;
  /** Null when the push channel is not configured */
  pushoverToken: string | null;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Empty values count as unset
const optionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional(),
);

const envSchema = z
  .object({
    DATABASE_URL: z.string().trim().min(1, "Required"),
    COURIER_INGEST_INTERVAL_MS: positiveInt(300_000),
    COURIER_CONVERT_INTERVAL_MS: positiveInt(10_000),
    COURIER_DELIVERY_INTERVAL_MS: positiveInt(10_000),
    COURIER_INGEST_CONCURRENCY: positiveInt(4),
    COURIER_CONVERT_CONCURRENCY: positiveInt(2),
    COURIER_DELIVERY_CONCURRENCY: positiveInt(4),
    COURIER_UNIT_DEADLINE_MS: positiveInt(60_000),
    COURIER_LEASE_TTL_MS: positiveInt(120_000),
    COURIER_MAX_CONVERSION_ATTEMPTS: positiveInt(3),
    COURIER_BACKOFF_BASE_MS: positiveInt(30_000),
    COURIER_BACKOFF_MAX_MS: positiveInt(3_600_000),
    MAILGUN_API_KEY: optionalText,
    MAILGUN_ENDPOINT: optionalText.pipe(z.string().url().optional()),
    MAILGUN_FROM: optionalText,
    PUSHOVER_TOKEN: optionalText,
  })
  .superRefine((env, ctx) => {
    const mailgun = ["MAILGUN_API_KEY", "MAILGUN_ENDPOINT", "MAILGUN_FROM"] as const;
    const set = mailgun.filter((name) => env[name] !== undefined);
    if (set.length > 0 && set.length < mailgun.length) {
      for (const name of mailgun.filter((name) => env[name] === undefined)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `Required when ${set.join(", ")} ${set.length === 1 ? "is" : "are"} set`,
        });
      }
    }
    if (env.COURIER_BACKOFF_MAX_MS < env.COURIER_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COURIER_BACKOFF_MAX_MS"],
        message: "Must not be smaller than COURIER_BACKOFF_BASE_MS",
      });
    }
  });

/**
 * Read `.env` into `process.env`, keeping variables that are already set.
 *
 * @returns Whether a file was loaded
 */
export function loadEnvFile(path = ".env"): boolean {
  const result = dotenv.config({ path, override: false });
  return result.error === undefined;
}

/**
 * Validate the environment and build the configuration.
 *
 * @throws {ConfigurationError} Naming every variable that is missing or invalid
 *
 * @example
 * const config = loadConfig({ DATABASE_URL: "postgres://localhost/courier" });
 * config.intervals.ingest // 300000
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  const { MAILGUN_API_KEY: apiKey, MAILGUN_ENDPOINT: endpoint, MAILGUN_FROM: from } = vars;
  return {
    databaseUrl: vars.DATABASE_URL,
    intervals: {
      ingest: vars.COURIER_INGEST_INTERVAL_MS,
      convert: vars.COURIER_CONVERT_INTERVAL_MS,
      deliver: vars.COURIER_DELIVERY_INTERVAL_MS,
    },
    concurrency: {
      ingest: vars.COURIER_INGEST_CONCURRENCY,
      convert: vars.COURIER_CONVERT_CONCURRENCY,
      deliver: vars.COURIER_DELIVERY_CONCURRENCY,
    },
    unitDeadlineMs: vars.COURIER_UNIT_DEADLINE_MS,
    leaseTtlMs: vars.COURIER_LEASE_TTL_MS,
    maxConversionAttempts: vars.COURIER_MAX_CONVERSION_ATTEMPTS,
    backoff: { baseMs: vars.COURIER_BACKOFF_BASE_MS, maxMs: vars.COURIER_BACKOFF_MAX_MS },
    mailgun: apiKey && endpoint && from ? { apiKey, endpoint, from } : null,
    pushoverToken: vars.PUSHOVER_TOKEN ?? null,
  };
}
