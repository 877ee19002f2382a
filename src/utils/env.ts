import { config } from "dotenv";
import { z } from "zod";

config();

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1" || value === "yes");

// setTimeout holds at most 2^31 - 1 ms
const MAX_TIMER_SECONDS = 2_147_483;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default("0.0.0.0"),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  LOG_TO_FILE: booleanFlag(false),
  SENTRY_DSN: optionalString,

  JOB_STORAGE_PATH: z.string().min(1).default("./data/jobs.json"),
  SCRIPT_TIMEOUT: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(300),
  SCRIPT_MEMORY_LIMIT_MB: z.coerce.number().int().positive().default(256),
  API_FETCH_TIMEOUT: z.coerce.number().positive().max(MAX_TIMER_SECONDS).default(30),

  SCHEDULER_TIMEZONE: z.string().min(1).default("UTC"),
  SCHEDULER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  SCHEDULER_MISFIRE_GRACE_SECONDS: z.coerce.number().int().positive().default(300),

  SMTP_HOST: z.string().min(1),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().min(1),
  SMTP_PASSWORD: z.string().min(1),
  SMTP_FROM_EMAIL: z.string().email(),
  SMTP_USE_TLS: booleanFlag(true),
  EMAIL_DRY_RUN: booleanFlag(false),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join("; ")}`);
  }

  return result.data;
}
