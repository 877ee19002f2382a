import { Env, parseEnv } from "@/utils/env";

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  server: {
    port: number;
    host: string;
    corsOrigins: string | string[] | boolean;
  };
  logging: {
    level: Env["LOG_LEVEL"];
    toFile: boolean;
  };
  monitoring: {
    sentryDsn?: string;
  };
  storage: {
    jobsPath: string;
  };
  executor: {
    scriptTimeoutMs: number;
    scriptMemoryLimitMb: number;
    apiFetchTimeoutMs: number;
  };
  scheduler: {
    timezone: string;
    pollIntervalMs: number;
    misfireGraceMs: number;
  };
  smtp: {
    host: string;
    port: number;
    user: string;
    password: string;
    fromEmail: string;
    useTls: boolean;
  };
  delivery: {
    dryRun: boolean;
  };
}

function resolveCorsOrigins(value: string): string | string[] | boolean {
  if (value === "*") {
    return true;
  }

  const origins = value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return origins.length === 1 ? origins[0] : origins;
}

export function buildConfig(env: Env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigins: resolveCorsOrigins(env.CORS_ORIGIN),
    },
    logging: {
      level: env.LOG_LEVEL,
      toFile: env.LOG_TO_FILE,
    },
    monitoring: {
      sentryDsn: env.SENTRY_DSN,
    },
    storage: {
      jobsPath: env.JOB_STORAGE_PATH,
    },
    executor: {
      scriptTimeoutMs: env.SCRIPT_TIMEOUT * 1000,
      scriptMemoryLimitMb: env.SCRIPT_MEMORY_LIMIT_MB,
      apiFetchTimeoutMs: env.API_FETCH_TIMEOUT * 1000,
    },
    scheduler: {
      timezone: env.SCHEDULER_TIMEZONE,
      pollIntervalMs: env.SCHEDULER_POLL_INTERVAL_MS,
      misfireGraceMs: env.SCHEDULER_MISFIRE_GRACE_SECONDS * 1000,
    },
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      password: env.SMTP_PASSWORD,
      fromEmail: env.SMTP_FROM_EMAIL,
      useTls: env.SMTP_USE_TLS,
    },
    delivery: {
      // test runs never reach a real SMTP server
      dryRun: env.EMAIL_DRY_RUN || env.NODE_ENV === "test",
    },
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return buildConfig(parseEnv(source));
}

export const config = loadConfig();
