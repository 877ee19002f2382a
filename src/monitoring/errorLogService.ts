import { captureWithSentry, logger } from "@/monitoring/errorLogger";

export type LogSeverity = "error" | "warn" | "info" | "debug";

export interface LogErrorEventOptions {
  message?: string;
  service?: string;
  requestId?: string;
  jobName?: string;
  errorCode?: string;
  context?: Record<string, unknown>;
  severity?: LogSeverity;
}

function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new Error(typeof error === "string" ? error : "Unexpected error");
}

export function logErrorEvent(error: unknown, options?: LogErrorEventOptions) {
  const severity: LogSeverity = options?.severity ?? "error";
  const service = options?.service ?? "backend";
  const normalizedError = normalizeError(error);
  const message = options?.message ?? normalizedError.message;

  const context = {
    request_id: options?.requestId,
    job_name: options?.jobName,
    error_code: options?.errorCode,
    service,
    ...options?.context,
  } satisfies Record<string, unknown>;

  logger.log({
    level: severity,
    message,
    error: normalizedError,
    ...context,
  });

  if (severity === "error") {
    captureWithSentry(normalizedError, context);
  }
}
