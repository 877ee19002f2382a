export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

export interface AppErrorOptions {
  statusCode?: number;
  code?: string;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.details = options.details;
  }
}

type SubclassOptions = Omit<AppErrorOptions, "statusCode" | "code">;

export class ValidationError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.BAD_REQUEST, code: "VALIDATION_ERROR" });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.NOT_FOUND, code: "NOT_FOUND" });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.CONFLICT, code: "CONFLICT" });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "SERVICE_UNAVAILABLE" });
  }
}

/** Cron expression rejected before a trigger is registered. */
export class InvalidScheduleError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.BAD_REQUEST, code: "INVALID_SCHEDULE" });
  }
}

export class FetchError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.BAD_GATEWAY, code: "FETCH_FAILED" });
  }
}

/** User transformation code failed to run or raised an exception. */
export class TransformError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, {
      ...options,
      statusCode: options.statusCode ?? HTTP_STATUS.UNPROCESSABLE_ENTITY,
      code: options.code ?? "TRANSFORM_FAILED",
    });
  }
}

export class TransformTimeoutError extends TransformError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Transform exceeded timeout of ${formatSeconds(timeoutMs)}`, {
      statusCode: HTTP_STATUS.GATEWAY_TIMEOUT,
      code: "TRANSFORM_TIMEOUT",
      details: { timeoutMs },
    });
    this.timeoutMs = timeoutMs;
  }
}

export class TransformOutputError extends TransformError {
  readonly producedType: string;

  constructor(producedType: string, reason?: string) {
    const suffix = reason ? ` (${reason})` : "";
    super(
      `Transform must produce a table. Got ${producedType} instead${suffix}. ` +
        "Assign an array of row objects (or { columns, rows }) to 'output'.",
      { code: "TRANSFORM_OUTPUT_INVALID", details: { producedType } },
    );
    this.producedType = producedType;
  }
}

export class FormatError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR, code: "FORMAT_FAILED" });
  }
}

export class DeliveryError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.BAD_GATEWAY, code: "DELIVERY_FAILED" });
  }
}

export class RegistryError extends AppError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR, code: "REGISTRY_FAILED" });
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds} seconds` : `${seconds.toFixed(3)} seconds`;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" ? error : "Unexpected error";
}

export interface FormattedError {
  error: {
    statusCode: number;
    code: string;
    message: string;
    details?: unknown;
    requestId?: string;
  };
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number; code?: string } {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 600
  );
}

export function formatError(error: unknown, requestId?: string): FormattedError {
  if (error instanceof AppError) {
    return {
      error: {
        statusCode: error.statusCode,
        code: error.code,
        message: error.message,
        ...(error.details === undefined ? {} : { details: error.details }),
        ...(requestId ? { requestId } : {}),
      },
    };
  }

  // fastify's own errors (body parsing, content type) carry a status code
  if (hasStatusCode(error)) {
    return {
      error: {
        statusCode: error.statusCode,
        code: typeof error.code === "string" ? error.code : "REQUEST_ERROR",
        message: error.message,
        ...(requestId ? { requestId } : {}),
      },
    };
  }

  return {
    error: {
      statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      code: "INTERNAL_ERROR",
      message: "Internal server error",
      ...(requestId ? { requestId } : {}),
    },
  };
}
