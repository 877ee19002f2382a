import { Cron } from "croner";

import { InvalidScheduleError, describeError } from "@/utils/errors";

export const CRON_FIELD_COUNT = 5;

/**
 * Parses a 5-field cron expression (minute hour day-of-month month day-of-week)
 * into a paused croner instance used only to compute fire times.
 */
export function parseCronExpression(expression: string, timezone = "UTC"): Cron {
  const fields = expression.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length !== CRON_FIELD_COUNT) {
    throw new InvalidScheduleError(
      `Invalid cron expression: ${expression}. Expected ${CRON_FIELD_COUNT} fields, got ${fields.length}`,
    );
  }

  try {
    return new Cron(fields.join(" "), { timezone, paused: true });
  } catch (error) {
    throw new InvalidScheduleError(`Invalid cron expression: ${expression}. Error: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/** Returns an error message for an invalid expression, or null when it parses. */
export function validateCronExpression(expression: string): string | null {
  try {
    parseCronExpression(expression).stop();
    return null;
  } catch (error) {
    return describeError(error);
  }
}
