import { z } from "zod";

import { ValidationError } from "@/utils/errors";

export type RequestPart = "body" | "params" | "query";

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/** Parses one part of a request, throwing a 400 ValidationError that lists every issue. */
export function validateInput<T extends z.ZodTypeAny>(schema: T, value: unknown, part: RequestPart): z.infer<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues = toValidationIssues(result.error);
  const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");

  throw new ValidationError(`Invalid request ${part}: ${summary}`, { details: { issues } });
}
