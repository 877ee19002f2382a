import type { Dataset } from "@/types/dataset";
import { formatCsv } from "@/utils/csv";
import { datasetSchema } from "@/utils/dataset";
import { FormatError, describeError } from "@/utils/errors";

export const CSV_CONTENT_TYPE = "text/csv; charset=utf-8";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHmmss` in UTC. */
export function compactTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function readableTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function resultFileName(jobName: string, at: Date): string {
  return `${jobName}_${compactTimestamp(at)}.csv`;
}

/**
 * Header value for a downloaded file: a quoted ASCII fallback plus the
 * RFC 5987 `filename*` form carrying the exact UTF-8 name.
 */
export function attachmentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, "_");
  const encoded = encodeURIComponent(fileName).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

export function formatResult(dataset: Dataset): string {
  const parsed = datasetSchema.safeParse(dataset);
  if (!parsed.success) {
    throw new FormatError(`Cannot format result as CSV: ${parsed.error.issues[0]?.message ?? "invalid table"}`);
  }

  try {
    return formatCsv(parsed.data);
  } catch (error) {
    throw new FormatError(`Cannot format result as CSV: ${describeError(error)}`, { cause: error });
  }
}
