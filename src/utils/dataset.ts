import { z } from "zod";

import type { CellValue, Dataset, DatasetRecord } from "@/types/dataset";

export const cellSchema = z.union([z.number().finite(), z.string(), z.boolean(), z.null()]);

export const datasetSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.array(cellSchema)),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    for (const column of value.columns) {
      if (seen.has(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate column "${column}"`, path: ["columns"] });
        return;
      }
      seen.add(column);
    }

    value.rows.forEach((row, index) => {
      if (row.length !== value.columns.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Row ${index} has ${row.length} cells, expected ${value.columns.length}`,
          path: ["rows", index],
        });
      }
    });
  });

export class DatasetShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetShapeError";
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function isDataset(value: unknown): value is Dataset {
  return datasetSchema.safeParse(value).success;
}

/** Coerces an arbitrary JSON value into a cell; nested structures keep their JSON text. */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (typeof value === "object") {
    return JSON.stringify(value);
  }

  return String(value);
}

export function cloneDataset(dataset: Dataset): Dataset {
  return {
    columns: [...dataset.columns],
    rows: dataset.rows.map((row) => [...row]),
  };
}

export function fromRecords(records: readonly Record<string, unknown>[]): Dataset {
  const columns: string[] = [];
  const known = new Set<string>();

  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!known.has(key)) {
        known.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map((record) =>
    columns.map((column) => (Object.prototype.hasOwnProperty.call(record, column) ? toCell(record[column]) : null)),
  );

  return { columns, rows };
}

/** Column-oriented object: array fields share one length, scalar fields are broadcast. */
export function fromColumns(source: Record<string, unknown>): Dataset {
  const columns = Object.keys(source);
  const lengths = new Set<number>();

  for (const column of columns) {
    const value = source[column];
    if (Array.isArray(value)) {
      lengths.add(value.length);
    }
  }

  if (lengths.size === 0) {
    throw new DatasetShapeError("Column-oriented data requires at least one array field");
  }

  if (lengths.size > 1) {
    throw new DatasetShapeError(`All array fields must have the same length, got ${[...lengths].join(", ")}`);
  }

  const [length] = [...lengths];
  const rows = Array.from({ length }, (_, rowIndex) =>
    columns.map((column) => {
      const value = source[column];
      return toCell(Array.isArray(value) ? value[rowIndex] : value);
    }),
  );

  return { columns, rows };
}

export function toRecords(dataset: Dataset): DatasetRecord[] {
  return dataset.rows.map((row) => {
    const record: DatasetRecord = {};
    dataset.columns.forEach((column, index) => {
      record[column] = row[index] ?? null;
    });
    return record;
  });
}

/**
 * Interprets a parsed JSON document as a table:
 * a list of objects is one row per object, an object holding at least one
 * array is column-oriented, any other object is a single row.
 */
export function datasetFromJson(value: unknown): Dataset {
  if (Array.isArray(value)) {
    const invalidIndex = value.findIndex((item) => !isPlainObject(item));
    if (invalidIndex !== -1) {
      throw new DatasetShapeError(
        `Expected a list of objects, item ${invalidIndex} is ${describeValueType(value[invalidIndex])}`,
      );
    }

    return fromRecords(value.filter(isPlainObject));
  }

  if (isPlainObject(value)) {
    const hasArrayField = Object.values(value).some((field) => Array.isArray(field));
    return hasArrayField ? fromColumns(value) : fromRecords([value]);
  }

  throw new DatasetShapeError(`Unexpected data format: ${describeValueType(value)}`);
}

export function describeValueType(value: unknown): string {
  if (value === null) {
    return "null";
  }

  if (Array.isArray(value)) {
    return "array";
  }

  if (typeof value === "object") {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === null) {
      return "object";
    }

    if (typeof prototype === "object" && "constructor" in prototype && typeof prototype.constructor === "function") {
      return prototype.constructor.name || "object";
    }

    return "object";
  }

  return typeof value;
}
