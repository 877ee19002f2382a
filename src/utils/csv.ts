import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import type { CellValue, Dataset } from "@/types/dataset";
import { DatasetShapeError } from "@/utils/dataset";

const csvRecordsSchema = z.array(z.array(z.string()));

/**
 * Text becomes a number only when the number prints back to the same text,
 * so "007" or "1.50" stay strings and formatting is stable across re-parsing.
 */
export function inferCell(text: string): CellValue {
  if (text.length === 0) {
    return null;
  }

  const lowered = text.toLowerCase();
  if (lowered === "true") {
    return true;
  }

  if (lowered === "false") {
    return false;
  }

  const numeric = Number(text);
  if (Number.isFinite(numeric) && String(numeric) === text) {
    return numeric;
  }

  return text;
}

export function renderCell(value: CellValue): string {
  if (value === null) {
    return "";
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  return typeof value === "number" ? String(value) : value;
}

function dedupeColumns(header: string[]): string[] {
  const counts = new Map<string, number>();

  return header.map((name) => {
    const seen = counts.get(name) ?? 0;
    counts.set(name, seen + 1);
    return seen === 0 ? name : `${name}.${seen}`;
  });
}

export function parseCsv(text: string): Dataset {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: false,
      relax_column_count: true,
    });
  } catch (error) {
    throw new DatasetShapeError(error instanceof Error ? error.message : "Malformed CSV");
  }

  const records = csvRecordsSchema.parse(parsed);
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...body] = records;
  const columns = dedupeColumns(header);
  const rows: CellValue[][] = [];

  body.forEach((record, index) => {
    // blank lines inside a multi-column file carry no data
    if (columns.length > 1 && record.length === 1 && record[0] === "") {
      return;
    }

    if (record.length !== columns.length) {
      throw new DatasetShapeError(
        `Line ${index + 2} has ${record.length} fields, expected ${columns.length}`,
      );
    }

    rows.push(record.map(inferCell));
  });

  return { columns, rows };
}

export function formatCsv(dataset: Dataset): string {
  if (dataset.columns.length === 0) {
    return "";
  }

  const records = [dataset.columns, ...dataset.rows.map((row) => row.map(renderCell))];
  return stringify(records, { record_delimiter: "unix" });
}
