export type CellValue = number | string | boolean | null;

export type DatasetRow = CellValue[];

/** Ordered rectangular table; every row has exactly `columns.length` cells. */
export interface Dataset {
  columns: string[];
  rows: DatasetRow[];
}

export type DatasetRecord = Record<string, CellValue>;
