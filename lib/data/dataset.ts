/**
 * Tabular dataset loaded from a deidentified CSV upload.
 *
 * Values stay as the strings found in the file; missing cells are null.
 * Each column is classified as numeric when every present value parses
 * as a finite number.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { DatasetError } from "../errors";

export type ColumnKind = "numeric" | "text";

export interface Column {
  name: string;
  kind: ColumnKind;
}

export interface Dataset {
  name: string;
  columns: Column[];
  rows: Array<Array<string | null>>;
}

const MISSING_MARKERS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL"]);

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

const RecordsSchema = z.array(z.array(z.string()));

export function isMissing(value: string): boolean {
  return MISSING_MARKERS.has(value.trim());
}

export function parseNumeric(value: string): number | null {
  const trimmed = value.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function inferKind(values: Array<string | null>): ColumnKind {
  const present = values.filter((v): v is string => v !== null);
  if (present.length === 0) return "text";
  return present.every((v) => parseNumeric(v) !== null) ? "numeric" : "text";
}

/**
 * Parse CSV text with a header row into a Dataset.
 *
 * Short rows are padded with missing values; extra cells are dropped.
 */
export function parseDataset(csvText: string, name: string): Dataset {
  if (!csvText.trim()) {
    throw new DatasetError(`${name} is empty`);
  }

  let records: string[][];
  try {
    records = RecordsSchema.parse(
      parse(csvText, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      })
    );
  } catch (error) {
    throw new DatasetError(
      `Could not parse ${name}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const [header, ...body] = records;
  if (!header || header.every((h) => !h.trim())) {
    throw new DatasetError(`${name} has no header row`);
  }

  const names = header.map((h, i) => h.trim() || `column_${i + 1}`);
  const rows = body.map((record) =>
    names.map((_, i) => {
      const cell = record[i];
      return cell === undefined || isMissing(cell) ? null : cell.trim();
    })
  );

  const columns: Column[] = names.map((columnName, i) => ({
    name: columnName,
    kind: inferKind(rows.map((row) => row[i] ?? null)),
  }));

  return { name, columns, rows };
}

export async function loadDataset(path: string): Promise<Dataset> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new DatasetError(
      `Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseDataset(text, basename(path));
}

export function getColumnValues(dataset: Dataset, columnName: string): Array<string | null> {
  const index = dataset.columns.findIndex((c) => c.name === columnName);
  if (index === -1) return [];
  return dataset.rows.map((row) => row[index] ?? null);
}

export function hasColumn(dataset: Dataset, columnName: string): boolean {
  return dataset.columns.some((c) => c.name === columnName);
}

/**
 * Serialize back to CSV (missing cells written as empty).
 */
export function datasetToCsv(dataset: Dataset): string {
  return stringify([
    dataset.columns.map((c) => c.name),
    ...dataset.rows.map((row) => row.map((cell) => cell ?? "")),
  ]);
}
