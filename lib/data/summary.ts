/**
 * Dataset summary sent to every model as context.
 *
 * Example:
 *   Dataset: 120 rows × 3 columns
 *
 *   Columns:
 *     - age (numeric): 41 unique, 2.5% null, mean=63.10, std=9.84, range=[34, 88]
 *     - sex (text): 2 unique, 0.0% null, top values: {F: 70, M: 50}
 */

import type { Dataset } from "./dataset";
import { getColumnValues, parseNumeric } from "./dataset";

export interface NumericStats {
  mean: number;
  std: number | null;
  min: number;
  max: number;
}

export interface ColumnSummary {
  name: string;
  kind: "numeric" | "text";
  uniqueCount: number;
  nullPercent: number;
  numeric: NumericStats | null;
  topValues: Array<[string, number]>;
}

/**
 * Mean, sample standard deviation and range. Null for an empty list.
 */
export function describeNumbers(values: number[]): NumericStats | null {
  if (values.length === 0) return null;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const mean = sum / values.length;
  const std =
    values.length > 1
      ? Math.sqrt(
          values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1)
        )
      : null;
  return { mean, std, min, max };
}

/**
 * Most frequent values, ties kept in order of first appearance.
 */
export function countTopValues(values: string[], limit: number = 3): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

export function summarizeColumn(dataset: Dataset, columnName: string): ColumnSummary {
  const column = dataset.columns.find((c) => c.name === columnName);
  const kind = column?.kind ?? "text";
  const values = getColumnValues(dataset, columnName);
  const present = values.filter((v): v is string => v !== null);
  const nullPercent =
    values.length === 0 ? 0 : ((values.length - present.length) / values.length) * 100;

  if (kind === "numeric") {
    const numbers = present
      .map((v) => parseNumeric(v))
      .filter((n): n is number => n !== null);
    return {
      name: columnName,
      kind,
      uniqueCount: new Set(numbers).size,
      nullPercent,
      numeric: describeNumbers(numbers),
      topValues: [],
    };
  }

  return {
    name: columnName,
    kind,
    uniqueCount: new Set(present).size,
    nullPercent,
    numeric: null,
    topValues: countTopValues(present),
  };
}

function formatColumnStats(summary: ColumnSummary): string {
  if (summary.kind === "numeric") {
    const stats = summary.numeric;
    if (!stats) return "no values";
    const std = stats.std === null ? "n/a" : stats.std.toFixed(2);
    return `mean=${stats.mean.toFixed(2)}, std=${std}, range=[${stats.min}, ${stats.max}]`;
  }
  const top = summary.topValues.map(([value, count]) => `${value}: ${count}`).join(", ");
  return `top values: {${top}}`;
}

export function summarizeDataset(dataset: Dataset): string {
  const lines: string[] = [];
  lines.push(`Dataset: ${dataset.rows.length} rows × ${dataset.columns.length} columns`);
  lines.push("");
  lines.push("Columns:");

  for (const column of dataset.columns) {
    const summary = summarizeColumn(dataset, column.name);
    lines.push(
      `  - ${summary.name} (${summary.kind}): ${summary.uniqueCount} unique, ${summary.nullPercent.toFixed(1)}% null, ${formatColumnStats(summary)}`
    );
  }

  return lines.join("\n");
}
