/**
 * Journal formatting conventions — statistic formats, Table 1 layout,
 * software citation and journal-specific notes.
 *
 * The catalog lives in journal-formats.json and is validated on load.
 */

import { z } from "zod";
import rawFormats from "./journal-formats.json";

const DecimalPlacesSchema = z.object({
  pValue: z.number().int().nonnegative(),
  percentage: z.number().int().nonnegative(),
  mean: z.number().int().nonnegative(),
  sd: z.number().int().nonnegative(),
  effectSize: z.number().int().nonnegative(),
  ci: z.number().int().nonnegative(),
});

const Table1FormatSchema = z.object({
  continuousNormal: z.string(),
  continuousSkewed: z.string(),
  categorical: z.string(),
  testContinuousNormal: z.string(),
  testContinuousSkewed: z.string(),
  testCategorical: z.string(),
});

export const JournalFormatSchema = z.object({
  name: z.string(),
  pValueFormat: z.enum(["exact", "threshold"]),
  pValueThreshold: z.number().positive().max(1),
  ciFormat: z.string(),
  decimalPlaces: DecimalPlacesSchema,
  effectSizeRequired: z.boolean(),
  sampleFormat: z.string(),
  table1Format: Table1FormatSchema,
  softwareCitation: z.string(),
  significanceStatement: z.string(),
  multipleComparisonNote: z.string().optional(),
  oddsOrRiskRatioRequired: z.boolean().optional(),
  mlMetrics: z.record(z.array(z.string())).optional(),
  survivalAnalysis: z
    .object({
      requiredFor: z.array(z.string()),
      methods: z.array(z.string()),
      reporting: z.string(),
    })
    .optional(),
  notes: z.array(z.string()).optional(),
});

export type JournalFormat = z.infer<typeof JournalFormatSchema>;
export type Table1Format = z.infer<typeof Table1FormatSchema>;

export const DEFAULT_JOURNAL = "Generic";

export const JOURNAL_FORMATS: Record<string, JournalFormat> = z
  .record(JournalFormatSchema)
  .parse(rawFormats);

export function getJournalKeys(): string[] {
  return Object.keys(JOURNAL_FORMATS);
}

export function isKnownJournal(key: string): boolean {
  return Object.hasOwn(JOURNAL_FORMATS, key);
}

/**
 * Format for a journal key, falling back to Generic for unknown keys.
 */
export function getJournalFormat(key: string): JournalFormat {
  const format = JOURNAL_FORMATS[key] ?? JOURNAL_FORMATS[DEFAULT_JOURNAL];
  if (!format) {
    throw new Error(`Journal catalog has no ${DEFAULT_JOURNAL} entry`);
  }
  return format;
}

export type Statistic =
  | { type: "p_value"; p: number }
  | { type: "ci"; lower: number; upper: number }
  | { type: "sample"; n: number; pct: number }
  | { type: "mean_sd"; mean: number; sd: number }
  | { type: "effect_size"; effect: number };

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Format a statistic according to a journal's conventions.
 *
 * P-values below .001 are always reported as "P < .001".
 */
export function formatStatistic(journal: string, stat: Statistic): string {
  const format = getJournalFormat(journal);
  const places = format.decimalPlaces;

  switch (stat.type) {
    case "p_value":
      if (stat.p < 0.001) return "P < .001";
      return `P = ${stat.p.toFixed(places.pValue)}`;
    case "ci":
      return fillTemplate(format.ciFormat, {
        lower: stat.lower.toFixed(places.ci),
        upper: stat.upper.toFixed(places.ci),
      });
    case "sample":
      return fillTemplate(format.sampleFormat, {
        n: String(stat.n),
        pct: stat.pct.toFixed(places.percentage),
      });
    case "mean_sd":
      return `${stat.mean.toFixed(places.mean)} ± ${stat.sd.toFixed(places.sd)}`;
    case "effect_size":
      return stat.effect.toFixed(places.effectSize);
  }
}

export function getTable1Format(journal: string): Table1Format {
  return getJournalFormat(journal).table1Format;
}

export interface SoftwareCitationOptions {
  /** Python version used in the sandbox; fills the first "X.X" placeholder */
  pythonVersion?: string;
  /**
   * Package name → version. Fills "name (X.X)" placeholders; packages the
   * citation does not mention are appended as "with name (version), ...".
   */
  packages?: Record<string, string>;
}

export function getSoftwareCitation(
  journal: string,
  options: SoftwareCitationOptions = {}
): string {
  let citation = getJournalFormat(journal).softwareCitation;

  if (options.pythonVersion) {
    citation = citation.replace("X.X", options.pythonVersion);
  }

  const unmentioned: string[] = [];
  for (const [name, version] of Object.entries(options.packages ?? {})) {
    const placeholder = `${name} (X.X)`;
    if (citation.includes(placeholder)) {
      citation = citation.replace(placeholder, `${name} (${version})`);
    } else {
      unmentioned.push(`${name} (${version})`);
    }
  }

  if (unmentioned.length > 0) {
    citation = `${citation.replace(/\.$/, "")} with ${unmentioned.join(", ")}.`;
  }

  return citation;
}
