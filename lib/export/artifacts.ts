/**
 * Final artifacts for a completed run: document, script, tables, figures
 * and the audit trail.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { datasetToCsv } from "../data/dataset";
import type { Confidence, PipelineRunRecord, StageId } from "../council/types";
import { currentOutput } from "../council/pipeline";
import { StageOrderError } from "../errors";
import { renderResultsDocument, type DocumentFormat, type RenderOptions } from "./document";

export const DOCUMENT_FILE_NAME = "methods_results.docx";
export const SCRIPT_FILE_NAME = "analysis.py";
export const AUDIT_FILE_NAME = "analysis_audit.json";

export interface AuditTrail {
  timestamp: string;
  runId: string;
  dataset: string;
  totalCostUsd: number;
  stageCosts: Record<StageId, number>;
  journal: string;
  studyDesign: string;
  researchQuestion: string;
  confidence: Confidence | null;
  councilDisagreements: string | null;
  reviewIssues: string | null;
  planEditedByUser: boolean;
  modifications: string;
  reviewNotes: string;
}

export function buildAuditTrail(run: PipelineRunRecord, now: Date = new Date()): AuditTrail {
  const planning = currentOutput(run, "planning");
  const review = currentOutput(run, "review");

  return {
    timestamp: now.toISOString(),
    runId: run.id,
    dataset: run.datasetName,
    totalCostUsd: run.totalCostUsd,
    stageCosts: { ...run.stageCosts },
    journal: run.context.journal,
    studyDesign: run.context.studyDesign,
    researchQuestion: run.context.researchQuestion,
    confidence: review?.confidence ?? null,
    councilDisagreements: planning?.disagreements ?? null,
    reviewIssues: review?.issues ?? null,
    planEditedByUser: planning?.editedByUser ?? false,
    modifications: run.modifications,
    reviewNotes: run.reviewNotes,
  };
}

/** "Results Table" → "results_table.csv" */
export function tableFileName(name: string): string {
  return `${name.toLowerCase().replace(/ /g, "_")}.csv`;
}

/**
 * File names for tables in order; a repeated name gets a `_2`, `_3`, ...
 * suffix so no table overwrites another.
 */
export function uniqueTableFileNames(names: string[]): string[] {
  const used = new Set<string>();
  return names.map((name) => {
    const base = tableFileName(name).replace(/\.csv$/, "");
    let candidate = `${base}.csv`;
    for (let n = 2; used.has(candidate); n++) {
      candidate = `${base}_${n}.csv`;
    }
    used.add(candidate);
    return candidate;
  });
}

export interface WrittenArtifacts {
  document: { path: string; format: DocumentFormat };
  script: string;
  tables: string[];
  figures: string[];
  audit: string;
}

export async function writeArtifacts(
  run: PipelineRunRecord,
  dir: string,
  options: Pick<RenderOptions, "pack"> & { now?: Date } = {}
): Promise<WrittenArtifacts> {
  const execution = currentOutput(run, "execution");
  const writing = currentOutput(run, "writing");
  if (execution === null || writing === null) {
    throw new StageOrderError("writing", "Artifacts need the execution and writing outputs.");
  }

  await mkdir(dir, { recursive: true });

  const document = await renderResultsDocument(writing.sections, join(dir, DOCUMENT_FILE_NAME), {
    tables: execution.tables,
    pack: options.pack,
  });

  const script = join(dir, SCRIPT_FILE_NAME);
  await writeFile(script, execution.code, "utf8");

  const tables: string[] = [];
  const fileNames = uniqueTableFileNames(execution.tables.map((t) => t.name));
  for (const [i, t] of execution.tables.entries()) {
    const path = join(dir, fileNames[i]);
    await writeFile(path, datasetToCsv(t.table), "utf8");
    tables.push(path);
  }

  const figures: string[] = [];
  for (const [i, figure] of execution.figures.entries()) {
    const path = join(dir, `figure_${i + 1}.png`);
    await writeFile(path, figure.data);
    figures.push(path);
  }

  const audit = join(dir, AUDIT_FILE_NAME);
  await writeFile(audit, JSON.stringify(buildAuditTrail(run, options.now), null, 2), "utf8");

  return { document, script, tables, figures, audit };
}
