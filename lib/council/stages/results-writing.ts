/**
 * Stage 6 — Results Writing.
 *
 * The writer drafts four sections (methods, results, figure legends,
 * limitations) from the approved plan, the sandbox output and the review,
 * formatted for the selected journal and reporting guideline.
 */

import type { ResultTable } from "../../execution/types";
import type { DocumentSections, StudyDesign, WritingOutput } from "../types";
import { queryModel, singleTurn, type QueryResult } from "../openrouter";
import {
  buildFigureLegendsPrompt,
  buildLimitationsPrompt,
  buildMethodsPrompt,
  buildResultsPrompt,
  WRITING_SYSTEM,
} from "../prompts";
import { datasetToCsv } from "../../data/dataset";
import { getJournalFormat, getSoftwareCitation } from "../../journals/formats";
import { getReportingGuideline } from "../../journals/guidelines";
import { RemoteCallError } from "../../errors";

const TABLE_SUMMARY_LIMIT = 2000;

export interface ResultsWritingInput {
  sampleSize: number;
  analysisPlan: string;
  executionResults: string;
  figureCount: number;
  tables: ResultTable[];
  review: string;
  reviewNotes: string;
  journal: string;
  studyDesign: StudyDesign;
  model: string;
  timeoutMs?: number;
}

export function summarizeTables(tables: ResultTable[]): Record<string, string> {
  const summaries: Record<string, string> = {};
  for (const t of tables) {
    summaries[t.name] = datasetToCsv(t.table).slice(0, TABLE_SUMMARY_LIMIT);
  }
  return summaries;
}

export async function runResultsWriting(input: ResultsWritingInput): Promise<WritingOutput> {
  const journalFormat = getJournalFormat(input.journal);
  const reportingGuideline = getReportingGuideline(input.studyDesign);

  const prompts: Record<keyof DocumentSections, string> = {
    methods: buildMethodsPrompt({
      analysisPlan: input.analysisPlan,
      studyDesign: input.studyDesign,
      reportingGuideline,
      journalFormat,
      sampleSize: input.sampleSize,
      softwareCitation: getSoftwareCitation(input.journal),
    }),
    results: buildResultsPrompt({
      executionResults: input.executionResults,
      tableSummaries: summarizeTables(input.tables),
      figureCount: input.figureCount,
      journalFormat,
      reportingGuideline,
    }),
    legends: buildFigureLegendsPrompt({
      figureCount: input.figureCount,
      executionResults: input.executionResults,
      journalFormat,
    }),
    limitations: buildLimitationsPrompt({
      studyDesign: input.studyDesign,
      review: input.review,
      reviewNotes: input.reviewNotes,
      analysisPlan: input.analysisPlan,
    }),
  };

  const ask = (prompt: string): Promise<QueryResult | null> =>
    queryModel(
      input.model,
      singleTurn(WRITING_SYSTEM, prompt, {
        temperature: 0.3,
        maxTokens: 8192,
        timeoutMs: input.timeoutMs,
      })
    );

  const [methods, results, legends, limitations] = await Promise.all([
    ask(prompts.methods),
    ask(prompts.results),
    ask(prompts.legends),
    ask(prompts.limitations),
  ]);

  const spent = [methods, results, legends, limitations].reduce(
    (sum, r) => sum + (r?.costUsd ?? 0),
    0
  );

  if (!methods || !results || !legends || !limitations) {
    const missing = (
      [
        ["methods", methods],
        ["results", results],
        ["legends", legends],
        ["limitations", limitations],
      ] as const
    )
      .filter(([, r]) => r === null)
      .map(([section]) => section);
    throw new RemoteCallError(
      "writing",
      input.model,
      `Results writing failed: no ${missing.join(", ")} section from ${input.model}.`,
      spent
    );
  }

  return {
    sections: {
      methods: methods.content,
      results: results.content,
      legends: legends.content,
      limitations: limitations.content,
    },
    journal: input.journal,
    reportingGuideline,
    costUsd: spent,
  };
}
