/**
 * Stage 1 — Data Audit.
 *
 * One model reads the dataset summary and the research framing and reports
 * quality problems, variable issues and feasibility before any planning.
 */

import type { DataAuditOutput, ResearchContext } from "../types";
import { queryModel, singleTurn } from "../openrouter";
import { buildDataAuditPrompt, DATA_AUDIT_SYSTEM } from "../prompts";
import { RemoteCallError } from "../../errors";

export interface DataAuditInput {
  dataSummary: string;
  context: ResearchContext;
  model: string;
  timeoutMs?: number;
}

export async function runDataAudit(input: DataAuditInput): Promise<DataAuditOutput> {
  const prompt = buildDataAuditPrompt({
    dataSummary: input.dataSummary,
    researchQuestion: input.context.researchQuestion,
    outcomeVar: input.context.outcomeVar,
    exposureVar: input.context.exposureVar,
    additionalContext: input.context.additionalContext,
  });

  const result = await queryModel(
    input.model,
    singleTurn(DATA_AUDIT_SYSTEM, prompt, { timeoutMs: input.timeoutMs })
  );

  if (!result) {
    throw new RemoteCallError("data_audit", input.model, `Data audit failed: ${input.model} did not respond.`);
  }

  return {
    report: result.content,
    response: {
      model: input.model,
      content: result.content,
      responseTimeMs: result.responseTimeMs,
      costUsd: result.costUsd,
    },
    costUsd: result.costUsd,
  };
}
