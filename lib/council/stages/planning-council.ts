/**
 * Stage 2 — Planning Council.
 *
 * Fan-out: every council model proposes an analysis plan in parallel from
 * the same context. Fan-in: once all have answered or failed, the synthesis
 * model merges the proposals and resolves disagreements.
 */

import type { CouncilPlan, PlanningOutput, ResearchContext } from "../types";
import { queryModel, queryModelsParallel, singleTurn } from "../openrouter";
import {
  buildPlanningPrompt,
  buildSynthesisPrompt,
  PLANNING_SYSTEM,
  SYNTHESIS_SYSTEM,
} from "../prompts";
import { extractDisagreements } from "../response-parsers";
import { getModelDisplayName } from "../models";
import { RemoteCallError } from "../../errors";

export interface PlanningInput {
  dataSummary: string;
  dataAudit: string;
  context: ResearchContext;
  councilModels: string[];
  synthesisModel: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Fan-out — collect individual proposals
// ---------------------------------------------------------------------------

export async function collectPlans(
  input: PlanningInput
): Promise<{ plans: CouncilPlan[]; failedModels: string[] }> {
  const prompt = buildPlanningPrompt({
    dataSummary: input.dataSummary,
    dataAudit: input.dataAudit,
    researchQuestion: input.context.researchQuestion,
    hypotheses: input.context.hypotheses,
    outcomeVar: input.context.outcomeVar,
    exposureVar: input.context.exposureVar,
    covariates: input.context.covariates,
    studyDesign: input.context.studyDesign,
  });

  const results = await queryModelsParallel(
    input.councilModels,
    singleTurn(PLANNING_SYSTEM, prompt, { timeoutMs: input.timeoutMs })
  );

  // Keep council order, not completion order
  const plans: CouncilPlan[] = [];
  const failedModels: string[] = [];
  for (const model of input.councilModels) {
    const result = results.get(model);
    if (!result) {
      failedModels.push(model);
      continue;
    }
    plans.push({
      model,
      displayName: getModelDisplayName(model),
      plan: result.content,
      responseTimeMs: result.responseTimeMs,
      costUsd: result.costUsd,
    });
  }

  return { plans, failedModels };
}

// ---------------------------------------------------------------------------
// Fan-in — synthesize
// ---------------------------------------------------------------------------

export async function runPlanningCouncil(input: PlanningInput): Promise<PlanningOutput> {
  const { plans, failedModels } = await collectPlans(input);

  if (plans.length === 0) {
    throw new RemoteCallError(
      "planning",
      input.councilModels.join(", "),
      "Planning council failed: no council model returned a plan."
    );
  }

  const plansCost = plans.reduce((sum, p) => sum + p.costUsd, 0);

  const synthesisResult = await queryModel(
    input.synthesisModel,
    singleTurn(
      SYNTHESIS_SYSTEM,
      buildSynthesisPrompt({
        researchQuestion: input.context.researchQuestion,
        plans: plans.map((p) => ({ name: p.displayName, plan: p.plan })),
      }),
      { timeoutMs: input.timeoutMs }
    )
  );

  if (!synthesisResult) {
    throw new RemoteCallError(
      "planning",
      input.synthesisModel,
      `Planning council failed: synthesis model ${input.synthesisModel} did not respond.`,
      plansCost
    );
  }

  return {
    plans,
    failedModels,
    synthesis: synthesisResult.content,
    synthesisModel: input.synthesisModel,
    disagreements: extractDisagreements(synthesisResult.content),
    editedByUser: false,
    costUsd: plansCost + synthesisResult.costUsd,
  };
}
