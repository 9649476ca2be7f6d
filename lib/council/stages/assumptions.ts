/**
 * Stage 3 — Assumption Verification.
 *
 * Checks the approved plan (plus any user modifications) against the data
 * before code is written.
 */

import type { AssumptionsOutput } from "../types";
import { queryModel, singleTurn } from "../openrouter";
import { ASSUMPTIONS_SYSTEM, buildAssumptionsPrompt } from "../prompts";
import { RemoteCallError } from "../../errors";

export interface AssumptionsInput {
  dataSummary: string;
  analysisPlan: string;
  modifications: string;
  model: string;
  timeoutMs?: number;
}

export async function runAssumptionVerification(
  input: AssumptionsInput
): Promise<AssumptionsOutput> {
  const result = await queryModel(
    input.model,
    singleTurn(
      ASSUMPTIONS_SYSTEM,
      buildAssumptionsPrompt({
        dataSummary: input.dataSummary,
        analysisPlan: input.analysisPlan,
        modifications: input.modifications,
      }),
      { timeoutMs: input.timeoutMs }
    )
  );

  if (!result) {
    throw new RemoteCallError(
      "assumptions",
      input.model,
      `Assumption verification failed: ${input.model} did not respond.`
    );
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
