/**
 * Stage 4 — Code Generation & Execution.
 *
 * generate → verify → (annotate) → execute. The verifier's notes never block
 * execution; when they flag a problem they are prepended to the code as
 * comments so the reader sees them next to what ran.
 */

import type { Dataset } from "../../data/dataset";
import type { ExecutionResult } from "../../execution/types";
import type { ExecutionOutput } from "../types";
import { queryModel, singleTurn } from "../openrouter";
import {
  buildCodeGenerationPrompt,
  buildCodeVerificationPrompt,
  CODE_GENERATION_SYSTEM,
  CODE_VERIFICATION_SYSTEM,
} from "../prompts";
import {
  annotateWithVerification,
  extractCode,
  verificationFlagsProblems,
} from "../response-parsers";
import { getJournalFormat } from "../../journals/formats";
import {
  addIncurredCost,
  RemoteCallError,
  ResponseParseError,
} from "../../errors";

export const VERIFICATION_UNAVAILABLE = "Verification unavailable: the verification model did not respond.";

export interface CodeGenerationInput {
  dataset: Dataset;
  dataSummary: string;
  analysisPlan: string;
  assumptions: string;
  modifications: string;
  journal: string;
  codeModel: string;
  verificationModel: string;
  /** Runs the final code in the sandbox */
  execute: (code: string) => Promise<ExecutionResult>;
  timeoutMs?: number;
}

export async function runCodeGeneration(input: CodeGenerationInput): Promise<ExecutionOutput> {
  // --- Generate ---
  const generated = await queryModel(
    input.codeModel,
    singleTurn(
      CODE_GENERATION_SYSTEM,
      buildCodeGenerationPrompt({
        dataSummary: input.dataSummary,
        columns: input.dataset.columns.map((c) => c.name),
        analysisPlan: input.analysisPlan,
        assumptions: input.assumptions,
        modifications: input.modifications,
        journalFormat: getJournalFormat(input.journal),
      }),
      { temperature: 0, timeoutMs: input.timeoutMs }
    )
  );

  if (!generated) {
    throw new RemoteCallError(
      "execution",
      input.codeModel,
      `Code generation failed: ${input.codeModel} did not respond.`
    );
  }

  let generationCostUsd = generated.costUsd;
  const code = extractCode(generated.content);
  if (!code) {
    throw new ResponseParseError(
      "execution",
      `Code generation failed: ${input.codeModel} returned no code.`,
      generationCostUsd
    );
  }

  // --- Verify ---
  const verified = await queryModel(
    input.verificationModel,
    singleTurn(CODE_VERIFICATION_SYSTEM, buildCodeVerificationPrompt({ code, analysisPlan: input.analysisPlan }), {
      timeoutMs: input.timeoutMs,
    })
  );

  let verification = VERIFICATION_UNAVAILABLE;
  let verificationFlagged = false;
  if (verified) {
    generationCostUsd += verified.costUsd;
    verification = verified.content;
    verificationFlagged = verificationFlagsProblems(verified.content);
  } else {
    console.warn(`[pipeline] Verification by ${input.verificationModel} failed; executing unverified code`);
  }

  const finalCode = verificationFlagged ? annotateWithVerification(code, verification) : code;

  // --- Execute ---
  let result: ExecutionResult;
  try {
    result = await input.execute(finalCode);
  } catch (error) {
    if (error instanceof RemoteCallError || error instanceof ResponseParseError) {
      throw addIncurredCost(error, generationCostUsd);
    }
    throw new RemoteCallError(
      "execution",
      "sandbox",
      `Sandbox execution failed: ${error instanceof Error ? error.message : String(error)}`,
      generationCostUsd
    );
  }

  return {
    code: finalCode,
    codeModel: input.codeModel,
    verification,
    verificationFlagged,
    results: result.text,
    figures: result.figures,
    tables: result.tables,
    generationCostUsd,
    sandboxCostUsd: result.costUsd,
    costUsd: generationCostUsd + result.costUsd,
  };
}
