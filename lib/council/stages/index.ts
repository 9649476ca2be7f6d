/**
 * Stage registry — display metadata for the six pipeline stages.
 */

import type { StageDefinition, StageId } from "../types";
import { STAGE_ORDER } from "../types";

export { runDataAudit } from "./data-audit";
export { runPlanningCouncil } from "./planning-council";
export { runAssumptionVerification } from "./assumptions";
export { runCodeGeneration } from "./code-generation";
export { runAdversarialReview } from "./adversarial-review";
export { runResultsWriting } from "./results-writing";

export const STAGE_REGISTRY: Record<StageId, StageDefinition> = {
  data_audit: {
    id: "data_audit",
    number: 1,
    name: "Data Audit",
    description: "DeepSeek V3 checks data quality, variable types and feasibility",
    requiresApproval: true,
    estimatedCostUsd: 0.05,
  },
  planning: {
    id: "planning",
    number: 2,
    name: "Planning Council",
    description: "DeepSeek V3, DeepSeek R1 and Gemini 2.5 Pro propose plans; o3 synthesizes",
    requiresApproval: true,
    estimatedCostUsd: 2.0,
  },
  assumptions: {
    id: "assumptions",
    number: 3,
    name: "Assumption Verification",
    description: "DeepSeek R1 checks the statistical assumptions of the approved plan",
    requiresApproval: true,
    estimatedCostUsd: 0.1,
  },
  execution: {
    id: "execution",
    number: 4,
    name: "Code Generation & Execution",
    description: "o3 writes the code, R1 verifies it, the sandbox runs it",
    requiresApproval: true,
    estimatedCostUsd: 1.5,
  },
  review: {
    id: "review",
    number: 5,
    name: "Adversarial Review",
    description: "DeepSeek V3 and R1 hunt for flaws in the analysis",
    requiresApproval: true,
    estimatedCostUsd: 0.2,
  },
  writing: {
    id: "writing",
    number: 6,
    name: "Results Writing",
    description: "Claude Opus 4.5 drafts methods, results, legends and limitations",
    requiresApproval: false,
    estimatedCostUsd: 5.0,
  },
};

export function stageIndex(stage: StageId): number {
  return STAGE_ORDER.indexOf(stage);
}

/** Stages strictly before `stage`, in order */
export function stagesBefore(stage: StageId): StageId[] {
  return STAGE_ORDER.slice(0, stageIndex(stage));
}

/** `stage` and every stage after it, in order */
export function stagesFrom(stage: StageId): StageId[] {
  return STAGE_ORDER.slice(stageIndex(stage));
}

export function estimatedTotalCostUsd(): number {
  return STAGE_ORDER.reduce((sum, id) => sum + STAGE_REGISTRY[id].estimatedCostUsd, 0);
}
