/**
 * Core type definitions for the Stats Council analysis pipeline.
 *
 * Pipeline:
 *   Stage 1: Data Audit — one model audits the dataset summary
 *   Stage 2: Planning Council — council models propose plans, a lead synthesizes
 *   Stage 3: Assumption Verification — check the approved plan's assumptions
 *   Stage 4: Code Generation & Execution — write, verify, run in the sandbox
 *   Stage 5: Adversarial Review — hostile reviewers look for flaws
 *   Stage 6: Results Writing — methods, results, legends, limitations
 *
 * Every stage except writing waits for approval before the next may run.
 */

import type { Figure, ResultTable } from "../execution/types";

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

export type StageId =
  | "data_audit"
  | "planning"
  | "assumptions"
  | "execution"
  | "review"
  | "writing";

export const STAGE_ORDER: readonly StageId[] = [
  "data_audit",
  "planning",
  "assumptions",
  "execution",
  "review",
  "writing",
] as const;

export interface StageDefinition {
  id: StageId;
  number: number;
  name: string;
  description: string;
  requiresApproval: boolean;
  estimatedCostUsd: number;
}

// ---------------------------------------------------------------------------
// Research context (user-supplied parameters)
// ---------------------------------------------------------------------------

export const STUDY_DESIGNS = [
  "Auto-detect",
  "Retrospective Cohort",
  "Prospective Cohort",
  "Case-Control",
  "Cross-sectional",
  "RCT",
  "Case Series",
  "Prediction Model",
] as const;

export type StudyDesign = (typeof STUDY_DESIGNS)[number];

export interface ResearchContext {
  researchQuestion: string;
  hypotheses: string;
  outcomeVar: string;
  exposureVar: string;
  covariates: string[];
  additionalContext: string;
  journal: string;
  studyDesign: StudyDesign;
}

// ---------------------------------------------------------------------------
// Model configuration
// ---------------------------------------------------------------------------

export interface PipelineModels {
  audit: string;
  council: string[];
  synthesis: string;
  assumptions: string;
  codeGeneration: string;
  codeVerification: string;
  reviewers: string[];
  writer: string;
}

export interface ModelResponse {
  model: string;
  content: string;
  responseTimeMs: number;
  costUsd: number;
}

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------

export interface DataAuditOutput {
  report: string;
  response: ModelResponse;
  costUsd: number;
}

export interface CouncilPlan {
  model: string;
  displayName: string;
  plan: string;
  responseTimeMs: number;
  costUsd: number;
}

export interface PlanningOutput {
  plans: CouncilPlan[];
  failedModels: string[];
  synthesis: string;
  synthesisModel: string;
  disagreements: string | null;
  /** True when the plan was replaced by hand before approval */
  editedByUser: boolean;
  costUsd: number;
}

export interface AssumptionsOutput {
  report: string;
  response: ModelResponse;
  costUsd: number;
}

export interface ExecutionOutput {
  code: string;
  codeModel: string;
  verification: string;
  verificationFlagged: boolean;
  results: string;
  figures: Figure[];
  tables: ResultTable[];
  generationCostUsd: number;
  sandboxCostUsd: number;
  costUsd: number;
}

export type Confidence = "HIGH" | "MEDIUM" | "LOW";

export interface SeverityCounts {
  critical: number;
  major: number;
  minor: number;
}

export interface ReviewOutput {
  reviews: ModelResponse[];
  failedModels: string[];
  combinedReview: string;
  issues: string | null;
  confidence: Confidence;
  severityCounts: SeverityCounts;
  costUsd: number;
}

export interface DocumentSections {
  methods: string;
  results: string;
  legends: string;
  limitations: string;
}

export interface WritingOutput {
  sections: DocumentSections;
  journal: string;
  reportingGuideline: string;
  costUsd: number;
}

export interface StageOutputs {
  data_audit: DataAuditOutput;
  planning: PlanningOutput;
  assumptions: AssumptionsOutput;
  execution: ExecutionOutput;
  review: ReviewOutput;
  writing: WritingOutput;
}

// ---------------------------------------------------------------------------
// Pipeline run record
// ---------------------------------------------------------------------------

export type AttemptStatus = "running" | "succeeded" | "failed";

export interface StageAttempt<S extends StageId = StageId> {
  attempt: number;
  status: AttemptStatus;
  output: StageOutputs[S] | null;
  error: string | null;
  costUsd: number;
  startedAt: string;
  finishedAt: string | null;
}

export type ApprovalStatus = "pending" | "approved";

export interface StageRecord<S extends StageId = StageId> {
  stage: S;
  attempts: StageAttempt<S>[];
  /** Attempt number whose output is in effect; null after a revision upstream */
  currentAttempt: number | null;
  approval: ApprovalStatus;
}

export type StageRecords = { [S in StageId]: StageRecord<S> };

export interface PipelineRunRecord {
  id: string;
  createdAt: string;
  datasetName: string;
  datasetSummary: string;
  columnNames: string[];
  rowCount: number;
  context: ResearchContext;
  stages: StageRecords;
  /** Free-text changes the user asked for when approving the plan */
  modifications: string;
  /** Notes the user attached to the adversarial review */
  reviewNotes: string;
  stageCosts: Record<StageId, number>;
  totalCostUsd: number;
}
