/**
 * Pipeline run — the per-session record and the runner that walks it.
 *
 * The record is an append-only log: every run of a stage (including manual
 * plan edits) adds an attempt, and every attempt's cost is added to the
 * running totals. Stages advance strictly in order; each one except writing
 * waits for an explicit approval before the next may run.
 */

import type { Dataset } from "../data/dataset";
import { summarizeDataset } from "../data/summary";
import type { ExecutionResult } from "../execution/types";
import type {
  PipelineModels,
  PipelineRunRecord,
  ResearchContext,
  StageAttempt,
  StageId,
  StageOutputs,
  StageRecord,
} from "./types";
import { STAGE_ORDER } from "./types";
import {
  runAdversarialReview,
  runAssumptionVerification,
  runCodeGeneration,
  runDataAudit,
  runPlanningCouncil,
  runResultsWriting,
  STAGE_REGISTRY,
  stageIndex,
  stagesBefore,
  stagesFrom,
} from "./stages";
import { extractDisagreements } from "./response-parsers";
import { describeError, incurredCost, StageOrderError } from "../errors";

// ---------------------------------------------------------------------------
// Record
// ---------------------------------------------------------------------------

function emptyStage<S extends StageId>(stage: S): StageRecord<S> {
  return { stage, attempts: [], currentAttempt: null, approval: "pending" };
}

export interface CreateRunOptions {
  id?: string;
  now?: () => Date;
}

export function createPipelineRun(
  dataset: Dataset,
  context: ResearchContext,
  options: CreateRunOptions = {}
): PipelineRunRecord {
  const now = options.now ?? (() => new Date());
  return {
    id: options.id ?? crypto.randomUUID(),
    createdAt: now().toISOString(),
    datasetName: dataset.name,
    datasetSummary: summarizeDataset(dataset),
    columnNames: dataset.columns.map((c) => c.name),
    rowCount: dataset.rows.length,
    context,
    stages: {
      data_audit: emptyStage("data_audit"),
      planning: emptyStage("planning"),
      assumptions: emptyStage("assumptions"),
      execution: emptyStage("execution"),
      review: emptyStage("review"),
      writing: emptyStage("writing"),
    },
    modifications: "",
    reviewNotes: "",
    stageCosts: {
      data_audit: 0,
      planning: 0,
      assumptions: 0,
      execution: 0,
      review: 0,
      writing: 0,
    },
    totalCostUsd: 0,
  };
}

/**
 * The attempt whose output is in effect for a stage, if any.
 */
export function currentAttempt<S extends StageId>(
  record: PipelineRunRecord,
  stage: S
): StageAttempt<S> | null {
  const stageRecord: StageRecord<S> = record.stages[stage];
  if (stageRecord.currentAttempt === null) return null;
  return stageRecord.attempts.find((a) => a.attempt === stageRecord.currentAttempt) ?? null;
}

/**
 * Output of the stage's current attempt when that attempt succeeded.
 */
export function currentOutput<S extends StageId>(
  record: PipelineRunRecord,
  stage: S
): StageOutputs[S] | null {
  const attempt = currentAttempt(record, stage);
  return attempt?.status === "succeeded" ? attempt.output : null;
}

export function requireOutput<S extends StageId>(
  record: PipelineRunRecord,
  stage: S
): StageOutputs[S] {
  const output = currentOutput(record, stage);
  if (output === null) {
    throw new StageOrderError(stage, `${STAGE_REGISTRY[stage].name} has no current output.`);
  }
  return output;
}

// ---------------------------------------------------------------------------
// Stage executors
// ---------------------------------------------------------------------------

export interface StageExecutionContext {
  record: PipelineRunRecord;
  dataset: Dataset;
}

export type StageExecutors = {
  [S in StageId]: (ctx: StageExecutionContext) => Promise<StageOutputs[S]>;
};

export interface DefaultExecutorOptions {
  models: PipelineModels;
  modelTimeoutMs?: number;
  /** Runs generated code in the sandbox */
  execute: (code: string, dataset: Dataset) => Promise<ExecutionResult>;
}

/**
 * Wire each stage to its stage function, feeding it the current outputs of
 * the approved stages before it.
 */
export function createStageExecutors(options: DefaultExecutorOptions): StageExecutors {
  const { models, modelTimeoutMs: timeoutMs } = options;

  return {
    data_audit: ({ record }) =>
      runDataAudit({
        dataSummary: record.datasetSummary,
        context: record.context,
        model: models.audit,
        timeoutMs,
      }),

    planning: ({ record }) =>
      runPlanningCouncil({
        dataSummary: record.datasetSummary,
        dataAudit: requireOutput(record, "data_audit").report,
        context: record.context,
        councilModels: models.council,
        synthesisModel: models.synthesis,
        timeoutMs,
      }),

    assumptions: ({ record }) =>
      runAssumptionVerification({
        dataSummary: record.datasetSummary,
        analysisPlan: requireOutput(record, "planning").synthesis,
        modifications: record.modifications,
        model: models.assumptions,
        timeoutMs,
      }),

    execution: ({ record, dataset }) =>
      runCodeGeneration({
        dataset,
        dataSummary: record.datasetSummary,
        analysisPlan: requireOutput(record, "planning").synthesis,
        assumptions: requireOutput(record, "assumptions").report,
        modifications: record.modifications,
        journal: record.context.journal,
        codeModel: models.codeGeneration,
        verificationModel: models.codeVerification,
        execute: (code) => options.execute(code, dataset),
        timeoutMs,
      }),

    review: ({ record }) => {
      const execution = requireOutput(record, "execution");
      return runAdversarialReview({
        analysisPlan: requireOutput(record, "planning").synthesis,
        code: execution.code,
        results: execution.results,
        assumptions: requireOutput(record, "assumptions").report,
        reviewers: models.reviewers,
        timeoutMs,
      });
    },

    writing: ({ record }) => {
      const execution = requireOutput(record, "execution");
      return runResultsWriting({
        sampleSize: record.rowCount,
        analysisPlan: requireOutput(record, "planning").synthesis,
        executionResults: execution.results,
        figureCount: execution.figures.length,
        tables: execution.tables,
        review: requireOutput(record, "review").combinedReview,
        reviewNotes: record.reviewNotes,
        journal: record.context.journal,
        studyDesign: record.context.studyDesign,
        model: models.writer,
        timeoutMs,
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export interface ApproveOptions {
  /** Changes to the plan, carried into assumptions and code generation */
  modifications?: string;
}

export class PipelineRunner {
  readonly record: PipelineRunRecord;
  private readonly dataset: Dataset;
  private readonly executors: StageExecutors;
  private readonly now: () => Date;

  constructor(
    record: PipelineRunRecord,
    dataset: Dataset,
    executors: StageExecutors,
    options: { now?: () => Date } = {}
  ) {
    this.record = record;
    this.dataset = dataset;
    this.executors = executors;
    this.now = options.now ?? (() => new Date());
  }

  // --- Queries ---

  /** First stage not yet approved, or null when the run is complete */
  currentStage(): StageId | null {
    return STAGE_ORDER.find((s) => this.record.stages[s].approval !== "approved") ?? null;
  }

  /** The current stage when it needs a (re)run; null while it awaits approval */
  nextRunnableStage(): StageId | null {
    const stage = this.currentStage();
    if (stage === null) return null;
    const attempt = currentAttempt(this.record, stage);
    if (attempt === null || attempt.status === "failed") return stage;
    return null;
  }

  isComplete(): boolean {
    return this.currentStage() === null;
  }

  // --- Transitions ---

  async run<S extends StageId>(stage: S): Promise<StageOutputs[S]> {
    this.assertRunnable(stage);
    const stageRecord: StageRecord<S> = this.record.stages[stage];
    const definition = STAGE_REGISTRY[stage];

    const attempt: StageAttempt<S> = {
      attempt: stageRecord.attempts.length + 1,
      status: "running",
      output: null,
      error: null,
      costUsd: 0,
      startedAt: this.now().toISOString(),
      finishedAt: null,
    };
    stageRecord.attempts.push(attempt);
    stageRecord.currentAttempt = attempt.attempt;

    console.info(`[pipeline] Stage ${definition.number} (${definition.name}) attempt ${attempt.attempt}`);

    const executor: (ctx: StageExecutionContext) => Promise<StageOutputs[S]> = this.executors[stage];
    try {
      const output = await executor({ record: this.record, dataset: this.dataset });
      attempt.status = "succeeded";
      attempt.output = output;
      this.finish(stage, attempt, output.costUsd);

      if (!definition.requiresApproval) {
        stageRecord.approval = "approved";
      }
      return output;
    } catch (error) {
      attempt.status = "failed";
      attempt.error = describeError(error);
      this.finish(stage, attempt, incurredCost(error));
      console.error(`[pipeline] ${definition.name} failed:`, attempt.error);
      throw error;
    }
  }

  /** Run the current stage again; only before it is approved */
  async rerun<S extends StageId>(stage: S): Promise<StageOutputs[S]> {
    if (this.record.stages[stage].attempts.length === 0) {
      throw new StageOrderError(stage, `${STAGE_REGISTRY[stage].name} has not run yet.`);
    }
    return this.run(stage);
  }

  approve(stage: StageId, options: ApproveOptions = {}): void {
    this.assertRunnable(stage);
    const name = STAGE_REGISTRY[stage].name;
    const attempt = currentAttempt(this.record, stage);
    if (attempt?.status !== "succeeded") {
      throw new StageOrderError(stage, `${name} has no successful attempt to approve.`);
    }

    if (options.modifications !== undefined) {
      if (stage !== "planning") {
        throw new StageOrderError(stage, "Modifications can only be given when approving the plan.");
      }
      this.record.modifications = options.modifications.trim();
    }

    this.record.stages[stage].approval = "approved";
    console.info(`[pipeline] ${name} approved`);
  }

  /**
   * Go back to `target`: it and every later stage return to pending, and the
   * later stages' outputs stop counting as current (they stay in history).
   */
  revise(target: StageId): void {
    const current = this.currentStage();
    if (current !== null && stageIndex(target) > stageIndex(current)) {
      throw new StageOrderError(target, `Cannot revise ${STAGE_REGISTRY[target].name}: it has not been reached.`);
    }

    for (const stage of stagesFrom(target)) {
      const stageRecord = this.record.stages[stage];
      stageRecord.approval = "pending";
      if (stage !== target) stageRecord.currentAttempt = null;
    }
    if (stageIndex(target) <= stageIndex("review")) {
      this.record.reviewNotes = "";
    }
    console.info(`[pipeline] Revising from ${STAGE_REGISTRY[target].name}`);
  }

  /**
   * Replace the synthesized plan by hand before approving it.
   */
  editPlan(text: string): void {
    this.assertRunnable("planning");
    const previous = currentOutput(this.record, "planning");
    if (previous === null) {
      throw new StageOrderError("planning", "There is no plan to edit yet.");
    }
    const plan = text.trim();
    if (!plan) {
      throw new StageOrderError("planning", "The edited plan is empty.");
    }

    const stageRecord = this.record.stages.planning;
    const timestamp = this.now().toISOString();
    const attempt: StageAttempt<"planning"> = {
      attempt: stageRecord.attempts.length + 1,
      status: "succeeded",
      output: {
        ...previous,
        synthesis: plan,
        disagreements: extractDisagreements(plan),
        editedByUser: true,
        costUsd: 0,
      },
      error: null,
      costUsd: 0,
      startedAt: timestamp,
      finishedAt: timestamp,
    };
    stageRecord.attempts.push(attempt);
    stageRecord.currentAttempt = attempt.attempt;
    console.info("[pipeline] Plan edited by hand");
  }

  /**
   * Attach notes on the adversarial review; writing uses them in the
   * limitations section.
   */
  addReviewNotes(notes: string): void {
    if (currentOutput(this.record, "review") === null) {
      throw new StageOrderError("review", "There is no review to annotate yet.");
    }
    if (this.record.stages.writing.approval === "approved") {
      throw new StageOrderError("writing", "Results are already written; revise the review first.");
    }
    this.record.reviewNotes = notes.trim();
  }

  // --- Internals ---

  private assertRunnable(stage: StageId): void {
    const name = STAGE_REGISTRY[stage].name;
    const blocking = stagesBefore(stage).find((s) => this.record.stages[s].approval !== "approved");
    if (blocking !== undefined) {
      throw new StageOrderError(
        stage,
        `${name} cannot proceed before ${STAGE_REGISTRY[blocking].name} is approved.`
      );
    }
    if (this.record.stages[stage].approval === "approved") {
      throw new StageOrderError(stage, `${name} is already approved; revise it to go back.`);
    }
    if (this.record.stages[stage].attempts.some((a) => a.status === "running")) {
      throw new StageOrderError(stage, `${name} is already running.`);
    }
  }

  private finish<S extends StageId>(stage: S, attempt: StageAttempt<S>, costUsd: number): void {
    attempt.costUsd = costUsd;
    attempt.finishedAt = this.now().toISOString();
    this.record.stageCosts[stage] += costUsd;
    this.record.totalCostUsd = STAGE_ORDER.reduce((sum, s) => sum + this.record.stageCosts[s], 0);
  }
}
