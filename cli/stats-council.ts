#!/usr/bin/env node
/**
 * Interactive command-line session for the Stats Council pipeline.
 *
 * Walks the six stages in order, printing each output and its cost, and
 * stops at every approval gate to ask what to do next.
 *
 * Usage:
 *   npm start -- --data study.csv --question "Does X change Y after surgery?" \
 *     --outcome revision --exposure implant --covariates age,sex --journal JBJS
 *
 * Options:
 *   --data <path>          CSV dataset (required)
 *   --question <text>      Research question (required)
 *   --hypotheses <text>    Stated hypotheses
 *   --outcome <column>     Primary outcome variable
 *   --exposure <column>    Exposure / treatment variable
 *   --covariates <list>    Comma-separated covariates
 *   --context <text>       Additional context for the audit
 *   --journal <key>        Journal format (default: Generic)
 *   --design <name>        Study design (default: Auto-detect)
 *   --out <dir>            Output directory (default: STATS_COUNCIL_OUTPUT_DIR)
 *   --yes                  Approve every stage without asking
 *   --quick                Quick execution: smaller sandbox model, text only
 *   -h, --help             Show help
 *
 * Exit codes:
 *   0 - Completed, artifacts written
 *   1 - Error
 *   2 - Abandoned by the user
 */

import "dotenv/config";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { createInterface, type Interface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

import { loadConfig } from "../lib/config";
import { loadDataset } from "../lib/data/dataset";
import { parseResearchContext, findUnknownVariables } from "../lib/council/validation";
import {
  createPipelineRun,
  createStageExecutors,
  currentAttempt,
  currentOutput,
  PipelineRunner,
} from "../lib/council/pipeline";
import { configureOpenRouter } from "../lib/council/openrouter";
import { DEFAULT_PIPELINE_MODELS, formatCost, getModelDisplayName } from "../lib/council/models";
import { STAGE_REGISTRY, estimatedTotalCostUsd } from "../lib/council/stages";
import type { PipelineRunRecord, StageId } from "../lib/council/types";
import { STAGE_ORDER, STUDY_DESIGNS } from "../lib/council/types";
import { OpenAICodeInterpreterBackend } from "../lib/execution/openai-backend";
import { DEFAULT_QUICK_MODEL, executeAnalysis, executeQuick } from "../lib/execution/executor";
import { writeArtifacts } from "../lib/export/artifacts";
import { getJournalKeys } from "../lib/journals/formats";
import { describeError } from "../lib/errors";

// ============================================================
// Arguments
// ============================================================

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_ABANDONED = 2;

export interface CliArgs {
  data?: string;
  question?: string;
  hypotheses?: string;
  outcome?: string;
  exposure?: string;
  covariates?: string;
  context?: string;
  journal?: string;
  design?: string;
  out?: string;
  yes: boolean;
  quick: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      data: { type: "string" },
      question: { type: "string" },
      hypotheses: { type: "string" },
      outcome: { type: "string" },
      exposure: { type: "string" },
      covariates: { type: "string" },
      context: { type: "string" },
      journal: { type: "string" },
      design: { type: "string" },
      out: { type: "string" },
      yes: { type: "boolean", default: false },
      quick: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  return {
    ...values,
    yes: values.yes ?? false,
    quick: values.quick ?? false,
    help: values.help ?? false,
  };
}

function printHelp(): void {
  console.log(`Usage: stats-council --data <csv> --question <text> [options]

  --hypotheses <text>   --outcome <column>   --exposure <column>
  --covariates <a,b,c>  --context <text>     --out <dir>
  --journal <key>       one of: ${getJournalKeys().join(", ")}
  --design <name>       one of: ${STUDY_DESIGNS.join(", ")}
  --yes                 approve every stage without asking
  --quick               quick execution (text results only)
  -h, --help            show this help`);
}

// ============================================================
// Output
// ============================================================

function section(title: string, body: string): string {
  return `\n--- ${title} ---\n${body}`;
}

function renderBody(record: PipelineRunRecord, stage: StageId): string {
  const lines: string[] = [];

  switch (stage) {
    case "data_audit": {
      const audit = currentOutput(record, "data_audit");
      if (audit) lines.push(audit.report);
      break;
    }
    case "planning": {
      const planning = currentOutput(record, "planning");
      if (!planning) break;
      for (const plan of planning.plans) {
        lines.push(section(`Plan from ${plan.displayName}`, plan.plan));
      }
      if (planning.failedModels.length > 0) {
        lines.push(`\n(No plan from: ${planning.failedModels.map(getModelDisplayName).join(", ")})`);
      }
      lines.push(section(`Synthesis (${getModelDisplayName(planning.synthesisModel)})`, planning.synthesis));
      if (planning.disagreements) lines.push(section("Council disagreements", planning.disagreements));
      break;
    }
    case "assumptions": {
      const assumptions = currentOutput(record, "assumptions");
      if (assumptions) lines.push(assumptions.report);
      break;
    }
    case "execution": {
      const e = currentOutput(record, "execution");
      if (!e) break;
      if (e.verificationFlagged) lines.push(section("Verification flagged problems", e.verification));
      lines.push(section("Code", e.code));
      lines.push(section("Results", e.results));
      lines.push(`\n${e.figures.length} figure(s), ${e.tables.length} table(s)`);
      break;
    }
    case "review": {
      const r = currentOutput(record, "review");
      if (!r) break;
      lines.push(r.combinedReview);
      lines.push(
        `\nConfidence: ${r.confidence} (critical ${r.severityCounts.critical}, major ${r.severityCounts.major}, minor ${r.severityCounts.minor})`
      );
      if (r.issues) lines.push(section("Issues", r.issues));
      break;
    }
    case "writing": {
      const w = currentOutput(record, "writing");
      if (!w) break;
      lines.push(`Journal: ${w.journal}  Guideline: ${w.reportingGuideline}`);
      lines.push(section("Methods", w.sections.methods));
      lines.push(section("Results", w.sections.results));
      lines.push(section("Figure Legends", w.sections.legends));
      lines.push(section("Limitations", w.sections.limitations));
      break;
    }
  }

  return lines.join("\n");
}

/**
 * Text shown after a stage runs: its current output and the attempt's cost.
 */
export function renderStageOutput(record: PipelineRunRecord, stage: StageId): string {
  const attempt = currentAttempt(record, stage);
  return `${renderBody(record, stage)}\n\nStage cost: ${formatCost(attempt?.costUsd ?? 0)}`;
}

// ============================================================
// Session
// ============================================================

type GateAction =
  | { kind: "approve"; modifications?: string }
  | { kind: "rerun" }
  | { kind: "back"; stage: StageId }
  | { kind: "edit" }
  | { kind: "notes" }
  | { kind: "quit" };

/**
 * Parse an answer at an approval gate. Returns null when it is not understood.
 */
export function parseGateAnswer(answer: string, stage: StageId): GateAction | null {
  const [command = "", ...rest] = answer.trim().split(/\s+/);
  switch (command.toLowerCase()) {
    case "a":
    case "approve":
      return { kind: "approve" };
    case "m":
    case "modify":
      return stage === "planning" ? { kind: "approve", modifications: rest.join(" ") } : null;
    case "r":
    case "rerun":
      return { kind: "rerun" };
    case "b":
    case "back": {
      const n = parseInt(rest[0] ?? "", 10);
      const target = STAGE_ORDER[n - 1];
      return target !== undefined ? { kind: "back", stage: target } : null;
    }
    case "e":
    case "edit":
      return stage === "planning" ? { kind: "edit" } : null;
    case "n":
    case "notes":
      return stage === "review" ? { kind: "notes" } : null;
    case "q":
    case "quit":
      return { kind: "quit" };
    default:
      return null;
  }
}

function gatePrompt(stage: StageId): string {
  const options = ["[a]pprove", "[r]erun", "[b]ack <stage no.>"];
  if (stage === "planning") options.push("[m]odify <changes>", "[e]dit plan");
  if (stage === "review") options.push("[n]otes");
  options.push("[q]uit");
  return `${options.join("  ")} > `;
}

async function readBlock(rl: Interface, label: string): Promise<string> {
  console.log(`${label} (finish with a line containing only ".")`);
  const lines: string[] = [];
  for (;;) {
    const line = await rl.question("");
    if (line.trim() === ".") break;
    lines.push(line);
  }
  return lines.join("\n");
}

async function session(args: CliArgs): Promise<number> {
  if (!args.data || !args.question) {
    console.error("Error: --data and --question are required (see --help)");
    return EXIT_ERROR;
  }

  const config = loadConfig();
  configureOpenRouter({
    apiKey: config.openRouterApiKey,
    appUrl: config.appUrl,
    appTitle: config.appTitle,
  });

  const dataset = await loadDataset(args.data);
  const context = parseResearchContext({
    researchQuestion: args.question,
    hypotheses: args.hypotheses,
    outcomeVar: args.outcome,
    exposureVar: args.exposure,
    covariates: args.covariates,
    additionalContext: args.context,
    journal: args.journal,
    studyDesign: args.design,
  });

  const unknown = findUnknownVariables(context, dataset);
  if (unknown.length > 0) {
    console.warn(`Warning: not columns of ${dataset.name}: ${unknown.join(", ")}`);
  }

  const backend = new OpenAICodeInterpreterBackend(config.openAiApiKey);
  const executionOptions = {
    backend,
    model: args.quick ? DEFAULT_QUICK_MODEL : config.sandboxModel,
    timeoutMs: config.sandboxTimeoutMs,
  };

  const record = createPipelineRun(dataset, context);
  const runner = new PipelineRunner(
    record,
    dataset,
    createStageExecutors({
      models: DEFAULT_PIPELINE_MODELS,
      modelTimeoutMs: config.modelTimeoutMs,
      execute: (code, data) =>
        args.quick ? executeQuick(code, data, executionOptions) : executeAnalysis(code, data, executionOptions),
    })
  );

  console.log(`Dataset: ${dataset.name} (${record.rowCount} rows, ${record.columnNames.length} columns)`);
  console.log(`Estimated cost of a full run: ~${formatCost(estimatedTotalCostUsd())}`);

  const rl = createInterface({ input: stdin, output: stdout });
  try {
    while (!runner.isComplete()) {
      const runnable = runner.nextRunnableStage();
      if (runnable !== null) {
        // A failed attempt is only retried on the user's say-so
        if (currentAttempt(record, runnable)?.status === "failed") {
          if (args.yes) return EXIT_ERROR;
          const answer = await rl.question("[r]etry  [q]uit > ");
          if (answer.trim().toLowerCase().startsWith("q")) return EXIT_ABANDONED;
        }

        const def = STAGE_REGISTRY[runnable];
        console.log(`\n=== Stage ${def.number}: ${def.name} ===\n${def.description}`);
        try {
          await runner.run(runnable);
          console.log(renderStageOutput(record, runnable));
        } catch (error) {
          console.error(`\n${describeError(error)}`);
        }
        continue;
      }

      const stage = runner.currentStage();
      if (stage === null) break;

      if (args.yes) {
        runner.approve(stage);
        continue;
      }

      const action = parseGateAnswer(await rl.question(gatePrompt(stage)), stage);
      if (action === null) {
        console.log("Not understood.");
        continue;
      }

      try {
        switch (action.kind) {
          case "approve":
            runner.approve(stage, { modifications: action.modifications });
            break;
          case "rerun":
            await runner.rerun(stage);
            console.log(renderStageOutput(record, stage));
            break;
          case "back":
            runner.revise(action.stage);
            break;
          case "edit":
            runner.editPlan(await readBlock(rl, "Enter the revised plan"));
            break;
          case "notes":
            runner.addReviewNotes(await readBlock(rl, "Enter your notes on the review"));
            break;
          case "quit":
            return EXIT_ABANDONED;
        }
      } catch (error) {
        console.error(describeError(error));
      }
    }
  } finally {
    rl.close();
  }

  const outDir = join(args.out ?? config.outputDir, record.id);
  const written = await writeArtifacts(record, outDir);

  console.log(`\nArtifacts written to ${outDir}`);
  console.log(`  ${written.document.path}${written.document.format === "txt" ? " (plain-text fallback)" : ""}`);
  for (const path of [written.script, ...written.tables, ...written.figures, written.audit]) {
    console.log(`  ${path}`);
  }
  for (const stage of STAGE_ORDER) {
    console.log(`  ${STAGE_REGISTRY[stage].name}: ${formatCost(record.stageCosts[stage])}`);
  }
  console.log(`Total cost: ${formatCost(record.totalCostUsd)}`);

  return EXIT_OK;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    return EXIT_ERROR;
  }

  if (args.help) {
    printHelp();
    return EXIT_OK;
  }

  try {
    return await session(args);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    return EXIT_ERROR;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("stats-council.ts") || process.argv[1].endsWith("stats-council.js"));

if (isDirectExecution) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = EXIT_ERROR;
    }
  );
}
