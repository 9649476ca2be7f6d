/**
 * Sandbox execution — upload the dataset, run the analysis code in the
 * remote interpreter, poll until the run finishes, then collect the
 * transcript, figures and tables it produced.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { basename } from "node:path";
import type { Dataset } from "../data/dataset";
import { datasetToCsv, parseDataset } from "../data/dataset";
import { calculateCost } from "../council/models";
import { addIncurredCost, RemoteCallError, ResponseParseError } from "../errors";
import type {
  CodeInterpreterBackend,
  ExecutionResult,
  Figure,
  ResultTable,
  RunStatus,
  SandboxRun,
} from "./types";

/** Flat per-session container fee charged on top of token usage */
export const CONTAINER_SESSION_FEE_USD = 0.03;

export const DATA_FILE_NAME = "data.csv";

export interface ExecutionOptions {
  backend: CodeInterpreterBackend;
  model: string;
  timeoutMs: number;
  pollIntervalMs?: number;
}

export const DEFAULT_QUICK_MODEL = "gpt-4.1-mini";

const ACTIVE_STATUSES: readonly RunStatus[] = ["queued", "in_progress"];

const ANALYST_INSTRUCTIONS =
  "You are a statistical analyst. Run the Python code you are given against the uploaded data and report the results faithfully.";

export function buildExecutionPrompt(code: string): string {
  return `Run the following Python analysis against the uploaded CSV file (${DATA_FILE_NAME}).

INSTRUCTIONS:
1. Load the uploaded file with pandas
2. Run the analysis code below, fixing only file paths if needed
3. Save every figure as a PNG file
4. Save every table as a CSV file
5. Finish with a complete text summary of the results

ANALYSIS CODE:
\`\`\`python
${code}
\`\`\`

When the analysis has run:
1. Save figures as 'figure_1.png', 'figure_2.png', ...
2. Save Table 1 as 'table_1.csv'
3. Save model results as 'results_table.csv'
4. Print a full summary of the statistical results:
   - Sample sizes
   - Descriptive statistics
   - Test statistics, p-values and confidence intervals
   - Effect sizes and their interpretation
   - Model diagnostics where applicable`;
}

/**
 * "table_1.csv" → "Table 1", "results_table.csv" → "Results Table"
 */
export function tableDisplayName(fileName: string): string {
  return fileName
    .replace(/\.csv$/i, "")
    .split(/[_\s-]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

function figureOrder(name: string): number {
  const match = name.match(/(\d+)/);
  return match ? parseInt(match[1], 10) : Number.MAX_SAFE_INTEGER;
}

/**
 * Poll a run until it leaves the queued/in-progress states. A run still
 * active at the deadline is cancelled before the timeout is raised.
 */
export async function waitForRun(
  backend: CodeInterpreterBackend,
  initial: SandboxRun,
  timeoutMs: number,
  pollIntervalMs: number
): Promise<SandboxRun> {
  const deadline = Date.now() + timeoutMs;
  let run = initial;

  while (ACTIVE_STATUSES.includes(run.status)) {
    if (Date.now() >= deadline) {
      try {
        await backend.cancelRun(run.id);
      } catch (error) {
        console.warn(`[sandbox] Could not cancel run ${run.id}:`, error);
      }
      throw new RemoteCallError(
        "execution",
        "sandbox",
        `Sandbox run ${run.id} did not finish within ${Math.round(timeoutMs / 1000)}s.`
      );
    }
    await sleep(pollIntervalMs);
    run = await backend.getRun(run.id);
  }

  return run;
}

async function collectOutputs(
  backend: CodeInterpreterBackend,
  containerId: string
): Promise<{ figures: Figure[]; tables: ResultTable[] }> {
  const figures: Figure[] = [];
  const tables: ResultTable[] = [];

  for (const file of await backend.listOutputFiles(containerId)) {
    const fileName = basename(file.path);
    if (fileName === DATA_FILE_NAME) continue;

    if (/\.png$/i.test(fileName)) {
      figures.push({ name: fileName, data: await backend.downloadFile(containerId, file.id) });
    } else if (/\.csv$/i.test(fileName)) {
      const bytes = await backend.downloadFile(containerId, file.id);
      const text = new TextDecoder().decode(bytes);
      try {
        tables.push({
          name: tableDisplayName(fileName),
          fileName,
          table: parseDataset(text, fileName),
        });
      } catch (error) {
        console.warn(`[sandbox] Skipping table ${fileName}:`, error);
      }
    }
  }

  figures.sort((a, b) => figureOrder(a.name) - figureOrder(b.name));
  tables.sort((a, b) => a.fileName.localeCompare(b.fileName));

  return { figures, tables };
}

async function runInSandbox(
  prompt: string,
  dataset: Dataset,
  options: ExecutionOptions
): Promise<{ run: SandboxRun; costUsd: number }> {
  const { backend, model, timeoutMs } = options;

  const fileId = await backend.uploadFile(DATA_FILE_NAME, datasetToCsv(dataset));

  try {
    const started = await backend.startRun({
      model,
      instructions: ANALYST_INSTRUCTIONS,
      prompt,
      fileIds: [fileId],
    });
    const run = await waitForRun(backend, started, timeoutMs, options.pollIntervalMs ?? 2000);

    if (run.status !== "completed") {
      throw new RemoteCallError(
        "execution",
        "sandbox",
        `Sandbox run ${run.id} ended with status ${run.status}${run.error ? `: ${run.error}` : ""}`
      );
    }

    const costUsd =
      (run.usage ? calculateCost(model, run.usage) : 0) + CONTAINER_SESSION_FEE_USD;

    if (!run.outputText.trim()) {
      throw new ResponseParseError(
        "execution",
        `Sandbox run ${run.id} completed without any output.`,
        costUsd
      );
    }

    return { run, costUsd };
  } finally {
    try {
      await backend.deleteFile(fileId);
    } catch (error) {
      console.warn(`[sandbox] Could not delete uploaded file ${fileId}:`, error);
    }
  }
}

/**
 * Execute analysis code against the dataset and collect every artifact.
 */
export async function executeAnalysis(
  code: string,
  dataset: Dataset,
  options: ExecutionOptions
): Promise<ExecutionResult> {
  console.info(`[sandbox] Executing analysis on ${options.model}`);
  const { run, costUsd } = await runInSandbox(buildExecutionPrompt(code), dataset, options);

  let outputs: { figures: Figure[]; tables: ResultTable[] } = { figures: [], tables: [] };
  if (run.containerId) {
    try {
      outputs = await collectOutputs(options.backend, run.containerId);
    } catch (error) {
      if (error instanceof RemoteCallError || error instanceof ResponseParseError) {
        throw addIncurredCost(error, costUsd);
      }
      throw new RemoteCallError(
        "execution",
        "sandbox",
        `Collecting outputs of sandbox run ${run.id} failed: ${error instanceof Error ? error.message : String(error)}`,
        costUsd
      );
    }
  }

  return {
    text: run.outputText,
    figures: outputs.figures,
    tables: outputs.tables,
    costUsd,
    runId: run.id,
  };
}

/**
 * Quick mode: text results only, no artifact download.
 */
export async function executeQuick(
  code: string,
  dataset: Dataset,
  options: ExecutionOptions
): Promise<ExecutionResult> {
  console.info(`[sandbox] Quick execution on ${options.model}`);
  const prompt = `Run this code against the uploaded ${DATA_FILE_NAME} and report the results:\n\`\`\`python\n${code}\n\`\`\``;
  const { run, costUsd } = await runInSandbox(prompt, dataset, options);

  return { text: run.outputText, figures: [], tables: [], costUsd, runId: run.id };
}
