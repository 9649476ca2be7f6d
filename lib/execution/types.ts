/**
 * Types shared by the sandbox backends and the execution stage.
 */

import type { Dataset } from "../data/dataset";

export interface Figure {
  /** e.g. "figure_1.png" */
  name: string;
  data: Uint8Array;
}

export interface ResultTable {
  /** Display name derived from the file name, e.g. "Table 1" */
  name: string;
  fileName: string;
  table: Dataset;
}

export interface ExecutionResult {
  text: string;
  figures: Figure[];
  tables: ResultTable[];
  costUsd: number;
  runId: string;
}

export type RunStatus =
  | "queued"
  | "in_progress"
  | "completed"
  | "failed"
  | "cancelled"
  | "incomplete";

export interface SandboxRun {
  id: string;
  status: RunStatus;
  /** Concatenated assistant text */
  outputText: string;
  /** Sandbox container the run executed in, once known */
  containerId: string | null;
  usage: { inputTokens: number; outputTokens: number } | null;
  error: string | null;
}

export interface SandboxFile {
  id: string;
  /** Path or name inside the sandbox, e.g. "/mnt/data/figure_1.png" */
  path: string;
}

export interface StartRunRequest {
  model: string;
  instructions: string;
  prompt: string;
  fileIds: string[];
}

/**
 * The remote code-interpreter surface the executor needs.
 */
export interface CodeInterpreterBackend {
  uploadFile(name: string, content: string): Promise<string>;
  startRun(request: StartRunRequest): Promise<SandboxRun>;
  getRun(runId: string): Promise<SandboxRun>;
  cancelRun(runId: string): Promise<void>;
  listOutputFiles(containerId: string): Promise<SandboxFile[]>;
  downloadFile(containerId: string, fileId: string): Promise<Uint8Array>;
  deleteFile(fileId: string): Promise<void>;
}
