/**
 * Error types surfaced to the user.
 *
 * Remote failures and unusable responses are kept apart so the CLI can tell
 * "the provider failed" from "the provider answered with something we could
 * not use".
 */

import type { StageId } from "./council/types";

export class RemoteCallError extends Error {
  readonly stage: StageId | null;
  readonly target: string;
  /** Spend on calls that succeeded before this one failed */
  readonly incurredCostUsd: number;

  constructor(
    stage: StageId | null,
    target: string,
    message: string,
    incurredCostUsd: number = 0
  ) {
    super(message);
    this.name = "RemoteCallError";
    this.stage = stage;
    this.target = target;
    this.incurredCostUsd = incurredCostUsd;
  }
}

export class ResponseParseError extends Error {
  readonly stage: StageId;
  readonly incurredCostUsd: number;

  constructor(stage: StageId, message: string, incurredCostUsd: number = 0) {
    super(message);
    this.name = "ResponseParseError";
    this.stage = stage;
    this.incurredCostUsd = incurredCostUsd;
  }
}

export class StageOrderError extends Error {
  readonly stage: StageId;

  constructor(stage: StageId, message: string) {
    super(message);
    this.name = "StageOrderError";
    this.stage = stage;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContextError";
  }
}

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/**
 * Cost already spent when a stage failed part-way.
 */
export function incurredCost(error: unknown): number {
  if (error instanceof RemoteCallError || error instanceof ResponseParseError) {
    return error.incurredCostUsd;
  }
  return 0;
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

/**
 * Re-raise a stage failure with spend from earlier calls in the same stage
 * folded into its incurred cost. Anything else passes through untouched.
 */
export function addIncurredCost(error: unknown, costUsd: number): unknown {
  if (error instanceof RemoteCallError) {
    return new RemoteCallError(error.stage, error.target, error.message, error.incurredCostUsd + costUsd);
  }
  if (error instanceof ResponseParseError) {
    return new ResponseParseError(error.stage, error.message, error.incurredCostUsd + costUsd);
  }
  return error;
}
