/**
 * Tests for Stage 4: generate → verify → annotate → execute.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@/lib/council/openrouter", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@/lib/council/openrouter")>()),
  queryModel: vi.fn(),
  queryModelsParallel: vi.fn(),
}));

import { queryModel, type QueryResult } from "@/lib/council/openrouter";
import { runCodeGeneration, VERIFICATION_UNAVAILABLE } from "@/lib/council/stages/code-generation";
import type { ExecutionResult } from "@/lib/execution/types";
import { parseDataset } from "@/lib/data/dataset";
import { incurredCost, RemoteCallError, ResponseParseError } from "@/lib/errors";
import { CONTAINER_SESSION_FEE_USD, executeAnalysis } from "@/lib/execution/executor";
import { bytes, FakeBackend, sandboxRun } from "./fake-backend";

const mockQueryModel = vi.mocked(queryModel);

function result(content: string, costUsd: number): QueryResult {
  return { content, responseTimeMs: 100, usage: { inputTokens: 1, outputTokens: 1 }, costUsd };
}

const SANDBOX_DATA = parseDataset("age\n60\n", "data.csv");
const SANDBOX_OPTIONS = { model: "gpt-4.1", timeoutMs: 60_000, pollIntervalMs: 0 };

const EXECUTION: ExecutionResult = {
  text: "OR 1.5",
  figures: [{ name: "figure_1.png", data: new Uint8Array([1]) }],
  tables: [],
  costUsd: 0.25,
  runId: "run_1",
};

function makeInput(execute: (code: string) => Promise<ExecutionResult>) {
  return {
    dataset: parseDataset("age,revised\n60,0\n", "cohort.csv"),
    dataSummary: "summary",
    analysisPlan: "Logistic regression",
    assumptions: "Hold",
    modifications: "",
    journal: "Generic",
    codeModel: "m/coder",
    verificationModel: "m/verifier",
    execute,
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "info").mockImplementation(() => {});
});

describe("runCodeGeneration", () => {
  it("runs verified code and adds up both costs", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("```python\nx = 1\n```", 0.5))
      .mockResolvedValueOnce(result("Looks correct.", 0.25));
    const execute = vi.fn(async (_code: string) => EXECUTION);

    const output = await runCodeGeneration(makeInput(execute));

    expect(execute).toHaveBeenCalledWith("x = 1");
    expect(output.code).toBe("x = 1");
    expect(output.codeModel).toBe("m/coder");
    expect(output.verification).toBe("Looks correct.");
    expect(output.verificationFlagged).toBe(false);
    expect(output.results).toBe("OR 1.5");
    expect(output.figures).toHaveLength(1);
    expect(output.generationCostUsd).toBe(0.75);
    expect(output.sandboxCostUsd).toBe(0.25);
    expect(output.costUsd).toBe(1);
  });

  it("generates deterministically and verifies against the plan", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("Looks correct.", 0.25));

    await runCodeGeneration(makeInput(async () => EXECUTION));

    expect(mockQueryModel).toHaveBeenNthCalledWith(
      1,
      "m/coder",
      expect.objectContaining({ temperature: 0 })
    );
    expect(mockQueryModel.mock.calls[1][0]).toBe("m/verifier");
    expect(mockQueryModel.mock.calls[1][1].messages[0].content).toContain(
      "INTENDED ANALYSIS PLAN:\nLogistic regression\n"
    );
  });

  it("prefixes flagged verification notes as comments", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("Found a bug: wrong test", 0.25));
    const execute = vi.fn(async (_code: string) => EXECUTION);

    const output = await runCodeGeneration(makeInput(execute));

    const annotated = "# VERIFICATION NOTES:\n# Found a bug: wrong test\n\nx = 1";
    expect(output.verificationFlagged).toBe(true);
    expect(output.code).toBe(annotated);
    expect(execute).toHaveBeenCalledWith(annotated);
  });

  it("executes unverified code when the verifier fails", async () => {
    mockQueryModel.mockResolvedValueOnce(result("x = 1", 0.5)).mockResolvedValueOnce(null);

    const output = await runCodeGeneration(makeInput(async () => EXECUTION));

    expect(output.verification).toBe(VERIFICATION_UNAVAILABLE);
    expect(output.verificationFlagged).toBe(false);
    expect(output.code).toBe("x = 1");
    expect(output.generationCostUsd).toBe(0.5);
  });

  it("raises RemoteCallError when the code model fails", async () => {
    mockQueryModel.mockResolvedValueOnce(null);
    const execute = vi.fn(async (_code: string) => EXECUTION);

    await expect(runCodeGeneration(makeInput(execute))).rejects.toMatchObject({
      name: "RemoteCallError",
      target: "m/coder",
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it("raises ResponseParseError when no code comes back", async () => {
    mockQueryModel.mockResolvedValueOnce(result("   ", 0.5));

    const error = await runCodeGeneration(makeInput(async () => EXECUTION)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResponseParseError);
    expect(incurredCost(error)).toBe(0.5);
  });

  it("adds generation cost to a sandbox failure", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("ok", 0.25));
    const execute = vi.fn(async (_code: string): Promise<ExecutionResult> => {
      throw new RemoteCallError("execution", "sandbox", "timed out", 0.03);
    });

    const error = await runCodeGeneration(makeInput(execute)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(incurredCost(error)).toBeCloseTo(0.78, 10);
  });

  it("wraps unexpected sandbox errors", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("ok", 0.25));
    const execute = vi.fn(async (_code: string): Promise<ExecutionResult> => {
      throw new Error("network down");
    });

    const error = await runCodeGeneration(makeInput(execute)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({
      message: "Sandbox execution failed: network down",
      incurredCostUsd: 0.75,
    });
  });

  it("charges generation and the billed sandbox run when output collection fails", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("ok", 0.25));
    const backend = new FakeBackend([sandboxRun({ usage: { inputTokens: 1_000_000, outputTokens: 0 } })]);
    backend.listOutputFiles = async () => {
      throw new Error("container gone");
    };
    const input = makeInput((code) => executeAnalysis(code, SANDBOX_DATA, { backend, ...SANDBOX_OPTIONS }));

    const error = await runCodeGeneration(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(incurredCost(error)).toBeCloseTo(0.75 + 2 + CONTAINER_SESSION_FEE_USD, 10);
  });

  it("keeps the stage going when a result table is empty", async () => {
    mockQueryModel
      .mockResolvedValueOnce(result("x = 1", 0.5))
      .mockResolvedValueOnce(result("ok", 0.25));
    const backend = new FakeBackend([sandboxRun({ usage: { inputTokens: 1_000_000, outputTokens: 0 } })], {
      t1: { path: "/mnt/data/results_table.csv", data: bytes("") },
    });
    const input = makeInput((code) => executeAnalysis(code, SANDBOX_DATA, { backend, ...SANDBOX_OPTIONS }));

    const output = await runCodeGeneration(input);

    expect(output.tables).toEqual([]);
    expect(output.sandboxCostUsd).toBeCloseTo(2 + CONTAINER_SESSION_FEE_USD, 10);
    expect(output.costUsd).toBeCloseTo(0.75 + 2 + CONTAINER_SESSION_FEE_USD, 10);
  });
});
