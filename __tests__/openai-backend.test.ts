/**
 * Tests for the OpenAI code-interpreter backend: response mapping, and
 * requests made through the real SDK against an in-process fetch.
 */

import { describe, it, expect } from "vitest";
import {
  OpenAICodeInterpreterBackend,
  toSandboxRun,
  type ResponseSnapshot,
} from "@/lib/execution/openai-backend";

function snapshot(overrides: Partial<ResponseSnapshot> = {}): ResponseSnapshot {
  return {
    id: "resp_1",
    status: "completed",
    output: [],
    output_text: "",
    usage: undefined,
    error: null,
    incomplete_details: null,
    ...overrides,
  };
}

describe("toSandboxRun", () => {
  it("reads the container, transcript and token usage of a finished run", () => {
    const run = toSandboxRun(
      snapshot({
        output_text: "OR 1.5",
        output: [
          {
            id: "ci_1",
            type: "code_interpreter_call",
            code: "print(1)",
            container_id: "cntr_9",
            outputs: null,
            status: "completed",
          },
        ],
        usage: {
          input_tokens: 120,
          input_tokens_details: { cached_tokens: 0 },
          output_tokens: 30,
          output_tokens_details: { reasoning_tokens: 0 },
          total_tokens: 150,
        },
      })
    );

    expect(run).toEqual({
      id: "resp_1",
      status: "completed",
      outputText: "OR 1.5",
      containerId: "cntr_9",
      usage: { inputTokens: 120, outputTokens: 30 },
      error: null,
    });
  });

  it("treats a response without status as still in progress", () => {
    const run = toSandboxRun(snapshot({ status: undefined }));

    expect(run.status).toBe("in_progress");
    expect(run.containerId).toBeNull();
    expect(run.usage).toBeNull();
  });

  it("reports the error message of a failed run", () => {
    const run = toSandboxRun(
      snapshot({ status: "failed", error: { code: "server_error", message: "sandbox crashed" } })
    );

    expect(run.status).toBe("failed");
    expect(run.error).toBe("sandbox crashed");
  });

  it("reports why an incomplete run stopped", () => {
    const run = toSandboxRun(
      snapshot({ status: "incomplete", incomplete_details: { reason: "max_output_tokens" } })
    );

    expect(run.error).toBe("max_output_tokens");
  });
});

describe("OpenAICodeInterpreterBackend", () => {
  const BASE_URL = "https://api.openai.test/v1";

  function backendAnswering(body: unknown) {
    const calls: Array<{ url: string; method: string }> = [];
    const fetch = async (input: string | URL | Request, init?: RequestInit) => {
      calls.push({ url: String(input), method: (init?.method ?? "GET").toUpperCase() });
      return new Response(JSON.stringify(body), {
        status: 200,
        headers: { "content-type": "application/json" },
      });
    };
    const backend = new OpenAICodeInterpreterBackend("test-secret", {
      baseURL: BASE_URL,
      fetch,
      maxRetries: 0,
    });
    return { backend, calls };
  }

  it("lists files the code wrote and skips the uploaded dataset", async () => {
    const file = (id: string, path: string, source: string) => ({
      id,
      bytes: 10,
      container_id: "cntr_1",
      created_at: 1,
      object: "container.file",
      path,
      source,
    });
    const { backend, calls } = backendAnswering({
      object: "list",
      data: [
        file("cfile_data", "/mnt/data/data.csv", "user"),
        file("cfile_fig", "/mnt/data/figure_1.png", "assistant"),
        file("cfile_tab", "/mnt/data/table_1.csv", "assistant"),
      ],
      first_id: "cfile_data",
      last_id: "cfile_tab",
      has_more: false,
    });

    const files = await backend.listOutputFiles("cntr_1");

    expect(files).toEqual([
      { id: "cfile_fig", path: "/mnt/data/figure_1.png" },
      { id: "cfile_tab", path: "/mnt/data/table_1.csv" },
    ]);
    expect(calls[0].url.startsWith(`${BASE_URL}/containers/cntr_1/files`)).toBe(true);
  });

  it("cancels a background run", async () => {
    const { backend, calls } = backendAnswering({
      id: "resp_1",
      object: "response",
      status: "cancelled",
      output: [],
    });

    await backend.cancelRun("resp_1");

    expect(calls).toEqual([{ url: `${BASE_URL}/responses/resp_1/cancel`, method: "POST" }]);
  });
});
