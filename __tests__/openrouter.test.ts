/**
 * Tests for the OpenRouter client: request shaping, cost accounting and
 * failure handling. The AI SDK is mocked; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

interface Generated {
  text: string;
  usage: { inputTokens: number | undefined; outputTokens: number | undefined };
}

const { mockGenerateText, mockCreateOpenAI } = vi.hoisted(() => ({
  mockGenerateText: vi.fn<(options: unknown) => Promise<Generated>>(),
  mockCreateOpenAI: vi.fn((options: unknown) => ({
    options,
    chat: (model: string) => ({ modelId: model }),
  })),
}));

vi.mock("ai", () => ({ generateText: mockGenerateText }));
vi.mock("@ai-sdk/openai", () => ({ createOpenAI: mockCreateOpenAI }));

import {
  configureOpenRouter,
  queryModel,
  queryModelsParallel,
  singleTurn,
} from "@/lib/council/openrouter";

function generated(text: string, inputTokens: number, outputTokens: number): Generated {
  return { text, usage: { inputTokens, outputTokens } };
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.stubEnv("OPENROUTER_API_KEY", "test-secret");
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  configureOpenRouter(null);
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("singleTurn", () => {
  it("wraps the prompt as one user message", () => {
    expect(singleTurn("sys", "hello", { temperature: 0 })).toEqual({
      system: "sys",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0,
    });
  });
});

describe("queryModel", () => {
  it("returns the text with usage and cost", async () => {
    mockGenerateText.mockResolvedValue(generated("Plan A", 1_000_000, 500_000));

    const result = await queryModel("openai/o3", singleTurn("sys", "prompt"));

    expect(result?.content).toBe("Plan A");
    expect(result?.usage).toEqual({ inputTokens: 1_000_000, outputTokens: 500_000 });
    expect(result?.costUsd).toBeCloseTo(6, 10);
  });

  it("points the provider at OpenRouter with attribution headers", async () => {
    vi.stubEnv("STATS_COUNCIL_APP_TITLE", "Test Title");
    mockGenerateText.mockResolvedValue(generated("ok", 1, 1));

    await queryModel("openai/o3", singleTurn("sys", "prompt"));

    expect(mockCreateOpenAI).toHaveBeenCalledWith({
      baseURL: "https://openrouter.ai/api/v1",
      apiKey: "test-secret",
      headers: {
        "HTTP-Referer": "http://localhost",
        "X-Title": "Test Title",
      },
    });
  });

  it("prefers configured settings over the environment", async () => {
    configureOpenRouter({
      apiKey: "configured-secret",
      appUrl: "https://stats.example.test",
      appTitle: "Configured",
    });
    mockGenerateText.mockResolvedValue(generated("ok", 1, 1));

    await queryModel("openai/o3", singleTurn("sys", "prompt"));

    expect(mockCreateOpenAI).toHaveBeenCalledWith({
      baseURL: "https://openrouter.ai/api/v1",
      apiKey: "configured-secret",
      headers: {
        "HTTP-Referer": "https://stats.example.test",
        "X-Title": "Configured",
      },
    });
  });

  it("applies request defaults", async () => {
    mockGenerateText.mockResolvedValue(generated("ok", 1, 1));

    await queryModel("openai/o3", singleTurn("sys", "prompt"));

    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { modelId: "openai/o3" },
        system: "sys",
        messages: [{ role: "user", content: "prompt" }],
        temperature: 0.1,
        maxOutputTokens: 4096,
      })
    );
  });

  it("passes temperature and token limits through", async () => {
    mockGenerateText.mockResolvedValue(generated("ok", 1, 1));

    await queryModel("openai/o3", singleTurn("sys", "prompt", { temperature: 0.7, maxTokens: 8192 }));

    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 0.7, maxOutputTokens: 8192 })
    );
  });

  it("counts missing usage as zero tokens", async () => {
    mockGenerateText.mockResolvedValue({
      text: "ok",
      usage: { inputTokens: undefined, outputTokens: undefined },
    });
    const result = await queryModel("openai/o3", singleTurn("sys", "prompt"));
    expect(result?.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
    expect(result?.costUsd).toBe(0);
  });

  it("returns null when the call fails", async () => {
    mockGenerateText.mockRejectedValue(new Error("503"));
    expect(await queryModel("openai/o3", singleTurn("sys", "prompt"))).toBeNull();
  });

  it("returns null when the API key is missing", async () => {
    vi.stubEnv("OPENROUTER_API_KEY", "");
    expect(await queryModel("openai/o3", singleTurn("sys", "prompt"))).toBeNull();
    expect(mockGenerateText).not.toHaveBeenCalled();
  });
});

describe("queryModelsParallel", () => {
  it("maps each successful model to its result", async () => {
    mockGenerateText
      .mockResolvedValueOnce(generated("A", 1, 1))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce(generated("C", 1, 1));

    const results = await queryModelsParallel(["m/a", "m/b", "m/c"], singleTurn("sys", "p"));

    expect([...results.keys()]).toEqual(["m/a", "m/c"]);
    expect(results.get("m/c")?.content).toBe("C");
  });
});
