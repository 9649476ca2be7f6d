/**
 * OpenRouter client — uses Vercel AI SDK pointed at the OpenRouter endpoint.
 *
 * OpenRouter acts as a gateway to all LLM providers (OpenAI, Anthropic,
 * Google, DeepSeek) via a single API key. Every result carries its token
 * usage priced against the model catalog.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import { calculateCost } from "./models";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const DEFAULT_TIMEOUT_MS = 120_000;

export interface OpenRouterSettings {
  apiKey: string;
  appUrl: string;
  appTitle: string;
}

let settings: OpenRouterSettings | null = null;

/**
 * Use validated application config for every later call. Without it the
 * provider falls back to the environment. Pass null to reset.
 */
export function configureOpenRouter(next: OpenRouterSettings | null): void {
  settings = next;
}

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider() {
  const apiKey = settings?.apiKey ?? process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new Error("OPENROUTER_API_KEY environment variable is not set");
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
    headers: {
      "HTTP-Referer": settings?.appUrl ?? process.env.STATS_COUNCIL_APP_URL ?? "http://localhost",
      "X-Title": settings?.appTitle ?? process.env.STATS_COUNCIL_APP_TITLE ?? "Stats Council",
    },
  });
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface QueryRequest {
  messages: ChatMessage[];
  system?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface QueryResult {
  content: string;
  responseTimeMs: number;
  usage: { inputTokens: number; outputTokens: number };
  costUsd: number;
}

/**
 * Build a single-turn request with a system prompt.
 */
export function singleTurn(
  system: string,
  prompt: string,
  options: Omit<QueryRequest, "messages" | "system"> = {}
): QueryRequest {
  return {
    system,
    messages: [{ role: "user", content: prompt }],
    ...options,
  };
}

/**
 * Query a single model via OpenRouter.
 *
 * @param model - OpenRouter model identifier (e.g. "openai/o3")
 * @returns QueryResult or null if the request failed
 */
export async function queryModel(
  model: string,
  request: QueryRequest
): Promise<QueryResult | null> {
  const start = Date.now();

  try {
    const provider = getOpenRouterProvider();
    const result = await generateText({
      model: provider.chat(model),
      system: request.system,
      messages: request.messages,
      temperature: request.temperature ?? 0.1,
      maxOutputTokens: request.maxTokens ?? 4096,
      abortSignal: AbortSignal.timeout(request.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    const usage = {
      inputTokens: result.usage.inputTokens ?? 0,
      outputTokens: result.usage.outputTokens ?? 0,
    };

    return {
      content: result.text,
      responseTimeMs: Date.now() - start,
      usage,
      costUsd: calculateCost(model, usage),
    };
  } catch (error) {
    console.error(`[openrouter] Error querying ${model}:`, error);
    return null;
  }
}

/**
 * Query multiple models in parallel with the same request.
 *
 * Uses Promise.allSettled so one failure doesn't block others; the caller
 * waits until every model has answered or failed.
 *
 * @returns Map of model identifier → QueryResult (failed models excluded)
 */
export async function queryModelsParallel(
  models: string[],
  request: QueryRequest
): Promise<Map<string, QueryResult>> {
  const results = await Promise.allSettled(
    models.map((model) => queryModel(model, request))
  );

  const map = new Map<string, QueryResult>();

  results.forEach((result, index) => {
    const model = models[index];
    if (result.status === "fulfilled" && result.value !== null) {
      map.set(model, result.value);
    } else if (result.status === "rejected") {
      console.error(`[openrouter] ${model} rejected:`, result.reason);
    }
  });

  return map;
}
