/**
 * Model catalog — OpenRouter identifiers, display names and pricing.
 *
 * Prices are USD per 1M tokens and drive the per-stage cost tracker.
 */

import type { PipelineModels } from "./types";

export interface ModelInfo {
  id: string;
  name: string;
  inputCostPerMillion: number;
  outputCostPerMillion: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export const MODEL_CATALOG: Record<string, ModelInfo> = {
  "deepseek/deepseek-chat-v3-0324": {
    id: "deepseek/deepseek-chat-v3-0324",
    name: "DeepSeek V3",
    inputCostPerMillion: 0.25,
    outputCostPerMillion: 0.38,
  },
  "deepseek/deepseek-r1": {
    id: "deepseek/deepseek-r1",
    name: "DeepSeek R1",
    inputCostPerMillion: 0.55,
    outputCostPerMillion: 2.19,
  },
  "google/gemini-2.5-pro": {
    id: "google/gemini-2.5-pro",
    name: "Gemini 2.5 Pro",
    inputCostPerMillion: 2.5,
    outputCostPerMillion: 15.0,
  },
  "openai/o3": {
    id: "openai/o3",
    name: "OpenAI o3",
    inputCostPerMillion: 2.0,
    outputCostPerMillion: 8.0,
  },
  "anthropic/claude-opus-4.5": {
    id: "anthropic/claude-opus-4.5",
    name: "Claude Opus 4.5",
    inputCostPerMillion: 5.0,
    outputCostPerMillion: 25.0,
  },
  // Sandbox models (called directly on OpenAI, not through OpenRouter)
  "gpt-4.1": {
    id: "gpt-4.1",
    name: "GPT-4.1",
    inputCostPerMillion: 2.0,
    outputCostPerMillion: 8.0,
  },
  "gpt-4.1-mini": {
    id: "gpt-4.1-mini",
    name: "GPT-4.1 mini",
    inputCostPerMillion: 0.4,
    outputCostPerMillion: 1.6,
  },
};

export const DEFAULT_PIPELINE_MODELS: PipelineModels = {
  audit: "deepseek/deepseek-chat-v3-0324",
  council: [
    "deepseek/deepseek-chat-v3-0324",
    "deepseek/deepseek-r1",
    "google/gemini-2.5-pro",
  ],
  synthesis: "openai/o3",
  assumptions: "deepseek/deepseek-r1",
  codeGeneration: "openai/o3",
  codeVerification: "deepseek/deepseek-r1",
  reviewers: ["deepseek/deepseek-chat-v3-0324", "deepseek/deepseek-r1"],
  writer: "anthropic/claude-opus-4.5",
};

export function getModelInfo(modelId: string): ModelInfo | null {
  return MODEL_CATALOG[modelId] ?? null;
}

/**
 * Get a short display name from a full model identifier.
 * Catalog names win; otherwise e.g. "mistralai/mistral-large-2" → "Mistral Large 2"
 */
export function getModelDisplayName(modelId: string): string {
  const known = MODEL_CATALOG[modelId];
  if (known) return known.name;

  const name = modelId.split("/").pop() ?? modelId;
  return name
    .replace(/-/g, " ")
    .replace(/\b\w/g, (c) => c.toUpperCase())
    .replace(/(\d) (\d)/g, "$1.$2"); // "4 5" → "4.5"
}

/**
 * Cost of one call in USD. Unknown models are priced at zero.
 */
export function calculateCost(modelId: string, usage: TokenUsage): number {
  const info = MODEL_CATALOG[modelId];
  if (!info) {
    console.warn(`[pricing] No pricing for ${modelId}; counting cost as 0`);
    return 0;
  }
  return (
    (usage.inputTokens * info.inputCostPerMillion) / 1_000_000 +
    (usage.outputTokens * info.outputCostPerMillion) / 1_000_000
  );
}

export function formatCost(costUsd: number): string {
  return `$${costUsd.toFixed(2)}`;
}
