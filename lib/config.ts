/**
 * Application configuration read from the environment.
 *
 * The CLI loads `.env` through dotenv before calling loadConfig().
 */

import { z } from "zod";
import { ConfigError } from "./errors";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().min(1, "OPENROUTER_API_KEY is required"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  STATS_COUNCIL_OUTPUT_DIR: z.string().min(1).default("output"),
  STATS_COUNCIL_MODEL_TIMEOUT_MS: positiveInt(120_000),
  STATS_COUNCIL_SANDBOX_TIMEOUT_MS: positiveInt(300_000),
  STATS_COUNCIL_SANDBOX_MODEL: z.string().min(1).default("gpt-4.1"),
  STATS_COUNCIL_APP_URL: z.string().url().default("http://localhost"),
  STATS_COUNCIL_APP_TITLE: z.string().min(1).default("Stats Council"),
});

export interface AppConfig {
  openRouterApiKey: string;
  openAiApiKey: string;
  outputDir: string;
  modelTimeoutMs: number;
  sandboxTimeoutMs: number;
  sandboxModel: string;
  appUrl: string;
  appTitle: string;
}

type Env = Record<string, string | undefined>;

/**
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return cleaned;
}

/**
 * Validate the environment. Throws ConfigError listing every problem.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = EnvSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const parsed = result.data;
  return {
    openRouterApiKey: parsed.OPENROUTER_API_KEY,
    openAiApiKey: parsed.OPENAI_API_KEY,
    outputDir: parsed.STATS_COUNCIL_OUTPUT_DIR,
    modelTimeoutMs: parsed.STATS_COUNCIL_MODEL_TIMEOUT_MS,
    sandboxTimeoutMs: parsed.STATS_COUNCIL_SANDBOX_TIMEOUT_MS,
    sandboxModel: parsed.STATS_COUNCIL_SANDBOX_MODEL,
    appUrl: parsed.STATS_COUNCIL_APP_URL,
    appTitle: parsed.STATS_COUNCIL_APP_TITLE,
  };
}
