/**
 * Tests for environment configuration.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

const BASE_ENV = {
  OPENROUTER_API_KEY: "test-secret",
  OPENAI_API_KEY: "test-secret-2",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      openRouterApiKey: "test-secret",
      openAiApiKey: "test-secret-2",
      outputDir: "output",
      modelTimeoutMs: 120_000,
      sandboxTimeoutMs: 300_000,
      sandboxModel: "gpt-4.1",
      appUrl: "http://localhost",
      appTitle: "Stats Council",
    });
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ ...BASE_ENV, STATS_COUNCIL_SANDBOX_TIMEOUT_MS: "60000" });
    expect(config.sandboxTimeoutMs).toBe(60_000);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ...BASE_ENV, STATS_COUNCIL_OUTPUT_DIR: "  " });
    expect(config.outputDir).toBe("output");
  });

  it("lists every missing key", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "" })).toThrow(
      "Invalid configuration:\n  OPENROUTER_API_KEY: Required\n  OPENAI_API_KEY: Required"
    );
  });

  it("rejects invalid values with ConfigError", () => {
    expect(() =>
      loadConfig({ ...BASE_ENV, STATS_COUNCIL_MODEL_TIMEOUT_MS: "-5" })
    ).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE_ENV, STATS_COUNCIL_APP_URL: "not a url" })).toThrow(
      /STATS_COUNCIL_APP_URL/
    );
  });
});
