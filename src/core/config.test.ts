import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to local defaults", () => {
    const config = loadConfig({});

    expect(config.provider).toEqual({
      kind: "ollama",
      host: "http://127.0.0.1:11434",
      model: "qwen2.5:7b-instruct",
      timeoutMs: 240_000,
    });
    expect(config.responseMode).toBe("strict");
    expect(config.limits.budgetChars).toBe(120_000);
    expect(config.limits.summaryRatio).toBe(0.15);
    expect(config.limits.maxConcurrentFetches).toBe(4);
    expect(config.generation).toEqual({ temperature: 0.2, maxOutputTokens: 4096 });
  });

  it("coerces numeric variables and treats blanks as unset", () => {
    const config = loadConfig({ REPOWALK_BUDGET_CHARS: "50000", REPOWALK_TEST_QUOTA: " ", OLLAMA_MODEL: "" });

    expect(config.limits.budgetChars).toBe(50_000);
    expect(config.limits.testQuota).toBe(3);
    expect(config.provider.model).toBe("qwen2.5:7b-instruct");
  });

  it("configures the hosted provider", () => {
    const config = loadConfig({
      LLM_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
    });

    expect(config.provider).toEqual({
      kind: "openai",
      apiKey: "test-secret",
      model: "gpt-4.1-mini",
      baseURL: "http://localhost:8080/v1",
      timeoutMs: 240_000,
    });
  });

  it("requires an API key for the hosted provider", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "openai" })).toThrowError(
      new ConfigError("LLM_PROVIDER=openai but OPENAI_API_KEY is not set")
    );
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ REPOWALK_BUDGET_CHARS: "lots" })).toThrow(/^Invalid configuration: REPOWALK_BUDGET_CHARS: /);
  });

  it("rejects an unknown provider", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "carrier-pigeon" })).toThrow(ConfigError);
  });

  it("applies per-run overrides over the environment", () => {
    const config = loadConfig(
      { OLLAMA_MODEL: "env-model", REPOWALK_TIMEOUT_MS: "1000" },
      { model: "flag-model", timeoutMs: 2000, budgetChars: 9000, responseMode: "helpful", temperature: 0 }
    );

    expect(config.provider.model).toBe("flag-model");
    expect(config.limits.timeoutMs).toBe(2000);
    expect(config.limits.budgetChars).toBe(9000);
    expect(config.responseMode).toBe("helpful");
    expect(config.generation.temperature).toBe(0);
  });
});
