import { z } from "zod";
import type { ResponseMode } from "../types/index.js";

export type ProviderConfig =
  | { kind: "ollama"; host: string; model: string; timeoutMs: number }
  | { kind: "openai"; apiKey: string; model: string; baseURL?: string; timeoutMs: number };

export interface PipelineLimits {
  budgetChars: number;
  summaryRatio: number;
  maxExcerptChars: number;
  maxCandidates: number;
  testQuota: number;
  maxFileBytes: number;
  maxRepoFiles: number;
  maxRepoBytes: number;
  timeoutMs: number;
  maxConcurrentFetches: number;
}

export interface GenerationDefaults {
  temperature: number;
  maxOutputTokens: number;
}

export interface RepowalkConfig {
  provider: ProviderConfig;
  responseMode: ResponseMode;
  limits: PipelineLimits;
  generation: GenerationDefaults;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  OLLAMA_HOST: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().min(1).default("qwen2.5:7b-instruct"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_BASE_URL: z.string().url().optional(),
  REPOWALK_RESPONSE_MODE: z.enum(["strict", "helpful"]).default("strict"),
  REPOWALK_BUDGET_CHARS: int(120_000, 1),
  REPOWALK_SUMMARY_RATIO: z.coerce.number().min(0).max(0.9).default(0.15),
  REPOWALK_MAX_EXCERPT_CHARS: int(28_000, 200),
  REPOWALK_MAX_CANDIDATES: int(300, 1),
  REPOWALK_TEST_QUOTA: int(3, 0),
  REPOWALK_MAX_FILE_BYTES: int(350_000, 1),
  REPOWALK_MAX_REPO_FILES: int(50_000, 1),
  REPOWALK_MAX_REPO_BYTES: int(500_000_000, 1),
  REPOWALK_TIMEOUT_MS: int(300_000, 1),
  REPOWALK_MODEL_TIMEOUT_MS: int(240_000, 1),
  REPOWALK_MAX_CONCURRENT_FETCHES: int(4, 1),
  REPOWALK_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  REPOWALK_MAX_OUTPUT_TOKENS: int(4096, 1),
});

export type RepowalkEnv = Record<string, string | undefined>;

/**
 * Per-run overrides, typically from CLI flags or a request body
 */
export interface ConfigOverrides {
  provider?: "ollama" | "openai";
  model?: string;
  temperature?: number;
  budgetChars?: number;
  timeoutMs?: number;
  responseMode?: ResponseMode;
}

/**
 * Build configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: RepowalkEnv = process.env, overrides: ConfigOverrides = {}): RepowalkConfig {
  const cleaned: RepowalkEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const kind = overrides.provider ?? vars.LLM_PROVIDER;
  let provider: ProviderConfig;
  if (kind === "openai") {
    if (!vars.OPENAI_API_KEY) {
      throw new ConfigError("LLM_PROVIDER=openai but OPENAI_API_KEY is not set");
    }
    provider = {
      kind,
      apiKey: vars.OPENAI_API_KEY,
      model: overrides.model ?? vars.OPENAI_MODEL,
      baseURL: vars.OPENAI_BASE_URL,
      timeoutMs: vars.REPOWALK_MODEL_TIMEOUT_MS,
    };
  } else {
    provider = {
      kind,
      host: vars.OLLAMA_HOST,
      model: overrides.model ?? vars.OLLAMA_MODEL,
      timeoutMs: vars.REPOWALK_MODEL_TIMEOUT_MS,
    };
  }

  return {
    provider,
    responseMode: overrides.responseMode ?? vars.REPOWALK_RESPONSE_MODE,
    limits: {
      budgetChars: overrides.budgetChars ?? vars.REPOWALK_BUDGET_CHARS,
      summaryRatio: vars.REPOWALK_SUMMARY_RATIO,
      maxExcerptChars: vars.REPOWALK_MAX_EXCERPT_CHARS,
      maxCandidates: vars.REPOWALK_MAX_CANDIDATES,
      testQuota: vars.REPOWALK_TEST_QUOTA,
      maxFileBytes: vars.REPOWALK_MAX_FILE_BYTES,
      maxRepoFiles: vars.REPOWALK_MAX_REPO_FILES,
      maxRepoBytes: vars.REPOWALK_MAX_REPO_BYTES,
      timeoutMs: overrides.timeoutMs ?? vars.REPOWALK_TIMEOUT_MS,
      maxConcurrentFetches: vars.REPOWALK_MAX_CONCURRENT_FETCHES,
    },
    generation: {
      temperature: overrides.temperature ?? vars.REPOWALK_TEMPERATURE,
      maxOutputTokens: vars.REPOWALK_MAX_OUTPUT_TOKENS,
    },
  };
}
