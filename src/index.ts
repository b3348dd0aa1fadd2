/**
 * repowalk - Architecture walkthroughs for public repositories
 *
 * Programmatic API: fetch a repository, pick the files that explain it,
 * pack them under a character budget, ask a model for a structured
 * walkthrough and validate the answer against the files actually seen.
 *
 * @example
 * ```ts
 * import { loadConfig, createProvider, runPipeline, renderArchitectureMarkdown } from 'repowalk';
 *
 * const config = loadConfig();
 * const outcome = await runPipeline('https://github.com/owner/name', {
 *   config,
 *   provider: createProvider(config.provider),
 * });
 *
 * if (outcome.ok) {
 *   console.log(renderArchitectureMarkdown(outcome.result, outcome.signals));
 * } else {
 *   console.error(outcome.error.kind, outcome.error.message);
 * }
 * ```
 */

// Types
export * from "./types/index.js";

// Core - Pipeline
export {
  runPipeline,
  packRepository,
  sharedFetchLimiter,
  type PipelineOptions,
  type PipelineSettings,
  type PackOnlyOptions,
  type PipelineOutcome,
  type PackOutcome,
} from "./core/pipeline.js";

// Core - Configuration, errors, logging
export {
  loadConfig,
  ConfigError,
  type RepowalkConfig,
  type ProviderConfig,
  type PipelineLimits,
  type GenerationDefaults,
  type ConfigOverrides,
} from "./core/config.js";
export { PipelineError, toErrorPayload, type ErrorPayload } from "./core/errors.js";
export { createConsoleLogger, silentLogger, type Logger } from "./core/logger.js";

// Core - Stages
export { parseRepositoryRef } from "./core/repo-ref.js";
export {
  GitCloneFetcher,
  withRepositorySnapshot,
  type RepositoryFetcher,
  type SnapshotOptions,
} from "./core/fetcher.js";
export { indexSnapshot, classifyPath } from "./core/indexer.js";
export { ConcurrencyLimiter } from "./core/limiter.js";
export { collectSignals } from "./core/signals.js";
export { selectCandidates, scoreEntry, DEFAULT_RULES, type ScoringRule } from "./core/selector.js";
export { packContext, renderPackedContext, truncateHeadTail } from "./core/packer.js";
export { buildAnalysisPrompt, buildRepairPrompt } from "./core/prompt.js";

// Providers
export {
  createProvider,
  OllamaProvider,
  OpenAIProvider,
  type ModelProvider,
  type ModelPrompt,
  type GenerationParams,
} from "./providers/index.js";

// Validators
export { validateAnalysis, extractJson, type AnalysisValidation } from "./validators/analysis.js";
export { validateMermaid } from "./validators/mermaid.js";
export { generateValidatedAnalysis } from "./validators/repair.js";
export { sanitizeAnalysis } from "./validators/sanitize.js";

// Generators
export { renderArchitectureMarkdown } from "./generators/markdown.js";
