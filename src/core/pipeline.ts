import type {
  Candidate,
  PackedContext,
  PipelineStage,
  PipelineStats,
  RepoSignals,
  RepositoryRef,
  AnalysisResult,
} from "../types/index.js";
import type { ModelPrompt, ModelProvider } from "../providers/types.js";
import type { RepowalkConfig } from "./config.js";
import { PipelineError, describeAbortReason, throwIfAborted } from "./errors.js";
import { GitCloneFetcher, withRepositorySnapshot, type RepositoryFetcher } from "./fetcher.js";
import { ConcurrencyLimiter } from "./limiter.js";
import { silentLogger, type Logger } from "./logger.js";
import { packContext } from "./packer.js";
import { buildAnalysisPrompt } from "./prompt.js";
import { parseRepositoryRef } from "./repo-ref.js";
import { selectCandidates } from "./selector.js";
import { collectSignals } from "./signals.js";
import { generateValidatedAnalysis } from "../validators/repair.js";
import { sanitizeAnalysis } from "../validators/sanitize.js";

// =============================================================================
// Types
// =============================================================================

export type PipelineSettings = Pick<RepowalkConfig, "limits" | "generation" | "responseMode">;

export interface PipelineOptions {
  config: PipelineSettings;
  provider: ModelProvider;
  /** Default: shallow git clone */
  fetcher?: RepositoryFetcher;
  /** Default: process-wide limiter sized by `limits.maxConcurrentFetches` */
  limiter?: ConcurrencyLimiter;
  logger?: Logger;
  /** Caller cancellation; combined with the wall-clock timeout */
  signal?: AbortSignal;
  tempRoot?: string;
}

export type PackOnlyOptions = Omit<PipelineOptions, "provider">;

export type PipelineOutcome =
  | {
      ok: true;
      result: AnalysisResult;
      context: PackedContext;
      signals: RepoSignals;
      stats: PipelineStats;
    }
  | { ok: false; error: PipelineError; stats: PipelineStats };

export type PackOutcome =
  | {
      ok: true;
      ref: RepositoryRef;
      signals: RepoSignals;
      candidates: Candidate[];
      context: PackedContext;
      prompt: ModelPrompt;
      stats: PipelineStats;
    }
  | { ok: false; error: PipelineError; stats: PipelineStats };

// =============================================================================
// Shared fetch limiter
// =============================================================================

const sharedLimiters = new Map<number, ConcurrencyLimiter>();

/**
 * One limiter per configured size, shared by every pipeline in the process
 */
export function sharedFetchLimiter(limit: number): ConcurrencyLimiter {
  let limiter = sharedLimiters.get(limit);
  if (!limiter) {
    limiter = new ConcurrencyLimiter(limit);
    sharedLimiters.set(limit, limiter);
  }
  return limiter;
}

// =============================================================================
// Run state
// =============================================================================

function emptyStats(): PipelineStats {
  return {
    totalFiles: 0,
    candidates: 0,
    excerpts: 0,
    truncated: 0,
    omitted: 0,
    contextChars: 0,
    estimatedTokens: 0,
    modelCalls: 0,
    durationsMs: {},
  };
}

class PipelineRun {
  readonly stats = emptyStats();
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly detach: () => void;
  private stage: PipelineStage | null = null;
  private stageStarted = 0;

  constructor(
    readonly logger: Logger,
    timeoutMs: number,
    external?: AbortSignal
  ) {
    this.signal = this.controller.signal;
    this.timer = setTimeout(() => {
      this.controller.abort(new Error(`Pipeline exceeded its ${timeoutMs}ms timeout`));
    }, timeoutMs);

    const onExternalAbort = () => this.controller.abort(external?.reason);
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener("abort", onExternalAbort, { once: true });
    }
    this.detach = () => external?.removeEventListener("abort", onExternalAbort);
  }

  /** Transition to `next`; refuses to start a stage once aborted */
  enter(next: PipelineStage, detail?: string): void {
    this.closeStage();
    throwIfAborted(this.signal, next);
    this.stage = next;
    this.stageStarted = Date.now();
    this.logger.stage(next, detail);
  }

  /**
   * Map a thrown value onto a classified error, or rethrow it.
   * Anything thrown once the run is aborted is a timeout, whatever its type.
   */
  fail(err: unknown): PipelineError {
    const stage = this.stage;
    this.closeStage();
    let error: PipelineError;
    if (err instanceof PipelineError) {
      error = err;
    } else if (this.signal.aborted) {
      error = new PipelineError(
        "timeout",
        `Pipeline aborted during ${stage ?? "startup"}: ${describeAbortReason(this.signal)}`
      );
    } else {
      throw err;
    }
    this.logger.stage("failed", `${error.kind}: ${error.message}`);
    return error;
  }

  finish(): void {
    this.closeStage();
    this.logger.stage("done");
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.detach();
  }

  private closeStage(): void {
    if (this.stage) {
      this.stats.durationsMs[this.stage] = Date.now() - this.stageStarted;
      this.stage = null;
    }
  }
}

// =============================================================================
// Stages
// =============================================================================

interface PreparedContext {
  ref: RepositoryRef;
  signals: RepoSignals;
  candidates: Candidate[];
  context: PackedContext;
}

async function fetchSelectPack(url: string, options: PackOnlyOptions, run: PipelineRun): Promise<PreparedContext> {
  const { limits } = options.config;
  const ref = parseRepositoryRef(url);
  run.enter("fetching", ref.url);

  return withRepositorySnapshot(
    ref,
    {
      fetcher: options.fetcher ?? new GitCloneFetcher(),
      limits: { maxRepoFiles: limits.maxRepoFiles, maxRepoBytes: limits.maxRepoBytes },
      limiter: options.limiter ?? sharedFetchLimiter(limits.maxConcurrentFetches),
      signal: run.signal,
      tempRoot: options.tempRoot,
    },
    async (snapshot) => {
      run.stats.totalFiles = snapshot.entries.length;
      run.enter("selecting", `${snapshot.entries.length} files`);

      const signals = await collectSignals(snapshot.entries);
      const candidates = selectCandidates(snapshot.entries, {
        maxCandidates: limits.maxCandidates,
        testQuota: limits.testQuota,
        maxFileBytes: limits.maxFileBytes,
        signals,
      });
      run.stats.candidates = candidates.length;
      run.logger.info(
        `${candidates.length} candidates, primary language ${signals.primaryLanguage ?? "unknown"}`
      );

      run.enter("packing", `budget ${limits.budgetChars} chars`);
      const treePaths = snapshot.entries
        .filter((e) => e.kind !== "vendored" && e.kind !== "generated")
        .map((e) => e.path);
      const context = await packContext(candidates, {
        budget: limits.budgetChars,
        summaryRatio: limits.summaryRatio,
        maxExcerptChars: limits.maxExcerptChars,
        treePaths,
      });

      run.stats.excerpts = context.excerpts.length;
      run.stats.truncated = context.excerpts.filter((e) => e.excerptKind === "truncated").length;
      run.stats.omitted = context.omitted.length;
      run.stats.contextChars = context.totalSize;
      run.stats.estimatedTokens = context.estimatedTokens;
      run.logger.info(
        `${context.excerpts.length} excerpts (${run.stats.truncated} truncated, ${context.omitted.length} omitted), ~${context.estimatedTokens} tokens`
      );

      return { ref, signals, candidates, context };
    }
  );
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Repository URL in, validated architecture analysis out.
 * Classified failures come back as `{ ok: false }`; anything else throws.
 */
export async function runPipeline(url: string, options: PipelineOptions): Promise<PipelineOutcome> {
  const { config, provider } = options;
  const run = new PipelineRun(options.logger ?? silentLogger, config.limits.timeoutMs, options.signal);

  try {
    const { ref, signals, context } = await fetchSelectPack(url, options, run);

    run.enter("prompting", `${provider.name}:${provider.model}`);
    const prompt = buildAnalysisPrompt({ ref, signals, context, mode: config.responseMode });

    const generation = await generateValidatedAnalysis(
      provider,
      prompt,
      {
        temperature: config.generation.temperature,
        maxTokens: config.generation.maxOutputTokens,
        signal: run.signal,
      },
      {
        knownPaths: context.knownPaths,
        repoName: `${ref.owner}/${ref.name}`,
        logger: run.logger,
        onModelCall: () => {
          run.stats.modelCalls++;
        },
      }
    );

    run.enter("validating", generation.repaired ? "accepted after repair" : "accepted");
    const result =
      config.responseMode === "strict" ? sanitizeAnalysis(generation.result, signals, context) : generation.result;

    run.finish();
    return { ok: true, result, context, signals, stats: run.stats };
  } catch (err: unknown) {
    return { ok: false, error: run.fail(err), stats: run.stats };
  } finally {
    run.dispose();
  }
}

/**
 * Fetch, select and pack without calling a model
 */
export async function packRepository(url: string, options: PackOnlyOptions): Promise<PackOutcome> {
  const { config } = options;
  const run = new PipelineRun(options.logger ?? silentLogger, config.limits.timeoutMs, options.signal);

  try {
    const { ref, signals, candidates, context } = await fetchSelectPack(url, options, run);
    const prompt = buildAnalysisPrompt({ ref, signals, context, mode: config.responseMode });
    run.finish();
    return { ok: true, ref, signals, candidates, context, prompt, stats: run.stats };
  } catch (err: unknown) {
    return { ok: false, error: run.fail(err), stats: run.stats };
  } finally {
    run.dispose();
  }
}
