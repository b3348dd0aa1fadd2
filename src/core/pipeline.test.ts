import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { OllamaProvider } from "../providers/ollama.js";
import type { GenerationParams, ModelPrompt, ModelProvider } from "../providers/types.js";
import type { RepositoryRef } from "../types/index.js";
import type { RepositoryFetcher } from "./fetcher.js";
import { ConcurrencyLimiter } from "./limiter.js";
import { packRepository, runPipeline, type PipelineSettings } from "./pipeline.js";
import { UNCONFIRMED_ROUTE } from "../validators/sanitize.js";

const REPO_URL = "https://github.com/acme/widgets";

const FIXTURE: Record<string, string> = {
  "README.md": "# Widgets\nA tiny Django shop.\n",
  "requirements.txt": "django==5.0\n",
  "manage.py": 'import app.views\nURLS = ["/api/items"]\n',
  "app/views.py": "from app.models import Item\n\ndef items(request):\n    return Item.all()\n",
  "app/models.py": "class Item:\n    pass\n",
};

class FixtureFetcher implements RepositoryFetcher {
  readonly dirs: string[] = [];

  constructor(private readonly files: Record<string, string>) {}

  async fetch(_ref: RepositoryRef, dir: string): Promise<void> {
    this.dirs.push(dir);
    for (const [relativePath, content] of Object.entries(this.files)) {
      const target = path.join(dir, relativePath);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
    }
  }
}

/** Never finishes on its own; rejects once the signal fires */
class HangingFetcher implements RepositoryFetcher {
  dir: string | undefined;
  readonly started: Promise<void>;
  private markStarted = () => {};

  constructor() {
    this.started = new Promise<void>((resolve) => {
      this.markStarted = () => resolve();
    });
  }

  fetch(_ref: RepositoryRef, dir: string, signal: AbortSignal): Promise<void> {
    this.dir = dir;
    this.markStarted();
    return new Promise<void>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")), { once: true });
    });
  }
}

class ScriptedProvider implements ModelProvider {
  readonly name = "scripted";
  readonly model = "test-model";
  readonly prompts: ModelPrompt[] = [];

  constructor(private readonly replies: (string | Error)[]) {}

  async generate(prompt: ModelPrompt): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Answers only by rejecting with the signal's reason once it fires */
class StalledProvider implements ModelProvider {
  readonly name = "stalled";
  readonly model = "test-model";
  readonly started: Promise<void>;
  private markStarted = () => {};

  constructor() {
    this.started = new Promise<void>((resolve) => {
      this.markStarted = () => resolve();
    });
  }

  generate(_prompt: ModelPrompt, params: GenerationParams): Promise<string> {
    this.markStarted();
    return new Promise<string>((_resolve, reject) => {
      const signal = params.signal;
      if (!signal) return;
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
  }
}

function analysisReply(modulePaths: string[] = ["app"]): string {
  return JSON.stringify({
    overview: "A tiny Django shop.",
    techStack: ["Python", "Django", "Kubernetes"],
    modules: [{ name: "Shop", purpose: "Views and models", paths: modulePaths }],
    keyFiles: [{ path: "manage.py", role: "Django entry point" }],
    flows: [
      {
        name: "List items",
        steps: [
          { action: "GET /api/items is routed (app/views.py)", file: "app/views.py" },
          { action: "Items are loaded", file: "app/models.py" },
        ],
      },
      { name: "Administer", steps: [{ action: "Open /admin", file: "manage.py" }] },
    ],
    diagram: "flowchart TD\nM[manage.py] --> V[app/views.py]\nV --> D[app/models.py]",
    onboardingPath: ["Read README.md", "Open manage.py"],
    improvements: ["Add tests"],
  });
}

function settings(overrides: Partial<PipelineSettings["limits"]> = {}, mode: "strict" | "helpful" = "strict"): PipelineSettings {
  return {
    responseMode: mode,
    generation: { temperature: 0.2, maxOutputTokens: 1024 },
    limits: {
      budgetChars: 20_000,
      summaryRatio: 0.15,
      maxExcerptChars: 5000,
      maxCandidates: 50,
      testQuota: 3,
      maxFileBytes: 100_000,
      maxRepoFiles: 1000,
      maxRepoBytes: 1_000_000,
      timeoutMs: 10_000,
      maxConcurrentFetches: 2,
      ...overrides,
    },
  };
}

describe("runPipeline", () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await mkdtemp(path.join(os.tmpdir(), "repowalk-pipeline-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempRoot, { recursive: true, force: true });
  });

  function options(fetcher: RepositoryFetcher, provider: ModelProvider, config = settings()) {
    return { config, fetcher, provider, tempRoot, limiter: new ConcurrencyLimiter(2) };
  }

  it("produces a validated walkthrough and removes the checkout", async () => {
    const fetcher = new FixtureFetcher(FIXTURE);
    const provider = new ScriptedProvider([analysisReply()]);

    const outcome = await runPipeline(REPO_URL, options(fetcher, provider));

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const { result, stats } = outcome;
    expect(result.repoName).toBe("acme/widgets");
    expect(result.modules.length).toBeGreaterThanOrEqual(1);
    expect(result.flows.length).toBeGreaterThanOrEqual(2);
    expect(result.flows.length).toBeLessThanOrEqual(6);
    expect(stats).toMatchObject({ totalFiles: 5, candidates: 5, excerpts: 5, modelCalls: 1 });
    expect(await readdir(tempRoot)).toEqual([]);
  });

  it("sanitizes in strict mode", async () => {
    const provider = new ScriptedProvider([analysisReply()]);

    const outcome = await runPipeline(REPO_URL, options(new FixtureFetcher(FIXTURE), provider));

    expect(outcome.ok && outcome.result.techStack).toEqual(["Python", "Django"]);
    expect(outcome.ok && outcome.result.flows.map((f) => f.steps[0].action)).toEqual([
      "GET /api/items is routed (app/views.py)",
      `Open ${UNCONFIRMED_ROUTE}`,
    ]);
  });

  it("leaves the answer untouched in helpful mode", async () => {
    const provider = new ScriptedProvider([analysisReply()]);

    const outcome = await runPipeline(
      REPO_URL,
      options(new FixtureFetcher(FIXTURE), provider, settings({}, "helpful"))
    );

    expect(outcome.ok && outcome.result.techStack).toEqual(["Python", "Django", "Kubernetes"]);
  });

  it("fails an empty repository before calling the model", async () => {
    const provider = new ScriptedProvider([analysisReply()]);

    const outcome = await runPipeline(REPO_URL, options(new FixtureFetcher({}), provider));

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("empty-repository");
    expect(outcome.error.message).toBe("Repository contains no files");
    expect(outcome.stats.modelCalls).toBe(0);
    expect(provider.prompts).toHaveLength(0);
  });

  it("repairs once and then gives up on unknown paths", async () => {
    const provider = new ScriptedProvider([analysisReply(["lib/ghost.py"]), analysisReply(["lib/ghost.py"])]);

    const outcome = await runPipeline(REPO_URL, options(new FixtureFetcher(FIXTURE), provider));

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("schema-invalid-after-repair");
    expect(outcome.error.defects).toEqual(['modules.0.paths.0: unknown path "lib/ghost.py"']);
    expect(outcome.stats.modelCalls).toBe(2);
    expect(provider.prompts).toHaveLength(2);
  });

  it("recovers when the repair succeeds", async () => {
    const provider = new ScriptedProvider([analysisReply(["lib/ghost.py"]), analysisReply(["app/views.py"])]);

    const outcome = await runPipeline(REPO_URL, options(new FixtureFetcher(FIXTURE), provider));

    expect(outcome.ok && outcome.result.modules[0].paths).toEqual(["app/views.py"]);
    expect(outcome.stats.modelCalls).toBe(2);
  });

  it("maps a cancel during fetch to timeout and cleans up", async () => {
    const fetcher = new HangingFetcher();
    const controller = new AbortController();
    const provider = new ScriptedProvider([]);

    const running = runPipeline(REPO_URL, { ...options(fetcher, provider), signal: controller.signal });
    await fetcher.started;
    controller.abort(new Error("user cancelled"));
    const outcome = await running;

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("timeout");
    expect(outcome.error.message).toBe(`Fetch of ${REPO_URL} aborted: user cancelled`);
    expect(fetcher.dir && existsSync(fetcher.dir)).toBe(false);
    expect(await readdir(tempRoot)).toEqual([]);
    expect(provider.prompts).toHaveLength(0);
  });

  it("maps a cancel during the model call to timeout", async () => {
    const provider = new StalledProvider();
    const controller = new AbortController();

    const running = runPipeline(REPO_URL, {
      ...options(new FixtureFetcher(FIXTURE), provider),
      signal: controller.signal,
    });
    await provider.started;
    controller.abort(new Error("user cancelled"));
    const outcome = await running;

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("timeout");
    expect(outcome.error.message).toBe("Pipeline aborted during prompting: user cancelled");
    expect(await readdir(tempRoot)).toEqual([]);
  });

  it("times out an Ollama call that never answers", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return;
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        })
    );
    const ollama = new OllamaProvider({ host: "http://localhost:11434", model: "test-model", timeoutMs: 60_000 });

    const outcome = await runPipeline(
      REPO_URL,
      options(new FixtureFetcher(FIXTURE), ollama, settings({ timeoutMs: 500 }))
    );

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("timeout");
    expect(outcome.error.message).toBe("Pipeline aborted during prompting: Pipeline exceeded its 500ms timeout");
  });

  it("enforces the wall-clock timeout", async () => {
    const outcome = await runPipeline(
      REPO_URL,
      options(new HangingFetcher(), new ScriptedProvider([]), settings({ timeoutMs: 20 }))
    );

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("timeout");
    expect(outcome.error.message).toBe(`Fetch of ${REPO_URL} aborted: Pipeline exceeded its 20ms timeout`);
  });

  it("reports an invalid URL as a fetch failure", async () => {
    const fetcher = new FixtureFetcher(FIXTURE);

    const outcome = await runPipeline("not a url at all", options(fetcher, new ScriptedProvider([])));

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.kind).toBe("fetch-failure");
    expect(fetcher.dirs).toEqual([]);
  });

  it("rethrows unclassified errors", async () => {
    const provider = new ScriptedProvider([new RangeError("bug")]);

    await expect(runPipeline(REPO_URL, options(new FixtureFetcher(FIXTURE), provider))).rejects.toThrow(RangeError);
    expect(await readdir(tempRoot)).toEqual([]);
  });
});

describe("packRepository", () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await mkdtemp(path.join(os.tmpdir(), "repowalk-pack-"));
  });

  afterEach(async () => {
    await rm(tempRoot, { recursive: true, force: true });
  });

  it("ranks candidates and builds the prompt without a model", async () => {
    const outcome = await packRepository(REPO_URL, {
      config: settings(),
      fetcher: new FixtureFetcher(FIXTURE),
      limiter: new ConcurrencyLimiter(1),
      tempRoot,
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.candidates.map((c) => c.entry.path)).toEqual([
      "README.md",
      "requirements.txt",
      "manage.py",
      "app/models.py",
      "app/views.py",
    ]);
    expect(outcome.signals.routesSample).toEqual(["/api/items"]);
    expect(outcome.context.knownPaths).toEqual([
      "README.md",
      "app/models.py",
      "app/views.py",
      "manage.py",
      "requirements.txt",
    ]);
    expect(outcome.prompt.user.startsWith(`Repository: ${REPO_URL}\n`)).toBe(true);
    expect(outcome.prompt.user).toContain("===== FILE: manage.py =====\n");
  });
});
