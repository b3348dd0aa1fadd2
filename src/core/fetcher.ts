import { spawn } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { RepositoryRef, RepositorySnapshot, SnapshotLimits } from "../types/index.js";
import { PipelineError, describeAbortReason, errorMessage, isAbortError } from "./errors.js";
import { indexSnapshot } from "./indexer.js";
import type { ConcurrencyLimiter } from "./limiter.js";

const STDERR_LIMIT = 4000;

/**
 * Materializes a repository into an empty directory
 */
export interface RepositoryFetcher {
  fetch(ref: RepositoryRef, dir: string, signal: AbortSignal): Promise<void>;
}

/**
 * Shallow `git clone` of a public repository.
 * Aborting the signal kills the git process.
 */
export class GitCloneFetcher implements RepositoryFetcher {
  constructor(private readonly gitBinary = "git") {}

  fetch(ref: RepositoryRef, dir: string, signal: AbortSignal): Promise<void> {
    const args = ["clone", "--depth", "1", "--single-branch", "--no-tags", "--quiet"];
    if (ref.branch) args.push("--branch", ref.branch);
    args.push(ref.url, dir);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.gitBinary, args, {
        signal,
        stdio: ["ignore", "ignore", "pipe"],
        env: { ...process.env, GIT_TERMINAL_PROMPT: "0", GIT_ASKPASS: "echo" },
      });

      let stderr = "";
      child.stderr.setEncoding("utf-8");
      child.stderr.on("data", (chunk: string) => {
        if (stderr.length < STDERR_LIMIT) stderr += chunk;
      });

      child.on("error", (err) => {
        if (isAbortError(err)) {
          reject(err);
          return;
        }
        reject(new PipelineError("fetch-failure", `Could not run git: ${err.message}`));
      });

      child.on("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(classifyCloneFailure(ref, stderr, code));
      });
    });
  }
}

export function classifyCloneFailure(
  ref: RepositoryRef,
  stderr: string,
  code: number | null
): PipelineError {
  const lower = stderr.toLowerCase();
  if (ref.branch && lower.includes("remote branch") && lower.includes("not found")) {
    return new PipelineError("fetch-failure", `Branch not found: ${ref.branch}`);
  }
  if (
    lower.includes("not found") ||
    lower.includes("could not read username") ||
    lower.includes("authentication failed")
  ) {
    return new PipelineError("fetch-failure", `Repository not found or is private: ${ref.url}`);
  }
  if (lower.includes("could not resolve host") || lower.includes("unable to access")) {
    return new PipelineError("fetch-failure", `Network error while cloning ${ref.url}`);
  }
  const firstLine = stderr.split(/\r?\n/).find((line) => line.trim().length > 0) ?? "";
  return new PipelineError(
    "fetch-failure",
    `git clone exited with code ${code ?? "null"}${firstLine ? `: ${firstLine.trim()}` : ""}`
  );
}

export interface SnapshotOptions {
  fetcher: RepositoryFetcher;
  limits: SnapshotLimits;
  signal: AbortSignal;
  /** Shared cap on concurrent fetches; only the fetch itself holds a slot */
  limiter?: ConcurrencyLimiter;
  /** Parent for the request-scoped directory (default: OS temp dir) */
  tempRoot?: string;
}

/**
 * Fetch a repository into request-scoped temporary storage, hand the
 * snapshot to `fn`, and remove the storage on every exit path.
 */
export async function withRepositorySnapshot<T>(
  ref: RepositoryRef,
  options: SnapshotOptions,
  fn: (snapshot: RepositorySnapshot) => Promise<T>
): Promise<T> {
  const { fetcher, limits, signal, limiter } = options;
  const dir = await mkdtemp(path.join(options.tempRoot ?? os.tmpdir(), "repowalk-"));

  try {
    try {
      if (limiter) {
        await limiter.run(() => fetcher.fetch(ref, dir, signal), signal);
      } else {
        await fetcher.fetch(ref, dir, signal);
      }
    } catch (err: unknown) {
      if (signal.aborted || isAbortError(err)) {
        throw new PipelineError(
          "timeout",
          `Fetch of ${ref.url} aborted: ${signal.aborted ? describeAbortReason(signal) : "cancelled"}`
        );
      }
      if (err instanceof PipelineError) throw err;
      throw new PipelineError("fetch-failure", `Fetch of ${ref.url} failed: ${errorMessage(err)}`);
    }

    if (signal.aborted) {
      throw new PipelineError("timeout", `Fetch of ${ref.url} aborted: ${describeAbortReason(signal)}`);
    }

    const snapshot = await indexSnapshot(ref, dir, limits);
    return await fn(snapshot);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
