import * as path from "node:path";
import type {
  Candidate,
  FileEntry,
  FileKind,
  RepoSignals,
  ScoreReason,
  SelectionOptions,
  SelectionScore,
} from "../types/index.js";
import { PipelineError } from "./errors.js";
import { comparePaths } from "./indexer.js";
import { ENTRY_FILENAMES } from "./signals.js";

/**
 * A single, named contribution to a file's score.
 * Rules return 0 when they do not apply.
 */
export interface ScoringRule {
  name: string;
  score(entry: FileEntry, signals: RepoSignals | undefined): number;
}

const EXCLUDED_KINDS = new Set<FileKind>(["vendored", "binary", "generated"]);

const CODE_DIR_HINTS = new Set(["src", "app", "apps", "api", "server", "backend", "frontend", "cmd", "pkg", "internal", "lib", "core", "packages"]);
const LOW_SIGNAL_DIRS = new Set(["docs", "doc", "documentation", "site", "website", "examples", "example", "demo", "demos", "public", "samples"]);

const ROLE_KEYWORDS = ["route", "router", "controller", "handler", "endpoint", "service"];
const CONFIG_KEYWORDS = ["config", "settings", "infra", "deploy", ".github"];

const DEPTH_PENALTY = 8;
const SIZE_PENALTY_BYTES = 12_000;
const CENTRALITY_POINTS = 5;
const CENTRALITY_CAP = 40;

function directories(entry: FileEntry): string[] {
  return entry.path.toLowerCase().split("/").slice(0, -1);
}

/**
 * Default ordered rule set
 */
export const DEFAULT_RULES: ScoringRule[] = [
  {
    name: "root-manifest",
    score(entry) {
      if (entry.depth > 1) return 0;
      const base = path.posix.basename(entry.path).toLowerCase();
      const isReadme = /^readme(\.|$)/.test(base);
      if (entry.kind !== "manifest" && !isReadme) return 0;
      return isReadme && entry.depth === 0 ? 130 : 120;
    },
  },
  {
    name: "entry-point",
    score(entry) {
      if (entry.kind === "test") return 0;
      return ENTRY_FILENAMES.has(path.posix.basename(entry.path).toLowerCase()) ? 90 : 0;
    },
  },
  {
    name: "code-dir",
    score(entry) {
      return directories(entry).some((d) => CODE_DIR_HINTS.has(d)) ? 40 : 0;
    },
  },
  {
    name: "low-signal-dir",
    score(entry) {
      return directories(entry).some((d) => LOW_SIGNAL_DIRS.has(d)) ? -35 : 0;
    },
  },
  {
    name: "role-keyword",
    score(entry) {
      const lower = entry.path.toLowerCase();
      if (ROLE_KEYWORDS.some((k) => lower.includes(k))) return 20;
      if (CONFIG_KEYWORDS.some((k) => lower.includes(k))) return 15;
      return 0;
    },
  },
  {
    name: "import-centrality",
    score(entry, signals) {
      const inbound = signals?.inboundImports[entry.path] ?? 0;
      return Math.min(inbound * CENTRALITY_POINTS, CENTRALITY_CAP);
    },
  },
  {
    name: "depth",
    score(entry) {
      return -DEPTH_PENALTY * entry.depth;
    },
  },
  {
    name: "size",
    score(entry) {
      return -Math.floor(entry.size / SIZE_PENALTY_BYTES);
    },
  },
];

/**
 * Apply every rule and keep the non-zero contributions for explanation
 */
export function scoreEntry(
  entry: FileEntry,
  signals?: RepoSignals,
  rules: ScoringRule[] = DEFAULT_RULES
): SelectionScore {
  const reasons: ScoreReason[] = [];
  let total = 0;
  for (const rule of rules) {
    const points = rule.score(entry, signals);
    if (points !== 0) {
      reasons.push({ rule: rule.name, points });
      total += points;
    }
  }
  return { total, reasons };
}

/**
 * Highest score first; ties broken by path for reproducibility
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  return b.score.total - a.score.total || comparePaths(a.entry.path, b.entry.path);
}

/**
 * Produce the ordered, de-duplicated, capped candidate list
 */
export function selectCandidates(
  entries: FileEntry[],
  options: SelectionOptions,
  rules: ScoringRule[] = DEFAULT_RULES
): Candidate[] {
  const seen = new Set<string>();
  const scored: Candidate[] = [];

  for (const entry of entries) {
    if (seen.has(entry.path)) continue;
    seen.add(entry.path);
    if (EXCLUDED_KINDS.has(entry.kind)) continue;
    if (entry.size > options.maxFileBytes) continue;
    scored.push({ entry, score: scoreEntry(entry, options.signals, rules) });
  }

  scored.sort(compareCandidates);

  // Tests are sampled: only the best-scoring few survive
  let testsKept = 0;
  const selected: Candidate[] = [];
  for (const candidate of scored) {
    if (candidate.entry.kind === "test") {
      if (testsKept >= options.testQuota) continue;
      testsKept++;
    }
    selected.push(candidate);
    if (selected.length >= options.maxCandidates) break;
  }

  if (selected.length === 0) {
    throw new PipelineError(
      "empty-repository",
      entries.length === 0
        ? "Repository contains no files"
        : `Repository has ${entries.length} files but none are eligible for analysis`
    );
  }

  return selected;
}
