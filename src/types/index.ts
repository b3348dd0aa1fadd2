/**
 * Core type definitions for repowalk
 * Every pipeline stage consumes and produces these shapes
 */

// =============================================================================
// Repository & Snapshot
// =============================================================================

export interface RepositoryRef {
  readonly url: string;       // canonical https://host/owner/name
  readonly host: string;
  readonly owner: string;
  readonly name: string;
  readonly branch?: string;
}

export type FileKind =
  | "source"
  | "manifest"
  | "docs"
  | "test"
  | "vendored"
  | "binary"
  | "generated";

export interface FileEntry {
  readonly path: string;      // POSIX, relative to snapshot root
  readonly size: number;      // bytes
  readonly kind: FileKind;
  readonly depth: number;     // number of parent directories
  read(): Promise<string>;
}

export interface RepositorySnapshot {
  ref: RepositoryRef;
  root: string;
  entries: FileEntry[];
  totalBytes: number;
}

export interface SnapshotLimits {
  maxRepoFiles: number;
  maxRepoBytes: number;
}

// =============================================================================
// Signals (scoring pass)
// =============================================================================

export interface RepoSignals {
  languages: string[];
  languageCounts: Record<string, number>;
  primaryLanguage: string | null;
  entrypointsNearRoot: string[];
  entrypointsAnywhere: string[];
  manifestPaths: string[];
  monorepoHint: boolean;
  routesSample: string[];
  /** path -> number of other files importing it */
  inboundImports: Record<string, number>;
}

// =============================================================================
// Selection
// =============================================================================

export interface ScoreReason {
  rule: string;
  points: number;
}

export interface SelectionScore {
  total: number;
  reasons: ScoreReason[];
}

export interface Candidate {
  entry: FileEntry;
  score: SelectionScore;
}

export interface SelectionOptions {
  maxCandidates: number;
  testQuota: number;
  maxFileBytes: number;
  signals?: RepoSignals;
}

// =============================================================================
// Packed Context
// =============================================================================

export type ExcerptKind = "full" | "truncated";

export interface Excerpt {
  path: string;
  fileKind: FileKind;
  excerptKind: ExcerptKind;
  text: string;
  originalChars: number;
}

export type OmissionReason = "budget" | "binary" | "unreadable";

export interface PackedContext {
  excerpts: Excerpt[];
  treeSummary: string;
  omitted: { path: string; reason: OmissionReason }[];
  knownPaths: string[];
  budget: number;
  totalSize: number;
  estimatedTokens: number;
}

export interface PackOptions {
  budget: number;
  summaryRatio: number;
  maxExcerptChars: number;
  /** Every file path in the snapshot, used for the tree summary */
  treePaths: string[];
}

// =============================================================================
// Analysis Result
// =============================================================================

export interface ModuleInfo {
  name: string;
  purpose: string;
  paths: string[];
}

export interface KeyFile {
  path: string;
  role: string;
}

export interface FlowStep {
  action: string;
  file?: string;
}

export interface CriticalFlow {
  name: string;
  steps: FlowStep[];
}

export interface AnalysisResult {
  repoName: string;
  overview: string;
  techStack: string[];
  modules: ModuleInfo[];
  keyFiles: KeyFile[];
  flows: CriticalFlow[];
  diagram: string;
  onboardingPath: string[];
  improvements: string[];
}

export type ResponseMode = "strict" | "helpful";

// =============================================================================
// Pipeline
// =============================================================================

export type PipelineStage =
  | "fetching"
  | "selecting"
  | "packing"
  | "prompting"
  | "validating"
  | "done"
  | "failed";

export type PipelineErrorKind =
  | "fetch-failure"
  | "empty-repository"
  | "budget-exhausted"
  | "model-unavailable"
  | "timeout"
  | "schema-invalid-after-repair";

export interface PipelineStats {
  totalFiles: number;
  candidates: number;
  excerpts: number;
  truncated: number;
  omitted: number;
  contextChars: number;
  estimatedTokens: number;
  modelCalls: number;
  durationsMs: Partial<Record<PipelineStage, number>>;
}
