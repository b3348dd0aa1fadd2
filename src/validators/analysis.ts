import { z } from "zod";
import type { AnalysisResult, CriticalFlow, FlowStep, ModuleInfo } from "../types/index.js";
import { normalizeRepoPath } from "../core/utils.js";
import { validateMermaid } from "./mermaid.js";

// =============================================================================
// Schema
// =============================================================================

const text = z.string().trim().min(1);

const optionalFile = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? normalizeRepoPath(value.trim()) : undefined));

const flowStepSchema = z.union([
  text.transform((action) => ({ action, file: undefined })),
  z.object({ action: text, file: optionalFile }),
]);

export const analysisSchema = z.object({
  overview: z.string().default(""),
  techStack: z.array(text).default([]),
  modules: z
    .array(
      z.object({
        name: text,
        purpose: z.string().default(""),
        paths: z.array(text).min(1),
      })
    )
    .min(1),
  keyFiles: z.array(z.object({ path: text, role: z.string().default("") })).default([]),
  flows: z
    .array(z.object({ name: text, steps: z.array(flowStepSchema).min(1) }))
    .min(2)
    .max(6),
  diagram: text,
  onboardingPath: z.array(text).min(1),
  improvements: z.array(text).default([]),
});

export type RawAnalysis = z.infer<typeof analysisSchema>;

// =============================================================================
// JSON extraction
// =============================================================================

type JsonExtraction = { ok: true; value: unknown } | { ok: false };

function tryParse(candidate: string): JsonExtraction {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pull a JSON value out of a model response: the whole text, then a fenced
 * block, then the outermost braces
 */
export function extractJson(raw: string): JsonExtraction {
  const trimmed = raw.trim();
  const direct = tryParse(trimmed);
  if (direct.ok) return direct;

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1]) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed.ok) return parsed;
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    return tryParse(trimmed.slice(start, end + 1));
  }
  return { ok: false };
}

// =============================================================================
// Closed-world path check
// =============================================================================

const REFERENCE_EXTENSIONS = new Set([
  "py", "js", "jsx", "ts", "tsx", "mjs", "cjs", "go", "rs", "java", "kt", "rb", "php", "cs",
  "c", "h", "cpp", "hpp", "swift", "scala", "vue", "svelte", "html", "css", "scss",
  "json", "yml", "yaml", "toml", "md", "sh", "sql",
]);

const PAREN_REF_RE = /\(([^()\s]+)\)/g;

/**
 * Known files plus every directory that contains one
 */
export class PathUniverse {
  private readonly files: Set<string>;
  private readonly dirs = new Set<string>();

  constructor(knownPaths: Iterable<string>) {
    this.files = new Set();
    for (const raw of knownPaths) {
      const file = normalizeRepoPath(raw);
      this.files.add(file);
      const parts = file.split("/");
      for (let i = 1; i < parts.length; i++) {
        this.dirs.add(parts.slice(0, i).join("/"));
      }
    }
  }

  hasFile(path: string): boolean {
    return this.files.has(normalizeRepoPath(path));
  }

  has(path: string): boolean {
    const normalized = normalizeRepoPath(path);
    return this.files.has(normalized) || this.dirs.has(normalized);
  }
}

/**
 * File-like tokens written in parentheses inside free text, e.g. "(app/views.py)"
 */
export function referencedPaths(sentence: string): string[] {
  const refs: string[] = [];
  for (const match of sentence.matchAll(PAREN_REF_RE)) {
    const token = match[1]?.replace(/[.,;:]+$/, "");
    if (!token) continue;
    const ext = token.includes(".") ? token.slice(token.lastIndexOf(".") + 1).toLowerCase() : "";
    const isDirectory = token.endsWith("/") && token.length > 1 && !token.startsWith("/");
    if (token.includes("://")) continue;
    if (REFERENCE_EXTENSIONS.has(ext) || isDirectory) {
      refs.push(normalizeRepoPath(token));
    }
  }
  return refs;
}

function checkPaths(analysis: RawAnalysis, universe: PathUniverse): string[] {
  const defects: string[] = [];

  analysis.modules.forEach((mod, i) => {
    mod.paths.forEach((p, j) => {
      if (!universe.has(p)) defects.push(`modules.${i}.paths.${j}: unknown path "${p}"`);
    });
  });

  analysis.keyFiles.forEach((kf, i) => {
    if (!universe.hasFile(kf.path)) defects.push(`keyFiles.${i}.path: unknown file "${kf.path}"`);
  });

  analysis.flows.forEach((flow, i) => {
    flow.steps.forEach((step, j) => {
      if (step.file !== undefined && !universe.has(step.file)) {
        defects.push(`flows.${i}.steps.${j}.file: unknown path "${step.file}"`);
      }
      for (const ref of referencedPaths(step.action)) {
        if (!universe.has(ref)) defects.push(`flows.${i}.steps.${j}.action: unknown path "${ref}"`);
      }
    });
  });

  return defects;
}

// =============================================================================
// Validation entry point
// =============================================================================

export interface AnalysisExpectations {
  knownPaths: string[];
  repoName: string;
}

export type AnalysisValidation =
  | { ok: true; value: AnalysisResult }
  | { ok: false; defects: string[] };

function toResult(analysis: RawAnalysis, repoName: string): AnalysisResult {
  const modules: ModuleInfo[] = analysis.modules.map((m) => ({
    name: m.name,
    purpose: m.purpose,
    paths: m.paths.map(normalizeRepoPath),
  }));
  const flows: CriticalFlow[] = analysis.flows.map((f) => ({
    name: f.name,
    steps: f.steps.map((s): FlowStep => (s.file !== undefined ? { action: s.action, file: s.file } : { action: s.action })),
  }));

  return {
    repoName,
    overview: analysis.overview.trim(),
    techStack: analysis.techStack,
    modules,
    keyFiles: analysis.keyFiles.map((k) => ({ path: normalizeRepoPath(k.path), role: k.role })),
    flows,
    diagram: analysis.diagram,
    onboardingPath: analysis.onboardingPath,
    improvements: analysis.improvements,
  };
}

/**
 * Parse and check a raw model response. All defects are collected so a
 * single repair request can address them together.
 */
export function validateAnalysis(raw: string, expectations: AnalysisExpectations): AnalysisValidation {
  const extracted = extractJson(raw);
  if (!extracted.ok) {
    return { ok: false, defects: ["response is not valid JSON"] };
  }

  const parsed = analysisSchema.safeParse(extracted.value);
  if (!parsed.success) {
    const defects = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    return { ok: false, defects };
  }

  const universe = new PathUniverse(expectations.knownPaths);
  const defects = [...checkPaths(parsed.data, universe), ...validateMermaid(parsed.data.diagram)];
  if (defects.length > 0) return { ok: false, defects };

  return { ok: true, value: toResult(parsed.data, expectations.repoName) };
}
