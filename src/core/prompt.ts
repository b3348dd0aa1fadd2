import type { PackedContext, RepoSignals, RepositoryRef, ResponseMode } from "../types/index.js";
import type { ModelPrompt } from "../providers/types.js";
import { comparePaths } from "./indexer.js";
import { renderPackedContext } from "./packer.js";

const MAX_REPAIR_ECHO_CHARS = 8000;
const MAX_CENTRAL_FILES = 15;

const BASE_INSTRUCTIONS = `You are a staff-level software engineer who onboards developers onto unfamiliar repositories.

Hard rules:
- Do NOT invent routes, commands, features, integrations or files.
- Use ONLY the provided REPO SIGNALS, FILE TREE and FILE EXCERPTS.
- Every file path you mention must appear exactly as written in the FILE TREE or a FILE header.
- If something is uncertain, say "Not confirmed in code" and point to likely files to verify.
- Suggested improvements must be small, repo-local and evidence-based.

Output format:
- Return ONLY valid JSON. No markdown or prose outside JSON.
`;

const HELPFUL_ADDENDUM = `
Helpful mode:
- You may suggest likely flows or setup steps ONLY if clearly labeled as "Likely" and grounded in typical conventions.
- Never present a guess as fact.
`;

export const JSON_CONTRACT = `Return a JSON object with EXACT keys:
{
  "overview": string,
  "techStack": [string],
  "modules": [
    {"name": string, "purpose": string, "paths": [string]}
  ],
  "keyFiles": [
    {"path": string, "role": string}
  ],
  "flows": [
    {"name": string, "steps": [{"action": string, "file": string}]}
  ],
  "diagram": string,
  "onboardingPath": [string],
  "improvements": [string]
}

Constraints:
- "modules" has at least 1 entry; each "paths" entry is a file or directory from the FILE TREE.
- "flows" has between 2 and 6 entries; each step is an action-oriented sentence, "file" is the most relevant implementing file (omit it if none applies).
- "diagram" is a mermaid flowchart: first line "flowchart TD" (or "graph TD"), then only node and edge declarations (subgraph/end allowed). No click handlers, no init directives, no HTML.
- "onboardingPath" has at least 1 step, in reading order.
- Only mention concrete routes if they appear in routesSample or in the excerpts.
- Return ONLY JSON.
`;

export function systemInstructions(mode: ResponseMode): string {
  return mode === "helpful" ? BASE_INSTRUCTIONS + HELPFUL_ADDENDUM : BASE_INSTRUCTIONS;
}

/**
 * Signals as shown to the model: drops the raw import map in favour of
 * the most-imported files
 */
export function summarizeSignals(signals: RepoSignals): Record<string, unknown> {
  const centralFiles = Object.entries(signals.inboundImports)
    .sort(([a, ca], [b, cb]) => cb - ca || comparePaths(a, b))
    .slice(0, MAX_CENTRAL_FILES)
    .map(([file, inbound]) => ({ file, inbound }));

  return {
    languages: signals.languages,
    primaryLanguage: signals.primaryLanguage,
    entrypointsNearRoot: signals.entrypointsNearRoot,
    entrypointsAnywhere: signals.entrypointsAnywhere.slice(0, 20),
    manifestPaths: signals.manifestPaths,
    monorepoHint: signals.monorepoHint,
    routesSample: signals.routesSample,
    centralFiles,
  };
}

export interface AnalysisPromptInput {
  ref: RepositoryRef;
  signals: RepoSignals;
  context: PackedContext;
  mode: ResponseMode;
}

/**
 * Deterministic prompt for a given (ref, signals, context, mode)
 */
export function buildAnalysisPrompt(input: AnalysisPromptInput): ModelPrompt {
  const { ref, signals, context, mode } = input;
  const truncatedCount = context.excerpts.filter((e) => e.excerptKind === "truncated").length;

  const user = [
    `Repository: ${ref.url}${ref.branch ? ` (branch ${ref.branch})` : ""}`,
    "",
    "REPO SIGNALS (ground truth hints):",
    JSON.stringify(summarizeSignals(signals), null, 2),
    "",
    `FILE TREE AND FILE EXCERPTS (${context.excerpts.length} files, ${truncatedCount} truncated):`,
    renderPackedContext(context),
    JSON_CONTRACT,
  ].join("\n");

  return { system: systemInstructions(mode), user };
}

/**
 * Corrective follow-up: the original request plus what was wrong with the answer
 */
export function buildRepairPrompt(original: ModelPrompt, rawOutput: string, defects: string[]): ModelPrompt {
  const echoed =
    rawOutput.length > MAX_REPAIR_ECHO_CHARS
      ? `${rawOutput.slice(0, MAX_REPAIR_ECHO_CHARS)}\n...(output truncated)`
      : rawOutput;

  const user = [
    original.user,
    "",
    "YOUR PREVIOUS RESPONSE WAS REJECTED.",
    "Problems found:",
    ...defects.map((d) => `- ${d}`),
    "",
    "Previous response:",
    echoed,
    "",
    "Return a corrected JSON object that fixes every problem above. Use only file paths from the FILE TREE. Return ONLY JSON.",
  ].join("\n");

  return { system: original.system, user };
}
