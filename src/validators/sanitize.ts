import type { AnalysisResult, PackedContext, RepoSignals } from "../types/index.js";
import { uniqueInOrder } from "../core/utils.js";

export const UNCONFIRMED_ROUTE = "(route not confirmed in code)";

const ALWAYS_ALLOWED = ["HTML", "CSS", "JavaScript", "TypeScript"];

const STACK_ALIASES: Record<string, string[]> = {
  "html/css/js": ["HTML", "CSS", "JavaScript"],
  "html/css/javascript": ["HTML", "CSS", "JavaScript"],
  js: ["JavaScript"],
  ts: ["TypeScript"],
};

const ROUTE_TOKEN_RE = /(^|\s)(\/[^\s,;:)"']+)/g;

function expandStack(items: string[]): string[] {
  return items.flatMap((item) => STACK_ALIASES[item.trim().toLowerCase()] ?? [item.trim()]);
}

/**
 * A tech stack entry survives if it is a detected language or its name
 * appears in a manifest or docs excerpt
 */
export function filterTechStack(techStack: string[], signals: RepoSignals, context: PackedContext): string[] {
  const allowed = new Set([...signals.languages, ...ALWAYS_ALLOWED].map((s) => s.toLowerCase()));
  const evidence = context.excerpts
    .filter((e) => e.fileKind === "manifest" || e.fileKind === "docs")
    .map((e) => e.text.toLowerCase())
    .join("\n");

  const seen = new Set<string>();
  return expandStack(techStack).filter((item) => {
    const key = item.toLowerCase();
    if (key.length === 0 || seen.has(key)) return false;
    seen.add(key);
    return allowed.has(key) || evidence.includes(key);
  });
}

/**
 * Replace URL-path tokens that were never seen in code
 */
export function scrubRoutes(sentence: string, knownRoutes: Set<string>): string {
  return sentence.replace(ROUTE_TOKEN_RE, (match, lead: string, route: string) =>
    knownRoutes.has(route) ? match : `${lead}${UNCONFIRMED_ROUTE}`
  );
}

/**
 * Strict-mode post-processing of a validated analysis. Helpful mode skips it.
 */
export function sanitizeAnalysis(result: AnalysisResult, signals: RepoSignals, context: PackedContext): AnalysisResult {
  const knownRoutes = new Set(signals.routesSample);

  return {
    ...result,
    techStack: filterTechStack(result.techStack, signals, context),
    flows: result.flows.map((flow) => ({
      name: flow.name,
      steps: flow.steps.map((step) => ({ ...step, action: scrubRoutes(step.action, knownRoutes) })),
    })),
    onboardingPath: result.onboardingPath.map((step) => scrubRoutes(step, knownRoutes)),
    improvements: uniqueInOrder(result.improvements.map((s) => s.trim()).filter((s) => s.length > 0)),
  };
}
