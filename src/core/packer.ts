import type { Candidate, Excerpt, PackOptions, PackedContext } from "../types/index.js";
import { PipelineError } from "./errors.js";
import { comparePaths } from "./indexer.js";
import { estimateTokens, isLikelyBinary } from "./utils.js";

export const TRUNCATION_MARKER = "\n...truncated...\n";

/** Smallest truncated body: the marker plus one character of content */
export const MIN_TRUNCATED_CHARS = TRUNCATION_MARKER.length + 1;

const HEAD_RATIO = 0.75;

export function excerptHeader(filePath: string): string {
  return `===== FILE: ${filePath} =====\n`;
}

export function renderExcerpt(excerpt: Excerpt): string {
  return `${excerptHeader(excerpt.path)}${excerpt.text}\n`;
}

/**
 * Render the packed context exactly as it is measured against the budget
 */
export function renderPackedContext(context: Pick<PackedContext, "treeSummary" | "excerpts">): string {
  return context.treeSummary + context.excerpts.map(renderExcerpt).join("");
}

/**
 * Keep the head and tail of `text` so the result is exactly `limit` chars
 */
export function truncateHeadTail(text: string, limit: number): string {
  if (text.length <= limit) return text;
  if (limit <= TRUNCATION_MARKER.length) {
    throw new RangeError(`limit ${limit} cannot hold the truncation marker`);
  }
  const keep = limit - TRUNCATION_MARKER.length;
  const head = Math.ceil(keep * HEAD_RATIO);
  const tail = keep - head;
  return text.slice(0, head) + TRUNCATION_MARKER + (tail > 0 ? text.slice(text.length - tail) : "");
}

function summaryHeader(fileCount: number): string {
  return `Repository tree (${fileCount} files):\n`;
}

function summaryFooter(remaining: number): string {
  return `... (${remaining} more files)\n`;
}

/**
 * Size of the smallest summary that still describes the whole tree
 */
export function minimumSummarySize(treePaths: string[]): number {
  const count = treePaths.length;
  return summaryHeader(count).length + (count > 0 ? summaryFooter(count).length : 0);
}

/**
 * Compact sorted listing of repository paths, cut to fit `limit`
 */
export function buildTreeSummary(
  treePaths: string[],
  limit: number
): { text: string; listed: string[] } {
  const sorted = [...new Set(treePaths)].sort(comparePaths);
  const header = summaryHeader(sorted.length);
  const worstFooter = summaryFooter(sorted.length).length;

  const listed: string[] = [];
  let text = header;
  for (let i = 0; i < sorted.length; i++) {
    const line = `${sorted[i]}\n`;
    const reserve = i === sorted.length - 1 ? 0 : worstFooter;
    if (text.length + line.length + reserve > limit) break;
    text += line;
    listed.push(sorted[i]);
  }

  if (listed.length < sorted.length) {
    text += summaryFooter(sorted.length - listed.length);
  }
  return { text, listed };
}

/**
 * Greedily pack candidate excerpts plus a tree summary under the budget.
 * Deterministic for a fixed (candidates, options) pair.
 */
export async function packContext(
  candidates: Candidate[],
  options: PackOptions
): Promise<PackedContext> {
  const { budget, summaryRatio, maxExcerptChars, treePaths } = options;

  if (candidates.length === 0) {
    throw new PipelineError("empty-repository", "No candidates to pack");
  }

  const minimum = minimumSummarySize(treePaths);
  if (budget < minimum) {
    throw new PipelineError(
      "budget-exhausted",
      `Budget of ${budget} chars cannot hold the ${minimum}-char minimum tree summary`
    );
  }

  const reservation = Math.min(budget, Math.max(minimum, Math.floor(budget * summaryRatio)));
  const summary = buildTreeSummary(treePaths, reservation);

  const excerpts: Excerpt[] = [];
  const omitted: PackedContext["omitted"] = [];
  let used = summary.text.length;

  for (const { entry } of candidates) {
    const remaining = budget - used;
    const overhead = excerptHeader(entry.path).length + 1;
    const minBody = Math.min(MIN_TRUNCATED_CHARS, entry.size);

    if (remaining < overhead + minBody) {
      omitted.push({ path: entry.path, reason: "budget" });
      continue;
    }

    let content: string;
    try {
      content = await entry.read();
    } catch {
      omitted.push({ path: entry.path, reason: "unreadable" });
      continue;
    }
    if (isLikelyBinary(content)) {
      omitted.push({ path: entry.path, reason: "binary" });
      continue;
    }

    const limit = Math.min(remaining - overhead, maxExcerptChars);
    if (content.length > limit && limit < MIN_TRUNCATED_CHARS) {
      omitted.push({ path: entry.path, reason: "budget" });
      continue;
    }
    const text = truncateHeadTail(content, limit);
    excerpts.push({
      path: entry.path,
      fileKind: entry.kind,
      excerptKind: text.length < content.length ? "truncated" : "full",
      text,
      originalChars: content.length,
    });
    used += overhead + text.length;
  }

  const knownPaths = [...new Set([...excerpts.map((e) => e.path), ...summary.listed])].sort(comparePaths);
  const rendered = renderPackedContext({ treeSummary: summary.text, excerpts });

  return {
    excerpts,
    treeSummary: summary.text,
    omitted,
    knownPaths,
    budget,
    totalSize: used,
    estimatedTokens: estimateTokens(rendered),
  };
}
