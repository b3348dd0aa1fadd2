import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Estimate token count from text
 * ~3.5 chars per token for code; actual tokenization varies by model
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 3.5);
}

/**
 * Ensure directory exists
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Write JSON to file with pretty printing
 */
export function writeJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

/**
 * Write text to file, creating parent directories
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, content);
}

/**
 * Format bytes for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Normalize a repo-relative path: POSIX separators, no leading ./ or /
 */
export function normalizeRepoPath(filePath: string): string {
  return filePath
    .trim()
    .replace(/\\/g, "/")
    .replace(/^(?:\.\/)+/, "")
    .replace(/^\/+/, "")
    .replace(/\/+$/, "");
}

/**
 * Text that contains NUL bytes or is mostly non-printable is treated as binary
 */
export function isLikelyBinary(content: string): boolean {
  if (!content) return false;
  if (content.includes("\u0000")) return true;
  const sample = content.slice(0, 8000);
  const nonPrintable = sample.replace(/[\x09\x0A\x0D\x20-\x7E]|[^\x00-\x7F]/g, "");
  return nonPrintable.length / sample.length > 0.2;
}

/**
 * Dedupe while keeping first-seen order
 */
export function uniqueInOrder<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
