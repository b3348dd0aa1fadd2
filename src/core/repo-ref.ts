import type { RepositoryRef } from "../types/index.js";
import { PipelineError } from "./errors.js";

const SEGMENT_RE = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse a public repository URL into a frozen RepositoryRef.
 * Accepts:
 *   https://github.com/owner/repo(.git)
 *   github.com/owner/repo
 *   https://github.com/owner/repo/tree/branch
 */
export function parseRepositoryRef(input: string): RepositoryRef {
  const trimmed = input.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw invalid(input, "not a URL");
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw invalid(input, `unsupported scheme ${url.protocol.replace(/:$/, "")}`);
  }
  if (url.username || url.password) {
    throw invalid(input, "credentials are not supported");
  }

  const segments = url.pathname.split("/").filter(Boolean);
  if (segments.length < 2) {
    throw invalid(input, "expected /<owner>/<name>");
  }

  const owner = segments[0];
  const name = segments[1].replace(/\.git$/, "");
  if (!SEGMENT_RE.test(owner) || !SEGMENT_RE.test(name) || name === "") {
    throw invalid(input, "owner or name contains unsupported characters");
  }

  const branch = segments[2] === "tree" && segments.length > 3 ? decodeBranch(input, segments.slice(3)) : undefined;
  const host = url.host.toLowerCase();

  const ref: RepositoryRef = branch
    ? { url: `https://${host}/${owner}/${name}`, host, owner, name, branch }
    : { url: `https://${host}/${owner}/${name}`, host, owner, name };
  return Object.freeze(ref);
}

/** Branch names may contain slashes: everything after /tree/ is the branch */
function decodeBranch(input: string, segments: string[]): string {
  try {
    return segments.map((segment) => decodeURIComponent(segment)).join("/");
  } catch (err: unknown) {
    if (err instanceof URIError) throw invalid(input, "malformed branch");
    throw err;
  }
}

function invalid(input: string, why: string): PipelineError {
  return new PipelineError("fetch-failure", `Invalid repository URL "${input}": ${why}`);
}
