import fg from "fast-glob";
import * as path from "node:path";
import { readFile } from "node:fs/promises";
import type {
  FileEntry,
  FileKind,
  RepositoryRef,
  RepositorySnapshot,
  SnapshotLimits,
} from "../types/index.js";
import { PipelineError, errorMessage } from "./errors.js";
import { formatBytes } from "./utils.js";

/**
 * Directories skipped while walking a fresh checkout.
 * Purely an optimization: classifyPath still tags anything that slips through.
 */
const FETCH_IGNORE = [
  "**/.git/**",
  "**/node_modules/**",
  "**/bower_components/**",
  "**/.venv/**",
  "**/venv/**",
  "**/__pycache__/**",
];

const VENDOR_DIRS = new Set([
  "node_modules",
  "vendor",
  "third_party",
  "third-party",
  "bower_components",
  "jspm_packages",
  ".venv",
  "venv",
  "site-packages",
  "pods",
  "carthage",
  ".yarn",
  ".pnpm-store",
]);

const GENERATED_DIRS = new Set([
  "dist",
  "build",
  "out",
  "target",
  ".next",
  ".nuxt",
  ".turbo",
  ".cache",
  ".parcel-cache",
  "coverage",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  "__generated__",
  "generated",
  ".gradle",
  ".git",
]);

const LOCK_FILES = new Set([
  "package-lock.json",
  "npm-shrinkwrap.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "poetry.lock",
  "pipfile.lock",
  "cargo.lock",
  "gemfile.lock",
  "composer.lock",
  "go.sum",
  "bun.lockb",
]);

const GENERATED_FILE_PATTERNS = [
  /\.min\.(js|css)$/,
  /\.map$/,
  /\.pb\.go$/,
  /_pb2(_grpc)?\.py$/,
  /\.generated\.[a-z]+$/,
  /\.g\.dart$/,
];

const BINARY_EXTENSIONS = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".bmp", ".ico", ".icns", ".webp", ".tiff", ".psd",
  ".pdf", ".zip", ".gz", ".tgz", ".bz2", ".xz", ".7z", ".rar", ".tar", ".jar", ".war",
  ".exe", ".dll", ".so", ".dylib", ".a", ".o", ".obj", ".class", ".pyc", ".pyo", ".wasm",
  ".woff", ".woff2", ".ttf", ".otf", ".eot",
  ".mp3", ".mp4", ".wav", ".ogg", ".mov", ".avi", ".webm", ".flac",
  ".sqlite", ".db", ".bin", ".dat", ".pkl", ".npy", ".parquet",
]);

const TEST_DIRS = new Set(["test", "tests", "__tests__", "spec", "specs", "__mocks__", "e2e", "testdata", "fixtures"]);

const TEST_FILE_PATTERNS = [
  /\.(test|spec)\.[a-z0-9]+$/i,
  /^test_.*\.py$/,
  /_test\.(go|py|rb|exs?)$/,
  /(Test|Tests|Spec)\.(java|kt|cs|scala|swift)$/,
];

/**
 * Manifests, build descriptors and container files
 */
export const MANIFEST_NAMES = new Set([
  "package.json",
  "pyproject.toml",
  "requirements.txt",
  "Pipfile",
  "setup.py",
  "setup.cfg",
  "go.mod",
  "Cargo.toml",
  "pom.xml",
  "build.gradle",
  "build.gradle.kts",
  "settings.gradle",
  "Gemfile",
  "composer.json",
  "mix.exs",
  "Dockerfile",
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
  "Makefile",
  "CMakeLists.txt",
  "tsconfig.json",
  "deno.json",
  "environment.yml",
  "serverless.yml",
  "template.yaml",
]);

const MANIFEST_PATTERNS = [/\.(csproj|fsproj|sln|gemspec|cabal|nimble)$/];

const DOC_EXTENSIONS = new Set([".md", ".mdx", ".rst", ".txt", ".adoc"]);
const DOC_DIRS = new Set(["docs", "doc", "documentation"]);

/**
 * Determine file kind from its repo-relative path alone
 */
export function classifyPath(relativePath: string): FileKind {
  const parts = relativePath.split("/");
  const baseName = parts[parts.length - 1];
  const lowerBase = baseName.toLowerCase();
  const dirs = parts.slice(0, -1).map((p) => p.toLowerCase());
  const ext = path.posix.extname(lowerBase);

  if (dirs.some((d) => VENDOR_DIRS.has(d))) return "vendored";
  if (dirs.some((d) => GENERATED_DIRS.has(d))) return "generated";
  if (LOCK_FILES.has(lowerBase)) return "generated";
  if (GENERATED_FILE_PATTERNS.some((re) => re.test(lowerBase))) return "generated";
  if (BINARY_EXTENSIONS.has(ext)) return "binary";
  if (dirs.some((d) => TEST_DIRS.has(d))) return "test";
  if (TEST_FILE_PATTERNS.some((re) => re.test(baseName))) return "test";
  if (MANIFEST_NAMES.has(baseName)) return "manifest";
  if (MANIFEST_PATTERNS.some((re) => re.test(lowerBase))) return "manifest";
  if (lowerBase.startsWith("readme")) return "docs";
  if (DOC_EXTENSIONS.has(ext)) return "docs";
  if (dirs.some((d) => DOC_DIRS.has(d))) return "docs";
  return "source";
}

/**
 * Plain code-unit ordering, independent of the host locale
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Build an immutable FileEntry around a lazy reader
 */
export function createFileEntry(
  relativePath: string,
  size: number,
  read: () => Promise<string>
): FileEntry {
  return Object.freeze({
    path: relativePath,
    size,
    kind: classifyPath(relativePath),
    depth: relativePath.split("/").length - 1,
    read,
  });
}

/**
 * Walk a checked-out repository and produce its snapshot
 */
export async function indexSnapshot(
  ref: RepositoryRef,
  root: string,
  limits: SnapshotLimits
): Promise<RepositorySnapshot> {
  let found: fg.Entry[];
  try {
    found = await fg(["**/*"], {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      stats: true,
      ignore: FETCH_IGNORE,
    });
  } catch (err: unknown) {
    throw new PipelineError("fetch-failure", `Could not read checkout: ${errorMessage(err)}`);
  }

  if (found.length > limits.maxRepoFiles) {
    throw new PipelineError(
      "fetch-failure",
      `Repository too large: ${found.length} files exceeds limit of ${limits.maxRepoFiles}`
    );
  }

  let totalBytes = 0;
  const entries: FileEntry[] = [];
  for (const item of found) {
    const size = item.stats?.size ?? 0;
    totalBytes += size;
    const absolutePath = path.join(root, item.path);
    entries.push(createFileEntry(item.path, size, () => readFile(absolutePath, "utf-8")));
  }

  if (totalBytes > limits.maxRepoBytes) {
    throw new PipelineError(
      "fetch-failure",
      `Repository too large: ${formatBytes(totalBytes)} exceeds limit of ${formatBytes(limits.maxRepoBytes)}`
    );
  }

  // Sort for determinism
  entries.sort((a, b) => comparePaths(a.path, b.path));

  return { ref, root, entries, totalBytes };
}
