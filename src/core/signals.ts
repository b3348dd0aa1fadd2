import * as path from "node:path";
import type { FileEntry, RepoSignals } from "../types/index.js";
import { MANIFEST_NAMES, comparePaths } from "./indexer.js";
import { uniqueInOrder } from "./utils.js";

const EXT_LANG: Record<string, string> = {
  ".py": "Python",
  ".js": "JavaScript",
  ".mjs": "JavaScript",
  ".cjs": "JavaScript",
  ".jsx": "JavaScript",
  ".ts": "TypeScript",
  ".tsx": "TypeScript",
  ".go": "Go",
  ".java": "Java",
  ".kt": "Kotlin",
  ".rb": "Ruby",
  ".php": "PHP",
  ".rs": "Rust",
  ".c": "C",
  ".cc": "C++",
  ".cpp": "C++",
  ".h": "C/C++",
  ".hpp": "C++",
  ".cs": "C#",
  ".swift": "Swift",
  ".scala": "Scala",
  ".ex": "Elixir",
  ".exs": "Elixir",
  ".dart": "Dart",
};

/**
 * Conventional "main"/"index" file names across ecosystems
 */
export const ENTRY_FILENAMES = new Set([
  "main.py", "app.py", "server.py", "wsgi.py", "asgi.py", "manage.py", "__main__.py",
  "index.js", "index.ts", "index.mjs", "index.tsx", "main.js", "main.ts", "main.tsx",
  "server.js", "server.ts", "app.js", "app.ts", "app.tsx", "cli.js", "cli.ts",
  "main.go", "main.rs", "lib.rs", "main.java", "program.cs", "main.kt", "main.c", "main.cpp",
]);

const MONOREPO_MANIFESTS = new Set(["package.json", "pyproject.toml", "go.mod", "pom.xml", "build.gradle", "build.gradle.kts", "Cargo.toml"]);

const SCANNABLE_EXTENSIONS = new Set([".py", ".js", ".mjs", ".cjs", ".jsx", ".ts", ".tsx", ".go"]);
const ROUTE_SCAN_EXTENSIONS = new Set([".py", ".js", ".ts", ".mjs", ".tsx"]);

const ROUTE_RE = /(["'])(\/[^"'\s]+)\1/g;
const MAX_ROUTES = 20;
const MAX_ROUTE_FILES = 6;
const MAX_MANIFEST_PATHS = 30;

export interface SignalOptions {
  /** Max code files read for the import scan */
  maxScanFiles?: number;
  /** Chars read from each scanned file */
  maxScanChars?: number;
}

/**
 * Extract import specifiers from JS/TS, Python and Go source
 */
export function extractImportSpecifiers(content: string, extension: string): string[] {
  const found: string[] = [];

  if (extension === ".py") {
    for (const match of content.matchAll(/^\s*(?:from\s+([\w.]+)\s+import|import\s+([\w.]+))/gm)) {
      found.push(match[1] ?? match[2] ?? "");
    }
  } else if (extension === ".go") {
    for (const block of content.matchAll(/^\s*import\s*\(([\s\S]*?)\)/gm)) {
      for (const match of block[1].matchAll(/"([^"]+)"/g)) found.push(match[1]);
    }
    for (const match of content.matchAll(/^\s*import\s+(?:\w+\s+)?"([^"]+)"/gm)) {
      found.push(match[1]);
    }
  } else {
    const staticImports = content.matchAll(/import\s+(?:[\w\s{},*]+\s+from\s+)?['"]([^'"]+)['"]/g);
    const reExports = content.matchAll(/export\s+(?:\*|\{[^}]*\})\s+from\s+['"]([^'"]+)['"]/g);
    const dynamicImports = content.matchAll(/import\s*\(\s*['"]([^'"]+)['"]\s*\)/g);
    const requires = content.matchAll(/require\s*\(\s*['"]([^'"]+)['"]\s*\)/g);
    for (const match of staticImports) found.push(match[1]);
    for (const match of reExports) found.push(match[1]);
    for (const match of dynamicImports) found.push(match[1]);
    for (const match of requires) found.push(match[1]);
  }

  return uniqueInOrder(found.filter(Boolean));
}

function specifierStem(specifier: string): string {
  const lastSegment = specifier.split(/[/.]/).filter(Boolean).pop() ?? "";
  return lastSegment.toLowerCase();
}

function fileStem(filePath: string): string {
  const base = path.posix.basename(filePath);
  const dot = base.indexOf(".");
  return (dot > 0 ? base.slice(0, dot) : base).toLowerCase();
}

async function readForScoring(entry: FileEntry, maxChars: number): Promise<string> {
  try {
    return (await entry.read()).slice(0, maxChars);
  } catch {
    // Unreadable files contribute no signal
    return "";
  }
}

/**
 * Gather lightweight repository evidence: languages, entry points,
 * manifests, route-like strings and import centrality.
 * Each file is read at most once here.
 */
export async function collectSignals(
  entries: FileEntry[],
  options: SignalOptions = {}
): Promise<RepoSignals> {
  const maxScanFiles = options.maxScanFiles ?? 250;
  const maxScanChars = options.maxScanChars ?? 80_000;
  const eligible = entries.filter(
    (e) => e.kind !== "vendored" && e.kind !== "generated" && e.kind !== "binary"
  );

  // Languages
  const languageCounts: Record<string, number> = {};
  for (const entry of eligible) {
    const lang = EXT_LANG[path.posix.extname(entry.path).toLowerCase()];
    if (lang) languageCounts[lang] = (languageCounts[lang] ?? 0) + 1;
  }
  const languages = Object.entries(languageCounts)
    .sort(([a, ca], [b, cb]) => cb - ca || comparePaths(a, b))
    .map(([lang]) => lang);

  // Entry points
  const entrypointsNearRoot = eligible
    .filter((e) => {
      const base = path.posix.basename(e.path);
      return e.depth <= 1 && (MANIFEST_NAMES.has(base) || /^readme(\.|$)/i.test(base) || base === "manage.py");
    })
    .map((e) => e.path);
  const entrypointsAnywhere = eligible
    .filter((e) => e.kind !== "test" && ENTRY_FILENAMES.has(path.posix.basename(e.path).toLowerCase()))
    .map((e) => e.path);

  // Manifests
  const manifestPaths = eligible
    .filter((e) => MONOREPO_MANIFESTS.has(path.posix.basename(e.path)))
    .map((e) => e.path);
  const manifestDirs = new Set(manifestPaths.map((p) => path.posix.dirname(p)));

  // Import centrality
  const contents = new Map<string, string>();
  const byStem = new Map<string, string[]>();
  for (const entry of eligible) {
    const stem = fileStem(entry.path);
    const list = byStem.get(stem);
    if (list) list.push(entry.path);
    else byStem.set(stem, [entry.path]);
  }

  const scanTargets = eligible
    .filter((e) => e.kind === "source" && SCANNABLE_EXTENSIONS.has(path.posix.extname(e.path).toLowerCase()))
    .sort((a, b) => b.size - a.size || comparePaths(a.path, b.path))
    .slice(0, maxScanFiles);

  const inboundImports: Record<string, number> = {};
  for (const entry of scanTargets) {
    const content = await readForScoring(entry, maxScanChars);
    contents.set(entry.path, content);
    if (!content) continue;

    const ext = path.posix.extname(entry.path).toLowerCase();
    const targets = new Set<string>();
    for (const specifier of extractImportSpecifiers(content, ext)) {
      const stem = specifierStem(specifier);
      for (const target of byStem.get(stem) ?? []) {
        if (target !== entry.path) targets.add(target);
      }
    }
    for (const target of targets) {
      inboundImports[target] = (inboundImports[target] ?? 0) + 1;
    }
  }

  // Route-like strings from entry files
  const routeFiles = uniqueInOrder([...entrypointsNearRoot, ...entrypointsAnywhere])
    .filter((p) => ROUTE_SCAN_EXTENSIONS.has(path.posix.extname(p).toLowerCase()))
    .slice(0, MAX_ROUTE_FILES);
  const byPath = new Map(eligible.map((e) => [e.path, e]));
  const routes: string[] = [];
  for (const filePath of routeFiles) {
    let content = contents.get(filePath);
    if (content === undefined) {
      const entry = byPath.get(filePath);
      content = entry ? await readForScoring(entry, maxScanChars) : "";
    }
    for (const match of content.matchAll(ROUTE_RE)) {
      if (match[2].length <= 60) routes.push(match[2]);
    }
  }

  return {
    languages,
    languageCounts,
    primaryLanguage: languages[0] ?? null,
    entrypointsNearRoot,
    entrypointsAnywhere,
    manifestPaths: manifestPaths.slice(0, MAX_MANIFEST_PATHS),
    monorepoHint: manifestDirs.size >= 2,
    routesSample: uniqueInOrder(routes).slice(0, MAX_ROUTES),
    inboundImports,
  };
}
