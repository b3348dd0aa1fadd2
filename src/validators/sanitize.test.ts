import { describe, expect, it } from "vitest";
import type { AnalysisResult, PackedContext, RepoSignals } from "../types/index.js";
import { UNCONFIRMED_ROUTE, filterTechStack, sanitizeAnalysis, scrubRoutes } from "./sanitize.js";

const signals: RepoSignals = {
  languages: ["Python"],
  languageCounts: { Python: 4 },
  primaryLanguage: "Python",
  entrypointsNearRoot: ["manage.py"],
  entrypointsAnywhere: ["manage.py"],
  manifestPaths: [],
  monorepoHint: false,
  routesSample: ["/api/items"],
  inboundImports: {},
};

const context: PackedContext = {
  excerpts: [
    { path: "requirements.txt", fileKind: "manifest", excerptKind: "full", text: "django==5.0\n", originalChars: 12 },
    { path: "app/views.py", fileKind: "source", excerptKind: "full", text: "import redis\n", originalChars: 13 },
  ],
  treeSummary: "Repository tree (2 files):\n",
  omitted: [],
  knownPaths: ["app/views.py", "requirements.txt"],
  budget: 1000,
  totalSize: 100,
  estimatedTokens: 29,
};

describe("filterTechStack", () => {
  it("keeps languages, web basics and manifest-backed names", () => {
    const stack = filterTechStack(["Python", "Django", "html/css/js", "Kubernetes", "python", "Redis"], signals, context);

    expect(stack).toEqual(["Python", "Django", "HTML", "CSS", "JavaScript"]);
  });
});

describe("scrubRoutes", () => {
  it("replaces routes not seen in code", () => {
    const known = new Set(["/api/items"]);

    expect(scrubRoutes("Call /api/items then /api/users, and open app/views.py", known)).toBe(
      `Call /api/items then ${UNCONFIRMED_ROUTE}, and open app/views.py`
    );
  });

  it("leaves parenthesized file paths alone", () => {
    expect(scrubRoutes("Handled in (app/views.py)", new Set())).toBe("Handled in (app/views.py)");
  });
});

describe("sanitizeAnalysis", () => {
  it("scrubs flows and onboarding and de-duplicates improvements", () => {
    const result: AnalysisResult = {
      repoName: "acme/widgets",
      overview: "",
      techStack: ["Python"],
      modules: [{ name: "Web", purpose: "", paths: ["app"] }],
      keyFiles: [],
      flows: [
        { name: "List", steps: [{ action: "GET /api/items returns items", file: "app/views.py" }] },
        { name: "Admin", steps: [{ action: "Visit /admin to log in" }] },
      ],
      diagram: "flowchart TD\nA-->B",
      onboardingPath: ["Open /docs in a browser"],
      improvements: ["Add tests", " Add tests ", ""],
    };

    const clean = sanitizeAnalysis(result, signals, context);

    expect(clean.flows).toEqual([
      { name: "List", steps: [{ action: "GET /api/items returns items", file: "app/views.py" }] },
      { name: "Admin", steps: [{ action: `Visit ${UNCONFIRMED_ROUTE} to log in` }] },
    ]);
    expect(clean.onboardingPath).toEqual([`Open ${UNCONFIRMED_ROUTE} in a browser`]);
    expect(clean.improvements).toEqual(["Add tests"]);
    expect(result.improvements).toHaveLength(3);
  });
});
