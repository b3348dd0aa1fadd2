import { describe, expect, it } from "vitest";
import type { AnalysisResult, RepoSignals } from "../types/index.js";
import { renderArchitectureMarkdown } from "./markdown.js";

const result: AnalysisResult = {
  repoName: "acme/widgets",
  overview: "A tiny Django shop.",
  techStack: ["Python", "Django"],
  modules: [{ name: "Shop", purpose: "Views and models", paths: ["app"] }],
  keyFiles: [{ path: "manage.py", role: "Entry | admin" }],
  flows: [
    { name: "List items", steps: [{ action: "Route the request", file: "app/views.py" }, { action: "Render" }] },
    { name: "Admin", steps: [{ action: "Open the admin" }] },
  ],
  diagram: "flowchart TD\nA --> B",
  onboardingPath: ["Read README.md", "Open manage.py"],
  improvements: [],
};

const signals: RepoSignals = {
  languages: ["Python"],
  languageCounts: { Python: 3 },
  primaryLanguage: "Python",
  entrypointsNearRoot: ["manage.py", "requirements.txt"],
  entrypointsAnywhere: ["manage.py"],
  manifestPaths: ["requirements.txt"],
  monorepoHint: false,
  routesSample: [],
  inboundImports: {},
};

function section(markdown: string, heading: string): string {
  const start = markdown.indexOf(`## ${heading}\n\n`);
  const body = markdown.slice(start + heading.length + 5);
  const end = body.indexOf("\n\n## ");
  return end === -1 ? body.trimEnd() : body.slice(0, end);
}

describe("renderArchitectureMarkdown", () => {
  it("renders every section in order", () => {
    const markdown = renderArchitectureMarkdown(result, signals);
    const headings = markdown.split("\n").filter((line) => line.startsWith("#"));

    expect(headings).toEqual([
      "# Architecture: acme/widgets",
      "## Overview",
      "## Tech Stack",
      "## Module Map",
      "### Shop",
      "## Key Files",
      "## Critical Flows",
      "### List items",
      "### Admin",
      "## Diagram",
      "## Onboarding Path",
      "## Quickstart",
      "## Suggested Improvements",
      "## Evidence Used",
    ]);
    expect(markdown.endsWith("\n")).toBe(true);
  });

  it("escapes pipes in the key file table", () => {
    expect(section(renderArchitectureMarkdown(result), "Key Files")).toBe(
      "| File | Role |\n|------|------|\n| `manage.py` | Entry \\| admin |"
    );
  });

  it("numbers flow steps and cites their files", () => {
    expect(section(renderArchitectureMarkdown(result), "Critical Flows")).toBe(
      "### List items\n\n1. Route the request (`app/views.py`)\n2. Render\n\n### Admin\n\n1. Open the admin"
    );
  });

  it("fences the diagram", () => {
    expect(section(renderArchitectureMarkdown(result), "Diagram")).toBe("```mermaid\nflowchart TD\nA --> B\n```");
  });

  it("suggests a Django quickstart when manage.py is near the root", () => {
    expect(section(renderArchitectureMarkdown(result, signals), "Quickstart")).toContain("python manage.py runserver");
  });

  it("falls back to the README without signals", () => {
    const markdown = renderArchitectureMarkdown(result);

    expect(section(markdown, "Quickstart")).toBe("Check the repo README for exact setup/run instructions.");
    expect(markdown).not.toContain("## Evidence Used");
  });

  it("fills empty sections with placeholders", () => {
    const markdown = renderArchitectureMarkdown({ ...result, overview: " ", techStack: [], improvements: [] });

    expect(section(markdown, "Overview")).toBe(
      "Not enough evidence in scanned files to summarize the repository's purpose."
    );
    expect(section(markdown, "Tech Stack")).toBe("- Not confirmed in code");
    expect(section(markdown, "Suggested Improvements")).toBe("- Not provided");
  });

  it("summarizes the evidence it was given", () => {
    expect(section(renderArchitectureMarkdown(result, signals), "Evidence Used")).toBe(
      [
        "**Languages detected:** Python",
        "",
        "**Entrypoints/manifests found near root:**",
        "- `manage.py`",
        "- `requirements.txt`",
        "",
        "**Route-like strings found:** None",
      ].join("\n")
    );
  });
});
