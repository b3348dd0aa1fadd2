import type { AnalysisResult, CriticalFlow, RepoSignals } from "../types/index.js";

const MAX_EVIDENCE_ENTRYPOINTS = 12;
const MAX_EVIDENCE_ROUTES = 10;

function buildTechStack(result: AnalysisResult): string {
  if (result.techStack.length === 0) return "- Not confirmed in code";
  return result.techStack.map((t) => `- ${t}`).join("\n");
}

function buildModuleMap(result: AnalysisResult): string {
  if (result.modules.length === 0) {
    return "No modules could be confidently identified from scanned files.";
  }

  const lines: string[] = [];
  for (const mod of result.modules) {
    lines.push(`### ${mod.name}`);
    lines.push("");
    lines.push(mod.purpose.trim() || "Purpose not confirmed in scanned files.");
    if (mod.paths.length > 0) {
      lines.push("");
      lines.push("**Paths:**");
      for (const p of mod.paths) lines.push(`- \`${p}\``);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

function buildKeyFiles(result: AnalysisResult): string {
  if (result.keyFiles.length === 0) return "No key files identified.";

  const lines = ["| File | Role |", "|------|------|"];
  for (const kf of result.keyFiles) {
    lines.push(`| \`${kf.path}\` | ${kf.role.replace(/\|/g, "\\|") || "-"} |`);
  }
  return lines.join("\n");
}

function buildFlow(flow: CriticalFlow): string {
  const lines = [`### ${flow.name}`, ""];
  flow.steps.forEach((step, i) => {
    lines.push(`${i + 1}. ${step.action}${step.file ? ` (\`${step.file}\`)` : ""}`);
  });
  return lines.join("\n");
}

function buildQuickstart(signals: RepoSignals | undefined): string {
  const entrypoints = signals?.entrypointsNearRoot ?? [];
  const has = (name: string) => entrypoints.some((e) => e === name || e.endsWith(`/${name}`));

  if (has("manage.py")) {
    return [
      "This repo contains `manage.py` (Django-style). Quickstart is likely:",
      "",
      "```bash",
      "python -m venv .venv",
      "source .venv/bin/activate",
      "pip install -r requirements.txt  # or pyproject.toml",
      "python manage.py migrate",
      "python manage.py runserver",
      "```",
    ].join("\n");
  }
  if (has("package.json")) {
    return [
      "This repo contains `package.json`. Quickstart is likely:",
      "",
      "```bash",
      "npm install",
      "npm run dev  # or npm start (check package.json scripts)",
      "```",
    ].join("\n");
  }
  if (has("pyproject.toml") || has("requirements.txt")) {
    return [
      "This repo appears Python-based (pyproject/requirements present). Quickstart is likely:",
      "",
      "```bash",
      "python -m venv .venv",
      "source .venv/bin/activate",
      "pip install -r requirements.txt  # or install via pyproject.toml",
      "```",
    ].join("\n");
  }
  return "Check the repo README for exact setup/run instructions.";
}

function buildEvidence(signals: RepoSignals): string {
  const lines: string[] = [];
  lines.push(`**Languages detected:** ${signals.languages.length > 0 ? signals.languages.join(", ") : "None"}`);
  lines.push("");

  const entrypoints = signals.entrypointsNearRoot.slice(0, MAX_EVIDENCE_ENTRYPOINTS);
  if (entrypoints.length > 0) {
    lines.push("**Entrypoints/manifests found near root:**");
    for (const e of entrypoints) lines.push(`- \`${e}\``);
  } else {
    lines.push("**Entrypoints/manifests found near root:** None");
  }
  lines.push("");

  const routes = signals.routesSample.slice(0, MAX_EVIDENCE_ROUTES);
  if (routes.length > 0) {
    lines.push("**Route-like strings found (sample):**");
    for (const r of routes) lines.push(`- \`${r}\``);
  } else {
    lines.push("**Route-like strings found:** None");
  }
  return lines.join("\n");
}

/**
 * Render ARCHITECTURE.md. Quickstart and evidence sections only draw on
 * `signals` when given.
 */
export function renderArchitectureMarkdown(result: AnalysisResult, signals?: RepoSignals): string {
  const onboarding =
    result.onboardingPath.length > 0
      ? result.onboardingPath.map((s, i) => `${i + 1}. ${s}`).join("\n")
      : "1. Start with README (if present)\n2. Open the entrypoints/manifests (if present)\n3. Follow imports from core modules";

  const sections = [
    `# Architecture: ${result.repoName}`,
    "## Overview",
    result.overview.trim() || "Not enough evidence in scanned files to summarize the repository's purpose.",
    "## Tech Stack",
    buildTechStack(result),
    "## Module Map",
    buildModuleMap(result),
    "## Key Files",
    buildKeyFiles(result),
    "## Critical Flows",
    result.flows.length > 0
      ? result.flows.map(buildFlow).join("\n\n")
      : "No execution flows could be confidently derived from scanned files.",
    "## Diagram",
    result.diagram.trim()
      ? ["```mermaid", result.diagram.trim(), "```"].join("\n")
      : "Diagram not available (insufficient evidence).",
    "## Onboarding Path",
    onboarding,
    "## Quickstart",
    buildQuickstart(signals),
    "## Suggested Improvements",
    result.improvements.length > 0 ? result.improvements.map((s) => `- ${s}`).join("\n") : "- Not provided",
  ];

  if (signals) {
    sections.push("## Evidence Used", buildEvidence(signals));
  }

  return sections.join("\n\n") + "\n";
}
