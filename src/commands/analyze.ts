import pc from "picocolors";
import * as path from "node:path";
import { toErrorPayload } from "../core/errors.js";
import { createConsoleLogger } from "../core/logger.js";
import { runPipeline, type PipelineOutcome } from "../core/pipeline.js";
import { writeJson, writeText } from "../core/utils.js";
import { renderArchitectureMarkdown } from "../generators/markdown.js";
import { createProvider } from "../providers/index.js";
import type { PipelineStats } from "../types/index.js";
import { loadCommandConfig, type RunFlags } from "./options.js";

export interface AnalyzeCommandOptions extends RunFlags {
  format?: string;
  output?: string;
  verbose?: boolean;
}

/**
 * Default output folder: .repowalk/<owner>__<name>
 */
export function defaultOutputDir(repoName: string): string {
  return path.join(process.cwd(), ".repowalk", repoName.replace(/\//g, "__"));
}

export function printStats(stats: PipelineStats): void {
  console.log(`  ${pc.dim("Files:")}       ${stats.totalFiles}`);
  console.log(`  ${pc.dim("Candidates:")}  ${stats.candidates}`);
  console.log(
    `  ${pc.dim("Excerpts:")}    ${stats.excerpts} ${pc.dim(`(${stats.truncated} truncated, ${stats.omitted} omitted)`)}`
  );
  console.log(`  ${pc.dim("Context:")}     ${stats.contextChars} chars ${pc.dim(`(~${stats.estimatedTokens} tokens)`)}`);
  if (stats.modelCalls > 0) {
    console.log(`  ${pc.dim("Model calls:")} ${stats.modelCalls}`);
  }
}

function printFailure(outcome: Extract<PipelineOutcome, { ok: false }>): void {
  const { error } = outcome;
  console.log(pc.red(`\n❌ ${error.kind}: ${error.message}`));
  for (const defect of error.defects.slice(0, 10)) {
    console.log(pc.dim(`   - ${defect}`));
  }
  if (error.defects.length > 10) {
    console.log(pc.dim(`   ... and ${error.defects.length - 10} more`));
  }
  console.log("");
}

export async function analyzeCommand(url: string, options: AnalyzeCommandOptions): Promise<void> {
  const loaded = loadCommandConfig(options);
  if (!loaded) return;
  const { config, format } = loaded;

  const provider = createProvider(config.provider);

  console.log(pc.cyan("\n🧭 Analyzing repository...\n"));
  console.log(pc.dim(`  URL:      ${url}`));
  console.log(pc.dim(`  Provider: ${provider.name} (${provider.model})`));
  console.log(pc.dim(`  Mode:     ${config.responseMode}\n`));

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error("Interrupted"));
  process.once("SIGINT", onSigint);

  let outcome: PipelineOutcome;
  try {
    outcome = await runPipeline(url, {
      config,
      provider,
      logger: createConsoleLogger({ verbose: options.verbose }),
      signal: controller.signal,
    });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }

  if (!outcome.ok) {
    printFailure(outcome);
    if (options.output && format !== "markdown") {
      const errorPath = path.join(path.resolve(options.output), "error.json");
      writeJson(errorPath, toErrorPayload(outcome.error));
      console.log(pc.dim(`Failure details saved to: ${errorPath}\n`));
    }
    process.exitCode = 1;
    return;
  }

  const { result, signals, stats } = outcome;
  const outputDir = options.output ? path.resolve(options.output) : defaultOutputDir(result.repoName);
  const written: string[] = [];

  if (format === "json" || format === "both") {
    const jsonPath = path.join(outputDir, "analysis.json");
    writeJson(jsonPath, result);
    written.push(jsonPath);
  }
  if (format === "markdown" || format === "both") {
    const mdPath = path.join(outputDir, "ARCHITECTURE.md");
    writeText(mdPath, renderArchitectureMarkdown(result, signals));
    written.push(mdPath);
  }

  console.log("\n" + pc.cyan("━".repeat(50)));
  console.log(pc.bold(`🧭 ${result.repoName}`));
  console.log(pc.cyan("━".repeat(50)));
  printStats(stats);
  console.log("");
  console.log(`  ${pc.dim("Modules:")}     ${result.modules.map((m) => m.name).join(", ")}`);
  console.log(`  ${pc.dim("Flows:")}       ${result.flows.length}`);
  console.log(`  ${pc.dim("Key files:")}   ${result.keyFiles.length}`);

  console.log("\n" + pc.cyan("━".repeat(50)));
  for (const file of written) {
    console.log(pc.green(`✅ Saved to: ${file}`));
  }
  console.log(pc.cyan("━".repeat(50)) + "\n");
}
