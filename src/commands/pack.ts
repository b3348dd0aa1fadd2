import pc from "picocolors";
import * as path from "node:path";
import { createConsoleLogger } from "../core/logger.js";
import { packRepository } from "../core/pipeline.js";
import { writeText } from "../core/utils.js";
import { loadCommandConfig, type RunFlags } from "./options.js";
import { printStats } from "./analyze.js";

export interface PackCommandOptions extends RunFlags {
  /** Write the packed prompt to this file */
  output?: string;
  top?: string;
  verbose?: boolean;
}

/**
 * Dry run: fetch, select and pack, then report what would be sent
 */
export async function packCommand(url: string, options: PackCommandOptions): Promise<void> {
  const loaded = loadCommandConfig({ ...options, format: undefined });
  if (!loaded) return;
  const { config } = loaded;

  const top = Math.max(1, Number.parseInt(options.top ?? "15", 10) || 15);

  console.log(pc.cyan("\n📦 Packing repository context...\n"));
  console.log(pc.dim(`  URL:    ${url}`));
  console.log(pc.dim(`  Budget: ${config.limits.budgetChars} chars\n`));

  const outcome = await packRepository(url, {
    config,
    logger: createConsoleLogger({ verbose: options.verbose }),
  });

  if (!outcome.ok) {
    console.log(pc.red(`\n❌ ${outcome.error.kind}: ${outcome.error.message}\n`));
    process.exitCode = 1;
    return;
  }

  const { ref, signals, candidates, context, prompt, stats } = outcome;

  console.log("\n" + pc.cyan("━".repeat(50)));
  console.log(pc.bold(`📦 ${ref.owner}/${ref.name}`));
  console.log(pc.cyan("━".repeat(50)));
  printStats(stats);
  console.log(`  ${pc.dim("Languages:")}   ${signals.languages.join(", ") || "none"}`);

  console.log("");
  console.log(pc.bold(`  Top ${Math.min(top, candidates.length)} candidates:`));
  for (const candidate of candidates.slice(0, top)) {
    const reasons = candidate.score.reasons.map((r) => `${r.rule} ${r.points > 0 ? "+" : ""}${r.points}`).join(", ");
    console.log(`    ${pc.green(String(candidate.score.total).padStart(5))} ${candidate.entry.path} ${pc.dim(reasons)}`);
  }

  if (context.omitted.length > 0) {
    console.log("");
    console.log(pc.bold(pc.yellow(`  ⚠️  Omitted (${context.omitted.length}):`)));
    for (const item of context.omitted.slice(0, 10)) {
      console.log(`    ${pc.yellow("!")} ${item.path} ${pc.dim(`(${item.reason})`)}`);
    }
  }

  console.log("\n" + pc.cyan("━".repeat(50)));
  if (options.output) {
    const outputPath = path.resolve(options.output);
    writeText(outputPath, `${prompt.system}\n\n${prompt.user}`);
    console.log(pc.green(`✅ Prompt saved to: ${outputPath}`));
  } else {
    console.log(pc.dim("  Use --output <file> to save the packed prompt"));
  }
  console.log(pc.cyan("━".repeat(50)) + "\n");
}
