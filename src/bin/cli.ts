#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { analyzeCommand } from "../commands/analyze.js";
import { packCommand } from "../commands/pack.js";
import { interactiveCommand } from "../commands/interactive.js";

const program = new Command();

program
  .name("repowalk")
  .description("Architecture walkthroughs for public repositories - module map, key files, flows and a diagram")
  .version("0.1.0");

// Default action: run interactive mode if no command specified
program.action(async () => {
  await interactiveCommand();
});

// repowalk i / repowalk interactive
program
  .command("i")
  .alias("interactive")
  .description("Interactive wizard mode (step-by-step prompts)")
  .action(async () => {
    await interactiveCommand();
  });

// repowalk analyze
program
  .command("analyze")
  .argument("<url>", "Repository URL (https://github.com/owner/name)")
  .description("Generate ARCHITECTURE.md and analysis.json for a repository")
  .option("-f, --format <format>", "Output format: json, markdown, or both", "both")
  .option("-o, --output <dir>", "Output directory (default: .repowalk/<owner>__<name>)")
  .option("-p, --provider <provider>", "Model provider: ollama or openai")
  .option("-m, --model <model>", "Model name (overrides OLLAMA_MODEL / OPENAI_MODEL)")
  .option("-t, --temperature <n>", "Generation temperature")
  .option("-b, --budget <chars>", "Packed context budget in characters")
  .option("--timeout <ms>", "Wall-clock timeout for the whole run")
  .option("--mode <mode>", "Response mode: strict or helpful")
  .option("-v, --verbose", "Show debug output")
  .action(analyzeCommand);

// repowalk pack
program
  .command("pack")
  .argument("<url>", "Repository URL")
  .description("Fetch, select and pack without calling a model")
  .option("-o, --output <file>", "Write the packed prompt to a file")
  .option("-n, --top <n>", "Number of top candidates to list", "15")
  .option("-b, --budget <chars>", "Packed context budget in characters")
  .option("--timeout <ms>", "Wall-clock timeout")
  .option("--mode <mode>", "Response mode used in the prompt: strict or helpful")
  .option("-v, --verbose", "Show debug output")
  .action(packCommand);

await program.parseAsync();
