import pc from "picocolors";
import { select, input, confirm } from "@inquirer/prompts";
import { parseRepositoryRef } from "../core/repo-ref.js";
import { PipelineError } from "../core/errors.js";
import { analyzeCommand } from "./analyze.js";
import { packCommand } from "./pack.js";

function validateUrl(value: string): true | string {
  try {
    parseRepositoryRef(value);
    return true;
  } catch (err: unknown) {
    if (err instanceof PipelineError) return err.message;
    throw err;
  }
}

async function askUrl(previous?: string): Promise<string> {
  return input({
    message: "Repository URL:",
    default: previous,
    validate: validateUrl,
  });
}

async function runAnalyze(url: string): Promise<void> {
  const format = await select({
    message: "Output format?",
    choices: [
      { name: "ARCHITECTURE.md and analysis.json", value: "both" },
      { name: "ARCHITECTURE.md only", value: "markdown" },
      { name: "analysis.json only", value: "json" },
    ],
  });

  const mode = await select({
    message: "Response mode?",
    choices: [
      {
        name: "Strict (evidence only)",
        value: "strict",
        description: "Unconfirmed routes and tech stack entries are removed",
      },
      {
        name: "Helpful (labelled guesses allowed)",
        value: "helpful",
        description: "The model may suggest likely flows, marked as such",
      },
    ],
  });

  const output = await input({
    message: "Output directory (blank for default):",
    default: "",
  });

  console.log("");
  await analyzeCommand(url, { format, mode, output: output.trim() || undefined });
}

async function runPack(url: string): Promise<void> {
  const save = await confirm({
    message: "Save the packed prompt to a file?",
    default: false,
  });

  let output: string | undefined;
  if (save) {
    output = await input({
      message: "Prompt file:",
      default: "./repowalk-prompt.txt",
    });
  }

  console.log("");
  await packCommand(url, { output });
}

export async function interactiveCommand(previousUrl?: string): Promise<void> {
  console.log(pc.cyan("\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━"));
  console.log(pc.bold("  🧭 repowalk - Interactive Mode"));
  console.log(pc.cyan("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n"));

  const url = await askUrl(previousUrl);

  const action = await select({
    message: "What would you like to do?",
    choices: [
      {
        name: "🧭 Generate architecture walkthrough",
        value: "analyze",
        description: "Fetch, pack, ask the model, validate and write the results",
      },
      {
        name: "📦 Preview packed context",
        value: "pack",
        description: "See what would be sent to the model, without calling it",
      },
      {
        name: "❌ Exit",
        value: "exit",
      },
    ],
  });

  switch (action) {
    case "analyze":
      await runAnalyze(url);
      break;
    case "pack":
      await runPack(url);
      break;
    case "exit":
      console.log(pc.dim("\nGoodbye!\n"));
      return;
  }

  console.log("");
  const continueSession = await confirm({
    message: "Do something else?",
    default: true,
  });

  if (continueSession) {
    await interactiveCommand(url);
  } else {
    console.log(pc.dim("\nGoodbye!\n"));
  }
}
