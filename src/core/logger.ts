import pc from "picocolors";
import type { PipelineStage } from "../types/index.js";

export interface Logger {
  stage(stage: PipelineStage, detail?: string): void;
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export const silentLogger: Logger = {
  stage() {},
  info() {},
  warn() {},
  debug() {},
};

const STAGE_ICONS: Record<PipelineStage, string> = {
  fetching: "📥",
  selecting: "🎯",
  packing: "📦",
  prompting: "🤖",
  validating: "🔎",
  done: "✅",
  failed: "❌",
};

/**
 * Console logger in the CLI's style. Writes to stderr so stdout stays
 * clean for JSON output.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    stage(stage, detail) {
      const label = stage === "failed" ? pc.red(stage) : pc.cyan(stage);
      console.error(`${STAGE_ICONS[stage]} ${label}${detail ? pc.dim(` ${detail}`) : ""}`);
    },
    info(message) {
      console.error(`  ${message}`);
    },
    warn(message) {
      console.error(pc.yellow(`  ⚠️  ${message}`));
    },
    debug(message) {
      if (options.verbose) console.error(pc.dim(`  ${message}`));
    },
  };
}
