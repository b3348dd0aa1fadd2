import { z } from "zod";
import pc from "picocolors";
import { ConfigError, loadConfig, type ConfigOverrides, type RepowalkConfig } from "../core/config.js";

/**
 * Flags shared by `analyze` and `pack`, as commander hands them over
 */
export interface RunFlags {
  provider?: string;
  model?: string;
  temperature?: string;
  budget?: string;
  timeout?: string;
  mode?: string;
}

const flagSchema = z.object({
  provider: z.enum(["ollama", "openai"]).optional(),
  model: z.string().trim().min(1).optional(),
  temperature: z.coerce.number().min(0).max(2).optional(),
  budget: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  mode: z.enum(["strict", "helpful"]).optional(),
});

export function parseOverrides(flags: RunFlags): ConfigOverrides {
  const parsed = flagSchema.safeParse(flags);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid option: ${details}`);
  }

  const { provider, model, temperature, budget, timeout, mode } = parsed.data;
  return {
    provider,
    model,
    temperature,
    budgetChars: budget,
    timeoutMs: timeout,
    responseMode: mode,
  };
}

export type OutputFormat = "json" | "markdown" | "both";

export function parseFormat(value: string | undefined): OutputFormat {
  const format = value ?? "both";
  if (format === "json" || format === "markdown" || format === "both") return format;
  throw new ConfigError(`Invalid option: --format must be json, markdown or both (got "${format}")`);
}

/**
 * Resolve configuration for a command. On invalid input prints the
 * problem, sets exit code 2 and returns null.
 */
export function loadCommandConfig(flags: RunFlags & { format?: string }): { config: RepowalkConfig; format: OutputFormat } | null {
  try {
    return {
      format: parseFormat(flags.format),
      config: loadConfig(process.env, parseOverrides(flags)),
    };
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(pc.red(`\n❌ ${err.message}\n`));
      process.exitCode = 2;
      return null;
    }
    throw err;
  }
}
