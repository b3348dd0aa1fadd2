import type { AnalysisResult } from "../types/index.js";
import type { GenerationParams, ModelPrompt, ModelProvider } from "../providers/types.js";
import { PipelineError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { buildRepairPrompt } from "../core/prompt.js";
import { validateAnalysis, type AnalysisExpectations } from "./analysis.js";

export interface ValidatedGeneration {
  result: AnalysisResult;
  modelCalls: number;
  repaired: boolean;
}

export interface RepairContext extends AnalysisExpectations {
  logger?: Logger;
  /** Called after each provider call; lets the caller count calls that end in failure */
  onModelCall?: () => void;
}

/**
 * Generate, validate, and repair at most once.
 * Provider failures propagate unchanged.
 */
export async function generateValidatedAnalysis(
  provider: ModelProvider,
  prompt: ModelPrompt,
  params: GenerationParams,
  context: RepairContext
): Promise<ValidatedGeneration> {
  const logger = context.logger ?? silentLogger;
  const expectations: AnalysisExpectations = { knownPaths: context.knownPaths, repoName: context.repoName };

  const first = await provider.generate(prompt, params);
  context.onModelCall?.();
  const firstCheck = validateAnalysis(first, expectations);
  if (firstCheck.ok) {
    return { result: firstCheck.value, modelCalls: 1, repaired: false };
  }

  logger.warn(`Model response rejected (${firstCheck.defects.length} defects), requesting one repair`);
  for (const defect of firstCheck.defects) logger.debug(defect);

  const second = await provider.generate(buildRepairPrompt(prompt, first, firstCheck.defects), params);
  context.onModelCall?.();
  const secondCheck = validateAnalysis(second, expectations);
  if (secondCheck.ok) {
    return { result: secondCheck.value, modelCalls: 2, repaired: true };
  }

  throw new PipelineError(
    "schema-invalid-after-repair",
    `Model response still invalid after one repair (${secondCheck.defects.length} defects)`,
    secondCheck.defects
  );
}
