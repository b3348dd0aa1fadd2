import OpenAI from "openai";
import { PipelineError } from "../core/errors.js";
import type { GenerationParams, ModelPrompt, ModelProvider } from "./types.js";

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** OpenAI-compatible endpoint override */
  baseURL?: string;
}

/**
 * Hosted model through the OpenAI chat completions API
 */
export class OpenAIProvider implements ModelProvider {
  readonly name = "openai";
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIProviderOptions, client?: OpenAI) {
    this.model = options.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        // Retry policy belongs to the pipeline
        maxRetries: 0,
      });
  }

  async generate(prompt: ModelPrompt, params: GenerationParams): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          stop: params.stop,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
        },
        { signal: params.signal }
      );
      return completion.choices[0]?.message?.content ?? "";
    } catch (err: unknown) {
      throw mapOpenAIError(err);
    }
  }
}

/**
 * Translate SDK failures into the pipeline taxonomy; caller aborts pass through
 */
export function mapOpenAIError(err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) return err;
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new PipelineError("timeout", "OpenAI request timed out");
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new PipelineError("model-unavailable", `OpenAI unreachable: ${err.message}`);
  }
  if (err instanceof OpenAI.APIError) {
    return new PipelineError("model-unavailable", `OpenAI error ${err.status ?? "unknown"}: ${err.message}`);
  }
  return err;
}
