import { z } from "zod";
import { PipelineError, errorMessage } from "../core/errors.js";
import type { GenerationParams, ModelPrompt, ModelProvider } from "./types.js";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

export interface OllamaProviderOptions {
  host: string;
  model: string;
  timeoutMs: number;
}

/**
 * Locally hosted model through Ollama's /api/chat endpoint
 */
export class OllamaProvider implements ModelProvider {
  readonly name = "ollama";
  readonly model: string;
  private readonly host: string;
  private readonly timeoutMs: number;

  constructor(options: OllamaProviderOptions) {
    this.host = options.host.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async generate(prompt: ModelPrompt, params: GenerationParams): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = params.signal ? AbortSignal.any([params.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await fetch(`${this.host}/api/chat`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          stream: false,
          format: "json",
          options: {
            temperature: params.temperature,
            num_predict: params.maxTokens,
            stop: params.stop,
          },
        }),
        signal,
      });
    } catch (err: unknown) {
      if (params.signal?.aborted) throw err;
      if (timeout.aborted) {
        throw new PipelineError("timeout", `Ollama did not answer within ${this.timeoutMs}ms`);
      }
      throw new PipelineError("model-unavailable", `Ollama unreachable at ${this.host}: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new PipelineError(
        "model-unavailable",
        `Ollama error ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`
      );
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err: unknown) {
      if (params.signal?.aborted) throw err;
      if (timeout.aborted) {
        throw new PipelineError("timeout", `Ollama did not answer within ${this.timeoutMs}ms`);
      }
      throw new PipelineError("model-unavailable", `Ollama returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PipelineError("model-unavailable", "Ollama returned an unexpected response shape");
    }
    return parsed.data.message.content;
  }
}
