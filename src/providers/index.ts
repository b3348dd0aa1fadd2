import type { ProviderConfig } from "../core/config.js";
import { OllamaProvider } from "./ollama.js";
import { OpenAIProvider } from "./openai.js";
import type { ModelProvider } from "./types.js";

export type { GenerationParams, ModelPrompt, ModelProvider } from "./types.js";
export { OllamaProvider } from "./ollama.js";
export { OpenAIProvider } from "./openai.js";

/**
 * Pick the backend once, from configuration.
 * Nothing downstream looks at which one it got.
 */
export function createProvider(config: ProviderConfig): ModelProvider {
  switch (config.kind) {
    case "openai":
      return new OpenAIProvider({
        apiKey: config.apiKey,
        model: config.model,
        baseURL: config.baseURL,
        timeoutMs: config.timeoutMs,
      });
    case "ollama":
      return new OllamaProvider({
        host: config.host,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
  }
}
