export interface ModelPrompt {
  system: string;
  user: string;
}

export interface GenerationParams {
  /** Target output length in tokens */
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  /** Aborting interrupts the in-flight request */
  signal?: AbortSignal;
}

/**
 * One interchangeable model backend.
 * Implementations do not retry; they fail with `model-unavailable` or `timeout`.
 */
export interface ModelProvider {
  readonly name: string;
  readonly model: string;
  generate(prompt: ModelPrompt, params: GenerationParams): Promise<string>;
}
