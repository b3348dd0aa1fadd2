import type { PipelineErrorKind } from "../types/index.js";

/**
 * Classified, terminal failure of a pipeline run.
 * `kind` is stable and safe to map onto transport status codes.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly defects: string[];

  constructor(kind: PipelineErrorKind, message: string, defects: string[] = []) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.defects = defects;
  }
}

export interface ErrorPayload {
  kind: PipelineErrorKind;
  message: string;
  defects?: string[];
}

export function toErrorPayload(error: PipelineError): ErrorPayload {
  return error.defects.length > 0
    ? { kind: error.kind, message: error.message, defects: error.defects }
    : { kind: error.kind, message: error.message };
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "APIUserAbortError");
}

/**
 * Throw a `timeout` error if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineError("timeout", `Pipeline aborted during ${stage}: ${describeAbortReason(signal)}`);
  }
}

export function describeAbortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string") return reason;
  return "cancelled";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
