import { describe, expect, it } from "vitest";
import OpenAI from "openai";
import { mapOpenAIError } from "./openai.js";
import { createProvider } from "./index.js";
import { PipelineError } from "../core/errors.js";

describe("mapOpenAIError", () => {
  it("passes caller aborts through", () => {
    const abort = new OpenAI.APIUserAbortError();

    expect(mapOpenAIError(abort)).toBe(abort);
  });

  it("maps transport timeouts to timeout", () => {
    expect(mapOpenAIError(new OpenAI.APIConnectionTimeoutError())).toEqual(
      new PipelineError("timeout", "OpenAI request timed out")
    );
  });

  it("maps connection failures to model-unavailable", () => {
    const mapped = mapOpenAIError(new OpenAI.APIConnectionError({ message: "socket hang up" }));

    expect(mapped).toBeInstanceOf(PipelineError);
    expect(mapped).toMatchObject({ kind: "model-unavailable", message: "OpenAI unreachable: socket hang up" });
  });

  it("maps API errors to model-unavailable with the status", () => {
    const mapped = mapOpenAIError(new OpenAI.APIError(500, { message: "boom" }, undefined, undefined));

    expect(mapped).toMatchObject({ kind: "model-unavailable", message: "OpenAI error 500: 500 boom" });
  });

  it("leaves unrelated errors alone", () => {
    const err = new RangeError("nope");

    expect(mapOpenAIError(err)).toBe(err);
  });
});

describe("createProvider", () => {
  it("builds the configured backend", () => {
    const ollama = createProvider({ kind: "ollama", host: "http://localhost:11434", model: "m1", timeoutMs: 1000 });
    const openai = createProvider({ kind: "openai", apiKey: "test-secret", model: "m2", timeoutMs: 1000 });

    expect([ollama.name, ollama.model]).toEqual(["ollama", "m1"]);
    expect([openai.name, openai.model]).toEqual(["openai", "m2"]);
  });
});
