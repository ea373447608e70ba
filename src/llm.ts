import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { NoObjectGeneratedError, generateObject, generateText, type LanguageModel } from "ai";
import type { ResearchConfig } from "./config.js";
import { MalformedModelOutput } from "./errors.js";

// ============================================================================
// Language model capability
// ============================================================================

export interface ModelRequest {
  system: string;
  prompt: string;
}

/**
 * The two ways the research loop talks to a model: JSON-constrained calls for
 * queries, free text for summaries.
 */
export interface LanguageModelClient {
  /** Resolves with the parsed JSON value; rejects with MalformedModelOutput when it does not parse. */
  generateJson(request: ModelRequest): Promise<unknown>;
  generateText(request: ModelRequest): Promise<string>;
}

export class AiSdkModelClient implements LanguageModelClient {
  constructor(private readonly model: LanguageModel) {}

  async generateJson({ system, prompt }: ModelRequest): Promise<unknown> {
    try {
      const { object } = await generateObject({
        model: this.model,
        output: "no-schema",
        system,
        prompt,
        temperature: 0,
      });
      return object;
    } catch (error) {
      if (NoObjectGeneratedError.isInstance(error)) {
        throw new MalformedModelOutput(`Model did not return valid JSON: ${error.text ?? "<empty>"}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  async generateText({ system, prompt }: ModelRequest): Promise<string> {
    const { text } = await generateText({ model: this.model, system, prompt, temperature: 0 });
    return text;
  }
}

/** Ollama serves an OpenAI-compatible API under /v1. */
export function createOllamaClient(config: Pick<ResearchConfig, "ollamaBaseUrl" | "modelName">): LanguageModelClient {
  const baseURL = new URL("v1", config.ollamaBaseUrl.endsWith("/") ? config.ollamaBaseUrl : `${config.ollamaBaseUrl}/`);
  const ollama = createOpenAICompatible({ name: "ollama", baseURL: baseURL.toString() });
  return new AiSdkModelClient(ollama.chatModel(config.modelName));
}
