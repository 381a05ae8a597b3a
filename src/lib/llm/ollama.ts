/**
 * Ollama chat client (non-streaming `/api/chat`)
 */

import { z } from "zod";
import { GenerationError, errorMessage } from "../workflow/errors.js";
import type {
  GenerationOptions,
  Provider,
  TextGenerationClient,
} from "./types.js";

/** Longer budget for local models */
export const OLLAMA_TIMEOUT_MS = 60_000;

const OllamaResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
});

export interface OllamaClientOptions {
  baseUrl: string;
}

export class OllamaClient implements TextGenerationClient {
  readonly provider: Provider = "ollama";
  private readonly endpoint: string;

  constructor(options: OllamaClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/api/chat`;
  }

  // Ollama has no max-tokens field on /api/chat; maxTokens is ignored
  async generateText(
    prompt: string,
    options: GenerationOptions,
  ): Promise<string> {
    // Reading the body runs under the same timeout as the request
    let res: Response;
    let body: string;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: options.model,
          messages: [{ role: "user", content: prompt }],
          stream: false,
        }),
        signal: AbortSignal.timeout(OLLAMA_TIMEOUT_MS),
      });
      body = await res.text();
    } catch (error) {
      throw new GenerationError(
        this.provider,
        `Error making request to Ollama (${this.endpoint}): ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (!res.ok) {
      throw new GenerationError(
        this.provider,
        `Ollama API error (${res.status}): ${body}`,
        { status: res.status },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new GenerationError(
        this.provider,
        `Error parsing response: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const parsed = OllamaResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GenerationError(
        this.provider,
        `Error parsing response: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`,
      );
    }

    const result = parsed.data.message.content.trim();
    if (!result) {
      throw new GenerationError(
        this.provider,
        "No content in Ollama API response",
      );
    }
    return result;
  }
}
