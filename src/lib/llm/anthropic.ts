/**
 * Anthropic Messages API client
 */

import Anthropic from "@anthropic-ai/sdk";
import { GenerationError, errorMessage } from "../workflow/errors.js";
import type {
  GenerationOptions,
  Provider,
  TextGenerationClient,
} from "./types.js";

export const ANTHROPIC_TIMEOUT_MS = 30_000;

export interface AnthropicClientOptions {
  /** Usually process.env.ANTHROPIC_API_KEY */
  apiKey?: string;
}

export class AnthropicClient implements TextGenerationClient {
  readonly provider: Provider = "anthropic";
  private readonly apiKey?: string;
  private client: Anthropic | null = null;

  constructor(options: AnthropicClientOptions = {}) {
    this.apiKey = options.apiKey;
  }

  private getClient(apiKey: string): Anthropic {
    if (!this.client) {
      // No SDK retries: a failure goes straight to the retry prompt
      this.client = new Anthropic({
        apiKey,
        timeout: ANTHROPIC_TIMEOUT_MS,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  private wrapError(error: unknown): GenerationError {
    if (error instanceof Anthropic.APIError) {
      return new GenerationError(
        this.provider,
        `API error (${error.status ?? "no status"}): ${error.message}`,
        { status: error.status, cause: error },
      );
    }
    return new GenerationError(
      this.provider,
      `Error making request: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  async generateText(
    prompt: string,
    options: GenerationOptions,
  ): Promise<string> {
    if (!this.apiKey) {
      throw new GenerationError(
        this.provider,
        "ANTHROPIC_API_KEY environment variable not set",
      );
    }

    const response = await this.getClient(this.apiKey)
      .messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        messages: [{ role: "user", content: prompt }],
      })
      .catch((error: unknown) => {
        throw this.wrapError(error);
      });

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") {
        text += block.text;
      }
    }

    const result = text.trim();
    if (!result) {
      throw new GenerationError(this.provider, "No content in API response");
    }
    return result;
  }
}
