/**
 * OpenAI-compatible chat completions client
 *
 * Works against api.openai.com and any server exposing the same
 * `/chat/completions` shape (LM Studio, vLLM, llama.cpp server, ...).
 */

import { z } from "zod";
import { GenerationError, errorMessage } from "../workflow/errors.js";
import type {
  GenerationOptions,
  Provider,
  TextGenerationClient,
} from "./types.js";

export const OPENAI_TIMEOUT_MS = 30_000;

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export interface OpenAIClientOptions {
  baseUrl: string;
  /** Omitted from the request when unset; local servers often need none */
  apiKey?: string;
}

export class OpenAIClient implements TextGenerationClient {
  readonly provider: Provider = "openai";
  private readonly endpoint: string;
  private readonly apiKey?: string;

  constructor(options: OpenAIClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    this.apiKey = options.apiKey;
  }

  async generateText(
    prompt: string,
    options: GenerationOptions,
  ): Promise<string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    // Reading the body runs under the same timeout as the request
    let res: Response;
    let body: string;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: options.model,
          max_tokens: options.maxTokens,
          messages: [{ role: "user", content: prompt }],
        }),
        signal: AbortSignal.timeout(OPENAI_TIMEOUT_MS),
      });
      body = await res.text();
    } catch (error) {
      throw new GenerationError(
        this.provider,
        `Error making request (${this.endpoint}): ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (!res.ok) {
      throw new GenerationError(
        this.provider,
        `API error (${res.status}): ${body}`,
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

    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new GenerationError(
        this.provider,
        `Error parsing response: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`,
      );
    }

    const result = parsed.data.choices[0]?.message.content?.trim() ?? "";
    if (!result) {
      throw new GenerationError(this.provider, "No content in API response");
    }
    return result;
  }
}
