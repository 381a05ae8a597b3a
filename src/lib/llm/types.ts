/**
 * Text-generation client contract
 */

export const PROVIDERS = ["anthropic", "ollama", "openai"] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface GenerationOptions {
  model: string;
  maxTokens: number;
}

/**
 * A backend that turns a prompt into text
 *
 * Implementations resolve with trimmed, non-empty text or reject with a
 * GenerationError.
 */
export interface TextGenerationClient {
  readonly provider: Provider;
  generateText(prompt: string, options: GenerationOptions): Promise<string>;
}
