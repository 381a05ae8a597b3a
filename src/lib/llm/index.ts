/**
 * Text-generation backends
 */

import type { AppConfig } from "../config.js";
import { AnthropicClient } from "./anthropic.js";
import { OllamaClient } from "./ollama.js";
import { OpenAIClient } from "./openai.js";
import type { TextGenerationClient } from "./types.js";

export * from "./types.js";
export * from "./prompts.js";
export { AnthropicClient } from "./anthropic.js";
export { OllamaClient } from "./ollama.js";
export { OpenAIClient } from "./openai.js";

/**
 * Build the client for the configured provider
 *
 * API keys come from the environment; for OpenAI a configured key wins.
 */
export function createGenerationClient(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env,
): TextGenerationClient {
  switch (config.provider) {
    case "ollama":
      return new OllamaClient({ baseUrl: config.ollama_url });
    case "openai":
      return new OpenAIClient({
        baseUrl: config.openai_url,
        apiKey: config.openai_api_key || env.OPENAI_API_KEY,
      });
    case "anthropic":
      return new AnthropicClient({ apiKey: env.ANTHROPIC_API_KEY });
  }
}
