/**
 * gitscribe configuration management
 *
 * User-level settings live in ~/.config/gitscribe/config.json. Missing
 * fields are filled with defaults on load; CLI flags are layered on top by
 * resolveEffectiveConfig().
 *
 * Settings hierarchy:
 * 1. Built-in defaults
 * 2. Config file
 * 3. CLI flags (highest priority; purpose-specific model flags beat -m)
 *
 * @example
 * ```typescript
 * const store = new ConfigStore();
 * const config = resolveEffectiveConfig(await store.load(), { provider: "ollama" });
 * getCommitModel(config); // "llama3.2"
 * ```
 */

import { access, mkdir, readFile, writeFile } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";
import { z } from "zod";
import { PROVIDERS, type Provider } from "./llm/types.js";
import { ConfigError, errorMessage } from "./workflow/errors.js";

export const DEFAULT_MODELS: Record<Provider, string> = {
  anthropic: "claude-sonnet-4-5-20250929",
  ollama: "llama3.2",
  openai: "gpt-4o-mini",
};

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_OPENAI_URL = "https://api.openai.com/v1";

export const ProviderSchema = z.enum(PROVIDERS);

/**
 * On-disk shape. Blank strings count as unset.
 */
const StoredConfigSchema = z.object({
  provider: ProviderSchema.default("anthropic"),
  model: z.string().default(""),
  commit_model: z.string().optional(),
  pr_model: z.string().optional(),
  ollama_url: z.string().default(""),
  openai_url: z.string().default(""),
  openai_api_key: z.string().optional(),
});

export const ConfigSchema = StoredConfigSchema.transform((stored) => ({
  ...stored,
  model: stored.model || DEFAULT_MODELS[stored.provider],
  commit_model: stored.commit_model || undefined,
  pr_model: stored.pr_model || undefined,
  ollama_url: stored.ollama_url || DEFAULT_OLLAMA_URL,
  openai_url: stored.openai_url || DEFAULT_OPENAI_URL,
  openai_api_key: stored.openai_api_key || undefined,
}));

export type AppConfig = z.output<typeof ConfigSchema>;

export function defaultConfig(): AppConfig {
  return ConfigSchema.parse({});
}

export function defaultConfigPath(): string {
  return join(homedir(), ".config", "gitscribe", "config.json");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads and writes the config file
 */
export class ConfigStore {
  readonly path: string;

  constructor(path: string = defaultConfigPath()) {
    this.path = path;
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load the config, or the defaults when the file does not exist
   *
   * @throws ConfigError when the file cannot be read or does not validate
   */
  async load(): Promise<AppConfig> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return defaultConfig();
      }
      throw new ConfigError(
        `failed to read config file: ${errorMessage(error)}`,
        error,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `failed to parse config file: ${errorMessage(error)}`,
        error,
      );
    }

    const parsed = ConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "config";
      throw new ConfigError(
        `failed to parse config file: ${where}: ${issue?.message ?? "invalid"}`,
      );
    }
    return parsed.data;
  }

  /**
   * @throws ConfigError when the directory or file cannot be written
   */
  async save(config: AppConfig): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
    } catch (error) {
      throw new ConfigError(
        `failed to write config file: ${errorMessage(error)}`,
        error,
      );
    }
  }
}

/**
 * Values given on the command line
 */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
  commitModel?: string;
  prModel?: string;
  ollamaUrl?: string;
  openaiUrl?: string;
  openaiKey?: string;
}

/**
 * Layer CLI flags over the loaded config
 *
 * Switching provider by flag moves every model left at the old provider's
 * default (model, commit and PR) to the new provider's default.
 *
 * @throws ConfigError for an unknown provider name
 */
export function resolveEffectiveConfig(
  config: AppConfig,
  overrides: ConfigOverrides,
): AppConfig {
  const effective: AppConfig = { ...config };

  if (overrides.provider) {
    const provider = ProviderSchema.safeParse(overrides.provider);
    if (!provider.success) {
      throw new ConfigError(
        `unknown provider "${overrides.provider}" (expected one of: ${PROVIDERS.join(", ")})`,
      );
    }
    if (provider.data !== config.provider) {
      const previousDefault = DEFAULT_MODELS[config.provider];
      const nextDefault = DEFAULT_MODELS[provider.data];
      if (config.model === previousDefault) {
        effective.model = nextDefault;
      }
      if (config.commit_model === previousDefault) {
        effective.commit_model = nextDefault;
      }
      if (config.pr_model === previousDefault) {
        effective.pr_model = nextDefault;
      }
    }
    effective.provider = provider.data;
  }

  if (overrides.model) {
    effective.model = overrides.model;
  }
  if (overrides.commitModel) {
    effective.commit_model = overrides.commitModel;
  }
  if (overrides.prModel) {
    effective.pr_model = overrides.prModel;
  }
  if (overrides.ollamaUrl) {
    effective.ollama_url = overrides.ollamaUrl;
  }
  if (overrides.openaiUrl) {
    effective.openai_url = overrides.openaiUrl;
  }
  if (overrides.openaiKey) {
    effective.openai_api_key = overrides.openaiKey;
  }

  return effective;
}

/**
 * Model for commit messages (falls back to `model`)
 */
export function getCommitModel(config: AppConfig): string {
  return config.commit_model || config.model;
}

/**
 * Model for PR descriptions (falls back to `model`)
 */
export function getPRModel(config: AppConfig): string {
  return config.pr_model || config.model;
}
