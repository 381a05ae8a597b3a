/**
 * gitscribe config - interactive configuration
 *
 * Walks through provider, models and endpoint, shows a review table and
 * saves to ~/.config/gitscribe/config.json on confirmation.
 */

import inquirer from "inquirer";
import { colors, ui } from "../lib/cli-ui.js";
import {
  ConfigStore,
  DEFAULT_MODELS,
  getCommitModel,
  getPRModel,
  type AppConfig,
} from "../lib/config.js";
import { PROVIDERS, type Provider } from "../lib/llm/types.js";
import { errorMessage } from "../lib/workflow/errors.js";
import { createLogger, type Logger } from "../lib/workflow/logger.js";
import { isPromptExit } from "../lib/workflow/presenter.js";

const PROVIDER_LABELS: Record<Provider, string> = {
  anthropic: "Anthropic (requires ANTHROPIC_API_KEY)",
  ollama: "Ollama (local models)",
  openai: "OpenAI-compatible (uses OPENAI_API_KEY)",
};

async function askText(message: string, current: string): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    { type: "input", name: "value", message, default: current },
  ]);
  return value.trim() || current;
}

/**
 * Suggest a model for the chosen provider; a previous provider's default is
 * swapped for the new provider's.
 */
function suggestedModel(model: string, provider: Provider): string {
  const isOtherDefault = PROVIDERS.some(
    (p) => p !== provider && DEFAULT_MODELS[p] === model,
  );
  return isOtherDefault ? DEFAULT_MODELS[provider] : model;
}

/**
 * Ask for every setting, starting from `current`
 */
export async function promptForConfig(current: AppConfig): Promise<AppConfig> {
  const { provider } = await inquirer.prompt<{ provider: Provider }>([
    {
      type: "list",
      name: "provider",
      message: "Select provider:",
      choices: PROVIDERS.map((value) => ({
        name: PROVIDER_LABELS[value],
        value,
      })),
      default: current.provider,
    },
  ]);

  const commitModel = await askText(
    "Commit message model:",
    suggestedModel(getCommitModel(current), provider),
  );
  const prModel = await askText(
    "PR description model:",
    suggestedModel(getPRModel(current), provider),
  );

  let ollamaUrl = current.ollama_url;
  if (provider === "ollama") {
    ollamaUrl = await askText("Ollama URL:", current.ollama_url);
  }

  let openaiUrl = current.openai_url;
  if (provider === "openai") {
    openaiUrl = await askText("OpenAI-compatible base URL:", current.openai_url);
  }

  return {
    ...current,
    provider,
    // Kept equal to the commit model so older files still read sensibly
    model: commitModel,
    commit_model: commitModel,
    pr_model: prModel,
    ollama_url: ollamaUrl,
    openai_url: openaiUrl,
  };
}

/**
 * Review table rows for a config
 */
export function describeConfig(config: AppConfig, path: string): Record<string, string> {
  const rows: Record<string, string> = {
    Provider: config.provider,
    "Commit model": getCommitModel(config),
    "PR model": getPRModel(config),
  };
  if (config.provider === "ollama") {
    rows["Ollama URL"] = config.ollama_url;
  }
  if (config.provider === "openai") {
    rows["OpenAI URL"] = config.openai_url;
  }
  rows["Config file"] = path;
  return rows;
}

/**
 * Run the wizard and return the process exit code
 */
export async function runConfigWizard(
  store: ConfigStore,
  logger: Logger,
): Promise<number> {
  let current: AppConfig;
  try {
    current = await store.load();
  } catch (error) {
    logger.error(`Error loading config: ${errorMessage(error)}`);
    return 1;
  }

  try {
    console.log(colors.header("\ngitscribe configuration\n"));
    const next = await promptForConfig(current);

    console.log(ui.keyValueTable(describeConfig(next, store.path)));

    const { save } = await inquirer.prompt<{ save: boolean }>([
      {
        type: "confirm",
        name: "save",
        message: "Save this configuration?",
        default: true,
      },
    ]);
    if (!save) {
      console.log(colors.muted("Configuration not saved."));
      return 0;
    }

    try {
      await store.save(next);
    } catch (error) {
      logger.error(`Error saving configuration: ${errorMessage(error)}`);
      return 1;
    }
  } catch (error) {
    if (isPromptExit(error)) {
      console.log(colors.muted("Configuration not saved."));
      return 0;
    }
    throw error;
  }

  ui.printStatus("success", "Configuration saved successfully!");
  return 0;
}

export async function configCommand(options: { verbose?: boolean } = {}): Promise<void> {
  const logger = createLogger({ verbose: options.verbose });
  process.exitCode = await runConfigWizard(new ConfigStore(), logger);
}
