/**
 * Command-line surface: flags, subcommands and help text
 */

import { Command } from "commander";
import type { CommitOptions } from "./commands/commit.js";
import { banner } from "./lib/cli-ui.js";

export interface ProgramActions {
  commit(options: CommitOptions): Promise<void>;
  config(options: { verbose?: boolean }): Promise<void>;
}

export function createProgram(actions: ProgramActions, version: string): Command {
  const program = new Command();

  program
    .name("gitscribe")
    .description("AI-powered git commit message and pull request generator")
    .version(version)
    // Options after a subcommand name belong to that subcommand
    .enablePositionalOptions()
    .option("-m, --model <model>", "Model for both commit and PR (overrides config)")
    .option(
      "--commit-model <model>",
      "Model for commit message generation (overrides config and -m)",
    )
    .option(
      "--pr-model <model>",
      "Model for PR description generation (overrides config and -m)",
    )
    .option(
      "-p, --provider <provider>",
      "LLM provider: anthropic, ollama or openai (overrides config)",
    )
    .option("--ollama-url <url>", "Ollama server URL (overrides config)")
    .option("--openai-url <url>", "OpenAI-compatible base URL (overrides config)")
    .option("--openai-key <key>", "API key for the OpenAI-compatible provider")
    .option("--pr", "Draft a PR from existing commits (no commit required)")
    .option("--verbose", "Show debug output")
    .option("--no-color", "Disable colored output")
    .addHelpText(
      "after",
      `
Examples:
  $ gitscribe                      Draft a commit message with the saved config
  $ gitscribe -p ollama            Use a local Ollama model
  $ gitscribe --commit-model claude-haiku-4-5 --pr-model claude-sonnet-4-5-20250929
  $ gitscribe --pr                 Open a PR for the current branch
  $ gitscribe config               Set provider, models and endpoints

Config is stored in ~/.config/gitscribe/config.json.
Anthropic needs ANTHROPIC_API_KEY; the OpenAI-compatible provider reads OPENAI_API_KEY.`,
    )
    .action(async () => {
      await actions.commit(program.opts<CommitOptions>());
    });

  const config = program
    .command("config")
    .description("Set provider, models and endpoints interactively")
    .option("--verbose", "Show debug output")
    .option("--no-color", "Disable colored output")
    .action(async () => {
      // Accepted on either side: `gitscribe --verbose config` or `gitscribe config --verbose`
      const verbose =
        config.opts().verbose === true || program.opts().verbose === true;
      await actions.config({ verbose });
    });

  program
    .command("help")
    .description("Show this help message")
    .action(() => {
      console.log(banner());
      program.help();
    });

  return program;
}
