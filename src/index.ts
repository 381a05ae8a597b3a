/**
 * gitscribe - AI-drafted commit messages and pull requests
 *
 * The session engine is usable without the CLI: build a session, then drive
 * it with runSession() and your own presenter.
 */

export { commitCommand, runCommit } from "./commands/commit.js";
export type { CommitOptions, CommitDependencies } from "./commands/commit.js";
export { configCommand, runConfigWizard } from "./commands/config.js";

export {
  ConfigStore,
  ConfigSchema,
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_URL,
  DEFAULT_OPENAI_URL,
  defaultConfig,
  defaultConfigPath,
  resolveEffectiveConfig,
  getCommitModel,
  getPRModel,
} from "./lib/config.js";
export type { AppConfig, ConfigOverrides } from "./lib/config.js";

// Workflow exports
export { transition, commitMessageRequest } from "./lib/workflow/engine.js";
export {
  createSession,
  choicesFor,
  cursorFor,
  isTerminal,
  parsePRContent,
  summarize,
} from "./lib/workflow/session.js";
export { executeEffect, runSession } from "./lib/workflow/runner.js";
export type {
  SessionCollaborators,
  SessionPresenter,
  RunSessionOptions,
} from "./lib/workflow/runner.js";
export { InquirerPresenter } from "./lib/workflow/presenter.js";
export {
  COMMIT_TYPES,
  DIFF_LINE_LIMIT,
  PROTECTED_BRANCHES,
} from "./lib/workflow/types.js";
export type {
  CommitType,
  Effect,
  OutcomeEvent,
  Phase,
  PhaseState,
  Session,
  SessionEvent,
  SessionInit,
  UserEvent,
} from "./lib/workflow/types.js";
export {
  classifyFailure,
  ConfigError,
  ForgeError,
  GenerationError,
  GitCommandError,
  isMissingUpstream,
} from "./lib/workflow/errors.js";
export { createLogger, createTestLogger } from "./lib/workflow/logger.js";
export type { Logger, LoggerOptions } from "./lib/workflow/logger.js";

// Git and forge
export { GitRunner } from "./lib/git/git-runner.js";
export { GitHubClient } from "./lib/git/github.js";
export {
  generateDefaultBranchName,
  validateBranchName,
} from "./lib/git/branch-name.js";
export type { ForgeClient, VersionControlRunner } from "./lib/git/types.js";

// Text generation
export {
  AnthropicClient,
  OllamaClient,
  OpenAIClient,
  createGenerationClient,
  PROVIDERS,
} from "./lib/llm/index.js";
export type {
  GenerationOptions,
  Provider,
  TextGenerationClient,
} from "./lib/llm/index.js";
