/**
 * gitscribe (default command) - interactive commit and pull request session
 *
 * Loads the config, inspects the repository, then hands a session to the
 * runner. With --pr the commit steps are skipped and a PR is drafted from
 * the commits already on the branch.
 */

import {
  ConfigStore,
  getCommitModel,
  getPRModel,
  resolveEffectiveConfig,
  type AppConfig,
  type ConfigOverrides,
} from "../lib/config.js";
import { generateDefaultBranchName } from "../lib/git/branch-name.js";
import { GitHubClient } from "../lib/git/github.js";
import { GitRunner } from "../lib/git/git-runner.js";
import type { ForgeClient, VersionControlRunner } from "../lib/git/types.js";
import { createGenerationClient } from "../lib/llm/index.js";
import type { TextGenerationClient } from "../lib/llm/types.js";
import { printStatus } from "../lib/cli-ui.js";
import { getNonInteractiveReason } from "../lib/tty.js";
import { errorMessage } from "../lib/workflow/errors.js";
import { createLogger, type Logger } from "../lib/workflow/logger.js";
import { InquirerPresenter } from "../lib/workflow/presenter.js";
import { runSession, type SessionPresenter } from "../lib/workflow/runner.js";
import { createSession, summarize } from "../lib/workflow/session.js";
import type { Session } from "../lib/workflow/types.js";

export interface CommitOptions extends ConfigOverrides {
  pr?: boolean;
  verbose?: boolean;
}

/**
 * Everything the command talks to, injectable for tests
 */
export interface CommitDependencies {
  store: ConfigStore;
  vcs: VersionControlRunner;
  forge: ForgeClient;
  presenter: SessionPresenter;
  createGenerator: (config: AppConfig) => TextGenerationClient;
  logger: Logger;
  now?: Date;
}

/**
 * Load the config file, writing the defaults on first run
 */
async function loadConfig(
  store: ConfigStore,
  logger: Logger,
): Promise<AppConfig> {
  const config = await store.load();
  if (!(await store.exists())) {
    try {
      await store.save(config);
      logger.debug(`Wrote default config to ${store.path}`);
    } catch (error) {
      logger.warn("Could not save default config", error);
    }
  }
  return config;
}

/**
 * Build the initial session from the repository state.
 * Returns an exit code instead when there is nothing to run.
 */
function prepareSession(
  options: CommitOptions,
  deps: CommitDependencies,
): Session | number {
  const { vcs, forge, logger } = deps;

  if (options.pr) {
    let branch: string;
    try {
      branch = vcs.currentBranch();
    } catch (error) {
      logger.error(`Error getting current branch: ${errorMessage(error)}`);
      return 1;
    }

    try {
      forge.isSupportedForgeOrigin();
    } catch (error) {
      logger.error(`Error: ${errorMessage(error)}`);
      return 1;
    }

    if (forge.hasExistingPR(branch)) {
      logger.error(`A pull request already exists for branch '${branch}'.`);
      return 1;
    }

    return createSession({
      diff: "",
      needsStaging: false,
      currentBranch: branch,
      defaultBranchName: "",
      mode: "pr_only",
    });
  }

  let diff: string;
  try {
    diff = vcs.diff();
  } catch (error) {
    logger.error(`Error getting git diff: ${errorMessage(error)}`);
    return 1;
  }

  let needsStaging = false;
  if (diff === "") {
    let hasChanges: boolean;
    try {
      hasChanges = vcs.hasAnyChanges();
    } catch (error) {
      logger.error(`Error checking git status: ${errorMessage(error)}`);
      return 1;
    }
    if (!hasChanges) {
      console.log("No changes to commit.");
      return 0;
    }
    needsStaging = true;
  }

  let branch: string;
  try {
    branch = vcs.currentBranch();
  } catch (error) {
    logger.error(`Error getting current branch: ${errorMessage(error)}`);
    return 1;
  }

  return createSession({
    diff,
    needsStaging,
    currentBranch: branch,
    defaultBranchName: generateDefaultBranchName(vcs.userName(), deps.now),
  });
}

/**
 * Run the whole command and return the process exit code
 */
export async function runCommit(
  options: CommitOptions,
  deps: CommitDependencies,
): Promise<number> {
  const { logger } = deps;

  let config: AppConfig;
  try {
    config = resolveEffectiveConfig(
      await loadConfig(deps.store, logger),
      options,
    );
  } catch (error) {
    logger.error(`Error loading config: ${errorMessage(error)}`);
    return 1;
  }

  logger.debug(
    `Provider ${config.provider}, commit model ${getCommitModel(config)}, PR model ${getPRModel(config)}`,
  );

  const initial = prepareSession(options, deps);
  if (typeof initial === "number") {
    return initial;
  }

  const final = await runSession(initial, {
    collaborators: {
      vcs: deps.vcs,
      forge: deps.forge,
      generator: deps.createGenerator(config),
      models: { commit: getCommitModel(config), pr: getPRModel(config) },
    },
    presenter: deps.presenter,
    logger,
  });

  if (final.state.phase === "failed") {
    logger.error(`Error: ${final.state.message}`);
    return 1;
  }

  const summary = summarize(final);
  if (summary) {
    printStatus("success", summary);
  }
  if (final.completion.prUrl) {
    printStatus("info", final.completion.prUrl);
  }
  return 0;
}

export async function commitCommand(options: CommitOptions): Promise<void> {
  const logger = createLogger({ verbose: options.verbose });

  const reason = getNonInteractiveReason();
  if (reason) {
    logger.error(`gitscribe needs an interactive terminal: ${reason}`);
    process.exitCode = 1;
    return;
  }

  process.exitCode = await runCommit(options, {
    store: new ConfigStore(),
    vcs: new GitRunner(),
    forge: new GitHubClient(),
    presenter: new InquirerPresenter(),
    createGenerator: (config) => createGenerationClient(config),
    logger,
  });
}
