/**
 * Session runner
 *
 * Drives a session to a terminal phase: while an effect is pending it is
 * executed against the collaborators and its outcome fed back into the
 * engine; otherwise the presenter is asked for the next user event.
 *
 * Failures never escape executeEffect(). They come back as outcome events,
 * classified as retryable (generation) or fatal (everything else).
 *
 * @example
 * ```typescript
 * const final = await runSession(createSession(init), {
 *   collaborators: { vcs, forge, generator, models: { commit, pr } },
 *   presenter: new InquirerPresenter(),
 *   logger: createLogger({ verbose }),
 * });
 * console.log(summarize(final));
 * ```
 */

import type { ForgeClient, VersionControlRunner } from "../git/types.js";
import {
  COMMIT_MAX_TOKENS,
  PR_MAX_TOKENS,
  buildCommitPrompt,
  buildPRPrompt,
} from "../llm/prompts.js";
import type { TextGenerationClient } from "../llm/types.js";
import { transition } from "./engine.js";
import {
  GenerationError,
  classifyFailure,
  errorMessage,
  isMissingUpstream,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { isTerminal } from "./session.js";
import type { Effect, OutcomeEvent, Session, UserEvent } from "./types.js";

export interface SessionCollaborators {
  vcs: VersionControlRunner;
  forge: ForgeClient;
  generator: TextGenerationClient;
  models: {
    commit: string;
    pr: string;
  };
}

/**
 * Renders a session and collects user input
 */
export interface SessionPresenter {
  /** Show the current phase and wait for the user's answer */
  nextEvent(session: Session): Promise<UserEvent>;
  /** An effect is about to run */
  effectStarted(effect: Effect): void;
  /** An effect finished with the given outcome */
  effectFinished(effect: Effect, outcome: OutcomeEvent): void;
}

export interface RunSessionOptions {
  collaborators: SessionCollaborators;
  presenter: SessionPresenter;
  logger?: Logger;
}

async function performEffect(
  effect: Effect,
  collaborators: SessionCollaborators,
  logger: Logger,
): Promise<OutcomeEvent> {
  const { vcs, forge, generator, models } = collaborators;

  switch (effect.kind) {
    case "create_branch":
      vcs.createAndCheckoutBranch(effect.name);
      return { kind: "branch_created", name: effect.name };

    case "stage_all":
      vcs.stageAll();
      return { kind: "staged", diff: vcs.diff() };

    case "generate_commit_message": {
      const text = await generator.generateText(
        buildCommitPrompt(effect.request),
        { model: models.commit, maxTokens: COMMIT_MAX_TOKENS },
      );
      return { kind: "commit_message_generated", text };
    }

    case "commit": {
      // Count before committing; afterwards nothing is staged
      const fileCount = vcs.countStagedFiles();
      vcs.commit(effect.message);
      return { kind: "committed", fileCount };
    }

    case "push":
      vcs.push();
      return { kind: "pushed" };

    case "push_set_upstream":
      vcs.pushSetUpstream(effect.branch);
      return { kind: "pushed" };

    case "check_forge_origin":
      try {
        forge.isSupportedForgeOrigin();
        return { kind: "forge_checked", supported: true };
      } catch (error) {
        logger.debug("Skipping PR offer", errorMessage(error));
        return { kind: "forge_checked", supported: false };
      }

    case "check_existing_pr":
      return {
        kind: "existing_pr_checked",
        exists: forge.hasExistingPR(effect.branch),
      };

    case "generate_pr_content": {
      let gitLog: string;
      try {
        gitLog = vcs.branchLog(effect.branch);
      } catch (error) {
        throw new GenerationError(
          generator.provider,
          `Error getting git log: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      const text = await generator.generateText(buildPRPrompt(gitLog), {
        model: models.pr,
        maxTokens: PR_MAX_TOKENS,
      });
      return { kind: "pr_content_generated", text };
    }

    case "create_pr":
      return {
        kind: "pr_created",
        url: forge.createPR(effect.title, effect.body),
      };
  }
}

/**
 * Execute one effect and describe its result as an outcome event
 */
export async function executeEffect(
  effect: Effect,
  collaborators: SessionCollaborators,
  logger: Logger = createLogger(),
): Promise<OutcomeEvent> {
  try {
    return await performEffect(effect, collaborators, logger);
  } catch (error) {
    const failure = classifyFailure(effect.kind, error);

    if (failure.kind === "retryable") {
      return { kind: "generation_failed", message: failure.message };
    }

    if (effect.kind === "push" || effect.kind === "push_set_upstream") {
      return {
        kind: "push_failed",
        noUpstream: isMissingUpstream(error),
        message: failure.message,
      };
    }

    return { kind: "operation_failed", message: failure.message };
  }
}

/**
 * Run a session until it reaches a terminal phase and return the final state
 */
export async function runSession(
  initial: Session,
  options: RunSessionOptions,
): Promise<Session> {
  const { collaborators, presenter } = options;
  const logger = (options.logger ?? createLogger()).child("session");

  let session = initial;

  while (!isTerminal(session)) {
    const pending = session.pending;

    if (pending) {
      logger.debug(`Running ${pending.kind}`);
      presenter.effectStarted(pending);
      const outcome = await executeEffect(pending, collaborators, logger);
      presenter.effectFinished(pending, outcome);
      logger.debug(`Outcome ${outcome.kind}`);
      session = transition(session, outcome).session;
      continue;
    }

    const event = await presenter.nextEvent(session);
    const before = session.state.phase;
    session = transition(session, event).session;
    if (session.state.phase !== before) {
      logger.debug(`${before} -> ${session.state.phase}`);
    }
  }

  return session;
}
