/**
 * Terminal presenter
 *
 * Renders the session's current phase with inquirer prompts and turns the
 * answer into a single engine event: `select` for choice phases, `submit`
 * (carrying the typed text) for text phases. Ctrl+C inside a prompt becomes
 * `quit`.
 */

import inquirer from "inquirer";
import { ui, colors, type SpinnerManager } from "../cli-ui.js";
import type { SessionPresenter } from "./runner.js";
import {
  choicesFor,
  cursorFor,
  isDiffTooLarge,
  isTextPhase,
  textBufferFor,
} from "./session.js";
import {
  DIFF_LINE_LIMIT,
  type Effect,
  type OutcomeEvent,
  type Phase,
  type Session,
  type TextPhase,
  type UserEvent,
} from "./types.js";

const PROMPT_MESSAGES: Partial<Record<Phase, string>> = {
  branch_warning: "Create a new branch?",
  branch_input: "New branch name:",
  add: "No staged changes. Stage all changes (git add .)?",
  type: "Select commit type:",
  scope: "Scope (optional, e.g. auth):",
  commit_error: "What would you like to do?",
  manual_input: "Commit message:",
  confirm: "Commit with this message?",
  edit: "Edit commit message:",
  push_prompt: "Push to remote?",
  upstream_prompt: "Set upstream and push?",
  pr_prompt: "Create a pull request?",
  pr_error: "What would you like to do?",
  pr_manual_title: "PR title:",
  pr_manual_body: "PR body:",
};

/**
 * Inquirer rejects with ExitPromptError when the user hits Ctrl+C
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

/**
 * Spinner text while an effect runs
 */
export function effectLabel(effect: Effect): string {
  switch (effect.kind) {
    case "create_branch":
      return `Creating branch ${effect.name}...`;
    case "stage_all":
      return "Staging all changes...";
    case "generate_commit_message":
      return "Generating commit message...";
    case "commit":
      return "Committing...";
    case "push":
      return "Pushing...";
    case "push_set_upstream":
      return `Pushing and setting upstream to origin/${effect.branch}...`;
    case "check_forge_origin":
    case "check_existing_pr":
      return "Checking pull request status...";
    case "generate_pr_content":
      return "Generating PR title and description...";
    case "create_pr":
      return "Creating pull request...";
  }
}

/**
 * Line printed when an effect finishes; null to clear the spinner silently
 */
export function outcomeLabel(outcome: OutcomeEvent): string | null {
  switch (outcome.kind) {
    case "branch_created":
      return `Created branch ${outcome.name}`;
    case "staged":
      return "Staged all changes";
    case "commit_message_generated":
      return "Generated commit message";
    case "pr_content_generated":
      return "Generated PR title and description";
    case "committed":
      return `Committed ${outcome.fileCount} ${outcome.fileCount === 1 ? "file" : "files"}`;
    case "pushed":
      return "Pushed";
    case "pr_created":
      return `Created PR: ${outcome.url}`;
    case "push_failed":
      return outcome.noUpstream ? "No upstream branch set" : "Push failed";
    case "generation_failed":
      return "Generation failed";
    case "operation_failed":
      return "Failed";
    case "forge_checked":
    case "existing_pr_checked":
      return null;
  }
}

export class InquirerPresenter implements SessionPresenter {
  private activeSpinner: SpinnerManager | null = null;

  async nextEvent(session: Session): Promise<UserEvent> {
    try {
      this.renderContext(session);
      const { phase } = session.state;
      if (isTextPhase(phase)) {
        return await this.askText(session, phase);
      }
      if (choicesFor(session).length > 0) {
        return await this.askChoice(session);
      }
      return { kind: "quit" };
    } catch (error) {
      if (isPromptExit(error)) {
        return { kind: "quit" };
      }
      throw error;
    }
  }

  effectStarted(effect: Effect): void {
    this.activeSpinner = ui.spinner(effectLabel(effect)).start();
  }

  effectFinished(_effect: Effect, outcome: OutcomeEvent): void {
    const active = this.activeSpinner;
    this.activeSpinner = null;
    if (!active) return;

    const label = outcomeLabel(outcome);
    if (label === null) {
      active.stop();
      return;
    }

    switch (outcome.kind) {
      case "generation_failed":
      case "operation_failed":
        active.fail(label);
        break;
      case "push_failed":
        if (outcome.noUpstream) {
          active.warn(label);
        } else {
          active.fail(label);
        }
        break;
      default:
        active.succeed(label);
    }
  }

  /**
   * Phase context shown above the prompt
   */
  private renderContext(session: Session): void {
    const { state, currentBranchName } = session;

    switch (state.phase) {
      case "branch_warning":
        console.log(
          ui.warningBox(
            "Protected branch",
            `You are about to commit directly to ${colors.bold(currentBranchName)}.`,
          ),
        );
        break;
      case "manual_input":
        if (isDiffTooLarge(session.changeSummary)) {
          const lines = session.changeSummary.split("\n").length;
          console.log(
            ui.warningBox(
              "Large diff",
              `The staged diff has ${lines} lines (limit ${DIFF_LINE_LIMIT}).\nSkipping AI generation; write the commit message yourself.`,
            ),
          );
        }
        break;
      case "confirm":
        console.log(ui.infoBox("Commit message", session.draftMessage));
        break;
      case "commit_error":
      case "pr_error":
        console.log(ui.errorBox("API Error", session.lastErrorMessage));
        break;
      case "upstream_prompt":
        console.log(
          colors.warning(
            `Branch ${currentBranchName} has no upstream branch on origin.`,
          ),
        );
        break;
      default:
        break;
    }
  }

  private async askChoice(session: Session): Promise<UserEvent> {
    const choices = choicesFor(session);
    const { choice } = await inquirer.prompt<{ choice: number }>([
      {
        type: "list",
        name: "choice",
        message: PROMPT_MESSAGES[session.state.phase] ?? "Choose:",
        choices: choices.map((name, index) => ({ name, value: index })),
        default: cursorFor(session) ?? 0,
        loop: false,
      },
    ]);
    return { kind: "select", index: choice };
  }

  private async askText(session: Session, phase: TextPhase): Promise<UserEvent> {
    const current = textBufferFor(session, phase);
    const { text } = await inquirer.prompt<{ text: string }>([
      {
        type: "input",
        name: "text",
        message: PROMPT_MESSAGES[phase] ?? "Input:",
        default: current || undefined,
      },
    ]);
    return { kind: "submit", text };
  }
}
