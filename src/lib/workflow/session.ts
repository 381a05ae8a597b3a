/**
 * Session construction and read-only helpers
 *
 * Everything here is pure: the engine and the presenter both read a session
 * through these helpers so that choice lists, terminal checks and the
 * end-of-session summary have one definition.
 *
 * @example
 * ```typescript
 * const session = createSession({
 *   diff,
 *   needsStaging: false,
 *   currentBranch: "feature/login",
 *   defaultBranchName: "dev/feature-2026-01-01",
 * });
 * choicesFor(session); // ["feat", "fix", ...]
 * ```
 */

import {
  COMMIT_TYPES,
  DIFF_LINE_LIMIT,
  PR_BODY_SEPARATOR,
  PROTECTED_BRANCHES,
  type CompletionFlags,
  type Phase,
  type PhaseState,
  type Session,
  type SessionInit,
  type TextPhase,
} from "./types.js";

const TEXT_PHASES: readonly Phase[] = [
  "branch_input",
  "scope",
  "manual_input",
  "edit",
  "pr_manual_title",
  "pr_manual_body",
];

/**
 * Check whether a branch name is one of the protected default branches
 */
export function isProtectedBranchName(branch: string): boolean {
  return PROTECTED_BRANCHES.some((name) => name === branch);
}

/**
 * Check whether a diff is too large to send to the generation backend
 */
export function isDiffTooLarge(diff: string): boolean {
  return diff.split("\n").length > DIFF_LINE_LIMIT;
}

/**
 * Phase that follows the branch decision (or branch creation)
 */
export function entryAfterBranch(needsStaging: boolean): PhaseState {
  return needsStaging ? { phase: "add", cursor: 0 } : { phase: "type" };
}

function emptyCompletion(): CompletionFlags {
  return {
    stagedFileCount: 0,
    didCommit: false,
    didPush: false,
    didCreatePR: false,
    createdBranchName: "",
    prUrl: "",
  };
}

/**
 * Create the session for this process invocation
 *
 * In PR-only mode the session starts with PR-content generation already
 * pending; the runner executes it before asking for any input.
 */
export function createSession(init: SessionInit): Session {
  const mode = init.mode ?? "commit";
  const isProtectedBranch = isProtectedBranchName(init.currentBranch);

  let state: PhaseState;
  if (mode === "pr_only") {
    state = { phase: "pr_generating" };
  } else if (isProtectedBranch) {
    state = { phase: "branch_warning", cursor: 0 };
  } else {
    state = entryAfterBranch(init.needsStaging);
  }

  return {
    mode,
    state,
    pending:
      mode === "pr_only"
        ? { kind: "generate_pr_content", branch: init.currentBranch }
        : null,
    changeSummary: init.diff,
    needsStaging: init.needsStaging,
    currentBranchName: init.currentBranch,
    isProtectedBranch,
    commitTypeIndex: 0,
    scopeText: "",
    draftMessage: "",
    draftPRTitle: "",
    draftPRBody: "",
    branchNameDraft: init.defaultBranchName,
    lastErrorMessage: "",
    completion: emptyCompletion(),
  };
}

/**
 * Options offered in the current phase (empty for non-choice phases)
 */
export function choicesFor(session: Session): readonly string[] {
  switch (session.state.phase) {
    case "branch_warning":
      return [
        "Yes, create a new branch",
        `No, continue on ${session.currentBranchName}`,
      ];
    case "add":
      return ["Yes, add all changes", "No, exit"];
    case "type":
      return COMMIT_TYPES;
    case "confirm":
      return ["Yes, commit", "No, let me edit"];
    case "commit_error":
      return ["Retry", "Enter commit message manually"];
    case "push_prompt":
      return ["Yes, push", "No, skip"];
    case "upstream_prompt":
      return ["Yes, set upstream and push", "No, skip"];
    case "pr_prompt":
      return ["Yes, create PR", "No, skip"];
    case "pr_error":
      return ["Retry", "Enter PR details manually", "Skip PR creation"];
    default:
      return [];
  }
}

/**
 * Current selection cursor, or null when the phase has no choices
 */
export function cursorFor(session: Session): number | null {
  if (session.state.phase === "type") {
    return session.commitTypeIndex;
  }
  return "cursor" in session.state ? session.state.cursor : null;
}

export function isTextPhase(phase: Phase): phase is TextPhase {
  return TEXT_PHASES.includes(phase);
}

/**
 * Text buffer edited in the given phase
 */
export function textBufferFor(session: Session, phase: TextPhase): string {
  switch (phase) {
    case "branch_input":
      return session.branchNameDraft;
    case "scope":
      return session.scopeText;
    case "manual_input":
    case "edit":
      return session.draftMessage;
    case "pr_manual_title":
      return session.draftPRTitle;
    case "pr_manual_body":
      return session.draftPRBody;
  }
}

/**
 * Return a copy of the session with the phase's text buffer replaced
 */
export function withTextBuffer(
  session: Session,
  phase: TextPhase,
  value: string,
): Session {
  switch (phase) {
    case "branch_input":
      return { ...session, branchNameDraft: value };
    case "scope":
      return { ...session, scopeText: value };
    case "manual_input":
    case "edit":
      return { ...session, draftMessage: value };
    case "pr_manual_title":
      return { ...session, draftPRTitle: value };
    case "pr_manual_body":
      return { ...session, draftPRBody: value };
  }
}

/**
 * Check whether the session has ended
 */
export function isTerminal(session: Session): boolean {
  switch (session.state.phase) {
    case "done":
    case "exiting":
    case "failed":
      return true;
    case "pr_creating":
      return session.pending === null;
    default:
      return false;
  }
}

/**
 * Split generated PR content into title and body
 *
 * Content without the separator is all title.
 */
export function parsePRContent(text: string): { title: string; body: string } {
  const index = text.indexOf(PR_BODY_SEPARATOR);
  if (index === -1) {
    return { title: text, body: "" };
  }
  return {
    title: text.slice(0, index),
    body: text.slice(index + PR_BODY_SEPARATOR.length),
  };
}

/**
 * Build the end-of-session summary line
 *
 * Returns an empty string when nothing worth reporting happened.
 */
export function summarize(session: Session): string {
  const { completion } = session;

  if (session.mode === "pr_only" && completion.didCreatePR) {
    return `Created PR on branch ${session.currentBranchName}`;
  }

  if (!completion.didCommit) {
    return "";
  }

  const fileWord = completion.stagedFileCount === 1 ? "file" : "files";
  const parts = [`Committed ${completion.stagedFileCount} ${fileWord}`];

  if (completion.createdBranchName) {
    parts.push(`to new branch ${completion.createdBranchName}`);
  } else {
    parts.push(`to branch ${session.currentBranchName}`);
  }

  if (completion.didPush) {
    parts.push("and pushed");
  }

  if (completion.didCreatePR) {
    parts.push("and created PR");
  }

  return parts.join(" ");
}
