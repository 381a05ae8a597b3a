/**
 * Core types for the commit/PR session state machine
 *
 * A session is a single record: the current phase (as a tagged union), the
 * one outstanding external call (if any), and the data accumulated so far.
 * The engine is a pure function over these types; see engine.ts.
 */

/**
 * Conventional-commit type labels, in menu order
 */
export const COMMIT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "build",
  "ci",
  "chore",
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

/**
 * Diffs with more lines than this skip AI generation
 */
export const DIFF_LINE_LIMIT = 1000;

/**
 * Branch names that trigger the protected-branch warning
 */
export const PROTECTED_BRANCHES = ["main", "master"] as const;

/**
 * Separator the PR prompt asks the model to put between title and body
 */
export const PR_BODY_SEPARATOR = "\n---BODY---\n";

export type SessionMode = "commit" | "pr_only";

/**
 * Phase state - one variant per phase.
 *
 * Choice phases carry their selection cursor; it is reset on every entry.
 */
export type PhaseState =
  | { phase: "branch_warning"; cursor: number }
  | { phase: "branch_input" }
  | { phase: "branch_creating" }
  | { phase: "add"; cursor: number }
  | { phase: "type" }
  | { phase: "scope" }
  | { phase: "generating" }
  | { phase: "commit_error"; cursor: number }
  | { phase: "manual_input" }
  | { phase: "confirm"; cursor: number }
  | { phase: "edit" }
  | { phase: "push_prompt"; cursor: number }
  | { phase: "upstream_prompt"; cursor: number }
  | { phase: "pr_prompt"; cursor: number }
  | { phase: "pr_generating" }
  | { phase: "pr_error"; cursor: number }
  | { phase: "pr_manual_title" }
  | { phase: "pr_manual_body" }
  | { phase: "pr_creating" }
  | { phase: "done" }
  | { phase: "exiting" }
  | { phase: "failed"; message: string };

export type Phase = PhaseState["phase"];

/**
 * Phases whose state variant carries a selection cursor
 */
export type ChoicePhaseState = Extract<PhaseState, { cursor: number }>;
export type ChoicePhase = ChoicePhaseState["phase"];

/**
 * Phases that edit a free-text buffer
 */
export type TextPhase =
  | "branch_input"
  | "scope"
  | "manual_input"
  | "edit"
  | "pr_manual_title"
  | "pr_manual_body";

/**
 * Results accumulated for the end-of-session summary.
 * Fields only move forward (false -> true, empty -> set).
 */
export interface CompletionFlags {
  stagedFileCount: number;
  didCommit: boolean;
  didPush: boolean;
  didCreatePR: boolean;
  /** Non-empty once a branch was created during the session */
  createdBranchName: string;
  /** URL reported by the forge for the created PR */
  prUrl: string;
}

/**
 * Input for the commit-message prompt
 */
export interface CommitMessageRequest {
  diff: string;
  commitType: CommitType;
  scope: string;
}

/**
 * External calls the engine can ask for
 */
export type Effect =
  | { kind: "create_branch"; name: string }
  | { kind: "stage_all" }
  | { kind: "generate_commit_message"; request: CommitMessageRequest }
  | { kind: "commit"; message: string }
  | { kind: "push" }
  | { kind: "push_set_upstream"; branch: string }
  | { kind: "check_forge_origin" }
  | { kind: "check_existing_pr"; branch: string }
  | { kind: "generate_pr_content"; branch: string }
  | { kind: "create_pr"; title: string; body: string };

export type EffectKind = Effect["kind"];

/**
 * Input coming from the presentation adapter
 */
export type UserEvent =
  /** Move the selection cursor in a choice phase */
  | { kind: "move"; delta: number }
  /** Pick option N of a choice phase and act on it */
  | { kind: "select"; index: number }
  /** Act on the option under the cursor */
  | { kind: "confirm" }
  /** Append text to the current input buffer */
  | { kind: "type"; text: string }
  /** Drop the last character of the current input buffer */
  | { kind: "backspace" }
  /** Submit the current input buffer, optionally replacing it first */
  | { kind: "submit"; text?: string }
  | { kind: "quit" };

/**
 * Outcome of an effect, fed back into the engine
 */
export type OutcomeEvent =
  | { kind: "branch_created"; name: string }
  | { kind: "staged"; diff: string }
  | { kind: "commit_message_generated"; text: string }
  | { kind: "pr_content_generated"; text: string }
  | { kind: "generation_failed"; message: string }
  | { kind: "committed"; fileCount: number }
  | { kind: "pushed" }
  | { kind: "push_failed"; noUpstream: boolean; message: string }
  | { kind: "forge_checked"; supported: boolean }
  | { kind: "existing_pr_checked"; exists: boolean }
  | { kind: "pr_created"; url: string }
  | { kind: "operation_failed"; message: string };

export type SessionEvent = UserEvent | OutcomeEvent;

/**
 * The single workflow instance
 */
export interface Session {
  mode: SessionMode;
  state: PhaseState;
  /** The one external call in flight, if any */
  pending: Effect | null;
  changeSummary: string;
  needsStaging: boolean;
  currentBranchName: string;
  isProtectedBranch: boolean;
  commitTypeIndex: number;
  scopeText: string;
  draftMessage: string;
  draftPRTitle: string;
  draftPRBody: string;
  branchNameDraft: string;
  /** Last retryable generation error */
  lastErrorMessage: string;
  completion: CompletionFlags;
}

/**
 * Result of a single engine step
 */
export interface Transition {
  session: Session;
  effect: Effect | null;
}

/**
 * Read-only inputs a session is created from
 */
export interface SessionInit {
  diff: string;
  needsStaging: boolean;
  currentBranch: string;
  defaultBranchName: string;
  mode?: SessionMode;
}
