/**
 * Workflow engine - the session state machine
 *
 * `transition(session, event)` is pure: it returns the next session and at
 * most one effect for the runner to execute. Any (phase, event) pair not
 * handled below returns the session untouched with no effect.
 *
 * Invariants enforced here:
 * - at most one effect is pending; while one is, user events other than
 *   `quit` are ignored and outcomes must answer the pending effect kind
 * - completion flags only move forward
 * - fatal outcomes end the session in `failed`, generation failures go to
 *   the retry/manual phases
 *
 * @example
 * ```typescript
 * let { session, effect } = transition(createSession(init), { kind: "select", index: 0 });
 * if (effect) {
 *   const outcome = await executeEffect(effect, collaborators);
 *   ({ session, effect } = transition(session, outcome));
 * }
 * ```
 */

import { validateBranchName } from "../git/branch-name.js";
import {
  choicesFor,
  cursorFor,
  entryAfterBranch,
  isDiffTooLarge,
  isTerminal,
  isTextPhase,
  parsePRContent,
  textBufferFor,
  withTextBuffer,
} from "./session.js";
import {
  COMMIT_TYPES,
  type CommitMessageRequest,
  type Effect,
  type OutcomeEvent,
  type PhaseState,
  type Session,
  type SessionEvent,
  type TextPhase,
  type Transition,
  type UserEvent,
} from "./types.js";

const OUTCOME_KINDS: ReadonlySet<string> = new Set<OutcomeEvent["kind"]>([
  "branch_created",
  "staged",
  "commit_message_generated",
  "pr_content_generated",
  "generation_failed",
  "committed",
  "pushed",
  "push_failed",
  "forge_checked",
  "existing_pr_checked",
  "pr_created",
  "operation_failed",
]);

const EMPTY_GENERATION_MESSAGE = "No content in API response";

export function isOutcomeEvent(event: SessionEvent): event is OutcomeEvent {
  return OUTCOME_KINDS.has(event.kind);
}

function unchanged(session: Session): Transition {
  return { session, effect: null };
}

function enter(session: Session, state: PhaseState): Transition {
  return { session: { ...session, state }, effect: null };
}

/**
 * Move to `state` and issue `effect`.
 * Refuses (returns the session untouched) while another call is pending.
 */
function schedule(
  session: Session,
  state: PhaseState,
  effect: Effect,
): Transition {
  if (session.pending !== null) {
    return unchanged(session);
  }
  return { session: { ...session, state, pending: effect }, effect };
}

function settle(session: Session): Session {
  return { ...session, pending: null };
}

function fail(session: Session, message: string): Transition {
  return {
    session: {
      ...session,
      state: { phase: "failed", message },
      pending: null,
      lastErrorMessage: message,
    },
    effect: null,
  };
}

/**
 * Build the commit-message request from the session's current inputs
 */
export function commitMessageRequest(session: Session): CommitMessageRequest {
  return {
    diff: session.changeSummary,
    commitType: COMMIT_TYPES[session.commitTypeIndex],
    scope: session.scopeText,
  };
}

/**
 * Compute the next session for an incoming event
 */
export function transition(session: Session, event: SessionEvent): Transition {
  if (isTerminal(session)) {
    return unchanged(session);
  }

  if (event.kind === "quit") {
    return {
      session: { ...session, state: { phase: "exiting" }, pending: null },
      effect: null,
    };
  }

  if (isOutcomeEvent(event)) {
    if (session.pending === null) {
      return unchanged(session);
    }
    return handleOutcome(settle(session), session.pending, event);
  }

  if (session.pending !== null) {
    return unchanged(session);
  }

  return handleUserEvent(session, event);
}

// === User events ===

function handleUserEvent(session: Session, event: UserEvent): Transition {
  const { phase } = session.state;

  if (isTextPhase(phase)) {
    return handleTextEvent(session, phase, event);
  }

  const cursor = cursorFor(session);
  if (cursor === null) {
    return unchanged(session);
  }

  const choiceCount = choicesFor(session).length;

  switch (event.kind) {
    case "move": {
      const next = Math.min(Math.max(cursor + event.delta, 0), choiceCount - 1);
      return withCursor(session, next);
    }
    case "select":
      if (
        !Number.isInteger(event.index) ||
        event.index < 0 ||
        event.index >= choiceCount
      ) {
        return unchanged(session);
      }
      return choose(withCursor(session, event.index).session, event.index);
    case "confirm":
      return choose(session, cursor);
    default:
      return unchanged(session);
  }
}

function withCursor(session: Session, cursor: number): Transition {
  const { state } = session;
  if (state.phase === "type") {
    return unchanged({ ...session, commitTypeIndex: cursor });
  }
  if ("cursor" in state) {
    return enter(session, { ...state, cursor });
  }
  return unchanged(session);
}

/**
 * Act on option `index` of the current choice phase
 */
function choose(session: Session, index: number): Transition {
  switch (session.state.phase) {
    case "branch_warning":
      return index === 0
        ? enter(session, { phase: "branch_input" })
        : enter(session, entryAfterBranch(session.needsStaging));

    case "add":
      return index === 0
        ? schedule(session, { phase: "add", cursor: index }, { kind: "stage_all" })
        : enter(session, { phase: "exiting" });

    case "type":
      return enter({ ...session, commitTypeIndex: index }, { phase: "scope" });

    case "confirm":
      if (index === 0) {
        if (session.draftMessage === "") {
          return unchanged(session);
        }
        return schedule(
          session,
          { phase: "confirm", cursor: index },
          { kind: "commit", message: session.draftMessage },
        );
      }
      return enter(session, { phase: "edit" });

    case "commit_error":
      if (index === 0) {
        return schedule(
          { ...session, lastErrorMessage: "" },
          { phase: "generating" },
          {
            kind: "generate_commit_message",
            request: commitMessageRequest(session),
          },
        );
      }
      return enter(
        { ...session, draftMessage: "", lastErrorMessage: "" },
        { phase: "manual_input" },
      );

    case "push_prompt":
      return index === 0
        ? schedule(session, { phase: "push_prompt", cursor: index }, { kind: "push" })
        : enter(session, { phase: "exiting" });

    case "upstream_prompt":
      return index === 0
        ? schedule(
            session,
            { phase: "upstream_prompt", cursor: index },
            { kind: "push_set_upstream", branch: session.currentBranchName },
          )
        : enter(session, { phase: "exiting" });

    case "pr_prompt":
      return index === 0
        ? schedule(
            session,
            { phase: "pr_generating" },
            { kind: "generate_pr_content", branch: session.currentBranchName },
          )
        : enter(session, { phase: "exiting" });

    case "pr_error":
      if (index === 0) {
        return schedule(
          { ...session, lastErrorMessage: "" },
          { phase: "pr_generating" },
          { kind: "generate_pr_content", branch: session.currentBranchName },
        );
      }
      if (index === 1) {
        return enter(
          {
            ...session,
            draftPRTitle: "",
            draftPRBody: "",
            lastErrorMessage: "",
          },
          { phase: "pr_manual_title" },
        );
      }
      return enter({ ...session, lastErrorMessage: "" }, { phase: "exiting" });

    default:
      return unchanged(session);
  }
}

function dropLastCharacter(value: string): string {
  return Array.from(value).slice(0, -1).join("");
}

function handleTextEvent(
  session: Session,
  phase: TextPhase,
  event: UserEvent,
): Transition {
  const buffer = textBufferFor(session, phase);

  switch (event.kind) {
    case "type":
      return unchanged(withTextBuffer(session, phase, buffer + event.text));
    case "backspace":
      if (buffer === "") {
        return unchanged(session);
      }
      return unchanged(withTextBuffer(session, phase, dropLastCharacter(buffer)));
    case "submit": {
      const next =
        event.text === undefined
          ? session
          : withTextBuffer(session, phase, event.text);
      return submitText(next, phase);
    }
    default:
      return unchanged(session);
  }
}

function submitText(session: Session, phase: TextPhase): Transition {
  switch (phase) {
    case "branch_input": {
      const validationError = validateBranchName(session.branchNameDraft);
      if (validationError) {
        return fail(session, validationError);
      }
      return schedule(
        session,
        { phase: "branch_creating" },
        { kind: "create_branch", name: session.branchNameDraft },
      );
    }

    case "scope":
      if (isDiffTooLarge(session.changeSummary)) {
        return enter({ ...session, draftMessage: "" }, { phase: "manual_input" });
      }
      return schedule(
        session,
        { phase: "generating" },
        {
          kind: "generate_commit_message",
          request: commitMessageRequest(session),
        },
      );

    case "manual_input":
    case "edit":
      return schedule(session, session.state, {
        kind: "commit",
        message: session.draftMessage,
      });

    case "pr_manual_title":
      return enter(session, { phase: "pr_manual_body" });

    case "pr_manual_body":
      return schedule(
        session,
        { phase: "pr_creating" },
        {
          kind: "create_pr",
          title: session.draftPRTitle,
          body: session.draftPRBody,
        },
      );
  }
}

// === Outcome events ===

/**
 * Apply the outcome of `pending` to a session whose pending marker has
 * already been cleared
 */
function handleOutcome(
  session: Session,
  pending: Effect,
  event: OutcomeEvent,
): Transition {
  const stale = { session: { ...session, pending }, effect: null };

  switch (pending.kind) {
    case "create_branch":
      if (event.kind === "branch_created") {
        return enter(
          {
            ...session,
            currentBranchName: event.name,
            completion: { ...session.completion, createdBranchName: event.name },
          },
          entryAfterBranch(session.needsStaging),
        );
      }
      break;

    case "stage_all":
      if (event.kind === "staged") {
        return enter({ ...session, changeSummary: event.diff }, { phase: "type" });
      }
      break;

    case "generate_commit_message":
      if (event.kind === "commit_message_generated") {
        if (event.text.trim() === "") {
          return enter(
            { ...session, lastErrorMessage: EMPTY_GENERATION_MESSAGE },
            { phase: "commit_error", cursor: 0 },
          );
        }
        return enter(
          { ...session, draftMessage: event.text },
          { phase: "confirm", cursor: 0 },
        );
      }
      if (event.kind === "generation_failed") {
        return enter(
          { ...session, lastErrorMessage: event.message },
          { phase: "commit_error", cursor: 0 },
        );
      }
      break;

    case "commit":
      if (event.kind === "committed") {
        return enter(
          {
            ...session,
            completion: {
              ...session.completion,
              didCommit: true,
              stagedFileCount: event.fileCount,
            },
          },
          { phase: "push_prompt", cursor: 1 },
        );
      }
      break;

    case "push":
    case "push_set_upstream":
      if (event.kind === "pushed") {
        return schedule(
          {
            ...session,
            completion: { ...session.completion, didPush: true },
          },
          session.state,
          { kind: "check_forge_origin" },
        );
      }
      if (event.kind === "push_failed") {
        if (pending.kind === "push" && event.noUpstream) {
          return enter(session, { phase: "upstream_prompt", cursor: 0 });
        }
        return fail(session, event.message);
      }
      break;

    case "check_forge_origin":
      if (event.kind === "forge_checked") {
        if (!event.supported) {
          return enter(session, { phase: "exiting" });
        }
        return schedule(session, session.state, {
          kind: "check_existing_pr",
          branch: session.currentBranchName,
        });
      }
      break;

    case "check_existing_pr":
      if (event.kind === "existing_pr_checked") {
        return event.exists
          ? enter(session, { phase: "exiting" })
          : enter(session, { phase: "pr_prompt", cursor: 1 });
      }
      break;

    case "generate_pr_content":
      if (event.kind === "pr_content_generated") {
        if (event.text.trim() === "") {
          return enter(
            { ...session, lastErrorMessage: EMPTY_GENERATION_MESSAGE },
            { phase: "pr_error", cursor: 0 },
          );
        }
        const { title, body } = parsePRContent(event.text);
        return schedule(
          { ...session, draftPRTitle: title, draftPRBody: body },
          { phase: "pr_creating" },
          { kind: "create_pr", title, body },
        );
      }
      if (event.kind === "generation_failed") {
        return enter(
          { ...session, lastErrorMessage: event.message },
          { phase: "pr_error", cursor: 0 },
        );
      }
      break;

    case "create_pr":
      if (event.kind === "pr_created") {
        return enter(
          {
            ...session,
            completion: {
              ...session.completion,
              didCreatePR: true,
              prUrl: event.url,
            },
          },
          { phase: "pr_creating" },
        );
      }
      break;
  }

  // Structural failures of any call end the session
  if (event.kind === "operation_failed") {
    return fail(session, event.message);
  }

  return stale;
}
