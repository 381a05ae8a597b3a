/**
 * Error types and classification for session side effects
 *
 * Two kinds matter to the engine:
 * - retryable: the text-generation backend failed; the user gets retry /
 *   manual entry / skip
 * - fatal: a git, forge or config operation failed; the session ends with
 *   the message as-is
 */

import type { EffectKind } from "./types.js";

export type FailureKind = "fatal" | "retryable";

export interface ClassifiedFailure {
  kind: FailureKind;
  message: string;
}

/**
 * A git command exited non-zero (or could not be started)
 */
export class GitCommandError extends Error {
  readonly command: string;
  readonly output: string;

  constructor(args: string[], output: string, cause?: unknown) {
    const command = `git ${args.join(" ")}`;
    super(output ? `${command} failed: ${output}` : `${command} failed`, {
      cause,
    });
    this.name = "GitCommandError";
    this.command = command;
    this.output = output;
  }
}

/**
 * A forge (GitHub) operation failed
 */
export class ForgeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ForgeError";
  }
}

/**
 * The text-generation backend failed: network, timeout, non-2xx,
 * unparsable or empty response, or a missing API key
 */
export class GenerationError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(
    provider: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "GenerationError";
    this.provider = provider;
    this.status = options?.status;
  }
}

/**
 * Config file could not be read, parsed or written
 */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigError";
  }
}

const RETRYABLE_EFFECTS: ReadonlySet<EffectKind> = new Set<EffectKind>([
  "generate_commit_message",
  "generate_pr_content",
]);

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Decide how a failed effect propagates
 */
export function classifyFailure(
  operation: EffectKind,
  error: unknown,
): ClassifiedFailure {
  const message = errorMessage(error);
  if (RETRYABLE_EFFECTS.has(operation) || error instanceof GenerationError) {
    return { kind: "retryable", message };
  }
  return { kind: "fatal", message };
}

/**
 * Check whether a push failed only because the branch has no upstream
 */
export function isMissingUpstream(error: unknown): boolean {
  return /has no upstream branch|no upstream branch/.test(errorMessage(error));
}
