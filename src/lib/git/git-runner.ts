/**
 * Git command runner
 *
 * Thin synchronous wrapper over the `git` binary. Every command runs with
 * an argument vector (no shell), so messages and branch names are passed
 * through untouched.
 *
 * @example
 * ```typescript
 * const git = new GitRunner();
 * if (git.diff() === "" && git.hasAnyChanges()) {
 *   git.stageAll();
 * }
 * git.commit("feat(auth): add login");
 * ```
 */

import { spawnSync } from "child_process";
import { GitCommandError } from "../workflow/errors.js";
import type { VersionControlRunner } from "./types.js";

export interface GitRunnerOptions {
  /** Repository directory (default: process.cwd()) */
  cwd?: string;
}

/**
 * Default branch assumed when `git remote show origin` does not report one
 */
const FALLBACK_DEFAULT_BRANCH = "main";

const LOG_FORMAT = "--pretty=format:%s%n%b%n---";

/**
 * Extract the remote HEAD branch from `git remote show origin` output
 */
export function parseRemoteHeadBranch(output: string): string {
  for (const line of output.split("\n")) {
    if (line.includes("HEAD branch:")) {
      const parts = line.split(":");
      if (parts.length === 2) {
        const branch = parts[1].trim();
        if (branch && branch !== "(unknown)") {
          return branch;
        }
      }
      break;
    }
  }
  return FALLBACK_DEFAULT_BRANCH;
}

export class GitRunner implements VersionControlRunner {
  private readonly cwd?: string;

  constructor(options: GitRunnerOptions = {}) {
    this.cwd = options.cwd;
  }

  /**
   * Run git and return stdout; throws GitCommandError on a non-zero exit
   */
  private run(args: string[]): string {
    const result = spawnSync("git", args, { stdio: "pipe", cwd: this.cwd });

    if (result.error) {
      throw new GitCommandError(args, result.error.message, result.error);
    }

    const stdout = result.stdout?.toString() ?? "";
    if (result.status !== 0) {
      const stderr = result.stderr?.toString().trim() ?? "";
      throw new GitCommandError(args, stderr || stdout.trim());
    }

    return stdout;
  }

  diff(): string {
    return this.run(["diff", "--staged"]);
  }

  hasAnyChanges(): boolean {
    return this.run(["status", "--porcelain"]).trim().length > 0;
  }

  stageAll(): void {
    this.run(["add", "."]);
  }

  commit(message: string): void {
    this.run(["commit", "-m", message]);
  }

  push(): void {
    this.run(["push"]);
  }

  pushSetUpstream(branch: string): void {
    this.run(["push", "--set-upstream", "origin", branch]);
  }

  currentBranch(): string {
    return this.run(["branch", "--show-current"]).trim();
  }

  createAndCheckoutBranch(name: string): void {
    this.run(["checkout", "-b", name]);
  }

  countStagedFiles(): number {
    try {
      return this.run(["diff", "--staged", "--name-only"])
        .split("\n")
        .filter((line) => line.trim() !== "").length;
    } catch {
      return 0;
    }
  }

  branchLog(branch: string): string {
    const defaultBranch = parseRemoteHeadBranch(
      this.run(["remote", "show", "origin"]),
    );

    try {
      return this.run(["log", `origin/${defaultBranch}..${branch}`, LOG_FORMAT]);
    } catch {
      // Branch comparison failed (no remote-tracking ref yet); use recent history
      return this.run(["log", "-10", LOG_FORMAT]);
    }
  }

  userName(): string | null {
    try {
      const name = this.run(["config", "user.name"]).trim();
      return name || null;
    } catch {
      return null;
    }
  }
}
