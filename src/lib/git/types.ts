/**
 * Contracts for the version-control and forge collaborators
 *
 * The session runner only talks to these interfaces; tests substitute
 * in-memory fakes.
 */

/**
 * Operations on the local repository
 *
 * Methods throw GitCommandError on failure unless noted.
 */
export interface VersionControlRunner {
  /** Staged diff (`git diff --staged`) */
  diff(): string;
  /** Whether the working tree has any change at all (staged or not) */
  hasAnyChanges(): boolean;
  stageAll(): void;
  commit(message: string): void;
  /** Push to the configured upstream; the error is recognisable by isMissingUpstream() when none is set */
  push(): void;
  pushSetUpstream(branch: string): void;
  currentBranch(): string;
  createAndCheckoutBranch(name: string): void;
  /** Number of staged files; zero when the count cannot be read */
  countStagedFiles(): number;
  /** Commit subjects and bodies not yet on the remote default branch (last 10 commits as fallback) */
  branchLog(branch: string): string;
  /** Configured `user.name`, or null when unset */
  userName(): string | null;
}

/**
 * Operations against the hosting forge
 */
export interface ForgeClient {
  /** Throws ForgeError naming the origin unless it points at a supported forge */
  isSupportedForgeOrigin(): void;
  /** Best effort: false when the lookup itself fails */
  hasExistingPR(branch: string): boolean;
  /** Open a PR for the current branch and return its URL */
  createPR(title: string, body: string): string;
}
