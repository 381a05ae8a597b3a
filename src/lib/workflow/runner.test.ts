import { describe, it, expect, vi, type Mock } from "vitest";
import type { ForgeClient, VersionControlRunner } from "../git/types.js";
import type { GenerationOptions, TextGenerationClient } from "../llm/types.js";
import { ForgeError, GenerationError, GitCommandError } from "./errors.js";
import { createTestLogger } from "./logger.js";
import {
  executeEffect,
  runSession,
  type SessionCollaborators,
  type SessionPresenter,
} from "./runner.js";
import { createSession, summarize } from "./session.js";
import type {
  Effect,
  OutcomeEvent,
  Session,
  SessionInit,
  UserEvent,
} from "./types.js";

const DIFF = "diff --git a/src/cart.ts b/src/cart.ts\n+export const total = 0;";

class FakeRepo implements VersionControlRunner {
  calls: string[] = [];
  stagedFiles = 2;
  failures = new Map<string, Error>();

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failures.get(call.split(" ")[0] ?? call);
    if (failure) throw failure;
  }

  diff(): string {
    this.record("diff");
    return DIFF;
  }
  hasAnyChanges(): boolean {
    return true;
  }
  stageAll(): void {
    this.record("stageAll");
  }
  commit(message: string): void {
    this.record(`commit ${message}`);
    this.stagedFiles = 0;
  }
  push(): void {
    this.record("push");
  }
  pushSetUpstream(branch: string): void {
    this.record(`pushSetUpstream ${branch}`);
  }
  currentBranch(): string {
    return "feature/cart";
  }
  createAndCheckoutBranch(name: string): void {
    this.record(`createAndCheckoutBranch ${name}`);
  }
  countStagedFiles(): number {
    return this.stagedFiles;
  }
  branchLog(branch: string): string {
    this.record(`branchLog ${branch}`);
    return "feat(cart): add total\n\n---";
  }
  userName(): string | null {
    return "Dev";
  }
}

class FakeForge implements ForgeClient {
  supported = true;
  existing = false;
  created: Array<{ title: string; body: string }> = [];
  createFailure: Error | null = null;

  isSupportedForgeOrigin(): void {
    if (!this.supported) {
      throw new ForgeError("origin is not GitHub (found: git@gitlab.com:a/b.git)");
    }
  }
  hasExistingPR(): boolean {
    return this.existing;
  }
  createPR(title: string, body: string): string {
    if (this.createFailure) throw this.createFailure;
    this.created.push({ title, body });
    return "https://github.com/acme/shop/pull/12";
  }
}

type GenerateText = (
  prompt: string,
  options: GenerationOptions,
) => Promise<string>;

function fakeGenerator(
  ...replies: Array<string | Error>
): TextGenerationClient & { generateText: Mock<GenerateText> } {
  const generateText = vi.fn<GenerateText>();
  for (const reply of replies) {
    if (reply instanceof Error) {
      generateText.mockRejectedValueOnce(reply);
    } else {
      generateText.mockResolvedValueOnce(reply);
    }
  }
  return { provider: "anthropic", generateText };
}

function collaborators(
  overrides: Partial<SessionCollaborators> = {},
): SessionCollaborators {
  return {
    vcs: new FakeRepo(),
    forge: new FakeForge(),
    generator: fakeGenerator(),
    models: { commit: "commit-model", pr: "pr-model" },
    ...overrides,
  };
}

/**
 * Presenter that answers from a script and records effect progress
 */
class ScriptedPresenter implements SessionPresenter {
  seen: string[] = [];
  progress: string[] = [];

  constructor(private readonly script: UserEvent[]) {}

  async nextEvent(session: Session): Promise<UserEvent> {
    this.seen.push(session.state.phase);
    return this.script.shift() ?? { kind: "quit" };
  }

  effectStarted(effect: Effect): void {
    this.progress.push(`start ${effect.kind}`);
  }

  effectFinished(_effect: Effect, outcome: OutcomeEvent): void {
    this.progress.push(`end ${outcome.kind}`);
  }
}

function initial(overrides: Partial<SessionInit> = {}): Session {
  return createSession({
    diff: DIFF,
    needsStaging: false,
    currentBranch: "feature/cart",
    defaultBranchName: "dev/feature-2026-05-06",
    ...overrides,
  });
}

describe("executeEffect", () => {
  it("counts staged files before committing", async () => {
    const vcs = new FakeRepo();
    vcs.stagedFiles = 4;

    const outcome = await executeEffect(
      { kind: "commit", message: "feat: x" },
      collaborators({ vcs }),
    );

    expect(outcome).toEqual({ kind: "committed", fileCount: 4 });
    expect(vcs.calls).toEqual(["commit feat: x"]);
  });

  it("returns the staged diff after staging", async () => {
    const vcs = new FakeRepo();
    await expect(
      executeEffect({ kind: "stage_all" }, collaborators({ vcs })),
    ).resolves.toEqual({ kind: "staged", diff: DIFF });
    expect(vcs.calls).toEqual(["stageAll", "diff"]);
  });

  it("passes the configured model and token limit to the generator", async () => {
    const generator = fakeGenerator("feat(cart): add total");

    const outcome = await executeEffect(
      {
        kind: "generate_commit_message",
        request: { diff: DIFF, commitType: "feat", scope: "cart" },
      },
      collaborators({ generator }),
    );

    expect(outcome).toEqual({
      kind: "commit_message_generated",
      text: "feat(cart): add total",
    });
    const [prompt, options] = generator.generateText.mock.calls[0] ?? [];
    expect(prompt).toContain("The scope is: cart");
    expect(options).toEqual({ model: "commit-model", maxTokens: 1024 });
  });

  it("builds the PR prompt from the branch log", async () => {
    const generator = fakeGenerator("Title\n---BODY---\nBody");

    await executeEffect(
      { kind: "generate_pr_content", branch: "feature/cart" },
      collaborators({ generator }),
    );

    const [prompt, options] = generator.generateText.mock.calls[0] ?? [];
    expect(prompt).toContain("feat(cart): add total");
    expect(options).toEqual({ model: "pr-model", maxTokens: 2048 });
  });

  it("makes a generation failure retryable", async () => {
    const generator = fakeGenerator(
      new GenerationError("anthropic", "API error (529): overloaded", {
        status: 529,
      }),
    );

    await expect(
      executeEffect(
        {
          kind: "generate_commit_message",
          request: { diff: DIFF, commitType: "fix", scope: "" },
        },
        collaborators({ generator }),
      ),
    ).resolves.toEqual({
      kind: "generation_failed",
      message: "API error (529): overloaded",
    });
  });

  it("reports a branch log failure as a generation failure", async () => {
    const vcs = new FakeRepo();
    vcs.failures.set("branchLog", new GitCommandError(["log"], "bad revision"));

    await expect(
      executeEffect(
        { kind: "generate_pr_content", branch: "feature/cart" },
        collaborators({ vcs }),
      ),
    ).resolves.toEqual({
      kind: "generation_failed",
      message: "Error getting git log: git log failed: bad revision",
    });
  });

  it("recognises a missing upstream", async () => {
    const vcs = new FakeRepo();
    vcs.failures.set(
      "push",
      new GitCommandError(
        ["push"],
        "fatal: The current branch feature/cart has no upstream branch.",
      ),
    );

    await expect(
      executeEffect({ kind: "push" }, collaborators({ vcs })),
    ).resolves.toEqual({
      kind: "push_failed",
      noUpstream: true,
      message:
        "git push failed: fatal: The current branch feature/cart has no upstream branch.",
    });
  });

  it("treats git failures as fatal", async () => {
    const vcs = new FakeRepo();
    vcs.failures.set("commit", new GitCommandError(["commit", "-m", "x"], "hook failed"));

    await expect(
      executeEffect({ kind: "commit", message: "x" }, collaborators({ vcs })),
    ).resolves.toEqual({
      kind: "operation_failed",
      message: "git commit -m x failed: hook failed",
    });
  });

  it("turns an unsupported origin into a negative check and logs it", async () => {
    const forge = new FakeForge();
    forge.supported = false;
    const { logger, messages } = createTestLogger({ verbose: true });

    await expect(
      executeEffect({ kind: "check_forge_origin" }, collaborators({ forge }), logger),
    ).resolves.toEqual({ kind: "forge_checked", supported: false });
    expect(messages).toEqual([
      "🔍 Skipping PR offer - origin is not GitHub (found: git@gitlab.com:a/b.git)",
    ]);
  });
});

describe("runSession", () => {
  it("runs commit, push and PR creation end to end", async () => {
    const vcs = new FakeRepo();
    const forge = new FakeForge();
    const generator = fakeGenerator(
      "feat(cart): add total",
      "Add cart total\n---BODY---\n- adds total",
    );
    const presenter = new ScriptedPresenter([
      { kind: "select", index: 0 },
      { kind: "submit", text: "cart" },
      { kind: "confirm" },
      { kind: "select", index: 0 },
      { kind: "select", index: 0 },
    ]);

    const final = await runSession(initial(), {
      collaborators: collaborators({ vcs, forge, generator }),
      presenter,
    });

    expect(presenter.seen).toEqual([
      "type",
      "scope",
      "confirm",
      "push_prompt",
      "pr_prompt",
    ]);
    expect(vcs.calls).toEqual([
      "commit feat(cart): add total",
      "push",
      "branchLog feature/cart",
    ]);
    expect(forge.created).toEqual([
      { title: "Add cart total", body: "- adds total" },
    ]);
    expect(final.completion.prUrl).toBe("https://github.com/acme/shop/pull/12");
    expect(summarize(final)).toBe(
      "Committed 2 files to branch feature/cart and pushed and created PR",
    );
  });

  it("reports each effect to the presenter", async () => {
    const presenter = new ScriptedPresenter([
      { kind: "select", index: 0 },
      { kind: "submit" },
      { kind: "confirm" },
      { kind: "confirm" },
    ]);

    await runSession(initial(), {
      collaborators: collaborators({ generator: fakeGenerator("feat: x") }),
      presenter,
    });

    expect(presenter.progress).toEqual([
      "start generate_commit_message",
      "end commit_message_generated",
      "start commit",
      "end committed",
    ]);
  });

  it("recovers from a generation failure through manual input", async () => {
    const vcs = new FakeRepo();
    const presenter = new ScriptedPresenter([
      { kind: "select", index: 1 },
      { kind: "submit", text: "" },
      { kind: "select", index: 1 },
      { kind: "submit", text: "fix: round totals" },
      { kind: "confirm" },
    ]);

    const final = await runSession(initial(), {
      collaborators: collaborators({
        vcs,
        generator: fakeGenerator(
          new GenerationError("anthropic", "request timed out"),
        ),
      }),
      presenter,
    });

    expect(presenter.seen).toEqual([
      "type",
      "scope",
      "commit_error",
      "manual_input",
      "push_prompt",
    ]);
    expect(vcs.calls).toEqual(["commit fix: round totals"]);
    expect(final.state).toEqual({ phase: "exiting" });
  });

  it("stops in failed on a fatal error", async () => {
    const vcs = new FakeRepo();
    vcs.failures.set("push", new GitCommandError(["push"], "rejected"));
    const presenter = new ScriptedPresenter([
      { kind: "select", index: 0 },
      { kind: "submit" },
      { kind: "confirm" },
      { kind: "select", index: 0 },
    ]);

    const final = await runSession(initial(), {
      collaborators: collaborators({ vcs, generator: fakeGenerator("feat: x") }),
      presenter,
    });

    expect(final.state).toEqual({
      phase: "failed",
      message: "git push failed: rejected",
    });
    expect(final.completion.didCommit).toBe(true);
    expect(final.completion.didPush).toBe(false);
  });

  it("runs PR-only sessions without asking anything", async () => {
    const forge = new FakeForge();
    const presenter = new ScriptedPresenter([]);

    const final = await runSession(initial({ mode: "pr_only" }), {
      collaborators: collaborators({
        forge,
        generator: fakeGenerator("Cart total"),
      }),
      presenter,
    });

    expect(presenter.seen).toEqual([]);
    expect(forge.created).toEqual([{ title: "Cart total", body: "" }]);
    expect(summarize(final)).toBe("Created PR on branch feature/cart");
  });

  it("fails when the PR cannot be created", async () => {
    const forge = new FakeForge();
    forge.createFailure = new ForgeError("gh pr create failed: HTTP 403");

    const final = await runSession(initial({ mode: "pr_only" }), {
      collaborators: collaborators({ forge, generator: fakeGenerator("Cart") }),
      presenter: new ScriptedPresenter([]),
    });

    expect(final.state).toEqual({
      phase: "failed",
      message: "gh pr create failed: HTTP 403",
    });
  });

  it("logs phase changes in verbose mode", async () => {
    const { logger, messages } = createTestLogger({ verbose: true });

    await runSession(initial({ needsStaging: true }), {
      collaborators: collaborators(),
      presenter: new ScriptedPresenter([{ kind: "select", index: 1 }]),
      logger,
    });

    expect(messages).toEqual(["🔍 [session] add -> exiting"]);
  });
});
