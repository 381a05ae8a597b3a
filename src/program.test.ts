import { describe, it, expect, vi } from "vitest";
import { createProgram, type ProgramActions } from "./program.js";

function setup() {
  const actions = {
    commit: vi.fn<ProgramActions["commit"]>().mockResolvedValue(undefined),
    config: vi.fn<ProgramActions["config"]>().mockResolvedValue(undefined),
  };
  return { actions, program: createProgram(actions, "1.2.3") };
}

describe("createProgram", () => {
  it("passes flags to the commit action", async () => {
    const { actions, program } = setup();

    await program.parseAsync(["--pr", "-p", "ollama", "--commit-model", "qwen"], {
      from: "user",
    });

    expect(actions.commit).toHaveBeenCalledWith(
      expect.objectContaining({ pr: true, provider: "ollama", commitModel: "qwen" }),
    );
    expect(actions.config).not.toHaveBeenCalled();
  });

  it("accepts --verbose after config", async () => {
    const { actions, program } = setup();

    await program.parseAsync(["config", "--verbose"], { from: "user" });

    expect(actions.config).toHaveBeenCalledWith({ verbose: true });
    expect(actions.commit).not.toHaveBeenCalled();
  });

  it("accepts --verbose before config", async () => {
    const { actions, program } = setup();

    await program.parseAsync(["--verbose", "config"], { from: "user" });

    expect(actions.config).toHaveBeenCalledWith({ verbose: true });
  });

  it("takes --no-color after config", async () => {
    const { actions, program } = setup();

    await program.parseAsync(["config", "--no-color"], { from: "user" });

    expect(actions.config).toHaveBeenCalledWith({ verbose: false });
  });

  it("runs config quietly by default", async () => {
    const { actions, program } = setup();

    await program.parseAsync(["config"], { from: "user" });

    expect(actions.config).toHaveBeenCalledWith({ verbose: false });
  });
});
