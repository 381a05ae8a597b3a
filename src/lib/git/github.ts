/**
 * GitHub forge client backed by the `gh` CLI
 */

import { spawnSync } from "child_process";
import { ForgeError } from "../workflow/errors.js";
import type { ForgeClient } from "./types.js";

export interface GitHubClientOptions {
  cwd?: string;
}

/**
 * Check whether a remote URL points at GitHub (HTTPS or SSH form)
 */
export function isGitHubRemote(url: string): boolean {
  return url.includes("github.com");
}

/**
 * Pick the PR URL out of `gh pr create` output
 *
 * gh prints progress lines before the URL; the URL is the last line.
 */
export function parsePRUrl(output: string): string {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  const urlLine = [...lines].reverse().find((line) => /^https?:\/\//.test(line));
  return urlLine ?? lines[lines.length - 1] ?? "";
}

export class GitHubClient implements ForgeClient {
  private readonly cwd?: string;

  constructor(options: GitHubClientOptions = {}) {
    this.cwd = options.cwd;
  }

  isSupportedForgeOrigin(): void {
    const result = spawnSync("git", ["remote", "get-url", "origin"], {
      stdio: "pipe",
      cwd: this.cwd,
    });

    if (result.error || result.status !== 0) {
      const detail =
        result.error?.message ?? result.stderr?.toString().trim() ?? "";
      throw new ForgeError(`failed to get origin URL: ${detail}`, result.error);
    }

    const originUrl = result.stdout?.toString().trim() ?? "";
    if (!isGitHubRemote(originUrl)) {
      throw new ForgeError(
        `origin is not GitHub (found: ${originUrl}). Only GitHub repositories are supported for PR creation`,
      );
    }
  }

  hasExistingPR(branch: string): boolean {
    try {
      const result = spawnSync(
        "gh",
        ["pr", "list", "--head", branch, "--json", "number"],
        { stdio: "pipe", cwd: this.cwd, timeout: 15000 },
      );

      if (result.status !== 0 || !result.stdout) {
        return false;
      }

      const output = result.stdout.toString().trim();
      return output !== "[]" && output !== "";
    } catch {
      // gh missing or not authenticated
      return false;
    }
  }

  createPR(title: string, body: string): string {
    const result = spawnSync(
      "gh",
      ["pr", "create", "--title", title, "--body", body],
      { stdio: "pipe", cwd: this.cwd, timeout: 30000 },
    );

    if (result.error) {
      throw new ForgeError(
        `gh pr create failed: ${result.error.message}`,
        result.error,
      );
    }

    if (result.status !== 0) {
      const prError = result.stderr?.toString().trim() || "Unknown error";
      throw new ForgeError(`gh pr create failed: ${prError}`);
    }

    return parsePRUrl(result.stdout?.toString() ?? "");
  }
}
