#!/usr/bin/env node
/**
 * gitscribe CLI - AI-drafted commit messages and pull requests
 *
 * Stage, pick a conventional-commit type, review the generated message,
 * commit, push and open a PR, all from one interactive session.
 */

import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { readFileSync } from "fs";
import { commitCommand } from "../src/commands/commit.js";
import { configCommand } from "../src/commands/config.js";
import { configureUI } from "../src/lib/cli-ui.js";
import { createProgram } from "../src/program.js";
import { isCI, isStdoutTTY } from "../src/lib/tty.js";

function isPackageManifest(
  value: unknown,
): value is { name: string; version: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    "version" in value &&
    typeof value.name === "string" &&
    typeof value.version === "string"
  );
}

// Read version from package.json dynamically
// Works from both source (bin/) and compiled (dist/bin/) locations
function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const candidate = resolve(dir, "package.json");
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (isPackageManifest(pkg) && pkg.name === "gitscribe") {
        return pkg.version;
      }
    } catch {
      // Not found, continue searching
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

// Handle --no-color before parsing
if (process.argv.includes("--no-color")) {
  process.env.FORCE_COLOR = "0";
}

configureUI({
  noColor: process.argv.includes("--no-color") || !!process.env.NO_COLOR,
  verbose: process.argv.includes("--verbose"),
  isTTY: isStdoutTTY(),
  isCI: isCI(),
  minimal: process.env.GITSCRIBE_MINIMAL === "1",
});

const program = createProgram(
  { commit: commitCommand, config: configCommand },
  getVersion(),
);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
