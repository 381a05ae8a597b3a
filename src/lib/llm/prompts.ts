/**
 * Prompt templates for commit messages and pull requests
 */

import type { CommitMessageRequest } from "../workflow/types.js";

export const COMMIT_MAX_TOKENS = 1024;
export const PR_MAX_TOKENS = 2048;

export function buildCommitPrompt(request: CommitMessageRequest): string {
  const { commitType, scope, diff } = request;

  return `You are a commit message generator. Based on the following git diff, generate a concise commit message using conventional commits format.

The commit type is: ${commitType}
The scope is: ${scope}

Format: ${commitType}(${scope}): <description>

The description should be:
- Clear and concise (max 72 characters for the first line)
- In imperative mood (e.g., "add" not "added")
- Explain WHAT and WHY, not HOW

If the changes warrant it, you can add a body after a blank line with more details.

Git diff:
${diff}

Respond with ONLY the commit message, no explanations or markdown formatting.`;
}

export function buildPRPrompt(gitLog: string): string {
  return `You are a pull request generator. Based on the following git log from a branch, generate a clear and concise pull request title and body.

Git log:
${gitLog}

Generate:
1. A clear, concise PR title (max 72 characters) that summarizes the changes
2. A detailed PR body that:
   - Summarizes the changes in bullet points
   - Explains the motivation and context
   - Notes any breaking changes or important details

Format your response as:
[PR Title]
---BODY---
[PR Body]

Respond with ONLY the title and body in this format, no explanations or markdown code blocks.`;
}
