/**
 * Branch naming helpers
 */

/**
 * Substrings git refuses in branch names
 */
const INVALID_BRANCH_SEQUENCES = [
  "..",
  "~",
  "^",
  ":",
  "?",
  "*",
  "[",
  "\\",
  " ",
];

/**
 * Validate a branch name before handing it to git
 *
 * @returns An error message, or null when the name is acceptable
 */
export function validateBranchName(name: string): string | null {
  if (name === "") {
    return "branch name cannot be empty";
  }
  if (name.startsWith("-")) {
    return "branch name cannot start with a hyphen";
  }
  for (const sequence of INVALID_BRANCH_SEQUENCES) {
    if (name.includes(sequence)) {
      return `branch name contains invalid character: ${sequence}`;
    }
  }
  return null;
}

function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const day = date.getDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Suggest a branch name from the committer identity and a date
 *
 * Convention: <identity>/feature-<YYYY-MM-DD>, identity lowercased with
 * spaces turned into hyphens ("dev" when unknown).
 */
export function generateDefaultBranchName(
  identity: string | null,
  now: Date = new Date(),
): string {
  const trimmed = identity?.trim() ?? "";
  const user = trimmed ? trimmed.toLowerCase().replace(/ /g, "-") : "dev";
  return `${user}/feature-${formatDate(now)}`;
}
