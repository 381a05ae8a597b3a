/**
 * Terminal and CI detection
 *
 * The commit session is driven by prompts, so it needs a terminal on both
 * ends. Spinners and the logo also check here before animating.
 */

type Env = NodeJS.ProcessEnv;

/** CI services keyed by the variable each one sets, most specific first */
const CI_SERVICES: ReadonlyArray<readonly [variable: string, name: string]> = [
  ["GITHUB_ACTIONS", "GitHub Actions"],
  ["GITLAB_CI", "GitLab CI"],
  ["CIRCLECI", "CircleCI"],
  ["TRAVIS", "Travis CI"],
  ["JENKINS_URL", "Jenkins"],
  ["BUILDKITE", "Buildkite"],
  ["DRONE", "Drone"],
  ["TEAMCITY_VERSION", "TeamCity"],
  ["TF_BUILD", "Azure Pipelines"],
  ["CODEBUILD_BUILD_ID", "AWS CodeBuild"],
  ["CONTINUOUS_INTEGRATION", "CI"],
  ["CI", "CI"],
];

export function isStdinTTY(): boolean {
  return process.stdin.isTTY === true;
}

export function isStdoutTTY(): boolean {
  return process.stdout.isTTY === true;
}

/**
 * Name of the CI service the process runs under, or null outside CI
 */
export function detectCI(env: Env = process.env): string | null {
  const match = CI_SERVICES.find(([variable]) => Boolean(env[variable]));
  return match ? match[1] : null;
}

export function isCI(env: Env = process.env): boolean {
  return detectCI(env) !== null;
}

/**
 * Why prompts cannot be shown here, or null when they can
 */
export function getNonInteractiveReason(env: Env = process.env): string | null {
  if (!isStdinTTY()) return "stdin is not a terminal (piped input detected)";
  if (!isStdoutTTY()) return "stdout is not a terminal";
  const service = detectCI(env);
  return service ? `running under ${service}` : null;
}
