import path from 'path'

/**
 * @file constants.ts
 *
 * Central configuration for the release pipeline scripts.
 *
 * Paths, environment variable names, stage ordering and the defaults used when
 * an environment variable is not set all live here, so the orchestrator, the
 * collaborators and the CLI agree on them.
 */
export const PATHS = {
  PACKAGE_JSON: 'package.json',
  NPMRC_PREFIX: 'release-npmrc-',
  GIT_DIR: '.git',
  LOCK_FILE_PREFIX: 'release-',
  LOCK_FILE_SUFFIX: '.lock',
}

/**
 * Environment variable names read by the release CLI
 */
export const ENV_VARS = {
  // Trigger related
  RELEASE_BRANCH: 'RELEASE_BRANCH',
  RELEASE_TRIGGER_BRANCH: 'RELEASE_TRIGGER_BRANCH',
  GITHUB_EVENT_NAME: 'GITHUB_EVENT_NAME',
  GITHUB_REF_NAME: 'GITHUB_REF_NAME',

  // Source control
  RELEASE_REMOTE: 'RELEASE_REMOTE',
  GIT_USER_NAME: 'GIT_USER_NAME',
  GIT_USER_EMAIL: 'GIT_USER_EMAIL',

  // Commands
  RELEASE_INSTALL_COMMAND: 'RELEASE_INSTALL_COMMAND',
  RELEASE_BUILD_COMMAND: 'RELEASE_BUILD_COMMAND',
  RELEASE_TEST_COMMAND: 'RELEASE_TEST_COMMAND',
  RELEASE_VERBOSE: 'RELEASE_VERBOSE',

  // NPM related
  NPM_TOKEN: 'NPM_TOKEN',
  NPM_REGISTRY: 'NPM_REGISTRY',
  RELEASE_DIST_TAG: 'RELEASE_DIST_TAG',
  NOT_DRY_RUN: 'NOT_DRY_RUN',
  CI: 'CI',
}

/**
 * Values used when the matching environment variable is not set
 */
export const DEFAULTS = {
  RELEASE_BRANCH: 'master',
  RELEASE_REMOTE: 'origin',
  GIT_USER_NAME: 'github-actions[bot]',
  GIT_USER_EMAIL: 'github-actions[bot]@users.noreply.github.com',
  INSTALL_COMMAND: 'npm ci',
  BUILD_COMMAND: 'npm run build',
  TEST_COMMAND: 'npm test',
  NPM_REGISTRY: 'https://registry.npmjs.org/',
  DIST_TAG: 'latest',
  TAG_PREFIX: 'v',
}

/**
 * Pipeline states in the order a run walks through them
 */
export const STAGE_ORDER = [
  'Checkout',
  'ToolSetup',
  'Building',
  'Testing',
  'Authenticating',
  'VersionBumping',
  'Publishing',
  'Pushing',
] as const

/**
 * Process exit codes reported to the host for each outcome
 */
export const EXIT_CODES = {
  SUCCEEDED: 0,
  FAILED: 1,
  PUBLISHED_BUT_NOT_PUSHED: 2,
}

/**
 * Builds the git tag for a released version, e.g. `v1.2.4`
 *
 * @param version - Plain semver version
 * @returns The tag name
 */
export function getReleaseTag(version: string): string {
  return `${DEFAULTS.TAG_PREFIX}${version}`
}

/**
 * Retrieves the absolute path to the package manifest being released.
 *
 * @param cwd - Root of the package checkout
 * @returns Absolute path to package.json
 *
 * @example
 * getPackageJsonPath('/project/root') // '/project/root/package.json'
 */
export function getPackageJsonPath(cwd: string): string {
  return path.join(cwd, PATHS.PACKAGE_JSON)
}

/**
 * Retrieves the path of the run lock file for a branch. The branch name is
 * percent-encoded, so distinct branches never share a file.
 *
 * @param dir - Directory holding lock files
 * @param branch - Branch the run targets
 *
 * @example
 * getLockFilePath('/repo/.git', 'release/1.x') // '/repo/.git/release-release%2F1.x.lock'
 */
export function getLockFilePath(dir: string, branch: string): string {
  return path.join(
    dir,
    `${PATHS.LOCK_FILE_PREFIX}${encodeURIComponent(branch)}${PATHS.LOCK_FILE_SUFFIX}`,
  )
}
