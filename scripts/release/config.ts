/**
 * @file config.ts
 *
 * Builds the release configuration from environment variables. A `.env` file
 * in the working directory is loaded first, so local runs can be configured
 * the same way CI is.
 *
 * Publishing for real requires either `CI=true` or `NOT_DRY_RUN=true`;
 * everything else is a dry run that publishes with `--dry-run` and never
 * pushes. The registry credential is only required for real runs.
 */

import dotenv from 'dotenv'
import { DEFAULTS, ENV_VARS } from './constants'
import { ReleaseConfig } from './types'
import { isFlagSet, validateEnvVariables } from '../utils/envUtils'
import { Logger } from './helpers'

dotenv.config()

/**
 * Reads the release configuration from the environment.
 *
 * @param env - Environment to read, process.env by default
 * @param cwd - Root of the package checkout
 * @returns The complete release configuration
 * @throws ConfigError if a real run is requested without a credential
 */
export function loadReleaseConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ReleaseConfig {
  const dryRun = !(isFlagSet(env, ENV_VARS.CI) || isFlagSet(env, ENV_VARS.NOT_DRY_RUN))

  if (!dryRun) {
    validateEnvVariables([ENV_VARS.NPM_TOKEN], env)
  }

  return {
    cwd,
    releaseBranch: env[ENV_VARS.RELEASE_BRANCH] || DEFAULTS.RELEASE_BRANCH,
    remote: env[ENV_VARS.RELEASE_REMOTE] || DEFAULTS.RELEASE_REMOTE,
    identity: {
      name: env[ENV_VARS.GIT_USER_NAME] || DEFAULTS.GIT_USER_NAME,
      email: env[ENV_VARS.GIT_USER_EMAIL] || DEFAULTS.GIT_USER_EMAIL,
    },
    credential: env[ENV_VARS.NPM_TOKEN] || undefined,
    registryUrl: env[ENV_VARS.NPM_REGISTRY] || DEFAULTS.NPM_REGISTRY,
    distTag: env[ENV_VARS.RELEASE_DIST_TAG] || DEFAULTS.DIST_TAG,
    dryRun,
    verbose: isFlagSet(env, ENV_VARS.RELEASE_VERBOSE),
    commands: {
      install:
        env[ENV_VARS.RELEASE_INSTALL_COMMAND] || DEFAULTS.INSTALL_COMMAND,
      build: env[ENV_VARS.RELEASE_BUILD_COMMAND] || DEFAULTS.BUILD_COMMAND,
      test: env[ENV_VARS.RELEASE_TEST_COMMAND] || DEFAULTS.TEST_COMMAND,
    },
  }
}

/**
 * Logs the effective configuration. The credential is reported only as set
 * or unset.
 */
export function describeConfig(config: ReleaseConfig, logger: Logger): void {
  logger.log(`Release branch: ${config.releaseBranch}`)
  logger.log(`Push remote: ${config.remote}`)
  logger.log(`Commit identity: ${config.identity.name} <${config.identity.email}>`)
  logger.log(`Registry: ${config.registryUrl} (dist-tag ${config.distTag})`)
  logger.log(`Credential: ${config.credential ? 'set' : 'not set'}`)
  if (config.dryRun) {
    logger.log(
      `DRY RUN: set ${ENV_VARS.NOT_DRY_RUN} to true or run with ${ENV_VARS.CI}=true to publish`,
    )
  }
}
