/**
 * @file envUtils.ts
 *
 * Utility functions for environment variable management in release scripts.
 *
 * These utilities check that required environment variables are present
 * before a release starts, so a missing credential is reported up front
 * instead of as a failed login halfway through the pipeline.
 */

import { ConfigError } from '../release/errors'

/**
 * Validates that required environment variables are set
 *
 * @param envVars Array of required environment variable names
 * @param env Environment to check, process.env by default
 * @throws ConfigError naming every missing variable
 */
export function validateEnvVariables(
  envVars: string[],
  env: NodeJS.ProcessEnv = process.env,
): void {
  const missingVars = envVars.filter((varName) => !env[varName])
  if (missingVars.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missingVars.join(', ')}`,
    )
  }
}

/**
 * Reads a boolean flag from the environment. Only the string `true` counts.
 *
 * @param env Environment to read from
 * @param name Variable name
 */
export function isFlagSet(env: NodeJS.ProcessEnv, name: string): boolean {
  return env[name] === 'true'
}
