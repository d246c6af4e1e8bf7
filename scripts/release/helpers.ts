/**
 * @file helpers.ts
 *
 * Shared helpers for the release pipeline: the logger interface used by every
 * stage, secret redaction for anything that is logged, and package manifest
 * access.
 */

import fs from 'fs'
import semver from 'semver'
import { getPackageJsonPath } from './constants'
import { ConfigError } from './errors'

// Define a logger interface to make it consistent with the semantic-release logger
export interface Logger {
  log: (message: string) => void
  error: (message: string) => void
  warn: (message: string) => void
}

export interface PackageInfo {
  name: string
  version: string
}

const REDACTED = '***'

/**
 * Replaces every occurrence of each secret in a message with `***`.
 *
 * @param message - Text about to be logged
 * @param secrets - Values that must never appear in output
 * @returns The message with all secrets masked
 *
 * @example
 * redact('token=abc', ['abc']) // 'token=***'
 */
export function redact(message: string, secrets: readonly string[]): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((text, secret) => text.split(secret).join(REDACTED), message)
}

/**
 * Creates a logger that masks the given secrets before writing.
 *
 * @param secrets - Values to mask, typically the registry credential
 * @param sink - Underlying logger, the console by default
 */
export function createLogger(
  secrets: readonly string[] = [],
  sink: Logger = {
    log: console.log,
    error: console.error,
    warn: console.warn,
  },
): Logger {
  return {
    log: (message) => sink.log(redact(message, secrets)),
    warn: (message) => sink.warn(redact(message, secrets)),
    error: (message) => sink.error(redact(message, secrets)),
  }
}

/**
 * Validates that a string is a plain `major.minor.patch` release version.
 * Prerelease and build suffixes are rejected since only patch bumps are made.
 *
 * @param version - Version string to validate
 */
export function isReleaseVersion(version: string): boolean {
  const parsed = semver.parse(version)
  return (
    parsed !== null &&
    parsed.prerelease.length === 0 &&
    parsed.build.length === 0
  )
}

/**
 * Reads the name and version of the package at `cwd`.
 *
 * @param cwd - Directory containing package.json
 * @throws ConfigError if the manifest is missing or lacks name/version
 */
export function getPackageInfo(cwd: string): PackageInfo {
  const packageJsonPath = getPackageJsonPath(cwd)
  if (!fs.existsSync(packageJsonPath)) {
    throw new ConfigError(`package.json not found at ${packageJsonPath}`)
  }

  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf8'),
  )
  if (typeof packageJson !== 'object' || packageJson === null) {
    throw new ConfigError(`Invalid package.json at ${packageJsonPath}`)
  }

  const name = 'name' in packageJson ? packageJson.name : undefined
  const version = 'version' in packageJson ? packageJson.version : undefined
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigError('Invalid package.json: missing "name" field')
  }
  if (typeof version !== 'string' || version.length === 0) {
    throw new ConfigError('Invalid package.json: missing "version" field')
  }
  return { name, version }
}
