/**
 * @file version.ts
 *
 * Determines the version a run publishes. The baseline is the latest version
 * on the registry, or the manifest version for a package that has never been
 * published, and the next version is always the patch bump of that baseline.
 * There is no minor or major bump.
 */

import semver from 'semver'
import { VersionError } from './errors'
import { isReleaseVersion, Logger } from './helpers'
import { Registry } from './types'

export interface VersionPlan {
  baseline: string
  next: string
  // Whether the baseline came from the registry or from package.json
  source: 'registry' | 'manifest'
}

/**
 * Increments the patch component of a plain release version.
 *
 * @param version - Version in `major.minor.patch` form
 * @returns The next patch version
 * @throws VersionError if the version is not a plain release version
 *
 * @example
 * bumpPatch('1.2.3') // '1.2.4'
 */
export function bumpPatch(version: string): string {
  if (!isReleaseVersion(version)) {
    throw new VersionError(
      `Cannot bump ${version}: expected a major.minor.patch release version`,
    )
  }
  const next = semver.inc(version, 'patch')
  if (!next) {
    throw new VersionError(`Cannot bump ${version}`)
  }
  return next
}

/**
 * Proposes the next version for a package from its last published version.
 *
 * @param registry - Registry to read the latest published version from
 * @param packageName - Package being released
 * @param manifestVersion - Version in package.json, used when nothing is published
 * @param logger - Logger instance for output messages
 */
export async function planNextVersion(
  registry: Pick<Registry, 'latestVersion'>,
  packageName: string,
  manifestVersion: string,
  logger: Logger,
): Promise<VersionPlan> {
  const published = await registry.latestVersion(packageName)

  if (published === null) {
    logger.log(
      `No published version of ${packageName} found, starting from package.json version ${manifestVersion}`,
    )
    return {
      baseline: manifestVersion,
      next: bumpPatch(manifestVersion),
      source: 'manifest',
    }
  }

  logger.log(`Found published version: ${published}`)
  return { baseline: published, next: bumpPatch(published), source: 'registry' }
}
