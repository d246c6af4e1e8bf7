/**
 * @file npm-registry.ts
 *
 * Registry collaborator for npm. Reads come from the registry through pacote;
 * login and publish go through the npm CLI.
 *
 * The credential never touches the user's npm config. `login` writes it to a
 * userconfig file in a fresh temporary directory and hands back a session
 * that points npm at that file; disposing the session deletes the directory.
 *
 * `publish` writes the release version into package.json before invoking
 * `npm publish` and puts the original manifest back if the publish fails or
 * is a dry run, so a failed run leaves no version change behind.
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import pacote from 'pacote'
import { getPackageJsonPath, PATHS } from './constants'
import { Logger } from './helpers'
import { executeProcessAsync, FAILED_EXIT_CODE } from '../utils/processUtils'
import {
  CommandOptions,
  CommandResult,
  PublishRequest,
  Registry,
  RegistrySession,
} from './types'

export class NpmRegistrySession implements RegistrySession {
  private disposed = false

  constructor(
    readonly user: string,
    readonly userconfigPath: string,
  ) {}

  get active(): boolean {
    return !this.disposed
  }

  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true
    await fs.promises.rm(path.dirname(this.userconfigPath), {
      recursive: true,
      force: true,
    })
  }
}

export class NpmRegistry implements Registry {
  constructor(
    private readonly cwd: string,
    private readonly registryUrl: string,
    private readonly logger: Logger,
  ) {}

  async login(
    credential: string,
    options?: CommandOptions,
  ): Promise<NpmRegistrySession> {
    const dir = await fs.promises.mkdtemp(
      path.join(os.tmpdir(), PATHS.NPMRC_PREFIX),
    )
    const userconfigPath = path.join(dir, '.npmrc')
    await fs.promises.writeFile(
      userconfigPath,
      buildUserconfig(this.registryUrl, credential),
      { mode: 0o600 },
    )
    const session = new NpmRegistrySession('', userconfigPath)

    const whoami = await this.npm(['whoami'], session, options)
    if (whoami.exitCode !== 0) {
      await session.dispose()
      throw new Error(
        `npm whoami failed against ${this.registryUrl}: ${whoami.stderr.trim()}`,
      )
    }

    const user = whoami.stdout.trim()
    this.logger.log(`Authenticated to ${this.registryUrl} as ${user}`)
    return new NpmRegistrySession(user, userconfigPath)
  }

  /**
   * Looks up the version behind the `latest` dist-tag.
   *
   * @returns The latest published version, or null if the package does not exist
   */
  async latestVersion(packageName: string): Promise<string | null> {
    try {
      const manifest = await pacote.manifest(`${packageName}@latest`, {
        registry: this.registryUrl,
        // Refresh cache to ensure we get the latest version
        preferOnline: true,
      })
      return manifest.version
    } catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }
  }

  async isPublished(packageName: string, version: string): Promise<boolean> {
    try {
      const packument = await pacote.packument(packageName, {
        registry: this.registryUrl,
        preferOnline: true,
      })
      return version in packument.versions
    } catch (error) {
      if (isNotFound(error)) {
        return false
      }
      throw error
    }
  }

  async publish(
    session: RegistrySession | null,
    request: PublishRequest,
    options?: CommandOptions,
  ): Promise<CommandResult> {
    if (!request.dryRun && !(session instanceof NpmRegistrySession && session.active)) {
      return {
        exitCode: FAILED_EXIT_CODE,
        stdout: '',
        stderr: 'no active npm session for publish',
      }
    }

    const packageJsonPath = getPackageJsonPath(this.cwd)
    const original = await fs.promises.readFile(packageJsonPath, 'utf8')
    updatePackageJsonVersion(this.cwd, request.version, this.logger)

    const args = ['publish', '--tag', request.distTag]
    if (request.dryRun) {
      args.push('--dry-run')
    }

    let result: CommandResult | undefined
    try {
      result = await this.npm(
        args,
        session instanceof NpmRegistrySession ? session : null,
        options,
      )
      return result
    } finally {
      if (!result || result.exitCode !== 0 || request.dryRun) {
        await fs.promises.writeFile(packageJsonPath, original, 'utf8')
        this.logger.log(`Restored package.json after publish of ${request.version}`)
      }
    }
  }

  private async npm(
    args: string[],
    session: NpmRegistrySession | null,
    options?: CommandOptions,
  ): Promise<CommandResult> {
    return executeProcessAsync(
      'npm',
      [...args, '--registry', this.registryUrl],
      {
        cwd: this.cwd,
        signal: options?.signal,
        env: session ? { NPM_CONFIG_USERCONFIG: session.userconfigPath } : {},
      },
    )
  }
}

/**
 * Builds the content of an npm userconfig holding an auth token for a registry.
 *
 * @example
 * buildUserconfig('https://registry.npmjs.org/', 'test-token')
 * // 'registry=https://registry.npmjs.org/\n//registry.npmjs.org/:_authToken=test-token\n'
 */
export function buildUserconfig(registryUrl: string, token: string): string {
  const url = new URL(registryUrl)
  const pathname = url.pathname.endsWith('/') ? url.pathname : `${url.pathname}/`
  return `registry=${url.href}\n//${url.host}${pathname}:_authToken=${token}\n`
}

/**
 * Updates the version field in package.json, keeping every other field.
 *
 * @param cwd - Directory containing package.json
 * @param version - Version to write
 * @param logger - Logger instance for output messages and errors
 */
export function updatePackageJsonVersion(
  cwd: string,
  version: string,
  logger: Logger,
): void {
  const packageJsonPath = getPackageJsonPath(cwd)
  try {
    const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'))
    packageJson.version = version
    fs.writeFileSync(
      packageJsonPath,
      JSON.stringify(packageJson, null, 2) + '\n',
      'utf8',
    )
    logger.log(`Updated version in package.json to ${version}`)
  } catch (error) {
    logger.error(
      `Error updating package.json version: ${(error as Error).message}`,
    )
    throw error
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'E404' || error.code === 'ETARGET')
  )
}
