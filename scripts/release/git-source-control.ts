/**
 * @file git-source-control.ts
 *
 * Source control collaborator backed by the git CLI. The commit identity is
 * handed to each commit with `-c user.name=… -c user.email=…`, so the
 * repository or global git config is never modified by a run.
 */

import { executeProcessAsync, FAILED_EXIT_CODE } from '../utils/processUtils'
import { Logger } from './helpers'
import {
  CommandOptions,
  CommandResult,
  GitIdentity,
  SourceControl,
} from './types'

const EMAIL_PATTERN = /^[^\s@<>]+@[^\s@<>]+$/

export class GitSourceControl implements SourceControl {
  private identity: GitIdentity | null = null

  constructor(
    private readonly cwd: string,
    private readonly logger: Logger,
    private readonly verbose = false,
  ) {}

  async checkout(ref: string, options?: CommandOptions): Promise<CommandResult> {
    return this.git(['checkout', '--force', ref], options)
  }

  async configureIdentity(identity: GitIdentity): Promise<CommandResult> {
    if (identity.name.trim().length === 0) {
      return failure('git identity name is empty')
    }
    if (!EMAIL_PATTERN.test(identity.email)) {
      return failure(`git identity email is invalid: ${identity.email}`)
    }
    this.identity = identity
    return {
      exitCode: 0,
      stdout: `commits will be authored by ${identity.name} <${identity.email}>`,
      stderr: '',
    }
  }

  /**
   * Commits the version change and creates an annotated tag for it.
   */
  async commitRelease(
    version: string,
    tag: string,
    options?: CommandOptions,
  ): Promise<CommandResult> {
    if (!this.identity) {
      return failure('git identity has not been configured for this run')
    }
    const identityArgs = [
      '-c',
      `user.name=${this.identity.name}`,
      '-c',
      `user.email=${this.identity.email}`,
    ]

    const commit = await this.git(
      [...identityArgs, 'commit', '--all', '-m', `chore(release): ${version}`],
      options,
    )
    if (commit.exitCode !== 0) {
      return commit
    }

    const tagged = await this.git(
      [...identityArgs, 'tag', '-a', tag, '-m', tag],
      options,
    )
    return {
      exitCode: tagged.exitCode,
      stdout: commit.stdout + tagged.stdout,
      stderr: commit.stderr + tagged.stderr,
    }
  }

  /**
   * Pushes the current branch head and the release tag in one atomic push.
   */
  async push(
    remote: string,
    tag: string,
    options?: CommandOptions,
  ): Promise<CommandResult> {
    return this.git(['push', '--atomic', remote, 'HEAD', tag], options)
  }

  private async git(
    args: string[],
    options?: CommandOptions,
  ): Promise<CommandResult> {
    if (this.verbose) {
      this.logger.log(`$ git ${args.join(' ')}`)
    }
    return executeProcessAsync('git', args, {
      cwd: this.cwd,
      signal: options?.signal,
      onOutput: this.verbose ? (chunk) => this.logger.log(chunk.trimEnd()) : undefined,
    })
  }
}

function failure(message: string): CommandResult {
  return { exitCode: FAILED_EXIT_CODE, stdout: '', stderr: message }
}
