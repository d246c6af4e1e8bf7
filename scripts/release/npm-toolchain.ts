/**
 * @file npm-toolchain.ts
 *
 * Tool install, build and test collaborator. Each stage runs the command line
 * configured for it (`npm ci`, `npm run build`, `npm test` by default) in the
 * package checkout.
 */

import { executeCommandLine } from '../utils/processUtils'
import { Logger } from './helpers'
import { CommandOptions, CommandResult, ReleaseConfig, Toolchain } from './types'

export class NpmToolchain implements Toolchain {
  constructor(
    private readonly cwd: string,
    private readonly commands: ReleaseConfig['commands'],
    private readonly logger: Logger,
    private readonly verbose = false,
  ) {}

  async install(options?: CommandOptions): Promise<CommandResult> {
    return this.run(this.commands.install, options)
  }

  async build(options?: CommandOptions): Promise<CommandResult> {
    return this.run(this.commands.build, options)
  }

  async test(options?: CommandOptions): Promise<CommandResult> {
    return this.run(this.commands.test, options)
  }

  private async run(
    commandLine: string,
    options?: CommandOptions,
  ): Promise<CommandResult> {
    this.logger.log(`$ ${commandLine}`)
    return executeCommandLine(commandLine, {
      cwd: this.cwd,
      signal: options?.signal,
      onOutput: this.verbose ? (chunk) => this.logger.log(chunk.trimEnd()) : undefined,
    })
  }
}
