/**
 * @file processUtils.ts
 *
 * Utility functions for process execution using async/await with proper Promise handling.
 *
 * Every pipeline stage ends up here: a command is spawned in the package
 * checkout, its output is captured for the stage result, and its exit code is
 * returned rather than thrown so the caller decides what a failure means.
 *
 * Key features:
 * - Promise-based wrapper around Node.js child_process.spawn
 * - Environment variable handling with parent env inheritance, minus the
 *   registry credential
 * - Output capture with optional streaming to a logger
 * - Abort support, so a host timeout kills the running command
 */

import { spawn, SpawnOptions } from 'child_process'
import { ENV_VARS } from '../release/constants'
import { CommandResult } from '../release/types'

export interface ProcessOptions {
  cwd: string
  env?: NodeJS.ProcessEnv
  signal?: AbortSignal
  // Called with each chunk of output when the command should be streamed
  onOutput?: (chunk: string) => void
}

/**
 * Exit code reported when a command could not be started or was killed by a signal
 */
export const FAILED_EXIT_CODE = 1

/**
 * Parent variables no child command inherits. npm receives the registry
 * credential only through the session userconfig.
 */
export const WITHHELD_ENV_VARS: readonly string[] = [ENV_VARS.NPM_TOKEN]

/**
 * Builds the environment for a child process: the parent's environment
 * without the withheld variables, then the caller's additions.
 */
export function buildChildEnv(extra: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env }
  for (const name of WITHHELD_ENV_VARS) {
    delete env[name]
  }
  return { ...env, ...extra }
}

/**
 * Executes a process and resolves with its exit code and captured output.
 * The promise only rejects if `spawn` itself throws synchronously; start-up
 * errors, aborts and signals resolve with a non-zero exit code.
 *
 * @param command The command to execute
 * @param args Array of command arguments
 * @param options Working directory, extra env and abort signal
 * @returns Exit code, stdout and stderr of the process
 */
export async function executeProcessAsync(
  command: string,
  args: string[],
  options: ProcessOptions,
): Promise<CommandResult> {
  const spawnOptions: SpawnOptions = {
    cwd: options.cwd,
    env: buildChildEnv(options.env),
    signal: options.signal,
    stdio: ['ignore', 'pipe', 'pipe'],
  }

  return new Promise((resolve) => {
    const proc = spawn(command, args, spawnOptions)
    let stdout = ''
    let stderr = ''
    let settled = false

    const finish = (exitCode: number, extra = ''): void => {
      if (settled) return
      settled = true
      resolve({ exitCode, stdout, stderr: stderr + extra })
    }

    proc.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString()
      stdout += chunk
      options.onOutput?.(chunk)
    })
    proc.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString()
      stderr += chunk
      options.onOutput?.(chunk)
    })

    proc.on('close', (code, signal) => {
      if (code === null) {
        finish(FAILED_EXIT_CODE, `\nprocess terminated by ${signal ?? 'signal'}`)
        return
      }
      finish(code)
    })

    proc.on('error', (error) => {
      finish(FAILED_EXIT_CODE, `\n${error.message}`)
    })
  })
}

/**
 * Simplified interface for running a configured command line such as
 * `npm run build`. The line is split into arguments; no shell is involved.
 *
 * @param commandLine The full command line to run
 * @param options Working directory, extra env and abort signal
 * @returns Exit code, stdout and stderr of the process
 */
export async function executeCommandLine(
  commandLine: string,
  options: ProcessOptions,
): Promise<CommandResult> {
  const [command, ...args] = splitCommandLine(commandLine)
  if (!command) {
    return { exitCode: FAILED_EXIT_CODE, stdout: '', stderr: 'empty command' }
  }
  return executeProcessAsync(command, args, options)
}

/**
 * Splits a command line on whitespace, keeping single- or double-quoted
 * segments together. No other shell syntax is interpreted.
 *
 * @example
 * splitCommandLine('npm run "build all"') // ['npm', 'run', 'build all']
 */
export function splitCommandLine(commandLine: string): string[] {
  const parts: string[] = []
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g
  let match: RegExpExecArray | null
  while ((match = pattern.exec(commandLine)) !== null) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? '')
  }
  return parts
}
