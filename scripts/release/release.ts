#!/usr/bin/env node
/**
 * @file release.ts
 *
 * Command line entry point for the release pipeline, run by the release
 * workflow on every push to the release branch and on manual dispatch.
 *
 * It resolves the trigger from the CI environment, takes the per-branch run
 * lock, runs the pipeline with the git and npm collaborators, and reports the
 * outcome through the process exit code:
 * - 0: released, dry run finished, or trigger skipped
 * - 1: failed at a stage, or another run holds the lock
 * - 2: published but the tag was not pushed
 *
 * SIGINT and SIGTERM abort the running stage, which is then reported as the
 * failing stage.
 */

import { describeConfig, loadReleaseConfig } from './config'
import { ENV_VARS, EXIT_CODES } from './constants'
import { createLogger, getPackageInfo, Logger } from './helpers'
import { GitSourceControl } from './git-source-control'
import { NpmRegistry } from './npm-registry'
import { NpmToolchain } from './npm-toolchain'
import { describeState, runRelease } from './orchestrator'
import { acquireRunLock, resolveLockDir } from './run-lock'
import { resolveTrigger, shouldStartRun } from './trigger'
import { PipelineRun, RunOutcome } from './types'

/**
 * Maps a run outcome to the exit code reported to the host.
 */
export function exitCodeFor(outcome: RunOutcome | undefined): number {
  switch (outcome?.status) {
    case 'succeeded':
      return EXIT_CODES.SUCCEEDED
    case 'published-but-not-pushed':
      return EXIT_CODES.PUBLISHED_BUT_NOT_PUSHED
    default:
      return EXIT_CODES.FAILED
  }
}

/**
 * Logs one line per stage and the final state of a run.
 */
export function reportRun(run: PipelineRun, logger: Logger): void {
  for (const stage of run.stages) {
    const seconds = (stage.finishedAt.getTime() - stage.startedAt.getTime()) / 1000
    logger.log(
      `${stage.ok ? '✅' : '❌'} ${stage.stage} (exit ${stage.exitCode}, ${seconds.toFixed(1)}s)`,
    )
  }
  logger.log(`Final state: ${describeState(run.state)}`)
}

export async function main(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<number> {
  const config = loadReleaseConfig(env, cwd)
  // Only config keeps the credential from here on; spawned commands never see it
  delete env[ENV_VARS.NPM_TOKEN]
  const logger = createLogger(config.credential ? [config.credential] : [])
  describeConfig(config, logger)

  const trigger = resolveTrigger(env)
  const decision = shouldStartRun(trigger, config)
  if (!decision.allowed) {
    logger.log(`Skipping release: ${decision.reason}`)
    return EXIT_CODES.SUCCEEDED
  }

  const lock = acquireRunLock(resolveLockDir(cwd), config.releaseBranch)

  const controller = new AbortController()
  const abort = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, aborting the current stage`)
    controller.abort()
  }
  process.once('SIGINT', abort)
  process.once('SIGTERM', abort)

  try {
    const run = await runRelease(
      trigger,
      {
        sourceControl: new GitSourceControl(cwd, logger, config.verbose),
        toolchain: new NpmToolchain(cwd, config.commands, logger, config.verbose),
        registry: new NpmRegistry(cwd, config.registryUrl, logger),
      },
      config,
      {
        logger,
        readPackage: () => getPackageInfo(cwd),
        signal: controller.signal,
      },
    )
    reportRun(run, logger)
    return exitCodeFor(run.outcome)
  } finally {
    process.off('SIGINT', abort)
    process.off('SIGTERM', abort)
    lock.release()
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      console.error('\n❌ Release pipeline could not run:')
      console.error(error instanceof Error ? error.message : String(error))
      process.exitCode = EXIT_CODES.FAILED
    })
}
