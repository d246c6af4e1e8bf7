/**
 * @file orchestrator.ts
 *
 * Runs one release: checkout, tool setup, build, test, authenticate, version
 * bump, publish and push, strictly in that order. A stage that fails ends the
 * run at that stage and nothing after it runs.
 *
 * The manifest is read after checkout, so the package name and the fallback
 * baseline version come from the ref being released.
 *
 * The publish gate is structural. The registry and the push are only reached
 * after the build and test stages have returned successfully, so a failed
 * verification can never produce a published version or a pushed tag.
 *
 * The registry session exists from the Authenticating stage until publishing
 * finishes and is disposed in a `finally`, so the credential does not outlive
 * that window on any path. A failure after a successful publish is reported
 * as `published-but-not-pushed`: the registry has the version, the remote
 * does not have the tag.
 */

import { STAGE_ORDER, getReleaseTag } from './constants'
import {
  AuthFailure,
  PublishFailure,
  PushFailure,
  ReleaseError,
  SetupFailure,
  TriggerRejectedError,
  VerificationFailure,
  VersionFailure,
} from './errors'
import { FAILED_EXIT_CODE } from '../utils/processUtils'
import { shouldStartRun } from './trigger'
import {
  Collaborators,
  CommandResult,
  PipelineRun,
  RegistrySession,
  ReleaseConfig,
  ReleaseState,
  RunOptions,
  StageName,
  StageResult,
  TriggerEvent,
} from './types'
import { planNextVersion } from './version'

type FailureFactory = (message: string, cause?: unknown) => ReleaseError

/**
 * Checks that a move between two pipeline states is allowed. States advance
 * one step at a time in `STAGE_ORDER`, the last stage advances to
 * `Succeeded`, and any in-progress stage may fail.
 *
 * @throws Error if the transition is not part of the state machine
 */
export function assertTransition(from: ReleaseState, to: ReleaseState): void {
  if (typeof from === 'object' || from === 'Succeeded') {
    throw new Error(`Run is already terminal (${describeState(from)})`)
  }

  if (typeof to === 'object') {
    if (from !== 'Idle' && to.failedAt === from) return
    throw new Error(
      `Invalid transition ${describeState(from)} -> ${describeState(to)}`,
    )
  }

  const fromIndex = from === 'Idle' ? -1 : STAGE_ORDER.indexOf(from)
  const expected =
    fromIndex + 1 < STAGE_ORDER.length ? STAGE_ORDER[fromIndex + 1] : 'Succeeded'
  if (to !== expected) {
    throw new Error(
      `Invalid transition ${describeState(from)} -> ${describeState(to)}`,
    )
  }
}

export function describeState(state: ReleaseState): string {
  return typeof state === 'object' ? `FailedAt(${state.failedAt})` : state
}

/**
 * Runs the release pipeline for one trigger event.
 *
 * @param trigger - Why the run was started
 * @param collaborators - Source control, toolchain and registry to drive
 * @param config - Release configuration
 * @param options - Logger, manifest reader, abort signal and transition hook
 * @returns The finished run with every stage result and the outcome
 * @throws TriggerRejectedError if the trigger may not start a run
 */
export async function runRelease(
  trigger: TriggerEvent,
  collaborators: Collaborators,
  config: ReleaseConfig,
  options: RunOptions,
): Promise<PipelineRun> {
  const decision = shouldStartRun(trigger, config)
  if (!decision.allowed) {
    throw new TriggerRejectedError(decision.reason)
  }

  const { sourceControl, toolchain, registry } = collaborators
  const { logger, signal } = options
  const run: PipelineRun = { trigger, state: 'Idle', stages: [] }

  const moveTo = (to: ReleaseState): void => {
    assertTransition(run.state, to)
    options.onTransition?.(run.state, to)
    run.state = to
  }

  const runStage = async (
    stage: StageName,
    fail: FailureFactory,
    work: () => Promise<CommandResult>,
  ): Promise<CommandResult> => {
    moveTo(stage)
    logger.log(`--- Starting ${stage} stage ---`)
    const startedAt = new Date()

    let result: CommandResult
    let cause: unknown
    if (signal?.aborted) {
      result = failedResult(`run aborted before ${stage}`)
    } else {
      try {
        result = await work()
      } catch (error) {
        cause = error
        result = failedResult(errorMessage(error))
      }
    }

    const stageResult: StageResult = Object.freeze({
      stage,
      ok: result.exitCode === 0,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      startedAt,
      finishedAt: new Date(),
    })
    run.stages.push(stageResult)

    if (!stageResult.ok) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`
      throw fail(`${stage} failed: ${detail}`, cause)
    }
    return result
  }

  const ref = trigger.kind === 'push' ? trigger.branch : config.releaseBranch
  let publishedVersion: string | undefined
  let packageName = ''
  let manifestVersion = ''

  try {
    await runStage('Checkout', setupFailure('Checkout'), async () => {
      const checkout = await sourceControl.checkout(ref, { signal })
      if (checkout.exitCode !== 0) return checkout
      const manifest = options.readPackage()
      packageName = manifest.name
      manifestVersion = manifest.version
      const identity = await sourceControl.configureIdentity(config.identity)
      return mergeResults(checkout, identity)
    })

    await runStage('ToolSetup', setupFailure('ToolSetup'), () =>
      toolchain.install({ signal }),
    )

    await runStage('Building', verificationFailure('Building'), () =>
      toolchain.build({ signal }),
    )
    await runStage('Testing', verificationFailure('Testing'), () =>
      toolchain.test({ signal }),
    )
    logger.log('✅ Build and tests passed')

    let session: RegistrySession | null = null
    let nextVersion = ''
    try {
      await runStage('Authenticating', authFailure, async () => {
        if (config.dryRun) {
          return okResult('DRY RUN: skipping registry login')
        }
        if (!config.credential) {
          return failedResult('no registry credential supplied')
        }
        session = await registry.login(config.credential, { signal })
        return okResult(`authenticated as ${session.user}`)
      })

      await runStage('VersionBumping', versionFailure, async () => {
        const plan = await planNextVersion(
          registry,
          packageName,
          manifestVersion,
          logger,
        )
        nextVersion = plan.next
        return okResult(`${plan.baseline} -> ${plan.next} (${plan.source})`)
      })

      await runStage('Publishing', publishFailure, async () => {
        if (await registry.isPublished(packageName, nextVersion)) {
          return failedResult(
            `${packageName}@${nextVersion} is already published; refusing to overwrite`,
          )
        }
        logger.log(`Publishing ${packageName}@${nextVersion}`)
        return registry.publish(
          session,
          {
            packageName,
            version: nextVersion,
            distTag: config.distTag,
            dryRun: config.dryRun,
          },
          { signal },
        )
      })
    } finally {
      await disposeSession(session)
    }

    if (!config.dryRun) {
      publishedVersion = nextVersion
      logger.log(`✅ Published ${packageName}@${nextVersion}`)
    }

    const tag = getReleaseTag(nextVersion)
    await runStage('Pushing', pushFailure, async () => {
      if (config.dryRun) {
        return okResult(`DRY RUN: not tagging ${tag} or pushing to ${config.remote}`)
      }
      const commit = await sourceControl.commitRelease(nextVersion, tag, {
        signal,
      })
      if (commit.exitCode !== 0) return commit
      const push = await sourceControl.push(config.remote, tag, { signal })
      return mergeResults(commit, push)
    })

    moveTo('Succeeded')
    run.outcome = {
      status: 'succeeded',
      version: nextVersion,
      tag,
      dryRun: config.dryRun,
    }
    logger.log(
      config.dryRun
        ? `✅ Dry run completed for ${packageName}@${nextVersion}`
        : `✅ Released ${packageName}@${nextVersion} and pushed ${tag}`,
    )
  } catch (error) {
    if (!(error instanceof ReleaseError)) {
      throw error
    }
    moveTo({ failedAt: error.stage })

    if (error instanceof PushFailure && publishedVersion) {
      const tag = getReleaseTag(publishedVersion)
      run.outcome = {
        status: 'published-but-not-pushed',
        version: publishedVersion,
        tag,
        error,
      }
      logger.error(
        `❌ ${packageName}@${publishedVersion} is published but ${tag} was not pushed to ${config.remote}`,
      )
      logger.error(`Push ${tag} by hand; do not re-publish ${publishedVersion}`)
    } else {
      run.outcome = {
        status: 'failed',
        stage: error.stage,
        kind: error.kind,
        error,
      }
      logger.error(`❌ Release failed at ${error.stage} (${error.kind})`)
    }
    logger.error(error.message)
  }

  return run

  async function disposeSession(session: RegistrySession | null): Promise<void> {
    if (!session) return
    await session.dispose()
    logger.log('Registry session closed')
  }
}

const setupFailure =
  (stage: StageName): FailureFactory =>
  (message, cause) =>
    new SetupFailure(message, stage, { cause })

const verificationFailure =
  (stage: StageName): FailureFactory =>
  (message, cause) =>
    new VerificationFailure(message, stage, { cause })

const authFailure: FailureFactory = (message, cause) =>
  new AuthFailure(message, { cause })

const versionFailure: FailureFactory = (message, cause) =>
  new VersionFailure(message, { cause })

const publishFailure: FailureFactory = (message, cause) =>
  new PublishFailure(message, { cause })

const pushFailure: FailureFactory = (message, cause) =>
  new PushFailure(message, { cause })

function okResult(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: '' }
}

function failedResult(stderr: string): CommandResult {
  return { exitCode: FAILED_EXIT_CODE, stdout: '', stderr }
}

function mergeResults(first: CommandResult, second: CommandResult): CommandResult {
  return {
    exitCode: second.exitCode,
    stdout: first.stdout + second.stdout,
    stderr: first.stderr + second.stderr,
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
