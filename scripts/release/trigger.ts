/**
 * @file trigger.ts
 *
 * Decides whether a trigger event may start a release run. Only a push to the
 * configured release branch, or a manual dispatch, is allowed through.
 */

import { ENV_VARS } from './constants'
import { ReleaseConfig, TriggerEvent } from './types'

export type TriggerDecision =
  | { allowed: true }
  | { allowed: false; reason: string }

const MANUAL_EVENT = 'workflow_dispatch'

export function shouldStartRun(
  trigger: TriggerEvent,
  config: Pick<ReleaseConfig, 'releaseBranch'>,
): TriggerDecision {
  if (trigger.kind === 'manual') {
    return { allowed: true }
  }
  if (trigger.branch === config.releaseBranch) {
    return { allowed: true }
  }
  return {
    allowed: false,
    reason: `push to ${trigger.branch || '(unknown branch)'} does not match release branch ${config.releaseBranch}`,
  }
}

/**
 * Builds the trigger event from the CI environment. A `workflow_dispatch`
 * event is a manual trigger; anything else is treated as a push of the
 * current ref.
 *
 * @param env - Environment to read, process.env by default
 */
export function resolveTrigger(
  env: NodeJS.ProcessEnv = process.env,
): TriggerEvent {
  if (env[ENV_VARS.GITHUB_EVENT_NAME] === MANUAL_EVENT) {
    return { kind: 'manual' }
  }
  return {
    kind: 'push',
    branch:
      env[ENV_VARS.RELEASE_TRIGGER_BRANCH] ||
      env[ENV_VARS.GITHUB_REF_NAME] ||
      '',
  }
}
