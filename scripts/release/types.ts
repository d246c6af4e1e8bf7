/**
 * @file types.ts
 *
 * Shared types for the release pipeline: trigger events, stage results, the
 * run outcome reported to the host, and the collaborator interfaces the
 * orchestrator drives. Collaborators are passed in explicitly so a run never
 * depends on process-wide git identity, installed tools or login state.
 */

import { STAGE_ORDER } from './constants'
import { Logger, PackageInfo } from './helpers'

export type TriggerEvent =
  | { kind: 'push'; branch: string }
  | { kind: 'manual' }

export type StageName = (typeof STAGE_ORDER)[number]

export type ReleaseState =
  | 'Idle'
  | StageName
  | 'Succeeded'
  | { failedAt: StageName }

export type FailureKind =
  | 'SetupFailure'
  | 'VerificationFailure'
  | 'AuthFailure'
  | 'VersionFailure'
  | 'PublishFailure'
  | 'PushFailure'

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface StageResult {
  readonly stage: StageName
  readonly ok: boolean
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
  readonly startedAt: Date
  readonly finishedAt: Date
}

export type RunOutcome =
  | { status: 'succeeded'; version: string; tag: string; dryRun: boolean }
  | {
      status: 'failed'
      stage: StageName
      kind: FailureKind
      error: Error
    }
  | {
      status: 'published-but-not-pushed'
      version: string
      tag: string
      error: Error
    }

export interface PipelineRun {
  trigger: TriggerEvent
  state: ReleaseState
  stages: StageResult[]
  outcome?: RunOutcome
}

export interface GitIdentity {
  name: string
  email: string
}

/**
 * Options handed to every command a collaborator runs
 */
export interface CommandOptions {
  signal?: AbortSignal
}

export interface SourceControl {
  checkout(ref: string, options?: CommandOptions): Promise<CommandResult>
  configureIdentity(identity: GitIdentity): Promise<CommandResult>
  commitRelease(
    version: string,
    tag: string,
    options?: CommandOptions,
  ): Promise<CommandResult>
  push(
    remote: string,
    tag: string,
    options?: CommandOptions,
  ): Promise<CommandResult>
}

export interface Toolchain {
  install(options?: CommandOptions): Promise<CommandResult>
  build(options?: CommandOptions): Promise<CommandResult>
  test(options?: CommandOptions): Promise<CommandResult>
}

/**
 * An authenticated registry session. Holds the credential until disposed.
 */
export interface RegistrySession {
  readonly user: string
  dispose(): Promise<void>
}

export interface PublishRequest {
  packageName: string
  version: string
  distTag: string
  dryRun: boolean
}

export interface Registry {
  login(credential: string, options?: CommandOptions): Promise<RegistrySession>
  latestVersion(packageName: string): Promise<string | null>
  isPublished(packageName: string, version: string): Promise<boolean>
  publish(
    session: RegistrySession | null,
    request: PublishRequest,
    options?: CommandOptions,
  ): Promise<CommandResult>
}

export interface Collaborators {
  sourceControl: SourceControl
  toolchain: Toolchain
  registry: Registry
}

export interface ReleaseConfig {
  cwd: string
  releaseBranch: string
  remote: string
  identity: GitIdentity
  credential?: string
  registryUrl: string
  distTag: string
  dryRun: boolean
  verbose: boolean
  commands: {
    install: string
    build: string
    test: string
  }
}

export interface RunOptions {
  logger: Logger
  // Reads the package manifest; called once the release ref is checked out
  readPackage: () => PackageInfo
  signal?: AbortSignal
  onTransition?: (from: ReleaseState, to: ReleaseState) => void
}
