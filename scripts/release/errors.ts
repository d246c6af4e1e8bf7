/**
 * @file errors.ts
 *
 * Error taxonomy for release runs. Stage failures carry the stage they
 * happened in and a kind the host uses to pick a remediation; the remaining
 * errors are raised before a run starts.
 */

import { FailureKind, StageName } from './types'

export class ReleaseError extends Error {
  constructor(
    message: string,
    readonly kind: FailureKind,
    readonly stage: StageName,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = kind
  }
}

/**
 * Checkout, identity or tool install failed
 */
export class SetupFailure extends ReleaseError {
  constructor(message: string, stage: StageName, options?: { cause?: unknown }) {
    super(message, 'SetupFailure', stage, options)
  }
}

/**
 * Build or test failed
 */
export class VerificationFailure extends ReleaseError {
  constructor(message: string, stage: StageName, options?: { cause?: unknown }) {
    super(message, 'VerificationFailure', stage, options)
  }
}

export class AuthFailure extends ReleaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AuthFailure', 'Authenticating', options)
  }
}

export class VersionFailure extends ReleaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VersionFailure', 'VersionBumping', options)
  }
}

export class PublishFailure extends ReleaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PublishFailure', 'Publishing', options)
  }
}

/**
 * Commit, tag or push failed after the registry accepted the version
 */
export class PushFailure extends ReleaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PushFailure', 'Pushing', options)
  }
}

export class TriggerRejectedError extends Error {
  name = 'TriggerRejectedError'
}

export class RunLockedError extends Error {
  name = 'RunLockedError'
}

export class ConfigError extends Error {
  name = 'ConfigError'
}

export class VersionError extends Error {
  name = 'VersionError'
}
