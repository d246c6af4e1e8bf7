/**
 * @file run-lock.ts
 *
 * One release run per branch at a time. The lock is a file created with
 * exclusive-create semantics, so a second process targeting the same branch
 * fails to acquire it instead of racing the first one to the registry.
 *
 * Lock files live in the checkout's git directory, which `npm publish` never
 * packs. If the process dies without releasing, the file stays behind and has
 * to be removed by hand; its content names the holder's pid and start time.
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import { getLockFilePath, PATHS } from './constants'
import { RunLockedError } from './errors'

export interface RunLock {
  branch: string
  path: string
  release: () => void
}

/**
 * Picks the directory for lock files: the checkout's `.git` directory, or the
 * system temp directory when the checkout has none.
 */
export function resolveLockDir(cwd: string): string {
  const gitDir = path.join(cwd, PATHS.GIT_DIR)
  return fs.existsSync(gitDir) && fs.statSync(gitDir).isDirectory()
    ? gitDir
    : os.tmpdir()
}

/**
 * Acquires the run lock for a branch.
 *
 * @param dir - Directory to hold the lock file
 * @param branch - Branch the run releases from
 * @returns The held lock; call `release()` when the run ends
 * @throws RunLockedError if another run holds the lock
 */
export function acquireRunLock(dir: string, branch: string): RunLock {
  const lockPath = getLockFilePath(dir, branch)

  try {
    fs.writeFileSync(
      lockPath,
      JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }),
      { flag: 'wx' },
    )
  } catch (error) {
    if (isAlreadyExists(error)) {
      throw new RunLockedError(
        `A release run for ${branch} is already in progress (lock file ${lockPath})`,
      )
    }
    throw error
  }

  let released = false
  return {
    branch,
    path: lockPath,
    release: () => {
      if (released) return
      released = true
      fs.rmSync(lockPath, { force: true })
    },
  }
}

function isAlreadyExists(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'EEXIST'
  )
}
