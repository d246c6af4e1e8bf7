// Mock dotenv before importing main module
jest.mock('dotenv', () => ({
  config: jest.fn(),
}))

jest.mock('../orchestrator', () => ({
  ...jest.requireActual('../orchestrator'),
  runRelease: jest.fn(),
}))

import fs from 'fs'
import os from 'os'
import path from 'path'
import { exitCodeFor, main, reportRun } from '../release'
import { runRelease } from '../orchestrator'
import { acquireRunLock, resolveLockDir } from '../run-lock'
import { RunLockedError } from '../errors'
import { PipelineRun, ReleaseConfig, RunOptions } from '../types'

describe('release CLI', () => {
  const mockRunRelease = runRelease as jest.Mock
  const mockLogger = {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  }
  const stage = {
    stage: 'Checkout' as const,
    ok: true,
    exitCode: 0,
    stdout: '',
    stderr: '',
    startedAt: new Date('2026-01-01T00:00:00.000Z'),
    finishedAt: new Date('2026-01-01T00:00:01.500Z'),
  }

  let cwd: string

  beforeEach(() => {
    jest.clearAllMocks()
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'release-cli-test-'))
    fs.writeFileSync(
      path.join(cwd, 'package.json'),
      JSON.stringify({ name: 'test-package', version: '0.1.0' }),
    )
    fs.mkdirSync(path.join(cwd, '.git'))
  })

  afterEach(() => {
    jest.restoreAllMocks()
    fs.rmSync(cwd, { recursive: true, force: true })
  })

  describe('exitCodeFor function', () => {
    it('should map each outcome to its exit code', () => {
      expect(
        exitCodeFor({ status: 'succeeded', version: '1.2.4', tag: 'v1.2.4', dryRun: false }),
      ).toBe(0)
      expect(
        exitCodeFor({
          status: 'failed',
          stage: 'Testing',
          kind: 'VerificationFailure',
          error: new Error('Testing failed'),
        }),
      ).toBe(1)
      expect(
        exitCodeFor({
          status: 'published-but-not-pushed',
          version: '1.2.4',
          tag: 'v1.2.4',
          error: new Error('Pushing failed'),
        }),
      ).toBe(2)
      expect(exitCodeFor(undefined)).toBe(1)
    })
  })

  describe('reportRun function', () => {
    it('should log one line per stage and the final state', () => {
      // Arrange
      const run: PipelineRun = {
        trigger: { kind: 'manual' },
        state: { failedAt: 'ToolSetup' },
        stages: [stage, { ...stage, stage: 'ToolSetup', ok: false, exitCode: 1 }],
      }

      // Act
      reportRun(run, mockLogger)

      // Assert
      expect(mockLogger.log.mock.calls).toEqual([
        ['✅ Checkout (exit 0, 1.5s)'],
        ['❌ ToolSetup (exit 1, 1.5s)'],
        ['Final state: FailedAt(ToolSetup)'],
      ])
    })
  })

  describe('main function', () => {
    it('should skip a push to another branch without running', async () => {
      // Act
      const code = await main({ GITHUB_REF_NAME: 'develop' }, cwd)

      // Assert
      expect(code).toBe(0)
      expect(mockRunRelease).not.toHaveBeenCalled()
    })

    it('should run the pipeline and release the lock afterwards', async () => {
      // Arrange
      const lockPath = path.join(cwd, '.git', 'release-master.lock')
      let lockHeldDuringRun = false
      let packageFilesDuringRun: string[] = []
      mockRunRelease.mockImplementation(async () => {
        lockHeldDuringRun = fs.existsSync(lockPath)
        packageFilesDuringRun = fs.readdirSync(cwd).sort()
        return {
          trigger: { kind: 'push', branch: 'master' },
          state: 'Succeeded',
          stages: [],
          outcome: { status: 'succeeded', version: '0.1.1', tag: 'v0.1.1', dryRun: true },
        }
      })

      // Act
      const code = await main({ GITHUB_REF_NAME: 'master' }, cwd)

      // Assert
      expect(code).toBe(0)
      expect(mockRunRelease).toHaveBeenCalledWith(
        { kind: 'push', branch: 'master' },
        expect.any(Object),
        expect.objectContaining({ cwd, dryRun: true }),
        expect.objectContaining({ readPackage: expect.any(Function) }),
      )
      expect(lockHeldDuringRun).toBe(true)
      expect(packageFilesDuringRun).toEqual(['.git', 'package.json'])
      expect(fs.existsSync(lockPath)).toBe(false)
    })

    it('should read the manifest through the reader handed to the run', async () => {
      // Arrange
      let manifest: unknown
      mockRunRelease.mockImplementation(
        async (_trigger: unknown, _collaborators: unknown, _config: unknown, options: RunOptions) => {
          fs.writeFileSync(
            path.join(cwd, 'package.json'),
            JSON.stringify({ name: 'test-package', version: '0.2.0' }),
          )
          manifest = options.readPackage()
          return { trigger: { kind: 'manual' }, state: 'Succeeded', stages: [] }
        },
      )

      // Act
      await main({ GITHUB_EVENT_NAME: 'workflow_dispatch' }, cwd)

      // Assert
      expect(manifest).toEqual({ name: 'test-package', version: '0.2.0' })
    })

    it('should remove the credential from the environment children inherit', async () => {
      // Arrange
      const env: NodeJS.ProcessEnv = { GITHUB_REF_NAME: 'master', NPM_TOKEN: 'test-secret' }
      let config: ReleaseConfig | undefined
      mockRunRelease.mockImplementation(
        async (_trigger: unknown, _collaborators: unknown, runConfig: ReleaseConfig) => {
          config = runConfig
          return { trigger: { kind: 'push', branch: 'master' }, state: 'Succeeded', stages: [] }
        },
      )

      // Act
      await main(env, cwd)

      // Assert
      expect(env.NPM_TOKEN).toBeUndefined()
      expect(config?.credential).toBe('test-secret')
    })

    it('should report published-but-not-pushed with exit code 2', async () => {
      // Arrange
      mockRunRelease.mockResolvedValue({
        trigger: { kind: 'manual' },
        state: { failedAt: 'Pushing' },
        stages: [],
        outcome: {
          status: 'published-but-not-pushed',
          version: '0.1.1',
          tag: 'v0.1.1',
          error: new Error('Pushing failed: remote rejected'),
        },
      })

      // Act
      const code = await main({ GITHUB_EVENT_NAME: 'workflow_dispatch' }, cwd)

      // Assert
      expect(code).toBe(2)
    })

    it('should refuse to start while another run holds the branch lock', async () => {
      // Arrange
      const lock = acquireRunLock(resolveLockDir(cwd), 'master')

      // Act & Assert
      await expect(main({ GITHUB_REF_NAME: 'master' }, cwd)).rejects.toThrow(RunLockedError)
      expect(mockRunRelease).not.toHaveBeenCalled()
      lock.release()
    })
  })
})
