import {
  buildChildEnv,
  executeCommandLine,
  executeProcessAsync,
  FAILED_EXIT_CODE,
  splitCommandLine,
} from '../processUtils'

describe('processUtils', () => {
  const node = process.execPath
  const cwd = process.cwd()

  describe('executeProcessAsync function', () => {
    it('should capture stdout and stderr separately', async () => {
      // Act
      const result = await executeProcessAsync(
        node,
        ['-e', 'process.stdout.write("out"); process.stderr.write("err")'],
        { cwd },
      )

      // Assert
      expect(result).toEqual({ exitCode: 0, stdout: 'out', stderr: 'err' })
    })

    it('should resolve with the exit code of a failing process', async () => {
      // Act
      const result = await executeProcessAsync(node, ['-e', 'process.exit(3)'], {
        cwd,
      })

      // Assert
      expect(result.exitCode).toBe(3)
    })

    it('should pass extra environment variables to the child', async () => {
      // Act
      const result = await executeProcessAsync(
        node,
        ['-e', 'process.stdout.write(process.env.RELEASE_TEST_VALUE)'],
        { cwd, env: { RELEASE_TEST_VALUE: 'from-parent' } },
      )

      // Assert
      expect(result.stdout).toBe('from-parent')
    })

    it('should not pass the registry credential to the child', async () => {
      // Arrange
      const previous = process.env.NPM_TOKEN
      process.env.NPM_TOKEN = 'test-secret'

      try {
        // Act
        const result = await executeProcessAsync(
          node,
          ['-e', 'process.stdout.write(process.env.NPM_TOKEN || "none")'],
          { cwd },
        )

        // Assert
        expect(result.stdout).toBe('none')
      } finally {
        if (previous === undefined) {
          delete process.env.NPM_TOKEN
        } else {
          process.env.NPM_TOKEN = previous
        }
      }
    })

    it('should stream output chunks to the callback', async () => {
      // Arrange
      const onOutput = jest.fn()

      // Act
      await executeProcessAsync(node, ['-e', 'process.stdout.write("chunk")'], {
        cwd,
        onOutput,
      })

      // Assert
      expect(onOutput).toHaveBeenCalledWith('chunk')
    })

    it('should resolve with a failure when the command does not exist', async () => {
      // Act
      const result = await executeProcessAsync('release-test-missing-command', [], {
        cwd,
      })

      // Assert
      expect(result.exitCode).toBe(FAILED_EXIT_CODE)
      expect(result.stderr).toContain('ENOENT')
    })

    it('should fail a process killed by an abort', async () => {
      // Arrange
      const controller = new AbortController()

      // Act
      const pending = executeProcessAsync(node, ['-e', 'setTimeout(() => {}, 10000)'], {
        cwd,
        signal: controller.signal,
      })
      controller.abort()
      const result = await pending

      // Assert
      expect(result.exitCode).toBe(FAILED_EXIT_CODE)
    })
  })

  describe('buildChildEnv function', () => {
    const saved = { ...process.env }

    afterEach(() => {
      process.env = { ...saved }
    })

    it('should inherit the parent environment without the credential', () => {
      // Arrange
      process.env.NPM_TOKEN = 'test-secret'
      process.env.RELEASE_TEST_INHERITED = 'kept'

      // Act
      const env = buildChildEnv({ NPM_CONFIG_USERCONFIG: '/tmp/session/.npmrc' })

      // Assert
      expect(env.NPM_TOKEN).toBeUndefined()
      expect(env.RELEASE_TEST_INHERITED).toBe('kept')
      expect(env.NPM_CONFIG_USERCONFIG).toBe('/tmp/session/.npmrc')
      expect(process.env.NPM_TOKEN).toBe('test-secret')
    })
  })

  describe('executeCommandLine function', () => {
    it('should split the command line and run it', async () => {
      // Act
      const result = await executeCommandLine(
        `"${node}" -e "process.stdout.write('split')"`,
        { cwd },
      )

      // Assert
      expect(result).toEqual({ exitCode: 0, stdout: 'split', stderr: '' })
    })

    it('should fail on an empty command line', async () => {
      // Act
      const result = await executeCommandLine('   ', { cwd })

      // Assert
      expect(result).toEqual({
        exitCode: FAILED_EXIT_CODE,
        stdout: '',
        stderr: 'empty command',
      })
    })
  })

  describe('splitCommandLine function', () => {
    it('should split on whitespace and keep quoted segments', () => {
      expect(splitCommandLine('npm run "build all"')).toEqual(['npm', 'run', 'build all'])
      expect(splitCommandLine("npm  test -- --grep 'a b'")).toEqual([
        'npm',
        'test',
        '--',
        '--grep',
        'a b',
      ])
    })
  })
})
