import { bumpPatch, planNextVersion } from '../version'
import { VersionError } from '../errors'

describe('version', () => {
  const mockLogger = {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  }

  beforeEach(() => {
    jest.clearAllMocks()
  })

  describe('bumpPatch function', () => {
    it('should increment only the patch component', () => {
      expect(bumpPatch('1.2.3')).toBe('1.2.4')
      expect(bumpPatch('0.9.9')).toBe('0.9.10')
      expect(bumpPatch('10.0.0')).toBe('10.0.1')
    })

    it('should reject prerelease versions', () => {
      expect(() => bumpPatch('2.0.0-beta.1')).toThrow(VersionError)
    })

    it('should reject malformed versions', () => {
      expect(() => bumpPatch('1.2')).toThrow(
        'Cannot bump 1.2: expected a major.minor.patch release version',
      )
    })
  })

  describe('planNextVersion function', () => {
    it('should bump the latest published version', async () => {
      // Arrange
      const registry = { latestVersion: jest.fn().mockResolvedValue('1.2.3') }

      // Act
      const plan = await planNextVersion(registry, 'test-package', '0.1.0', mockLogger)

      // Assert
      expect(registry.latestVersion).toHaveBeenCalledWith('test-package')
      expect(plan).toEqual({ baseline: '1.2.3', next: '1.2.4', source: 'registry' })
      expect(mockLogger.log).toHaveBeenCalledWith('Found published version: 1.2.3')
    })

    it('should fall back to the manifest version when nothing is published', async () => {
      // Arrange
      const registry = { latestVersion: jest.fn().mockResolvedValue(null) }

      // Act
      const plan = await planNextVersion(registry, 'test-package', '0.1.0', mockLogger)

      // Assert
      expect(plan).toEqual({ baseline: '0.1.0', next: '0.1.1', source: 'manifest' })
    })

    it('should propagate registry errors', async () => {
      // Arrange
      const registry = {
        latestVersion: jest.fn().mockRejectedValue(new Error('ECONNREFUSED')),
      }

      // Act & Assert
      await expect(
        planNextVersion(registry, 'test-package', '0.1.0', mockLogger),
      ).rejects.toThrow('ECONNREFUSED')
    })
  })
})
