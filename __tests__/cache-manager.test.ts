import * as core from '@actions/core';
import * as cache from '@actions/cache';
import { CacheManager } from '../src/cache-manager';
import { HostCacheError } from '../src/errors';

// Mock dependent modules
jest.mock('@actions/core');
jest.mock('@actions/cache', () => ({
  // Mock functions used by CacheManager
  restoreCache: jest.fn(),
  saveCache: jest.fn(),
  // Mock error classes for instanceof checks
  ValidationError: class ValidationError extends Error {
    constructor(message?: string) {
      super(message);
      this.name = 'ValidationError';
    }
  },
  ReserveCacheError: class ReserveCacheError extends Error {
    constructor(message?: string) {
      super(message);
      this.name = 'ReserveCacheError';
    }
  },
}));

// Typed mocks
const coreMock = core as jest.Mocked<typeof core>;
const cacheMock = cache as jest.Mocked<typeof cache>;

describe('CacheManager', () => {
  const TEST_KEY = { primary: 'Registry indices - AAAAAAAAAAA', restoreFallback: 'Registry indices' };
  const TEST_PATH = '/home/runner/.cargo/registry/index';
  let cacheManager: CacheManager;

  beforeEach(() => {
    jest.clearAllMocks();
    cacheManager = new CacheManager(); // Create a new instance for each test
  });

  describe('restore', () => {
    test('should return the matched key on a hit', async () => {
      // Arrange
      const matchedKey = 'Registry indices - older-nonce';
      cacheMock.restoreCache.mockResolvedValue(matchedKey);

      // Act
      const result = await cacheManager.restore(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toBe(matchedKey);
      expect(cacheMock.restoreCache).toHaveBeenCalledTimes(1);
      expect(cacheMock.restoreCache).toHaveBeenCalledWith([TEST_PATH], TEST_KEY.primary, [TEST_KEY.restoreFallback]);
      expect(coreMock.debug).toHaveBeenCalledWith(`Cache restored for ${TEST_PATH} with key: ${matchedKey}`);
    });

    test('should return undefined on a miss', async () => {
      // Arrange
      cacheMock.restoreCache.mockResolvedValue(undefined);

      // Act
      const result = await cacheManager.restore(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toBeUndefined();
      expect(coreMock.debug).not.toHaveBeenCalledWith(expect.stringContaining('Cache restored'));
    });

    test('should raise a HostCacheError when restoreCache throws', async () => {
      // Arrange
      cacheMock.restoreCache.mockRejectedValue(new Error('Cache service unavailable'));

      // Act
      const restoring = cacheManager.restore(TEST_KEY, TEST_PATH);

      // Assert
      await expect(restoring).rejects.toBeInstanceOf(HostCacheError);
      await expect(restoring).rejects.toThrow(
        `Failed to restore cache for key ${TEST_KEY.primary}: Cache service unavailable`
      );
    });
  });

  describe('save', () => {
    test('should report success when a cache id is returned', async () => {
      // Arrange
      cacheMock.saveCache.mockResolvedValue(42);

      // Act
      const result = await cacheManager.save(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toEqual({ success: true, cacheKey: TEST_KEY.primary });
      expect(cacheMock.saveCache).toHaveBeenCalledWith([TEST_PATH], TEST_KEY.primary);
      expect(coreMock.debug).toHaveBeenCalledWith(`Cache saved successfully for key: ${TEST_KEY.primary} (cache ID: 42)`);
    });

    test('should report failure when the cache service returns -1', async () => {
      // Arrange
      cacheMock.saveCache.mockResolvedValue(-1);

      // Act
      const result = await cacheManager.save(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toEqual({
        success: false,
        cacheKey: TEST_KEY.primary,
        error: 'cache service did not accept the entry',
      });
    });

    test('should name ValidationError failures', async () => {
      // Arrange
      cacheMock.saveCache.mockRejectedValue(new cache.ValidationError('Key is too long'));

      // Act
      const result = await cacheManager.save(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toEqual({
        success: false,
        cacheKey: TEST_KEY.primary,
        error: 'ValidationError: Key is too long',
      });
    });

    test('should name ReserveCacheError failures', async () => {
      // Arrange
      cacheMock.saveCache.mockRejectedValue(new cache.ReserveCacheError('Unable to reserve cache'));

      // Act
      const result = await cacheManager.save(TEST_KEY, TEST_PATH);

      // Assert
      expect(result.error).toBe('ReserveCacheError: Unable to reserve cache');
    });

    test('should not throw for other errors', async () => {
      // Arrange
      cacheMock.saveCache.mockRejectedValue(new Error('Network error'));

      // Act
      const result = await cacheManager.save(TEST_KEY, TEST_PATH);

      // Assert
      expect(result).toEqual({ success: false, cacheKey: TEST_KEY.primary, error: 'Network error' });
      expect(coreMock.warning).not.toHaveBeenCalled();
    });
  });
});
