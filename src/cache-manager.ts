import * as cacheWrapper from './actions/cache-wrapper';
import * as actionCore from './actions/core-wrapper';
import { CacheKey } from './cache-key';
import { getErrorMessage, HostCacheError } from './errors';

/**
 * Result of a cache save.
 */
export type CacheSaveResult = {
  readonly success: boolean;
  readonly cacheKey: string;
  readonly error?: string;
};

/**
 * Handshake with the blob cache for a single folder.
 */
export class CacheManager {
  /**
   * Restores a folder by primary key, falling back to the most recent entry whose key starts with the fallback.
   *
   * @returns The matched key, or undefined on a cache miss
   * @throws HostCacheError when the blob cache rejects the request
   */
  async restore(key: CacheKey, path: string): Promise<string | undefined> {
    actionCore.debug(`Restoring ${path} with key "${key.primary}" (fallback "${key.restoreFallback}")`);
    try {
      const matchedKey = await cacheWrapper.restoreCache([path], key.primary, [key.restoreFallback]);
      if (matchedKey) {
        actionCore.debug(`Cache restored for ${path} with key: ${matchedKey}`);
      }
      return matchedKey;
    } catch (error) {
      throw new HostCacheError(`Failed to restore cache for key ${key.primary}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Uploads a folder under the primary key. Failures are reported in the result, never thrown.
   */
  async save(key: CacheKey, path: string): Promise<CacheSaveResult> {
    actionCore.debug(`Saving cache for ${path} with key: ${key.primary}`);
    try {
      const cacheId = await cacheWrapper.saveCache([path], key.primary);
      if (cacheId === -1) {
        return { success: false, cacheKey: key.primary, error: 'cache service did not accept the entry' };
      }
      actionCore.debug(`Cache saved successfully for key: ${key.primary} (cache ID: ${cacheId})`);
      return { success: true, cacheKey: key.primary };
    } catch (error) {
      const message = getErrorMessage(error);
      if (error instanceof cacheWrapper.ValidationError || error instanceof cacheWrapper.ReserveCacheError) {
        return { success: false, cacheKey: key.primary, error: `${error.name}: ${message}` };
      }
      return { success: false, cacheKey: key.primary, error: message };
    }
  }
}
