/**
 * Wrapper module for GitHub Actions cache library.
 * Provides simplified access to GitHub Actions cache functionality.
 */
import * as cache from '@actions/cache';

/**
 * Restores cache from the provided paths
 *
 * @param paths - Paths the cached entry is extracted to
 * @param primaryKey - Primary cache key to restore
 * @param restoreKeys - Fallback key prefixes tried when the primary key is not found
 * @returns The cache key that was restored, or undefined on a cache miss
 */
export async function restoreCache(
  paths: readonly string[],
  primaryKey: string,
  restoreKeys: readonly string[]
): Promise<string | undefined> {
  return cache.restoreCache([...paths], primaryKey, [...restoreKeys]);
}

/**
 * Saves cache from the provided paths
 *
 * @param paths - Paths to archive
 * @param key - Cache key to save the paths with
 * @returns Cache id if successfully saved, -1 otherwise
 */
export async function saveCache(paths: readonly string[], key: string): Promise<number> {
  return cache.saveCache([...paths], key);
}

export const { ValidationError, ReserveCacheError } = cache;
