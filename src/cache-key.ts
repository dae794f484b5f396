/**
 * @fileoverview Cache key construction for segments.
 *
 * Every upload gets a unique primary key (`{friendly name} - {nonce}`); restores
 * fall back to the bare friendly name, which the blob cache matches as a prefix
 * and resolves to the most recent entry.
 */

import * as crypto from 'crypto';

import { Segment } from './segments';

/**
 * Number of random bytes in a primary key nonce.
 */
const NONCE_BYTES = 8;

export type CacheKey = {
  readonly primary: string;
  readonly restoreFallback: string;
};

/**
 * Generates a random nonce rendered as unpadded URL-safe base64.
 *
 * @param byteLength - Number of random bytes
 */
export function buildNonce(byteLength: number = NONCE_BYTES): string {
  return crypto.randomBytes(byteLength).toString('base64url');
}

/**
 * Builds a fresh cache key for a segment.
 */
export function buildCacheKey(segment: Segment): CacheKey {
  return {
    primary: `${segment.friendlyName} - ${buildNonce()}`,
    restoreFallback: segment.friendlyName,
  };
}
