/**
 * @fileoverview Action input parsing.
 */

import * as actionCore from './actions/core-wrapper';
import { ParseCacheableItemError } from './errors';
import { allSegments, findSegmentByShortName, Segment } from './segments';

/**
 * Name of the input restricting which segments are cached.
 */
export const CACHE_ONLY_INPUT = 'cache-only';

/**
 * Configuration for action inputs.
 */
export type ActionConfig = {
  readonly segments: readonly Segment[];
};

/**
 * Parses the `cache-only` input into the segments to operate on.
 * An empty value selects every segment. Duplicates collapse, and the result
 * always follows registry order.
 *
 * @param cacheOnly - Whitespace-separated segment short names
 * @returns Selected segments in registry order
 * @throws ParseCacheableItemError naming the first unrecognized token
 */
export function parseCacheOnly(cacheOnly: string): readonly Segment[] {
  const tokens = cacheOnly.split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    return allSegments();
  }

  const requested = new Set<Segment>();
  for (const token of tokens) {
    const segment = findSegmentByShortName(token);
    if (!segment) {
      throw new ParseCacheableItemError(token);
    }
    requested.add(segment);
  }
  return allSegments().filter((segment) => requested.has(segment));
}

/**
 * Gets action configuration from GitHub Actions environment.
 */
export function getActionConfig(): ActionConfig {
  return {
    segments: parseCacheOnly(actionCore.getInput(CACHE_ONLY_INPUT)),
  };
}
