import * as io from '@actions/io';
import * as fs from 'fs/promises';

import { RestoreResult, SaveResult, SegmentResult, RestoreStatus, SaveStatus } from './action-outputs';
import * as actionCore from './actions/core-wrapper';
import { buildCacheKey } from './cache-key';
import { CacheManager } from './cache-manager';
import { formatTimeBetween } from './date-utils';
import { CacheActionError, getErrorMessage, PathMismatchError, SidecarMissingError } from './errors';
import { fingerprintDirectory, formatFingerprint } from './fingerprint';
import { readFolderInfo, writeFolderInfo } from './folder-info';
import { ActionConfig, getActionConfig } from './inputs';
import { findSegmentPath, folderInfoPath, pathExists } from './path-utils';
import { Segment } from './segments';

type SegmentOutcome<Status extends RestoreStatus | SaveStatus> = Omit<
  SegmentResult<Status>,
  'processingDuration' | 'humanReadableDuration'
>;

/**
 * Fatal failure of one segment; the message names the segment and the underlying condition.
 */
export class SegmentFailureError extends CacheActionError {
  readonly segment: Segment;

  constructor(segment: Segment, cause: unknown) {
    super(`${segment.friendlyName}: ${getErrorMessage(cause)}`, { cause });
    this.segment = segment;
  }
}

/**
 * Drives the restore and save phases over the selected segments, one segment at a time in registry order.
 */
export class ActionRunner {
  private readonly segments: readonly Segment[];
  private readonly cacheManager: CacheManager;

  constructor(config: ActionConfig = getActionConfig(), cacheManager: CacheManager = new CacheManager()) {
    this.segments = config.segments;
    this.cacheManager = cacheManager;
    actionCore.info(`Caching segments: ${this.segments.map((segment) => segment.shortName).join(', ')}`);
  }

  /**
   * Restore phase: clears each segment folder, restores it from the blob cache and records its fingerprint.
   * Stops at the first failure.
   */
  async restore(): Promise<readonly RestoreResult[]> {
    const results: RestoreResult[] = [];
    for (const segment of this.segments) {
      results.push(await this.timed(segment, () => this.restoreSegment(segment)));
    }
    return results;
  }

  /**
   * Save phase: uploads each segment whose fingerprint changed since the restore phase.
   * Upload failures are logged and do not stop the remaining segments.
   */
  async save(): Promise<readonly SaveResult[]> {
    const results: SaveResult[] = [];
    for (const segment of this.segments) {
      results.push(await this.timed(segment, () => this.saveSegment(segment)));
    }
    return results;
  }

  private async timed<Status extends RestoreStatus | SaveStatus>(
    segment: Segment,
    operation: () => Promise<SegmentOutcome<Status>>
  ): Promise<SegmentResult<Status>> {
    const startTime = performance.now();
    let outcome: SegmentOutcome<Status>;
    try {
      outcome = await operation();
    } catch (error) {
      throw new SegmentFailureError(segment, error);
    }
    const endTime = performance.now();
    return {
      ...outcome,
      processingDuration: endTime - startTime,
      humanReadableDuration: formatTimeBetween(startTime, endTime),
    };
  }

  private async restoreSegment(segment: Segment): Promise<SegmentOutcome<RestoreStatus>> {
    const folderPath = findSegmentPath(segment);
    if (await pathExists(folderPath)) {
      actionCore.warning(
        `Cache action will delete existing contents of ${folderPath}. ` +
          'To avoid this warning, place this action earlier or delete this before running the action.'
      );
      await io.rmRF(folderPath);
    }

    const cacheKey = buildCacheKey(segment);
    const matchedKey = await this.cacheManager.restore(cacheKey, folderPath);
    if (matchedKey) {
      actionCore.info(`Restored ${segment.friendlyName} from cache.`);
    } else {
      actionCore.info(`No existing cache entry for ${segment.friendlyName} found.`);
      await fs.mkdir(folderPath, { recursive: true });
    }

    const fingerprint = await fingerprintDirectory(folderPath, segment.ignores);
    actionCore.debug(`${segment.friendlyName} fingerprint after restore: ${formatFingerprint(fingerprint)}`);
    await writeFolderInfo(segment, { path: folderPath, fingerprint });

    return {
      segment,
      folderPath,
      status: matchedKey ? 'restored' : 'not-found',
      fingerprint,
      cacheKey: matchedKey,
    };
  }

  private async saveSegment(segment: Segment): Promise<SegmentOutcome<SaveStatus>> {
    const folderPath = findSegmentPath(segment);
    const fingerprint = await fingerprintDirectory(folderPath, segment.ignores);

    const previous = await readFolderInfo(segment);
    if (!previous) {
      throw new SidecarMissingError(
        `No cached folder info found at ${folderInfoPath(segment)}. Did the restore step run in this job?`
      );
    }
    if (previous.path !== folderPath) {
      throw new PathMismatchError(previous.path, folderPath);
    }

    if (previous.fingerprint === fingerprint) {
      actionCore.info(`${segment.friendlyName} unchanged, no need to write to cache`);
      return { segment, folderPath, status: 'unchanged', fingerprint };
    }

    actionCore.info(
      `${segment.friendlyName} fingerprint changed from ${formatFingerprint(previous.fingerprint)} to ${formatFingerprint(fingerprint)}`
    );
    const cacheKey = buildCacheKey(segment);
    const saveResult = await this.cacheManager.save(cacheKey, folderPath);
    if (!saveResult.success) {
      actionCore.error(`Failed to save ${segment.friendlyName} to cache: ${saveResult.error ?? 'Unknown error'}`);
      return { segment, folderPath, status: 'failed', fingerprint, cacheKey: saveResult.cacheKey, error: saveResult.error };
    }

    actionCore.info(`Saved ${segment.friendlyName} to cache.`);
    return { segment, folderPath, status: 'saved', fingerprint, cacheKey: saveResult.cacheKey };
  }
}
