/**
 * @fileoverview Result aggregation and output formatting for both phases.
 * Handles segment results, generates summaries, and creates action outputs.
 */

import * as actionCore from './actions/core-wrapper';
import { formatTimeBetween } from './date-utils';
import { getErrorMessage } from './errors';
import { formatFingerprint } from './fingerprint';
import { Segment } from './segments';

export type Phase = 'restore' | 'save';

export type RestoreStatus = 'restored' | 'not-found';

export type SaveStatus = 'unchanged' | 'saved' | 'failed';

/**
 * Outcome of one segment within a phase.
 */
export type SegmentResult<Status extends RestoreStatus | SaveStatus> = {
  readonly segment: Segment;
  readonly folderPath: string;
  readonly status: Status;
  readonly fingerprint: bigint;
  readonly cacheKey?: string;
  readonly error?: string;
  readonly processingDuration: number;
  readonly humanReadableDuration: string;
};

export type RestoreResult = SegmentResult<RestoreStatus>;

export type SaveResult = SegmentResult<SaveStatus>;

const STATUS_LABELS: Readonly<Record<RestoreStatus | SaveStatus, string>> = {
  restored: '✅ Restored',
  'not-found': '🆕 Not found',
  unchanged: '⏭️ Unchanged',
  saved: '⬆️ Saved',
  failed: '❌ Failed',
};

const PHASE_TITLES: Readonly<Record<Phase, string>> = {
  restore: 'Cargo Home Cache Restore',
  save: 'Cargo Home Cache Save',
};

/**
 * Sets the restore phase outputs.
 * `cache-hit` is true only when every selected segment came from the cache.
 *
 * @param results - Restore results in registry order
 */
export function setRestoreOutputs(results: readonly RestoreResult[]): void {
  const restored = results.filter((result) => result.status === 'restored');
  const allRestored = results.length > 0 && restored.length === results.length;

  actionCore.setOutput('cache-hit', allRestored.toString());
  actionCore.setOutput('restored-segments', restored.map((result) => result.segment.shortName).join(' '));
}

/**
 * Counts results per status.
 */
export function countByStatus<Status extends RestoreStatus | SaveStatus>(
  results: readonly SegmentResult<Status>[]
): ReadonlyMap<Status, number> {
  const counts = new Map<Status, number>();
  for (const result of results) {
    counts.set(result.status, (counts.get(result.status) ?? 0) + 1);
  }
  return counts;
}

function describeStatus(result: SegmentResult<RestoreStatus | SaveStatus>): string {
  const label = STATUS_LABELS[result.status];
  return result.error ? `${label}: ${result.error}` : label;
}

/**
 * Writes the job summary table for a phase.
 * A failure to write the summary is logged and never fails the step.
 *
 * @param phase - Phase the results belong to
 * @param results - Segment results in registry order
 * @param executionTimeMs - Total phase duration
 */
export async function createPhaseSummary(
  phase: Phase,
  results: readonly SegmentResult<RestoreStatus | SaveStatus>[],
  executionTimeMs: number
): Promise<void> {
  try {
    await actionCore.summary
      .addHeading(PHASE_TITLES[phase], 2)
      .addTable([
        [
          { data: 'Segment', header: true },
          { data: 'Status', header: true },
          { data: 'Path', header: true },
          { data: 'Fingerprint', header: true },
          { data: 'Processing Time', header: true },
          { data: 'Cache Key', header: true },
        ],
        ...results.map((result) => [
          { data: result.segment.friendlyName },
          { data: describeStatus(result) },
          { data: result.folderPath },
          { data: formatFingerprint(result.fingerprint) },
          { data: result.humanReadableDuration },
          { data: result.cacheKey ?? 'N/A' },
        ]),
      ])
      .addRaw(`Total execution time: ${formatTimeBetween(0, executionTimeMs)}`, true)
      .write();
  } catch (error) {
    actionCore.warning(`Failed to write job summary: ${getErrorMessage(error)}`);
  }
}

/**
 * Logs phase completion information.
 *
 * @param phase - Phase that finished
 * @param results - Segment results of the phase
 * @param executionTimeMs - Total phase duration
 */
export function logPhaseCompletion(
  phase: Phase,
  results: readonly SegmentResult<RestoreStatus | SaveStatus>[],
  executionTimeMs: number
): void {
  const counts = countByStatus(results);
  const breakdown = [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ');

  actionCore.info(`${PHASE_TITLES[phase]} processed ${results.length} segment(s)${breakdown ? `: ${breakdown}` : ''}`);
  actionCore.info(`Action completed in ${formatTimeBetween(0, executionTimeMs)}`);
}
