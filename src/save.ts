/**
 * @fileoverview Entry point of the save phase (the action's `post` step).
 * Uploads the Cargo home segments whose content changed since the restore phase.
 */

import { createPhaseSummary, logPhaseCompletion } from './action-outputs';
import { ActionRunner } from './action-runner';
import * as actionCore from './actions/core-wrapper';
import { getErrorMessage } from './errors';

/**
 * Runs the save phase. Fatal errors fail the step; upload failures only show up in the log and summary.
 */
export async function run(): Promise<void> {
  const actionStartTime = performance.now();

  try {
    const runner = new ActionRunner();
    const results = await runner.save();
    const executionTimeMs = performance.now() - actionStartTime;

    await createPhaseSummary('save', results, executionTimeMs);
    logPhaseCompletion('save', results, executionTimeMs);
  } catch (executionError) {
    actionCore.setFailed(getErrorMessage(executionError));
  }
}

if (require.main === module) {
  void run();
}
