/**
 * @fileoverview Entry point of the restore phase (the action's `main` step).
 * Restores every selected Cargo home segment and records its fingerprint for the save phase.
 */

import { createPhaseSummary, logPhaseCompletion, setRestoreOutputs } from './action-outputs';
import { ActionRunner } from './action-runner';
import * as actionCore from './actions/core-wrapper';
import { getErrorMessage } from './errors';

/**
 * Runs the restore phase. Any failure marks the step as failed.
 */
export async function run(): Promise<void> {
  const actionStartTime = performance.now();

  try {
    const runner = new ActionRunner();
    const results = await runner.restore();
    const executionTimeMs = performance.now() - actionStartTime;

    setRestoreOutputs(results);
    await createPhaseSummary('restore', results, executionTimeMs);
    logPhaseCompletion('restore', results, executionTimeMs);
  } catch (executionError) {
    actionCore.setFailed(getErrorMessage(executionError));
  }
}

if (require.main === module) {
  void run();
}
