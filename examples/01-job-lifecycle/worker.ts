/**
 * Example task for the grow_optimizer workflow.
 */

import { parseWorkflowConfigParameter, type WorkerTaskFunction } from '../../src/index.js';

export const growOptimizerTask: WorkerTaskFunction = async (esdl, params, updateProgress) => {
  const horizon = parseWorkflowConfigParameter(params, 'horizon', 'integer', 10);
  const solver = parseWorkflowConfigParameter(params, 'solver', 'string', 'highs');

  for (let year = 1; year <= horizon; year += 1) {
    await updateProgress(year / horizon, `Optimized year ${String(year)} of ${String(horizon)}`);
  }

  return esdl.replace('/>', ` solver="${solver}" horizon="${String(horizon)}"/>`);
};
