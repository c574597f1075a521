/**
 * Replay Executor
 *
 * Answers backend requests from recorded runs instead of calling a model,
 * so stored outputs can be re-scored against a newer baseline version.
 */

import { BackendExecutionError } from '../errors';
import type { BackendExecutor, BackendRunOutput } from '../executor';

export type RecordedRuns =
  | ReadonlyMap<string, BackendRunOutput>
  | Readonly<Record<string, BackendRunOutput>>;

export function createReplayExecutor(recordings: RecordedRuns): BackendExecutor {
  const runs: ReadonlyMap<string, BackendRunOutput> =
    isRunMap(recordings) ? recordings : new Map(Object.entries(recordings));

  return ({ backend }) => {
    const run = runs.get(backend.name);
    if (!run) {
      throw new BackendExecutionError(backend.name, `No recorded run for backend ${backend.name}`);
    }
    return run;
  };
}

function isRunMap(recordings: RecordedRuns): recordings is ReadonlyMap<string, BackendRunOutput> {
  return recordings instanceof Map;
}
