import type { StateStore } from './store.js';
import { buildTestStatusSchema, type ResultOutcome, type ResultSummary } from '../types/status.js';

function outcomeOf(passed: number, failed: number): ResultOutcome {
  if (failed > 0) return 'failing';
  if (passed > 0) return 'passing';
  return 'unknown';
}

/**
 * Summarize a `build-status.json` / `test-status.json` file. These files
 * belong to external tooling, so a corrupt one is reported, never moved.
 */
export async function readResultSummary(
  store: StateStore,
  file: string,
  now: Date,
  stalenessMs?: number,
): Promise<ResultSummary> {
  const result = await store.read(file, buildTestStatusSchema, { stalenessMs });
  const empty = {
    file,
    passed: 0,
    failed: 0,
    skipped: 0,
    durationSeconds: 0,
    failures: [],
    checkedAt: now.toISOString(),
  };

  switch (result.status) {
    case 'not-found':
      return { ...empty, outcome: 'missing', stale: false };
    case 'corrupt':
      return { ...empty, outcome: 'corrupt', stale: false };
    case 'ok': {
      const { value } = result;
      return {
        file,
        outcome: outcomeOf(value.passed, value.failed),
        passed: value.passed,
        failed: value.failed,
        skipped: value.skipped,
        durationSeconds: value.durationSeconds,
        failures: value.failures,
        finishedAt: value.finishedAt,
        stale: result.stale,
        checkedAt: now.toISOString(),
      };
    }
  }
}
