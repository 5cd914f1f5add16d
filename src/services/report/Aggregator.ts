import { v4 as uuidv4 } from 'uuid';
import { DispatchResult, Report, ReportCounts } from '../../models';

export interface RoundMeta {
  roundId?: string;
  startedAt: number;
  completedAt: number;
}

export function countOutcomes<T>(results: DispatchResult<T>[]): ReportCounts {
  const counts: ReportCounts = { total: results.length, succeeded: 0, failed: 0, timedOut: 0, skipped: 0 };
  for (const { outcome } of results) {
    switch (outcome.kind) {
      case 'success':
        counts.succeeded++;
        break;
      case 'connection-failed':
      case 'command-failed':
        counts.failed++;
        break;
      case 'timeout':
        counts.timedOut++;
        break;
      case 'skipped':
        counts.skipped++;
        break;
    }
  }
  return counts;
}

/**
 * Builds the report for one round. Results keep the order they were given
 * in, which is the order of the plans.
 */
export function summarize<T>(results: DispatchResult<T>[], meta: RoundMeta): Report<T> {
  return {
    roundId: meta.roundId ?? uuidv4(),
    startedAt: meta.startedAt,
    completedAt: meta.completedAt,
    counts: countOutcomes(results),
    results: [...results],
  };
}
