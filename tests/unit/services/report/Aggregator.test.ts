import { DispatchResult } from '../../../../src/models';
import { countOutcomes, summarize } from '../../../../src/services/report/Aggregator';

const results: DispatchResult<string>[] = [
  { nodeId: 'a', mode: 'direct', outcome: { kind: 'success', payload: 'ok' }, elapsedMs: 10 },
  { nodeId: 'b', mode: 'direct', outcome: { kind: 'timeout', reason: 'timed out after 5ms' }, elapsedMs: 5 },
  { nodeId: 'c', mode: 'relayed', outcome: { kind: 'success', payload: 'ok' }, elapsedMs: 20 },
  { nodeId: 'd', mode: 'unreachable', outcome: { kind: 'skipped', reason: 'no route' }, elapsedMs: 0 },
  { nodeId: 'e', mode: 'relayed', outcome: { kind: 'connection-failed', reason: 'relay down' }, elapsedMs: 1 },
  {
    nodeId: 'f',
    mode: 'direct',
    outcome: { kind: 'command-failed', reason: 'exit 1', exitCode: 1 },
    elapsedMs: 3,
  },
];

describe('Aggregator', () => {
  it('should count each outcome kind separately', () => {
    expect(countOutcomes(results)).toEqual({ total: 6, succeeded: 2, failed: 2, timedOut: 1, skipped: 1 });
  });

  it('should keep result order and the round metadata', () => {
    const report = summarize(results, { roundId: 'round-1', startedAt: 100, completedAt: 250 });

    expect(report.roundId).toBe('round-1');
    expect(report.startedAt).toBe(100);
    expect(report.completedAt).toBe(250);
    expect(report.results.map((result) => result.nodeId)).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(report.results).not.toBe(results);
  });

  it('should generate a round id when none is given', () => {
    const report = summarize([], { startedAt: 0, completedAt: 0 });

    expect(report.roundId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(report.counts.total).toBe(0);
  });
});
