import { CommandOutput, Report } from '../../src/models';
import { FleetService } from '../../src/services/FleetService';
import { commandUnit } from '../../src/services/dispatch/units';
import { LiveView } from '../../src/services/report/LiveView';
import { TunnelError } from '../../src/utils/errors';
import { ManualClock, flushPromises } from '../helpers/ManualClock';
import { FakeConnector, FakeDiscoverySource, FakeRelay, deferred, hang, makeNode, ok } from '../helpers/fakes';

const START = 1_000_000;

function output(stdout: string): CommandOutput {
  return { stdout, stderr: '', exitCode: 0 };
}

describe('Fleet dispatch round', () => {
  let clock: ManualClock;
  let source: FakeDiscoverySource;
  let relay: FakeRelay;
  let connector: FakeConnector;
  let fleet: FleetService;

  beforeEach(() => {
    clock = new ManualClock(START);
    source = new FakeDiscoverySource();
    relay = new FakeRelay().addRelay('net-1', 'bastion-1').addRelay('net-2', 'bastion-2');
    connector = new FakeConnector(relay);
    fleet = new FleetService({
      source,
      connector,
      relay,
      clock,
      maxConcurrency: 5,
      directoryTtlMs: 1000,
      tunnels: { setupTimeoutMs: 5000, idleGraceMs: 5000, reapIntervalMs: 1000, maxTunnels: 4 },
    });
    fleet.start();
  });

  afterEach(async () => {
    await fleet.shutdown();
  });

  it('should report every node once across direct, relayed and failing routes', async () => {
    source.nodes = [
      makeNode('a', { addresses: { publicAddress: '203.0.113.10', privateAddress: null } }),
      makeNode('b', { addresses: { publicAddress: '203.0.113.11', privateAddress: null } }),
      makeNode('c', { relayEligible: true, scope: 'net-1' }),
      makeNode('d'),
      makeNode('e', { relayEligible: true, scope: 'net-2' }),
    ];
    relay.failures.set('net-2', new TunnelError('bastion-2 refused the session'));
    connector.on('203.0.113.10', ok('a-out')).on('203.0.113.11', hang()).on('c', ok('c-out'));

    const pending = fleet.runRound(commandUnit('hostname'), { roundId: 'round-1', perNodeTimeoutMs: 1000 });
    await flushPromises();
    clock.advance(1000);
    const report = await pending;

    expect(report).toEqual({
      roundId: 'round-1',
      startedAt: START,
      completedAt: START + 1000,
      counts: { total: 5, succeeded: 2, failed: 1, timedOut: 1, skipped: 1 },
      results: [
        { nodeId: 'a', mode: 'direct', outcome: { kind: 'success', payload: output('a-out') }, elapsedMs: 0 },
        { nodeId: 'b', mode: 'direct', outcome: { kind: 'timeout', reason: 'timed out after 1000ms' }, elapsedMs: 1000 },
        { nodeId: 'c', mode: 'relayed', outcome: { kind: 'success', payload: output('c-out') }, elapsedMs: 0 },
        {
          nodeId: 'd',
          mode: 'unreachable',
          outcome: { kind: 'skipped', reason: 'no route: no public address and no relay available' },
          elapsedMs: 0,
        },
        {
          nodeId: 'e',
          mode: 'relayed',
          outcome: { kind: 'connection-failed', reason: 'bastion-2 refused the session' },
          elapsedMs: 0,
        },
      ],
    });

    await flushPromises();
    expect(fleet.tunnels?.list().map(({ relayId, refCount }) => ({ relayId, refCount }))).toEqual([
      { relayId: 'net-1/c', refCount: 0 },
    ]);
    expect(fleet.tunnels?.isBackingOff('net-2')).toBe(true);
    expect(connector.openConnections).toBe(0);
  });

  it('should keep a tunnel in use open across reaper ticks', async () => {
    source.nodes = [makeNode('c', { relayEligible: true, scope: 'net-1' })];
    const gate = deferred<void>();
    connector.on('c', async () => {
      await gate.promise;
      return output('c-out');
    });

    const pending = fleet.runRound(commandUnit('hostname'), { perNodeTimeoutMs: 60000 });
    await flushPromises();
    expect(fleet.tunnels?.stats().inUse).toBe(1);

    clock.advance(10000);
    await flushPromises();
    expect(relay.destroyed).toEqual([]);

    gate.resolve();
    const report = await pending;
    await flushPromises();

    expect(report.results[0].outcome).toEqual({ kind: 'success', payload: output('c-out') });
    expect(fleet.tunnels?.stats()).toEqual({ tunnels: 1, inUse: 0, maxTunnels: 4, totalAcquisitions: 1 });
  });

  it('should drop a vanished node from later live rounds and reap its tunnel afterwards', async () => {
    source.nodes = [
      makeNode('a', { addresses: { publicAddress: '203.0.113.10', privateAddress: null } }),
      makeNode('c', { relayEligible: true, scope: 'net-1' }),
    ];
    connector.on('203.0.113.10', ok('a-out')).on('c', ok('c-out'));
    const rendered: Array<Report<CommandOutput>> = [];
    const view = new LiveView<CommandOutput>(
      (signal) => fleet.runRound(commandUnit('hostname'), { signal, perNodeTimeoutMs: 500 }),
      {
        render: (report) => {
          rendered.push(report);
        },
      },
      { intervalMs: 1000, iterations: 2, clock }
    );
    const errors: unknown[] = [];
    view.on('roundError', (error) => errors.push(error));

    const done = view.run();
    await flushPromises();
    expect(rendered.map((report) => report.results.map((result) => result.nodeId))).toEqual([['a', 'c']]);

    source.nodes = source.nodes.filter((node) => node.name !== 'c');
    clock.advance(1000);
    await done;

    expect(errors).toEqual([]);
    expect(rendered[1].results.map((result) => result.nodeId)).toEqual(['a']);
    expect(rendered[1].counts).toEqual({ total: 1, succeeded: 1, failed: 0, timedOut: 0, skipped: 0 });
    expect(source.calls).toBe(2);
    expect(relay.destroyed).toEqual([]);
    expect(fleet.tunnels?.list().map(({ relayId, refCount }) => ({ relayId, refCount }))).toEqual([
      { relayId: 'net-1/c', refCount: 0 },
    ]);

    await flushPromises();
    clock.advance(3000);
    await flushPromises();
    expect(relay.destroyed).toEqual([]);

    clock.advance(1000);
    await flushPromises();

    expect(relay.destroyed).toEqual([40000]);
    expect(fleet.tunnels?.list()).toEqual([]);
  });

  it('should mark a refused direct route bad and stop trying it while the mark holds', async () => {
    source.nodes = [makeNode('a', { addresses: { publicAddress: '203.0.113.10', privateAddress: null } })];
    connector.unreachable.add('203.0.113.10');

    const first = await fleet.runRound(commandUnit('hostname'));
    fleet.directory.refresh();
    const second = await fleet.runRound(commandUnit('hostname'));

    expect(first.results[0].outcome).toEqual({
      kind: 'connection-failed',
      reason: 'Connection refused by 203.0.113.10',
    });
    expect(second.results[0]).toEqual({
      nodeId: 'a',
      mode: 'unreachable',
      outcome: {
        kind: 'skipped',
        reason: 'direct address unreachable (Connection refused by 203.0.113.10) and no relay available',
      },
      elapsedMs: 0,
    });
    expect(connector.opened).toEqual([]);
  });

  it('should serve a repeat sessions round from the cache without reopening the tunnel', async () => {
    source.nodes = [makeNode('c', { relayEligible: true, scope: 'net-1' })];
    connector.on('c', ok('main: 1 windows (created Mon Jan  1 00:00:00 2024)\n'));
    const unit = fleet.terminalSessionsUnit(60000);

    const first = await fleet.runRound(unit);
    await flushPromises();
    const second = await fleet.runRound(unit);

    expect(first.results[0].outcome).toEqual({
      kind: 'success',
      payload: [{ nodeId: 'c', name: 'main', windows: 1, createdAt: 'Mon Jan  1 00:00:00 2024', attached: false }],
    });
    expect(second.results).toEqual([{ nodeId: 'c', mode: 'relayed', outcome: first.results[0].outcome, elapsedMs: 0 }]);
    expect(connector.opened).toEqual(['c']);
    expect(fleet.tunnels?.stats().totalAcquisitions).toBe(1);
  });

  it('should drop cached sessions of nodes that left the fleet', async () => {
    source.nodes = [
      makeNode('a', { addresses: { publicAddress: '203.0.113.10', privateAddress: null } }),
      makeNode('b', { addresses: { publicAddress: '203.0.113.11', privateAddress: null } }),
    ];
    connector.on('203.0.113.10', ok('main: 1 windows\n')).on('203.0.113.11', ok('work: 2 windows\n'));

    await fleet.runRound(fleet.terminalSessionsUnit(60000));
    expect(fleet.sessions.stats().size).toBe(2);

    source.nodes = source.nodes.filter((node) => node.name === 'a');
    fleet.directory.refresh();
    await fleet.runRound(fleet.terminalSessionsUnit(60000), { filter: { names: ['a'] } });

    expect(fleet.sessions.peek('b')).toBeUndefined();
    expect(fleet.sessions.stats().size).toBe(1);
    expect(connector.opened).toEqual(['203.0.113.10', '203.0.113.11']);
  });

  it('should close every tunnel on shutdown', async () => {
    source.nodes = [makeNode('c', { relayEligible: true, scope: 'net-1' })];
    connector.on('c', ok('c-out'));

    await fleet.runRound(commandUnit('hostname'));
    await flushPromises();
    await fleet.shutdown();
    await fleet.shutdown();

    expect(relay.destroyed).toEqual([40000]);
    expect(fleet.tunnels?.list()).toEqual([]);
    expect(fleet.sessions.stats().size).toBe(0);
  });
});
