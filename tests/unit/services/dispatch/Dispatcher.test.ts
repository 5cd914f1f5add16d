import {
  CommandOutput,
  DirectRoutePlan,
  DispatchResult,
  RelayedRoutePlan,
  UnreachableRoutePlan,
} from '../../../../src/models';
import { Dispatcher, classifyError } from '../../../../src/services/dispatch/Dispatcher';
import { commandUnit } from '../../../../src/services/dispatch/units';
import { TunnelPool } from '../../../../src/services/relay/TunnelPool';
import { CommandError, ConnectionError } from '../../../../src/utils/errors';
import { ManualClock, flushPromises } from '../../../helpers/ManualClock';
import { FakeConnector, FakeRelay, deferred, exit, hang, ok } from '../../../helpers/fakes';

function direct(nodeId: string): DirectRoutePlan {
  return { nodeId, mode: 'direct', endpoint: { host: `host-${nodeId}`, port: 22 }, establishedAt: 0 };
}

function relayed(nodeId: string): RelayedRoutePlan {
  return {
    nodeId,
    mode: 'relayed',
    relayId: `net-1/${nodeId}`,
    relayScope: 'net-1',
    endpoint: 'bastion-1',
    targetPort: 22,
    establishedAt: 0,
  };
}

function unreachable(nodeId: string, detail: string): UnreachableRoutePlan {
  return { nodeId, mode: 'unreachable', reason: 'no-route', detail, establishedAt: 0 };
}

function success(stdout: string): CommandOutput {
  return { stdout, stderr: '', exitCode: 0 };
}

describe('Dispatcher', () => {
  let clock: ManualClock;
  let relay: FakeRelay;
  let pool: TunnelPool;
  let connector: FakeConnector;
  let dispatcher: Dispatcher;
  const unit = commandUnit('hostname');

  beforeEach(() => {
    clock = new ManualClock();
    relay = new FakeRelay().addRelay('net-1', 'bastion-1');
    pool = new TunnelPool(relay, { clock, setupTimeoutMs: 5000, maxTunnels: 10 });
    connector = new FakeConnector(relay);
    dispatcher = new Dispatcher(connector, pool, { maxConcurrency: 2, clock });
  });

  it('should return one result per plan, in plan order, with each failure classified', async () => {
    connector
      .on('host-a', ok('a-out'))
      .on('c', ok('c-out'))
      .on('host-f', exit(2, 'partial', 'boom'));
    connector.unreachable.add('host-e');

    const results = await dispatcher.run(
      [direct('a'), unreachable('d', 'no route'), relayed('c'), direct('e'), direct('f')],
      unit,
      { perNodeTimeoutMs: 1000 }
    );

    expect(results).toEqual([
      { nodeId: 'a', mode: 'direct', outcome: { kind: 'success', payload: success('a-out') }, elapsedMs: 0 },
      { nodeId: 'd', mode: 'unreachable', outcome: { kind: 'skipped', reason: 'no route' }, elapsedMs: 0 },
      { nodeId: 'c', mode: 'relayed', outcome: { kind: 'success', payload: success('c-out') }, elapsedMs: 0 },
      {
        nodeId: 'e',
        mode: 'direct',
        outcome: { kind: 'connection-failed', reason: 'Connection refused by host-e' },
        elapsedMs: 0,
      },
      {
        nodeId: 'f',
        mode: 'direct',
        outcome: { kind: 'command-failed', reason: 'Command failed: boom', exitCode: 2, partialOutput: 'partial' },
        elapsedMs: 0,
      },
    ]);
    expect(connector.openConnections).toBe(0);

    await flushPromises();
    expect(pool.list()[0].refCount).toBe(0);
  });

  it('should resolve immediately for an empty plan list', async () => {
    await expect(dispatcher.run([], unit)).resolves.toEqual([]);
  });

  it('should never launch a worker for an unreachable plan', async () => {
    const seen: string[] = [];

    const results = await dispatcher.run([unreachable('x', 'stopped'), unreachable('y', 'no relay')], unit, {
      onResult: (result) => seen.push(result.nodeId),
    });

    expect(connector.opened).toEqual([]);
    expect(results.map((result) => result.outcome)).toEqual([
      { kind: 'skipped', reason: 'stopped' },
      { kind: 'skipped', reason: 'no relay' },
    ]);
    expect(seen).toEqual(['x', 'y']);
  });

  it('should time out a slow node without holding up the others', async () => {
    connector.on('host-a', hang()).on('host-b', ok('b-out'));
    const settled: string[] = [];

    const round = dispatcher.run([direct('a'), direct('b')], unit, {
      perNodeTimeoutMs: 1000,
      onSettled: (nodeId) => settled.push(nodeId),
    });
    await flushPromises();
    expect(settled).toEqual(['b']);

    clock.advance(1000);
    const results = await round;

    expect(results).toEqual([
      { nodeId: 'a', mode: 'direct', outcome: { kind: 'timeout', reason: 'timed out after 1000ms' }, elapsedMs: 1000 },
      { nodeId: 'b', mode: 'direct', outcome: { kind: 'success', payload: success('b-out') }, elapsedMs: 0 },
    ]);
    await flushPromises();
    expect(settled).toEqual(['b', 'a']);
  });

  it('should start queued plans in order as slots free up', async () => {
    const gates = [deferred<void>(), deferred<void>(), deferred<void>(), deferred<void>()];
    gates.forEach((gate, i) => {
      connector.on(`host-n${i}`, () => gate.promise.then(() => success(`n${i}`)));
    });

    const round = dispatcher.run(
      gates.map((_, i) => direct(`n${i}`)),
      unit,
      { perNodeTimeoutMs: 10000 }
    );
    await flushPromises();
    expect(connector.opened).toEqual(['host-n0', 'host-n1']);

    gates[1].resolve();
    await flushPromises();
    expect(connector.opened).toEqual(['host-n0', 'host-n1', 'host-n2']);

    gates.forEach((gate) => gate.resolve());
    const results = await round;
    expect(results.map((result) => result.nodeId)).toEqual(['n0', 'n1', 'n2', 'n3']);
  });

  it('should time out running and queued plans at the round deadline', async () => {
    const serial = new Dispatcher(connector, pool, { maxConcurrency: 1, clock });
    connector.on('host-a', hang()).on('host-b', ok('b-out'));

    const round = serial.run([direct('a'), direct('b')], unit, { perNodeTimeoutMs: 10000, deadlineMs: 500 });
    await flushPromises();
    clock.advance(500);
    const results = await round;

    expect(results.map((result) => [result.nodeId, result.outcome, result.elapsedMs])).toEqual([
      ['a', { kind: 'timeout', reason: 'round deadline of 500ms exceeded' }, 500],
      ['b', { kind: 'timeout', reason: 'round deadline of 500ms exceeded' }, 0],
    ]);
    expect(connector.opened).toEqual(['host-a']);
  });

  it('should record running plans as cancelled timeouts and queued ones as skipped', async () => {
    const serial = new Dispatcher(connector, pool, { maxConcurrency: 1, clock });
    connector.on('host-a', hang()).on('host-b', ok('b-out'));
    const controller = new AbortController();

    const round = serial.run([direct('a'), direct('b')], unit, { perNodeTimeoutMs: 10000, signal: controller.signal });
    await flushPromises();
    controller.abort();
    const results = await round;

    expect(results.map((result) => result.outcome)).toEqual([
      { kind: 'timeout', reason: 'cancelled' },
      { kind: 'skipped', reason: 'cancelled' },
    ]);
  });

  it('should skip everything when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await dispatcher.run([direct('a')], unit, { signal: controller.signal });

    expect(results[0].outcome).toEqual({ kind: 'skipped', reason: 'cancelled' });
    expect(connector.opened).toEqual([]);
  });

  it('should release the tunnel of an abandoned relayed worker exactly once', async () => {
    connector.on('c', hang());

    const round = dispatcher.run([relayed('c')], unit, { perNodeTimeoutMs: 1000 });
    await flushPromises();
    expect(pool.list()[0].refCount).toBe(1);

    clock.advance(1000);
    await round;
    await flushPromises();

    expect(pool.list()[0].refCount).toBe(0);
    expect(pool.stats().totalAcquisitions).toBe(1);
    expect(relay.destroyed).toEqual([]);
  });

  it('should not start a queued relayed plan before the finished one has released its tunnel', async () => {
    const gates = Array.from({ length: 11 }, () => deferred<void>());
    gates.forEach((gate, i) => {
      connector.on(`n${i}`, () => gate.promise.then(() => success(`n${i}`)));
    });
    const wide = new Dispatcher(connector, pool, { maxConcurrency: 10, clock });

    const round = wide.run(
      gates.map((_, i) => relayed(`n${i}`)),
      unit,
      { perNodeTimeoutMs: 10000 }
    );
    await flushPromises();
    expect(pool.stats()).toEqual({ tunnels: 10, inUse: 10, maxTunnels: 10, totalAcquisitions: 10 });

    gates[0].resolve();
    await flushPromises();
    gates.forEach((gate) => gate.resolve());
    const results = await round;
    await flushPromises();

    expect(results.map((result) => result.outcome.kind)).toEqual(Array(11).fill('success'));
    expect(relay.destroyed).toEqual([40000]);
    expect(pool.stats().totalAcquisitions).toBe(11);
  });

  it('should answer cached nodes without connecting or acquiring a tunnel', async () => {
    connector.on('host-a', ok('a-live'));
    const cached = { ...unit, fromCache: (nodeId: string) => (nodeId === 'c' ? success('c-cached') : undefined) };

    const results = await dispatcher.run([direct('a'), relayed('c')], cached, { perNodeTimeoutMs: 1000 });

    expect(results).toEqual([
      { nodeId: 'a', mode: 'direct', outcome: { kind: 'success', payload: success('a-live') }, elapsedMs: 0 },
      { nodeId: 'c', mode: 'relayed', outcome: { kind: 'success', payload: success('c-cached') }, elapsedMs: 0 },
    ]);
    expect(connector.opened).toEqual(['host-a']);
    expect(pool.stats().totalAcquisitions).toBe(0);
  });

  it('should report a relay that cannot be created as a connection failure', async () => {
    relay.failures.set('net-1', new Error('relay down'));

    const [result] = await dispatcher.run([relayed('c')], unit, { perNodeTimeoutMs: 1000 });

    expect(result.outcome).toEqual({ kind: 'connection-failed', reason: 'Relay rejected tunnel: relay down' });
  });

  it('should fail relayed plans when no tunnel pool is configured', async () => {
    const directOnly = new Dispatcher(connector, null, { clock });

    const [result] = await directOnly.run([relayed('c')], unit, { perNodeTimeoutMs: 1000 });

    expect(result.outcome).toEqual({
      kind: 'connection-failed',
      reason: 'No tunnel pool configured for relayed nodes',
    });
  });

  it('should keep going when a result callback throws', async () => {
    connector.on('host-a', ok('a')).on('host-b', ok('b'));
    const onResult = jest.fn((result: DispatchResult<CommandOutput>) => {
      if (result.nodeId === 'a') {
        throw new Error('sink broke');
      }
    });

    const results = await dispatcher.run([direct('a'), direct('b')], unit, { onResult });

    expect(results).toHaveLength(2);
    expect(onResult).toHaveBeenCalledTimes(2);
  });
});

describe('classifyError', () => {
  it('should map errors onto outcomes', () => {
    expect(classifyError(new ConnectionError('refused'))).toEqual({ kind: 'connection-failed', reason: 'refused' });
    expect(classifyError(new CommandError('bad', 3, 'out'))).toEqual({
      kind: 'command-failed',
      reason: 'bad',
      exitCode: 3,
      partialOutput: 'out',
    });
    expect(classifyError(new Error('parse failure'))).toEqual({
      kind: 'command-failed',
      reason: 'parse failure',
      exitCode: null,
    });
  });
});
