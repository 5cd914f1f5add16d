import { NodeDirectory, globToRegExp } from '../../../../src/services/discovery/NodeDirectory';
import { DiscoveryError } from '../../../../src/utils/errors';
import { ManualClock } from '../../../helpers/ManualClock';
import { FakeDiscoverySource, makeNode } from '../../../helpers/fakes';

describe('NodeDirectory', () => {
  let clock: ManualClock;
  let source: FakeDiscoverySource;
  let directory: NodeDirectory;

  beforeEach(() => {
    clock = new ManualClock();
    source = new FakeDiscoverySource([
      makeNode('web-2', { state: 'running' }),
      makeNode('db-1', { state: 'stopped' }),
      makeNode('web-1', { state: 'running' }),
    ]);
    directory = new NodeDirectory(source, { ttlMs: 60000, clock });
  });

  it('should list nodes sorted by name and stamped with the refresh time', async () => {
    const nodes = await directory.list();

    expect(nodes.map((node) => node.name)).toEqual(['db-1', 'web-1', 'web-2']);
    expect(nodes.every((node) => node.observedAt === clock.now())).toBe(true);
    expect(Object.isFrozen(nodes[0])).toBe(true);
  });

  it('should serve repeated lists from the snapshot within the TTL', async () => {
    await directory.list();
    clock.advance(59999);
    await directory.list();

    expect(source.calls).toBe(1);

    clock.advance(1);
    await directory.list();
    expect(source.calls).toBe(2);
  });

  it('should share one discovery call between concurrent lists', async () => {
    await Promise.all([directory.list(), directory.list(), directory.get('web-1')]);

    expect(source.calls).toBe(1);
  });

  it('should filter by glob pattern, names and state', async () => {
    expect((await directory.list({ pattern: 'web-*' })).map((node) => node.name)).toEqual(['web-1', 'web-2']);
    expect((await directory.list({ names: ['db-1'] })).map((node) => node.name)).toEqual(['db-1']);
    expect((await directory.list({ states: ['stopped'] })).map((node) => node.name)).toEqual(['db-1']);
  });

  it('should keep the first of duplicate names', async () => {
    source.nodes = [
      makeNode('dup', { port: 2201 }),
      makeNode('dup', { port: 2202 }),
    ];

    const nodes = await directory.list();

    expect(nodes).toHaveLength(1);
    expect(nodes[0].port).toBe(2201);
  });

  it('should return null for an unknown node', async () => {
    await expect(directory.get('missing')).resolves.toBeNull();
  });

  it('should wrap source failures in DiscoveryError', async () => {
    source.failure = new Error('inventory unreachable');

    const attempt = directory.list();

    await expect(attempt).rejects.toBeInstanceOf(DiscoveryError);
    await expect(directory.list()).rejects.toThrow('Node discovery failed (fake): inventory unreachable');
  });

  it('should rediscover after refresh()', async () => {
    await directory.list();
    directory.refresh();
    await directory.list();

    expect(source.calls).toBe(2);
    expect(directory.lastRefreshedAt()).toBe(clock.now());
  });
});

describe('globToRegExp', () => {
  it('should treat regex metacharacters literally', () => {
    expect(globToRegExp('node.1').test('node.1')).toBe(true);
    expect(globToRegExp('node.1').test('nodex1')).toBe(false);
    expect(globToRegExp('web-?').test('web-7')).toBe(true);
  });
});
