import { NodeRecord, NodeState } from '../../models';
import { DiscoveredNode, DiscoverySource } from '../../models/capabilities';
import { SessionCache } from '../session/SessionCache';
import { Clock, systemClock } from '../../utils/clock';
import { DiscoveryError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export interface NodeFilter {
  names?: string[];
  /** Glob over node names; `*` and `?` are wildcards. */
  pattern?: string;
  states?: NodeState[];
}

export interface NodeDirectoryOptions {
  ttlMs?: number;
  clock?: Clock;
}

const SNAPSHOT_KEY = 'fleet';

export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${escaped.replace(/\*/g, '.*').replace(/\?/g, '.')}$`);
}

/**
 * Read-through cached view of fleet membership.
 *
 * A snapshot is one discovery call, sorted by name and frozen. Concurrent
 * callers on a miss share the same discovery call.
 */
export class NodeDirectory {
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly snapshots: SessionCache<readonly NodeRecord[]>;

  constructor(
    private readonly source: DiscoverySource,
    options: NodeDirectoryOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? config.directory.ttlMs;
    this.clock = options.clock ?? systemClock;
    this.snapshots = new SessionCache<readonly NodeRecord[]>('node-directory', this.clock);
  }

  async list(filter: NodeFilter = {}): Promise<NodeRecord[]> {
    const snapshot = await this.snapshots.getOrFetch(SNAPSHOT_KEY, this.ttlMs, () => this.discover());
    return snapshot.filter((node) => matchesFilter(node, filter));
  }

  async get(name: string): Promise<NodeRecord | null> {
    const nodes = await this.list({ names: [name] });
    return nodes[0] ?? null;
  }

  /**
   * Drops the cached snapshot; the next list() performs a discovery call.
   */
  refresh(): void {
    this.snapshots.invalidate(SNAPSHOT_KEY);
  }

  lastRefreshedAt(): number | null {
    return this.snapshots.getEntry(SNAPSHOT_KEY)?.fetchedAt ?? null;
  }

  private async discover(): Promise<readonly NodeRecord[]> {
    let discovered: DiscoveredNode[];
    try {
      discovered = await this.source.discover();
    } catch (error) {
      logger.error('Node discovery failed', { source: this.source.name, error: errorMessage(error) });
      throw new DiscoveryError(`Node discovery failed (${this.source.name}): ${errorMessage(error)}`, error);
    }

    const observedAt = this.clock.now();
    const byName = new Map<string, NodeRecord>();
    for (const node of discovered) {
      if (byName.has(node.name)) {
        logger.warn('Duplicate node in discovery output, keeping first', { node: node.name });
        continue;
      }
      byName.set(
        node.name,
        Object.freeze({
          ...node,
          addresses: Object.freeze({ ...node.addresses }),
          observedAt,
        })
      );
    }

    const nodes = [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    logger.info('Fleet membership refreshed', { source: this.source.name, nodes: nodes.length });
    return Object.freeze(nodes);
  }
}

export function matchesFilter(node: NodeRecord, filter: NodeFilter): boolean {
  if (filter.names && filter.names.length > 0 && !filter.names.includes(node.name)) {
    return false;
  }
  if (filter.pattern && !globToRegExp(filter.pattern).test(node.name)) {
    return false;
  }
  if (filter.states && filter.states.length > 0 && !filter.states.includes(node.state)) {
    return false;
  }
  return true;
}
