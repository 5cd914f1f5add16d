import { DispatchResult, NodeRecord, Report, RoutePlan, TerminalSession } from '../models';
import { ConnectionCapability, DiscoverySource, RelayCapability, RelayPolicy } from '../models/capabilities';
import { NodeDirectory, NodeFilter, matchesFilter } from './discovery/NodeDirectory';
import { RoutingResolver } from './routing/RoutingResolver';
import { ReachabilityTracker } from './routing/ReachabilityTracker';
import { TunnelPool, TunnelPoolOptions } from './relay/TunnelPool';
import { SessionCache } from './session/SessionCache';
import { DispatchOptions, Dispatcher, WorkUnit } from './dispatch/Dispatcher';
import { terminalSessionsUnit } from './dispatch/units';
import { summarize } from './report/Aggregator';
import { Clock, systemClock } from '../utils/clock';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { config } from '../config/config';

export interface FleetServiceOptions {
  source: DiscoverySource;
  connector: ConnectionCapability;
  /** Without a relay driver, nodes lacking a direct address are skipped. */
  relay?: RelayCapability;
  policy?: RelayPolicy;
  directoryTtlMs?: number;
  maxConcurrency?: number;
  preferPrivate?: boolean;
  knownBadTtlMs?: number;
  tunnels?: Omit<TunnelPoolOptions, 'clock'>;
  clock?: Clock;
}

export interface RoundOptions<T> extends DispatchOptions<T> {
  filter?: NodeFilter;
  roundId?: string;
}

/**
 * Wires the directory, resolver, tunnel pool and dispatcher together and
 * runs list → resolve → dispatch → summarize rounds.
 */
export class FleetService {
  readonly directory: NodeDirectory;
  readonly resolver: RoutingResolver;
  readonly tracker: ReachabilityTracker;
  readonly tunnels: TunnelPool | null;
  readonly dispatcher: Dispatcher;
  readonly sessions: SessionCache<TerminalSession[]>;
  private readonly clock: Clock;
  private started = false;
  private shutDown = false;

  constructor(options: FleetServiceOptions) {
    this.clock = options.clock ?? systemClock;
    this.directory = new NodeDirectory(options.source, {
      ttlMs: options.directoryTtlMs,
      clock: this.clock,
    });
    this.tracker = new ReachabilityTracker(options.knownBadTtlMs ?? config.routing.knownBadTtlMs, this.clock);
    this.resolver = new RoutingResolver({
      relay: options.relay,
      policy: options.policy,
      tracker: this.tracker,
      preferPrivate: options.preferPrivate,
      clock: this.clock,
    });
    this.tunnels = options.relay ? new TunnelPool(options.relay, { ...options.tunnels, clock: this.clock }) : null;
    this.dispatcher = new Dispatcher(options.connector, this.tunnels, {
      maxConcurrency: options.maxConcurrency,
      clock: this.clock,
    });
    this.sessions = new SessionCache<TerminalSession[]>('terminal-sessions', this.clock);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.tunnels?.start();
    logger.info('Fleet service started', { relay: this.tunnels !== null });
  }

  /**
   * Stops the reaper, force-closes every tunnel and empties the session
   * cache. Only for process exit; later calls do nothing.
   */
  async shutdown(): Promise<void> {
    if (this.shutDown) {
      return;
    }
    this.shutDown = true;
    this.started = false;
    logger.info('Fleet service shutting down');
    try {
      await this.tunnels?.closeAll();
    } catch (error) {
      logger.error('Failed to close tunnels', { error: errorMessage(error) });
    }
    this.sessions.clear();
  }

  listNodes(filter: NodeFilter = {}): Promise<NodeRecord[]> {
    return this.directory.list(filter);
  }

  async resolveRoutes(filter: NodeFilter = {}): Promise<RoutePlan[]> {
    const nodes = await this.directory.list(filter);
    return this.resolver.resolveAll(nodes);
  }

  terminalSessionsUnit(ttlMs: number = config.sessions.ttlMs): WorkUnit<TerminalSession[]> {
    return terminalSessionsUnit(this.sessions, ttlMs);
  }

  /**
   * One full round. Only a discovery failure rejects; every node-level
   * problem ends up in the report.
   */
  async runRound<T>(unit: WorkUnit<T>, options: RoundOptions<T> = {}): Promise<Report<T>> {
    const startedAt = this.clock.now();
    const { filter, roundId, ...dispatchOptions } = options;

    const fleet = await this.directory.list();
    this.forgetDepartedSessions(fleet);
    const nodes = filter ? fleet.filter((node) => matchesFilter(node, filter)) : fleet;
    const plans = await this.resolver.resolveAll(nodes);
    const results = await this.dispatcher.run(plans, unit, dispatchOptions);
    this.recordReachability(results);

    const report = summarize(results, { roundId, startedAt, completedAt: this.clock.now() });
    logger.info('Dispatch round complete', {
      roundId: report.roundId,
      unit: unit.name,
      ...report.counts,
    });
    return report;
  }

  /**
   * Cached session answers only live as long as their node is in the fleet.
   */
  private forgetDepartedSessions(fleet: NodeRecord[]): void {
    const departed = this.sessions.retain(fleet.map((node) => node.name));
    const expired = this.sessions.prune();
    if (departed + expired > 0) {
      logger.debug('Session cache pruned', { departed, expired });
    }
  }

  private recordReachability<T>(results: DispatchResult<T>[]): void {
    for (const result of results) {
      if (result.mode !== 'direct') {
        continue;
      }
      if (result.outcome.kind === 'connection-failed') {
        this.tracker.markBad(result.nodeId, result.outcome.reason);
      } else if (result.outcome.kind === 'success') {
        this.tracker.markGood(result.nodeId);
      }
    }
  }
}
