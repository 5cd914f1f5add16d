import {
  DirectRoutePlan,
  NodeRecord,
  RelayedRoutePlan,
  RelayLocation,
  RoutePlan,
  UnreachableReason,
  UnreachableRoutePlan,
} from '../../models';
import { RelayCapability, RelayPolicy } from '../../models/capabilities';
import { SessionCache } from '../session/SessionCache';
import { TunnelPool } from '../relay/TunnelPool';
import { ReachabilityTracker } from './ReachabilityTracker';
import { Clock, systemClock } from '../../utils/clock';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export interface RoutingResolverOptions {
  /** Relay driver used to locate a relay per scope. Without one nothing is relayed. */
  relay?: RelayCapability;
  policy?: RelayPolicy;
  tracker?: ReachabilityTracker;
  /** Treat the private address as directly reachable (running inside the network). */
  preferPrivate?: boolean;
  locateTtlMs?: number;
  clock?: Clock;
}

export const autoApprovePolicy: RelayPolicy = {
  approve: () => true,
};

type RelayDecision =
  | { kind: 'approved'; location: RelayLocation }
  | { kind: 'unavailable'; detail: string }
  | { kind: 'declined'; detail: string };

/**
 * Decides, per node, how it is reached: directly, through a relay tunnel, or
 * not at all. Resolution never opens a tunnel; relayed plans name the pool
 * entry the dispatcher acquires.
 */
export class RoutingResolver {
  private readonly relay: RelayCapability | null;
  private readonly policy: RelayPolicy;
  private readonly tracker: ReachabilityTracker;
  private readonly preferPrivate: boolean;
  private readonly locateTtlMs: number;
  private readonly locations: SessionCache<RelayLocation | null>;
  private approvals: Map<string, Promise<boolean>> = new Map();

  constructor(options: RoutingResolverOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.relay = options.relay ?? null;
    this.policy = options.policy ?? autoApprovePolicy;
    this.tracker = options.tracker ?? new ReachabilityTracker(config.routing.knownBadTtlMs, clock);
    this.preferPrivate = options.preferPrivate ?? config.routing.preferPrivate;
    this.locateTtlMs = options.locateTtlMs ?? config.relay.locateTtlMs;
    this.locations = new SessionCache<RelayLocation | null>('relay-locations', clock);
  }

  async resolve(node: NodeRecord): Promise<RoutePlan> {
    if (node.state === 'stopped') {
      return unreachable(node, 'node-stopped', 'node is not running');
    }

    const directAddress = this.directAddress(node);
    const badReason = directAddress ? this.tracker.badReason(node.name) : null;

    if (directAddress && badReason === null) {
      const plan: DirectRoutePlan = {
        nodeId: node.name,
        mode: 'direct',
        endpoint: Object.freeze({ host: directAddress, port: node.port }),
        establishedAt: node.observedAt,
      };
      return Object.freeze(plan);
    }

    if (node.relayEligible && node.scope && this.relay) {
      const decision = await this.decideRelay(node.scope);
      switch (decision.kind) {
        case 'approved': {
          const plan: RelayedRoutePlan = {
            nodeId: node.name,
            mode: 'relayed',
            relayId: TunnelPool.keyFor(node.name, node.scope),
            relayScope: node.scope,
            endpoint: decision.location.name,
            targetPort: node.port,
            establishedAt: node.observedAt,
          };
          return Object.freeze(plan);
        }
        case 'declined':
          return unreachable(node, 'relay-declined', decision.detail);
        case 'unavailable':
          if (badReason === null) {
            return unreachable(node, 'relay-unavailable', decision.detail);
          }
          break;
      }
    }

    if (badReason !== null) {
      return unreachable(
        node,
        'direct-known-bad',
        `direct address unreachable (${badReason}) and no relay available`
      );
    }
    return unreachable(node, 'no-route', 'no route: no public address and no relay available');
  }

  /**
   * Resolves every node independently, keeping input order.
   */
  async resolveAll(nodes: NodeRecord[]): Promise<RoutePlan[]> {
    return Promise.all(
      nodes.map(async (node) => {
        try {
          return await this.resolve(node);
        } catch (error) {
          logger.warn('Route resolution failed', { nodeId: node.name, error: errorMessage(error) });
          return unreachable(node, 'no-route', `route resolution failed: ${errorMessage(error)}`);
        }
      })
    );
  }

  private directAddress(node: NodeRecord): string | null {
    if (node.addresses.publicAddress) {
      return node.addresses.publicAddress;
    }
    if (this.preferPrivate && node.addresses.privateAddress) {
      return node.addresses.privateAddress;
    }
    return null;
  }

  private async decideRelay(scope: string): Promise<RelayDecision> {
    const relay = this.relay;
    if (!relay) {
      return { kind: 'unavailable', detail: 'no relay driver configured' };
    }

    let location: RelayLocation | null;
    try {
      location = await this.locations.getOrFetch(scope, this.locateTtlMs, () => relay.locateRelay(scope));
    } catch (error) {
      logger.debug('Relay lookup failed', { scope, error: errorMessage(error) });
      return { kind: 'unavailable', detail: `relay lookup failed: ${errorMessage(error)}` };
    }

    if (!location) {
      return { kind: 'unavailable', detail: `no relay available for scope ${scope}` };
    }

    if (!(await this.isApproved(location))) {
      return { kind: 'declined', detail: `relay ${location.name} declined by operator` };
    }
    return { kind: 'approved', location };
  }

  private isApproved(location: RelayLocation): Promise<boolean> {
    const key = `${location.scope}/${location.name}`;
    let approval = this.approvals.get(key);
    if (!approval) {
      approval = Promise.resolve()
        .then(() => this.policy.approve(location))
        .catch((error: unknown) => {
          logger.warn('Relay approval failed, treating as declined', {
            relay: location.name,
            error: errorMessage(error),
          });
          return false;
        });
      this.approvals.set(key, approval);
    }
    return approval;
  }
}

function unreachable(node: NodeRecord, reason: UnreachableReason, detail: string): UnreachableRoutePlan {
  const plan: UnreachableRoutePlan = {
    nodeId: node.name,
    mode: 'unreachable',
    reason,
    detail,
    establishedAt: node.observedAt,
  };
  return Object.freeze(plan);
}
