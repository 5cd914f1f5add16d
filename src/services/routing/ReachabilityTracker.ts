import { Clock, systemClock } from '../../utils/clock';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

interface KnownBad {
  reason: string;
  until: number;
}

/**
 * Remembers nodes whose direct address recently refused connections, so the
 * resolver can route them through a relay until the mark expires.
 */
export class ReachabilityTracker {
  private knownBad: Map<string, KnownBad> = new Map();

  constructor(
    private readonly ttlMs: number = config.routing.knownBadTtlMs,
    private readonly clock: Clock = systemClock
  ) {}

  markBad(nodeId: string, reason: string): void {
    this.knownBad.set(nodeId, { reason, until: this.clock.now() + this.ttlMs });
    logger.debug('Direct route marked bad', { nodeId, reason, ttlMs: this.ttlMs });
  }

  markGood(nodeId: string): void {
    if (this.knownBad.delete(nodeId)) {
      logger.debug('Direct route marked good', { nodeId });
    }
  }

  isKnownBad(nodeId: string): boolean {
    return this.badReason(nodeId) !== null;
  }

  badReason(nodeId: string): string | null {
    const entry = this.knownBad.get(nodeId);
    if (!entry) {
      return null;
    }
    if (this.clock.now() >= entry.until) {
      this.knownBad.delete(nodeId);
      return null;
    }
    return entry.reason;
  }
}
