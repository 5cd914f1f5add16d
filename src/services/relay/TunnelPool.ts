import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { RelayEndpoint, RelayLocation, TunnelHandle } from '../../models';
import { RelayCapability } from '../../models/capabilities';
import { KeyedQueue } from '../../utils/KeyedQueue';
import { linkedAbortController } from '../../utils/abort';
import { Clock, TimerHandle, systemClock } from '../../utils/clock';
import { TunnelError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export interface TunnelPoolOptions {
  setupTimeoutMs?: number;
  idleGraceMs?: number;
  reapIntervalMs?: number;
  maxTunnels?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  clock?: Clock;
}

export interface AcquireOptions {
  remotePort?: number;
  signal?: AbortSignal;
}

export interface TunnelPoolStats {
  tunnels: number;
  inUse: number;
  maxTunnels: number;
  totalAcquisitions: number;
}

export type CloseReason = 'idle' | 'dead' | 'evicted' | 'replaced' | 'shutdown';

interface TunnelEntry {
  relayId: string;
  tunnelId: string;
  nodeId: string;
  scope: string;
  endpoint: RelayEndpoint;
  createdAt: number;
  lastUsedAt: number;
  refCount: number;
  closed: boolean;
}

interface ScopeBackoff {
  failures: number;
  until: number;
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);

/**
 * Owns every relay tunnel. At most one tunnel exists per (node, scope);
 * callers share it through reference counting and the reaper closes tunnels
 * nobody has used for the grace period.
 *
 * All state changes for one key run under that key's lock. Different keys
 * never wait on each other.
 */
export class TunnelPool extends EventEmitter {
  private readonly setupTimeoutMs: number;
  private readonly idleGraceMs: number;
  private readonly reapIntervalMs: number;
  private readonly maxTunnels: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly clock: Clock;

  private entries: Map<string, TunnelEntry> = new Map();
  private outstanding: WeakSet<TunnelHandle> = new WeakSet();
  private backoff: Map<string, ScopeBackoff> = new Map();
  private locks = new KeyedQueue();
  private pendingCreates = 0;
  private totalAcquisitions = 0;
  private reapTimer: TimerHandle | null = null;
  private reaping = false;
  private shutDown = false;

  static keyFor(nodeId: string, scope: string): string {
    return `${scope}/${nodeId}`;
  }

  constructor(
    private readonly relay: RelayCapability,
    options: TunnelPoolOptions = {}
  ) {
    super();
    this.setupTimeoutMs = options.setupTimeoutMs ?? config.tunnel.setupTimeoutMs;
    this.idleGraceMs = options.idleGraceMs ?? config.tunnel.idleGraceMs;
    this.reapIntervalMs = options.reapIntervalMs ?? config.tunnel.reapIntervalMs;
    this.maxTunnels = options.maxTunnels ?? config.tunnel.maxTunnels;
    this.backoffBaseMs = options.backoffBaseMs ?? config.tunnel.backoffBaseMs;
    this.backoffMaxMs = options.backoffMaxMs ?? config.tunnel.backoffMaxMs;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Hands out the tunnel to `nodeId` through `relay`, creating it if needed.
   * The relay is the one routing located and the operator approved; it is
   * never looked up again here.
   */
  async acquire(nodeId: string, relay: RelayLocation, options: AcquireOptions = {}): Promise<TunnelHandle> {
    const scope = relay.scope;
    const relayId = TunnelPool.keyFor(nodeId, scope);

    return this.locks.run(relayId, async () => {
      if (this.shutDown) {
        throw new TunnelError('Tunnel pool is shut down', relayId);
      }
      if (options.signal?.aborted) {
        throw new TunnelError('Tunnel setup cancelled', relayId);
      }

      const existing = this.entries.get(relayId);
      if (existing && existing.endpoint.relay !== relay.name) {
        if (existing.refCount > 0) {
          throw new TunnelError(
            `Tunnel ${relayId} is in use through relay ${existing.endpoint.relay}, not ${relay.name}`,
            relayId
          );
        }
        await this.closeEntry(existing, 'replaced');
      } else if (existing) {
        if (this.isAlive(existing)) {
          existing.refCount++;
          existing.lastUsedAt = this.clock.now();
          logger.debug('Reusing tunnel', { relayId, refCount: existing.refCount });
          return this.handOut(existing);
        }
        logger.warn('Tunnel no longer alive, recreating', { relayId, tunnelId: existing.tunnelId });
        await this.closeEntry(existing, 'dead');
      }

      this.checkBackoff(scope, relayId);
      this.ensureCapacity(relayId);

      this.pendingCreates++;
      let entry: TunnelEntry;
      try {
        entry = await this.create(nodeId, relay, relayId, options);
      } finally {
        this.pendingCreates--;
      }
      return this.handOut(entry);
    });
  }

  /**
   * Gives back one acquisition. Releasing the same handle twice is a no-op.
   * Never closes the tunnel; that is left to the reaper.
   */
  async release(handle: TunnelHandle): Promise<void> {
    if (!this.outstanding.has(handle)) {
      return;
    }
    this.outstanding.delete(handle);

    await this.locks.run(handle.relayId, async () => {
      const entry = this.entries.get(handle.relayId);
      if (!entry || entry.tunnelId !== handle.tunnelId) {
        return;
      }
      entry.refCount = Math.max(0, entry.refCount - 1);
      entry.lastUsedAt = this.clock.now();
      logger.debug('Tunnel released', { relayId: entry.relayId, refCount: entry.refCount });
    });
  }

  /**
   * Closes unused tunnels idle for at least the grace period, and unused
   * tunnels the relay reports dead. Returns how many were closed.
   */
  async reap(): Promise<number> {
    let closed = 0;
    for (const candidate of [...this.entries.values()]) {
      if (!this.isReapable(candidate)) {
        continue;
      }
      await this.locks.run(candidate.relayId, async () => {
        const entry = this.entries.get(candidate.relayId);
        if (entry === candidate && this.isReapable(entry)) {
          await this.closeEntry(entry, this.isAlive(entry) ? 'idle' : 'dead');
          closed++;
        }
      });
    }
    if (closed > 0) {
      logger.info('Reaped idle tunnels', { closed, remaining: this.entries.size });
    }
    return closed;
  }

  start(): void {
    if (this.reapTimer !== null) {
      return;
    }
    logger.info('Starting tunnel reaper', { intervalMs: this.reapIntervalMs, idleGraceMs: this.idleGraceMs });
    this.reapTimer = this.clock.setInterval(() => {
      void this.runScheduledReap();
    }, this.reapIntervalMs);
  }

  stop(): void {
    if (this.reapTimer !== null) {
      this.clock.clearInterval(this.reapTimer);
      this.reapTimer = null;
      logger.info('Tunnel reaper stopped');
    }
  }

  /**
   * Force-closes every tunnel regardless of use. Only for process shutdown;
   * the pool refuses new acquisitions afterwards.
   */
  async closeAll(): Promise<void> {
    this.stop();
    this.shutDown = true;
    const entries = [...this.entries.values()];
    logger.info('Closing all tunnels', { count: entries.length });
    await Promise.all(entries.map((entry) => this.closeEntry(entry, 'shutdown')));
  }

  stats(): TunnelPoolStats {
    let inUse = 0;
    for (const entry of this.entries.values()) {
      if (entry.refCount > 0) {
        inUse++;
      }
    }
    return {
      tunnels: this.entries.size,
      inUse,
      maxTunnels: this.maxTunnels,
      totalAcquisitions: this.totalAcquisitions,
    };
  }

  /**
   * Snapshots of the live tunnels, for status displays.
   */
  list(): TunnelHandle[] {
    return [...this.entries.values()].map((entry) => this.snapshot(entry));
  }

  isBackingOff(scope: string): boolean {
    const state = this.backoff.get(scope);
    return state !== undefined && state.until > this.clock.now();
  }

  private async runScheduledReap(): Promise<void> {
    if (this.reaping) {
      return;
    }
    this.reaping = true;
    try {
      await this.reap();
    } catch (error) {
      logger.error('Tunnel reaper failed', { error: errorMessage(error) });
    } finally {
      this.reaping = false;
    }
  }

  private async create(
    nodeId: string,
    location: RelayLocation,
    relayId: string,
    options: AcquireOptions
  ): Promise<TunnelEntry> {
    const scope = location.scope;
    const remotePort = options.remotePort ?? 22;
    const { controller, dispose } = linkedAbortController(options.signal);
    const timer = this.clock.setTimeout(() => {
      controller.abort(new TunnelError(`Tunnel setup timed out after ${this.setupTimeoutMs}ms`, relayId));
    }, this.setupTimeoutMs);
    let settled = false;

    const creation = Promise.resolve().then(() =>
      this.relay.createRelay(nodeId, location, { remotePort, signal: controller.signal })
    );
    const aborted = new Promise<never>((_, reject) => {
      const onAbort = (): void => {
        const reason: unknown = controller.signal.reason;
        reject(reason instanceof TunnelError ? reason : new TunnelError('Tunnel setup cancelled', relayId));
      };
      if (controller.signal.aborted) {
        onAbort();
        return;
      }
      controller.signal.addEventListener('abort', onAbort, { once: true });
    });

    logger.info('Creating tunnel', { relayId, nodeId, relay: location.name });
    let endpoint: RelayEndpoint;
    try {
      endpoint = await Promise.race([creation, aborted]);
      settled = true;
    } catch (error) {
      // A caller giving up says nothing about the relay.
      if (!options.signal?.aborted) {
        this.recordFailure(scope);
      }
      const tunnelError =
        error instanceof TunnelError ? error : new TunnelError(`Relay rejected tunnel: ${errorMessage(error)}`, relayId);
      logger.warn('Tunnel creation failed', { relayId, error: tunnelError.message });
      this.emit('tunnelFailed', relayId, tunnelError);
      throw tunnelError;
    } finally {
      this.clock.clearTimeout(timer);
      if (!settled) {
        controller.abort();
        // A relay that comes up after we gave up must not be left running.
        void creation.then(
          (late) => this.destroyQuietly(late, relayId),
          () => undefined
        );
      }
      dispose();
    }

    if (!LOOPBACK_HOSTS.has(endpoint.local.host)) {
      await this.destroyQuietly(endpoint, relayId);
      this.recordFailure(scope);
      const error = new TunnelError(
        `Tunnel bound to ${endpoint.local.host} instead of a loopback address; rejected`,
        relayId
      );
      this.emit('tunnelFailed', relayId, error);
      throw error;
    }

    if (this.shutDown) {
      await this.destroyQuietly(endpoint, relayId);
      throw new TunnelError('Tunnel pool is shut down', relayId);
    }

    this.backoff.delete(scope);
    const now = this.clock.now();
    const entry: TunnelEntry = {
      relayId,
      tunnelId: uuidv4(),
      nodeId,
      scope,
      endpoint,
      createdAt: now,
      lastUsedAt: now,
      refCount: 1,
      closed: false,
    };
    this.entries.set(relayId, entry);

    logger.info('Tunnel created', {
      relayId,
      tunnelId: entry.tunnelId,
      local: `${endpoint.local.host}:${endpoint.local.port}`,
      poolSize: this.entries.size,
    });
    this.emit('tunnelCreated', this.snapshot(entry));
    return entry;
  }

  private handOut(entry: TunnelEntry): TunnelHandle {
    const handle = this.snapshot(entry);
    this.outstanding.add(handle);
    this.totalAcquisitions++;
    return handle;
  }

  private snapshot(entry: TunnelEntry): TunnelHandle {
    const handle: TunnelHandle = {
      relayId: entry.relayId,
      tunnelId: entry.tunnelId,
      nodeId: entry.nodeId,
      scope: entry.scope,
      localEndpoint: Object.freeze({ ...entry.endpoint.local }),
      remoteEndpoint: `${entry.endpoint.relay}->${entry.nodeId}:${entry.endpoint.remotePort}`,
      createdAt: entry.createdAt,
      lastUsedAt: entry.lastUsedAt,
      refCount: entry.refCount,
    };
    return Object.freeze(handle);
  }

  private isAlive(entry: TunnelEntry): boolean {
    return this.relay.isAlive ? this.relay.isAlive(entry.endpoint) : true;
  }

  private isReapable(entry: TunnelEntry): boolean {
    if (entry.refCount > 0) {
      return false;
    }
    return !this.isAlive(entry) || this.clock.now() - entry.lastUsedAt >= this.idleGraceMs;
  }

  private checkBackoff(scope: string, relayId: string): void {
    const state = this.backoff.get(scope);
    if (!state) {
      return;
    }
    const remaining = state.until - this.clock.now();
    if (remaining > 0) {
      throw new TunnelError(
        `Relay scope ${scope} backing off for ${remaining}ms after ${state.failures} failed attempt(s)`,
        relayId
      );
    }
  }

  private recordFailure(scope: string): void {
    const failures = (this.backoff.get(scope)?.failures ?? 0) + 1;
    const delay = Math.min(this.backoffMaxMs, this.backoffBaseMs * Math.pow(2, failures - 1));
    this.backoff.set(scope, { failures, until: this.clock.now() + delay });
  }

  /**
   * Makes room for one more tunnel by evicting the longest-idle unused one.
   * The victim leaves the map before any await so no other key can pick it up.
   */
  private ensureCapacity(relayId: string): void {
    if (this.entries.size + this.pendingCreates < this.maxTunnels) {
      return;
    }

    let victim: TunnelEntry | null = null;
    for (const entry of this.entries.values()) {
      if (entry.refCount === 0 && (victim === null || entry.lastUsedAt < victim.lastUsedAt)) {
        victim = entry;
      }
    }

    if (victim === null) {
      throw new TunnelError(`Tunnel pool exhausted (${this.maxTunnels} tunnels in use)`, relayId);
    }

    logger.info('Evicting idle tunnel', {
      relayId: victim.relayId,
      idleMs: this.clock.now() - victim.lastUsedAt,
    });
    void this.closeEntry(victim, 'evicted');
  }

  /**
   * Tears a tunnel down exactly once. Relay errors are logged, not raised.
   */
  private async closeEntry(entry: TunnelEntry, reason: CloseReason): Promise<void> {
    if (entry.closed) {
      return;
    }
    entry.closed = true;
    if (this.entries.get(entry.relayId) === entry) {
      this.entries.delete(entry.relayId);
    }

    await this.destroyQuietly(entry.endpoint, entry.relayId);
    logger.info('Tunnel closed', { relayId: entry.relayId, tunnelId: entry.tunnelId, reason });
    this.emit('tunnelClosed', this.snapshot(entry), reason);
  }

  private async destroyQuietly(endpoint: RelayEndpoint, relayId: string): Promise<void> {
    try {
      await this.relay.destroyRelay(endpoint);
    } catch (error) {
      logger.warn('Relay teardown failed (ignored)', { relayId, error: errorMessage(error) });
    }
  }
}
