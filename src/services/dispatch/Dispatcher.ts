import PQueue from 'p-queue';
import {
  DirectRoutePlan,
  DispatchOutcome,
  DispatchResult,
  RelayedRoutePlan,
  RoutePlan,
  TunnelHandle,
} from '../../models';
import { Connection, ConnectionCapability } from '../../models/capabilities';
import { TunnelPool } from '../relay/TunnelPool';
import { Clock, TimerHandle, systemClock } from '../../utils/clock';
import {
  CommandError,
  ConnectionError,
  DispatchTimeoutError,
  TunnelError,
  errorMessage,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export interface UnitContext {
  nodeId: string;
  signal: AbortSignal;
}

/**
 * What runs on each node once a connection is open.
 */
export interface WorkUnit<T> {
  readonly name: string;
  run(connection: Connection, context: UnitContext): Promise<T>;
  /** A still-fresh answer for `nodeId`, if the unit keeps one. Hits open no connection. */
  fromCache?(nodeId: string): T | undefined;
}

export interface DispatchOptions<T> {
  perNodeTimeoutMs?: number;
  /** Budget for the whole round, measured from the call to run(). */
  deadlineMs?: number;
  signal?: AbortSignal;
  onResult?: (result: DispatchResult<T>) => void;
  /** Fires when a worker has really finished, including abandoned ones. */
  onSettled?: (nodeId: string) => void;
}

export interface DispatcherOptions {
  maxConcurrency?: number;
  clock?: Clock;
}

type ReachablePlan = DirectRoutePlan | RelayedRoutePlan;

interface WorkerSlot<T> {
  plan: ReachablePlan;
  controller: AbortController;
  startedAt: number;
  timer: TimerHandle | null;
  handle: TunnelHandle | null;
  acquiring: boolean;
  tunnelFreed: () => void;
  abandonOutcome: DispatchOutcome<T> | null;
}

export const CANCELLED = 'cancelled';

/**
 * Maps a worker failure onto the outcome it is reported as.
 */
export function classifyError<T>(error: unknown): DispatchOutcome<T> {
  if (error instanceof ConnectionError || error instanceof TunnelError) {
    return { kind: 'connection-failed', reason: error.message };
  }
  if (error instanceof DispatchTimeoutError) {
    return { kind: 'timeout', reason: error.message };
  }
  if (error instanceof CommandError) {
    return {
      kind: 'command-failed',
      reason: error.message,
      exitCode: error.exitCode,
      partialOutput: error.partialOutput,
    };
  }
  return { kind: 'command-failed', reason: errorMessage(error), exitCode: null };
}

/**
 * Runs a unit of work against every routable node with bounded concurrency.
 *
 * Node-scoped failures never escape run(): each plan yields exactly one
 * result, in plan order. Workers that time out or get cancelled are abandoned
 * rather than awaited. A worker slot only frees up once its tunnel has been
 * handed back to the pool.
 */
export class Dispatcher {
  private readonly maxConcurrency: number;
  private readonly clock: Clock;

  constructor(
    private readonly connector: ConnectionCapability,
    private readonly tunnels: TunnelPool | null = null,
    options: DispatcherOptions = {}
  ) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? config.dispatch.maxConcurrency);
    this.clock = options.clock ?? systemClock;
  }

  run<T>(plans: RoutePlan[], unit: WorkUnit<T>, options: DispatchOptions<T> = {}): Promise<DispatchResult<T>[]> {
    const perNodeTimeoutMs = options.perNodeTimeoutMs ?? config.dispatch.perNodeTimeoutMs;
    const results: Array<DispatchResult<T> | undefined> = plans.map(() => undefined);
    const queue = new PQueue({ concurrency: this.maxConcurrency });
    const waiting = new Set<number>();
    const running = new Map<number, WorkerSlot<T>>();
    let remaining = plans.length;
    let stopped = false;
    let deadlineTimer: TimerHandle | null = null;

    logger.debug('Dispatch round starting', {
      unit: unit.name,
      plans: plans.length,
      maxConcurrency: this.maxConcurrency,
    });

    return new Promise<DispatchResult<T>[]>((resolve) => {
      const finish = (): void => {
        if (deadlineTimer !== null) {
          this.clock.clearTimeout(deadlineTimer);
        }
        options.signal?.removeEventListener('abort', onCancel);
        const ordered: DispatchResult<T>[] = [];
        for (const result of results) {
          if (result) {
            ordered.push(result);
          }
        }
        resolve(ordered);
      };

      const record = (index: number, outcome: DispatchOutcome<T>, elapsedMs: number): void => {
        if (results[index]) {
          return;
        }
        const plan = plans[index];
        const result: DispatchResult<T> = { nodeId: plan.nodeId, mode: plan.mode, outcome, elapsedMs };
        results[index] = result;
        waiting.delete(index);

        try {
          options.onResult?.(result);
        } catch (error) {
          logger.warn('Result callback failed', { nodeId: plan.nodeId, error: errorMessage(error) });
        }

        remaining--;
        if (remaining === 0) {
          finish();
        }
      };

      const abandon = (slot: WorkerSlot<T>, outcome: DispatchOutcome<T>, reason: Error): void => {
        if (slot.abandonOutcome) {
          return;
        }
        slot.abandonOutcome = outcome;
        slot.controller.abort(reason);
      };

      const execute = async (index: number, plan: ReachablePlan): Promise<void> => {
        waiting.delete(index);
        if (stopped || results[index]) {
          return;
        }

        let tunnelFreed: () => void = () => undefined;
        const freed = new Promise<void>((done) => {
          tunnelFreed = done;
        });
        const slot: WorkerSlot<T> = {
          plan,
          controller: new AbortController(),
          startedAt: this.clock.now(),
          timer: null,
          handle: null,
          acquiring: false,
          tunnelFreed,
          abandonOutcome: null,
        };
        slot.timer = this.clock.setTimeout(() => {
          const reason = new DispatchTimeoutError(`timed out after ${perNodeTimeoutMs}ms`, perNodeTimeoutMs);
          logger.warn('Node timed out', { nodeId: plan.nodeId, timeoutMs: perNodeTimeoutMs });
          abandon(slot, { kind: 'timeout', reason: reason.message }, reason);
        }, perNodeTimeoutMs);
        running.set(index, slot);
        logger.debug('Worker launched', { nodeId: plan.nodeId, mode: plan.mode });

        const abandoned = new Promise<DispatchOutcome<T>>((settle) => {
          slot.controller.signal.addEventListener(
            'abort',
            () => settle(slot.abandonOutcome ?? { kind: 'timeout', reason: CANCELLED }),
            { once: true }
          );
        });
        const worker = this.work(slot, unit).then(
          (payload): DispatchOutcome<T> => ({ kind: 'success', payload }),
          (error: unknown) => {
            if (!slot.controller.signal.aborted) {
              logger.debug('Worker failed', { nodeId: plan.nodeId, error: errorMessage(error) });
            }
            return classifyError<T>(error);
          }
        );
        worker
          .then(() => options.onSettled?.(plan.nodeId))
          .catch((error: unknown) => {
            logger.warn('Settled callback failed', { nodeId: plan.nodeId, error: errorMessage(error) });
          });

        const outcome = await Promise.race([worker, abandoned]);
        const elapsedMs = this.clock.now() - slot.startedAt;
        if (slot.timer !== null) {
          this.clock.clearTimeout(slot.timer);
        }
        if (slot.controller.signal.aborted) {
          await this.releaseHandle(slot);
        }
        await freed;
        running.delete(index);
        record(index, outcome, elapsedMs);
      };

      const drain = (outcome: DispatchOutcome<T>, reason: Error): void => {
        stopped = true;
        queue.clear();
        for (const slot of [...running.values()]) {
          abandon(slot, outcome, reason);
        }
        for (const index of [...waiting]) {
          record(index, queuedOutcome(outcome), 0);
        }
      };

      const onCancel = (): void => {
        logger.info('Dispatch round cancelled', { unit: unit.name, running: running.size, queued: waiting.size });
        drain({ kind: 'timeout', reason: CANCELLED }, new DispatchTimeoutError(CANCELLED, 0));
      };

      if (plans.length === 0) {
        finish();
        return;
      }

      // Unreachable plans are settled up front, without a worker.
      plans.forEach((plan, index) => {
        if (plan.mode === 'unreachable') {
          record(index, { kind: 'skipped', reason: plan.detail }, 0);
        }
      });
      if (remaining === 0) {
        return;
      }

      if (options.signal?.aborted) {
        plans.forEach((plan, index) => {
          if (plan.mode !== 'unreachable') {
            record(index, { kind: 'skipped', reason: CANCELLED }, 0);
          }
        });
        return;
      }

      const reachable: Array<[number, ReachablePlan]> = [];
      plans.forEach((plan, index) => {
        if (plan.mode === 'unreachable') {
          return;
        }
        const cached = unit.fromCache?.(plan.nodeId);
        if (cached !== undefined) {
          logger.debug('Answered from cache', { nodeId: plan.nodeId, unit: unit.name });
          record(index, { kind: 'success', payload: cached }, 0);
          return;
        }
        reachable.push([index, plan]);
      });
      if (remaining === 0) {
        return;
      }

      options.signal?.addEventListener('abort', onCancel, { once: true });

      const deadlineMs = options.deadlineMs;
      if (deadlineMs !== undefined) {
        deadlineTimer = this.clock.setTimeout(() => {
          deadlineTimer = null;
          const message = `round deadline of ${deadlineMs}ms exceeded`;
          logger.warn('Dispatch deadline reached', { unit: unit.name, running: running.size, queued: waiting.size });
          drain({ kind: 'timeout', reason: message }, new DispatchTimeoutError(message, deadlineMs));
        }, deadlineMs);
      }

      for (const [index] of reachable) {
        waiting.add(index);
      }
      for (const [index, plan] of reachable) {
        queue.add(() => execute(index, plan)).catch((error: unknown) => {
          logger.error('Worker bookkeeping failed', { nodeId: plan.nodeId, error: errorMessage(error) });
        });
      }
    });
  }

  private async work<T>(slot: WorkerSlot<T>, unit: WorkUnit<T>): Promise<T> {
    const { plan, controller } = slot;
    const signal = controller.signal;
    let connection: Connection | null = null;

    try {
      if (plan.mode === 'relayed') {
        if (!this.tunnels) {
          throw new TunnelError('No tunnel pool configured for relayed nodes', plan.relayId);
        }
        slot.acquiring = true;
        let handle: TunnelHandle;
        try {
          handle = await this.tunnels.acquire(
            plan.nodeId,
            { name: plan.endpoint, scope: plan.relayScope },
            { remotePort: plan.targetPort, signal }
          );
        } catch (error) {
          slot.acquiring = false;
          throw error;
        }
        // Flag and handle change together; a release in between would free the slot early.
        slot.acquiring = false;
        slot.handle = handle;
        if (signal.aborted) {
          throw signal.reason;
        }
        connection = await this.connector.openRelayed(handle.localEndpoint);
      } else {
        connection = await this.connector.openDirect(plan.endpoint);
      }

      if (signal.aborted) {
        throw signal.reason;
      }
      return await unit.run(connection, { nodeId: plan.nodeId, signal });
    } finally {
      if (connection) {
        await closeQuietly(connection, plan.nodeId);
      }
      await this.releaseHandle(slot);
    }
  }

  /**
   * Hands the slot's tunnel back at most once. The slot counts as free of its
   * tunnel once nothing is held and no acquire is still in flight.
   */
  private async releaseHandle<T>(slot: WorkerSlot<T>): Promise<void> {
    const handle = slot.handle;
    slot.handle = null;
    if (handle && this.tunnels) {
      try {
        await this.tunnels.release(handle);
      } catch (error) {
        logger.warn('Tunnel release failed', { relayId: handle.relayId, error: errorMessage(error) });
      }
    }
    if (!slot.acquiring) {
      slot.tunnelFreed();
    }
  }
}

function queuedOutcome<T>(outcome: DispatchOutcome<T>): DispatchOutcome<T> {
  if (outcome.kind === 'timeout' && outcome.reason === CANCELLED) {
    return { kind: 'skipped', reason: CANCELLED };
  }
  return outcome;
}

async function closeQuietly(connection: Connection, nodeId: string): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    logger.debug('Connection close failed (ignored)', { nodeId, error: errorMessage(error) });
  }
}
