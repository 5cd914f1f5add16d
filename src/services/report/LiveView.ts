import { EventEmitter } from 'events';
import { Report } from '../../models';
import { ReportSink } from '../../models/capabilities';
import { Clock, sleep, systemClock } from '../../utils/clock';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export type RoundRunner<T> = (signal: AbortSignal) => Promise<Report<T>>;

export interface LiveViewOptions {
  intervalMs?: number;
  /** Stop after this many rounds; unbounded when omitted. */
  iterations?: number;
  clock?: Clock;
}

/**
 * Repeats a dispatch round on an interval and renders each completed round.
 *
 * Events: 'round' (report), 'roundError' (error). A failed round is reported
 * and the loop carries on with the next one.
 */
export class LiveView<T> extends EventEmitter {
  private readonly intervalMs: number;
  private readonly iterations: number | null;
  private readonly clock: Clock;
  private controller: AbortController | null = null;
  private rounds = 0;

  constructor(
    private readonly runRound: RoundRunner<T>,
    private readonly sink: ReportSink<T>,
    options: LiveViewOptions = {}
  ) {
    super();
    this.intervalMs = options.intervalMs ?? config.live.intervalMs;
    this.iterations = options.iterations ?? null;
    this.clock = options.clock ?? systemClock;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  completedRounds(): number {
    return this.rounds;
  }

  /**
   * Runs until stop(), the external signal, or the iteration limit.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.controller) {
      throw new Error('Live view already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      controller.abort(signal.reason);
    }

    logger.info('Live view started', { intervalMs: this.intervalMs, iterations: this.iterations });
    let attempted = 0;
    try {
      while (!controller.signal.aborted && (this.iterations === null || attempted < this.iterations)) {
        attempted++;
        await this.runOnce(controller.signal);

        if (this.iterations !== null && attempted >= this.iterations) {
          break;
        }
        try {
          await sleep(this.intervalMs, controller.signal, this.clock);
        } catch {
          break;
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      logger.info('Live view stopped', { rounds: this.rounds });
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  private async runOnce(signal: AbortSignal): Promise<void> {
    try {
      const report = await this.runRound(signal);
      // A round interrupted by stop() is incomplete and never shown.
      if (signal.aborted) {
        return;
      }
      await this.sink.render(report);
      this.rounds++;
      this.emit('round', report);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      logger.warn('Live round failed', { error: errorMessage(error) });
      this.emit('roundError', error);
    }
  }
}
