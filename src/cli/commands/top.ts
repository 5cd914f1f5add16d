import { Command } from 'commander';
import { NodeMetrics } from '../../models';
import { ReportSink } from '../../models/capabilities';
import { metricsUnit } from '../../services/dispatch/units';
import { LiveView } from '../../services/report/LiveView';
import { JsonRenderer, TableRenderer, formatMetrics } from '../../services/report/ReportRenderer';
import { CommonOptions, parseInteger, toFilter, withFleet } from '../context';
import { errorMessage } from '../../utils/errors';
import { config } from '../../config/config';

interface TopOptions extends CommonOptions {
  interval?: number;
  iterations?: number;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export function topCommand(program: Command): void {
  program
    .command('top')
    .description('Live CPU, memory and load view of the fleet')
    .option('-p, --pattern <glob>', 'Only nodes whose name matches the glob')
    .option('-c, --concurrency <n>', 'Maximum nodes worked on at once', parseInteger)
    .option('-t, --timeout <ms>', 'Per-node timeout', parseInteger)
    .option('-i, --interval <ms>', 'Time between rounds', parseInteger)
    .option('-n, --iterations <n>', 'Stop after this many rounds', parseInteger)
    .option('--json', 'Print each round as JSON')
    .action(async (options: TopOptions) => {
      await withFleet(options, async (fleet, signal) => {
        const table = new TableRenderer<NodeMetrics>(formatMetrics, (text) => {
          process.stdout.write(CLEAR_SCREEN + text);
        });
        const sink: ReportSink<NodeMetrics> = options.json ? new JsonRenderer<NodeMetrics>() : table;
        const unit = metricsUnit();

        const view = new LiveView<NodeMetrics>(
          (roundSignal) =>
            fleet.runRound(unit, {
              filter: toFilter(options),
              perNodeTimeoutMs: options.timeout ?? config.dispatch.perNodeTimeoutMs,
              // A round must finish before the next one is due.
              deadlineMs: options.interval ?? config.live.intervalMs,
              signal: roundSignal,
            }),
          sink,
          { intervalMs: options.interval, iterations: options.iterations }
        );
        view.on('roundError', (error: unknown) => {
          process.stderr.write(`Round failed: ${errorMessage(error)}\n`);
        });
        await view.run(signal);
      });
    });
}
