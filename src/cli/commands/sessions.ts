import { Command } from 'commander';
import { Report, TerminalSession } from '../../models';
import { ReportSink } from '../../models/capabilities';
import { LiveView } from '../../services/report/LiveView';
import { JsonRenderer, TableRenderer, formatSessions } from '../../services/report/ReportRenderer';
import { CommonOptions, parseInteger, toFilter, withFleet } from '../context';
import { errorMessage } from '../../utils/errors';
import { config } from '../../config/config';

interface SessionsOptions extends CommonOptions {
  watch?: boolean;
  interval?: number;
  iterations?: number;
}

export function sessionsCommand(program: Command): void {
  program
    .command('sessions')
    .description('List tmux sessions on every matching node')
    .option('-p, --pattern <glob>', 'Only nodes whose name matches the glob')
    .option('-c, --concurrency <n>', 'Maximum nodes worked on at once', parseInteger)
    .option('-t, --timeout <ms>', 'Per-node timeout', parseInteger)
    .option('-w, --watch', 'Keep listing; answers younger than the session TTL are reused')
    .option('-i, --interval <ms>', 'Time between rounds in watch mode', parseInteger)
    .option('-n, --iterations <n>', 'Stop watching after this many rounds', parseInteger)
    .option('--json', 'Print the report as JSON')
    .action(async (options: SessionsOptions) => {
      await withFleet(options, async (fleet, signal) => {
        const sink: ReportSink<TerminalSession[]> = options.json
          ? new JsonRenderer<TerminalSession[]>()
          : new TableRenderer<TerminalSession[]>(formatSessions);
        const unit = fleet.terminalSessionsUnit(config.sessions.ttlMs);
        const round = (roundSignal?: AbortSignal): Promise<Report<TerminalSession[]>> =>
          fleet.runRound(unit, {
            filter: toFilter(options),
            perNodeTimeoutMs: options.timeout ?? config.dispatch.perNodeTimeoutMs,
            signal: roundSignal,
          });

        if (!options.watch) {
          await sink.render(await round(signal));
          return;
        }

        const view = new LiveView<TerminalSession[]>(round, sink, {
          intervalMs: options.interval,
          iterations: options.iterations,
        });
        view.on('roundError', (error: unknown) => {
          process.stderr.write(`Round failed: ${errorMessage(error)}\n`);
        });
        await view.run(signal);
      });
    });
}
