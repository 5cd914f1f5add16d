import { Command } from 'commander';
import { CommandOutput, Report } from '../../models';
import { ReportSink } from '../../models/capabilities';
import { commandUnit } from '../../services/dispatch/units';
import { JsonRenderer, TableRenderer, formatCommandOutput } from '../../services/report/ReportRenderer';
import { CommonOptions, parseInteger, toFilter, withFleet } from '../context';
import { config } from '../../config/config';

/**
 * Exit status for a finished round: 0 only when every routable node succeeded.
 */
export function exitCodeFor(report: Report<unknown>): number {
  return report.counts.failed > 0 || report.counts.timedOut > 0 ? 1 : 0;
}

export function runCommand(program: Command): void {
  program
    .command('run')
    .description('Run a shell command on every matching node')
    .argument('<command...>', 'Command to run, after --')
    .option('-p, --pattern <glob>', 'Only nodes whose name matches the glob')
    .option('-c, --concurrency <n>', 'Maximum nodes worked on at once', parseInteger)
    .option('-t, --timeout <ms>', 'Per-node timeout', parseInteger)
    .option('-d, --deadline <ms>', 'Budget for the whole round', parseInteger)
    .option('--json', 'Print the report as JSON')
    .action(async (words: string[], options: CommonOptions) => {
      const command = words.join(' ');
      await withFleet(options, async (fleet, signal) => {
        const sink: ReportSink<CommandOutput> = options.json
          ? new JsonRenderer<CommandOutput>()
          : new TableRenderer<CommandOutput>(formatCommandOutput);

        const report = await fleet.runRound(commandUnit(command), {
          filter: toFilter(options),
          perNodeTimeoutMs: options.timeout ?? config.dispatch.perNodeTimeoutMs,
          deadlineMs: options.deadline,
          signal,
        });
        await sink.render(report);
        process.exitCode = exitCodeFor(report);
      });
    });
}
