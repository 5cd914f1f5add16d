import {
  CommandOutput,
  DispatchOutcome,
  NodeMetrics,
  OutcomeKind,
  Report,
  TerminalSession,
} from '../../models';
import { ReportSink } from '../../models/capabilities';

export type Writer = (text: string) => void;
export type PayloadFormatter<T> = (payload: T) => string;

const stdoutWriter: Writer = (text) => {
  process.stdout.write(text);
};

export const STATUS_LABELS: Record<OutcomeKind, string> = {
  success: 'OK',
  'command-failed': 'FAILED',
  'connection-failed': 'FAILED',
  timeout: 'TIMEOUT',
  skipped: 'SKIPPED',
};

export function formatCommandOutput(output: CommandOutput): string {
  return output.stdout.trim().split('\n').join(' | ');
}

export function formatMetrics(metrics: NodeMetrics): string {
  const load = metrics.loadAverage ? metrics.loadAverage.map((value) => value.toFixed(2)).join(' / ') : 'N/A';
  const cpu = metrics.cpuPercent !== null ? `${metrics.cpuPercent.toFixed(1)}%` : 'N/A';
  const memory =
    metrics.memoryUsedMb !== null && metrics.memoryTotalMb !== null && metrics.memoryPercent !== null
      ? `${metrics.memoryUsedMb}/${metrics.memoryTotalMb}MB (${metrics.memoryPercent.toFixed(1)}%)`
      : 'N/A';
  const top = metrics.topProcesses.map((proc) => `${proc.command} ${proc.cpu}%`).join(', ');
  return `load ${load}  cpu ${cpu}  mem ${memory}${top ? `  top ${top}` : ''}`;
}

export function formatSessions(sessions: TerminalSession[]): string {
  if (sessions.length === 0) {
    return 'no sessions';
  }
  return sessions
    .map((session) => {
      const windows = `${session.windows} ${session.windows === 1 ? 'window' : 'windows'}`;
      return `${session.name} (${windows}${session.attached ? ', attached' : ''})`;
    })
    .join(', ');
}

function describeOutcome<T>(outcome: DispatchOutcome<T>, formatPayload: PayloadFormatter<T>): string {
  switch (outcome.kind) {
    case 'success':
      return formatPayload(outcome.payload);
    case 'command-failed':
      return outcome.exitCode !== null ? `${outcome.reason} (exit ${outcome.exitCode})` : outcome.reason;
    default:
      return outcome.reason;
  }
}

export function formatSummary(report: Report<unknown>): string {
  const { counts } = report;
  return (
    `${counts.succeeded}/${counts.total} succeeded, ${counts.failed} failed, ` +
    `${counts.timedOut} timed out, ${counts.skipped} skipped`
  );
}

/**
 * Fixed-width text table, one row per node, followed by a summary line.
 */
export function formatTable<T>(report: Report<T>, formatPayload: PayloadFormatter<T>): string {
  const header = ['NODE', 'MODE', 'STATUS', 'TIME', 'DETAIL'];
  const rows = report.results.map((result) => [
    result.nodeId,
    result.mode,
    STATUS_LABELS[result.outcome.kind],
    `${(result.elapsedMs / 1000).toFixed(1)}s`,
    describeOutcome(result.outcome, formatPayload),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column].length))
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
      .join('  ')
      .trimEnd();

  return [line(header), ...rows.map(line), '', formatSummary(report), ''].join('\n');
}

export class TableRenderer<T> implements ReportSink<T> {
  constructor(
    private readonly formatPayload: PayloadFormatter<T>,
    private readonly write: Writer = stdoutWriter
  ) {}

  render(report: Report<T>): void {
    this.write(formatTable(report, this.formatPayload));
  }
}

export class JsonRenderer<T> implements ReportSink<T> {
  constructor(private readonly write: Writer = stdoutWriter) {}

  render(report: Report<T>): void {
    this.write(`${JSON.stringify(report, null, 2)}\n`);
  }
}
