import { NodeMetrics, ProcessInfo, TerminalSession } from '../models';

const TOP_PROCESS_LIMIT = 3;
const COMMAND_WIDTH = 40;

function parseLoadAverage(line: string | undefined): [number, number, number] | null {
  if (!line) {
    return null;
  }
  const marker = line.indexOf('load average:');
  if (marker < 0) {
    return null;
  }
  const values = line
    .slice(marker + 'load average:'.length)
    .split(',')
    .slice(0, 3)
    .map((part) => Number.parseFloat(part.trim()));
  if (values.length !== 3 || values.some((value) => Number.isNaN(value))) {
    return null;
  }
  return [values[0], values[1], values[2]];
}

/**
 * Parses the combined output of `uptime && free -m && top -bn1`.
 * Sections that cannot be read come back as null rather than failing.
 */
export function parseMetricsOutput(output: string): NodeMetrics {
  const lines = output.split('\n');
  const metrics: NodeMetrics = {
    loadAverage: parseLoadAverage(lines[0]),
    cpuPercent: null,
    memoryUsedMb: null,
    memoryTotalMb: null,
    memoryPercent: null,
    topProcesses: [],
  };

  // free prints a header then Mem:, right after the uptime line
  const memLine = lines.slice(1, 6).find((line) => line.startsWith('Mem:'));
  if (memLine) {
    const parts = memLine.trim().split(/\s+/);
    const total = Number.parseInt(parts[1], 10);
    const used = Number.parseInt(parts[2], 10);
    if (!Number.isNaN(total) && !Number.isNaN(used)) {
      metrics.memoryTotalMb = total;
      metrics.memoryUsedMb = used;
      metrics.memoryPercent = total > 0 ? (used / total) * 100 : 0;
    }
  }

  const processes: ProcessInfo[] = [];
  let inProcessList = false;
  for (const line of lines) {
    if (!inProcessList) {
      inProcessList = line.includes('PID') && line.includes('USER') && line.includes('COMMAND');
      continue;
    }
    const parts = line.trim().split(/\s+/);
    if (parts.length < 12 || processes.length >= TOP_PROCESS_LIMIT) {
      continue;
    }
    const cpu = Number.parseFloat(parts[8]);
    if (Number.isNaN(cpu) || cpu <= 0) {
      continue;
    }
    processes.push({
      pid: parts[0],
      user: parts[1],
      cpu: parts[8],
      mem: parts[9],
      command: parts.slice(11).join(' ').slice(0, COMMAND_WIDTH),
    });
  }

  metrics.topProcesses = processes;
  if (processes.length > 0) {
    // Sum of the busiest processes; close enough for a dashboard.
    metrics.cpuPercent = processes.reduce((sum, proc) => sum + Number.parseFloat(proc.cpu), 0);
  }
  return metrics;
}

/**
 * Parses `tmux list-sessions` lines such as
 * `dev: 3 windows (created Thu Oct 10 10:00:00 2024) (attached)`.
 * Lines without a `name:` prefix (e.g. "No sessions") are ignored.
 */
export function parseTmuxSessions(output: string, nodeId: string): TerminalSession[] {
  const sessions: TerminalSession[] = [];

  for (const raw of output.trim().split('\n')) {
    const line = raw.trim();
    const colon = line.indexOf(':');
    if (line.length === 0 || colon < 0) {
      continue;
    }

    const name = line.slice(0, colon).trim();
    const rest = line.slice(colon + 1).trim();

    const windowsMatch = /(\d+)\s+windows?\b/.exec(rest);
    const createdMatch = /\(created ([^)]*)\)/.exec(rest);

    sessions.push({
      nodeId,
      name,
      windows: windowsMatch ? Number.parseInt(windowsMatch[1], 10) : 1,
      createdAt: createdMatch ? createdMatch[1].trim() : '',
      attached: rest.includes('(attached)'),
    });
  }

  return sessions;
}
