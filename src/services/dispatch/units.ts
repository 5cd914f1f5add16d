import { CommandOutput, NodeMetrics, TerminalSession } from '../../models';
import { Connection } from '../../models/capabilities';
import { SessionCache } from '../session/SessionCache';
import { CommandError } from '../../utils/errors';
import { parseMetricsOutput, parseTmuxSessions } from '../../utils/parsers';
import { UnitContext, WorkUnit } from './Dispatcher';

export const METRICS_COMMAND = 'uptime && free -m && top -bn1 -o %CPU | head -n 15';
export const TMUX_SESSIONS_COMMAND = "tmux list-sessions 2>/dev/null || echo 'No sessions'";

async function runChecked(connection: Connection, command: string, context: UnitContext): Promise<CommandOutput> {
  const output = await connection.execute(command, { signal: context.signal });
  if (output.exitCode !== 0) {
    const detail = output.stderr.trim() || `exit code ${output.exitCode}`;
    throw new CommandError(`Command failed: ${detail}`, output.exitCode, output.stdout);
  }
  return output;
}

/**
 * Runs an arbitrary shell command. A non-zero exit is a failure that keeps
 * whatever the command printed.
 */
export function commandUnit(command: string): WorkUnit<CommandOutput> {
  return {
    name: `command:${command}`,
    run: (connection, context) => runChecked(connection, command, context),
  };
}

export function metricsUnit(): WorkUnit<NodeMetrics> {
  return {
    name: 'metrics',
    run: async (connection, context) => {
      const output = await runChecked(connection, METRICS_COMMAND, context);
      return parseMetricsOutput(output.stdout);
    },
  };
}

/**
 * Lists tmux sessions, reusing each node's previous answer while it is
 * younger than `ttlMs`. Fresh answers are served before any connection or
 * tunnel is opened.
 */
export function terminalSessionsUnit(
  cache: SessionCache<TerminalSession[]>,
  ttlMs: number
): WorkUnit<TerminalSession[]> {
  return {
    name: 'terminal-sessions',
    fromCache: (nodeId) => cache.lookup(nodeId),
    run: (connection, context) =>
      cache.getOrFetch(context.nodeId, ttlMs, async () => {
        const output = await runChecked(connection, TMUX_SESSIONS_COMMAND, context);
        return parseTmuxSessions(output.stdout, context.nodeId);
      }),
  };
}
