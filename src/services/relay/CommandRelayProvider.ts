import { ChildProcess, spawn } from 'child_process';
import { RelayEndpoint, RelayLocation } from '../../models';
import { CreateRelayOptions, RelayCapability, RelayCatalog } from '../../models/capabilities';
import { ConfigurationError, TunnelError, errorMessage } from '../../utils/errors';
import { LOOPBACK, findFreePort, waitForPort } from '../../utils/network';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

export interface CommandRelayOptions {
  /** Tunnel command with {relay} {scope} {node} {port} {remotePort} placeholders. */
  command?: string;
  /** Where the relay of each scope is listed; only consulted by locateRelay. */
  catalog: RelayCatalog;
  readyTimeoutMs?: number;
  pollIntervalMs?: number;
}

export type RelayCommandValues = Record<'relay' | 'scope' | 'node' | 'port' | 'remotePort', string>;

const PLACEHOLDER = /\{(\w+)\}/g;

function isPlaceholder(name: string, values: RelayCommandValues): name is keyof RelayCommandValues {
  return Object.prototype.hasOwnProperty.call(values, name);
}

/**
 * Expands a tunnel command template into argv. Tokens are split on
 * whitespace before substitution, so values never introduce new arguments.
 */
export function buildRelayCommand(template: string, values: RelayCommandValues): string[] {
  const argv = template
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) =>
      token.replace(PLACEHOLDER, (match, name: string) => {
        if (!isPlaceholder(name, values)) {
          throw new ConfigurationError(`Unknown placeholder ${match} in relay command`);
        }
        return values[name];
      })
    );

  if (argv.length === 0) {
    throw new ConfigurationError('Relay command is empty');
  }
  return argv;
}

/**
 * Relay driver that runs an external tunnel command (one process per tunnel)
 * forwarding a loopback port to the node through the scope's relay.
 */
export class CommandRelayProvider implements RelayCapability {
  private readonly command: string;
  private readonly catalog: RelayCatalog;
  private readonly readyTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private processes: Map<number, ChildProcess> = new Map();

  constructor(options: CommandRelayOptions) {
    this.command = options.command ?? config.relay.command;
    this.catalog = options.catalog;
    this.readyTimeoutMs = options.readyTimeoutMs ?? config.tunnel.setupTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
  }

  async locateRelay(scope: string): Promise<RelayLocation | null> {
    const relays = await this.catalog.listRelays();
    return relays.find((location) => location.scope === scope) ?? null;
  }

  async createRelay(nodeId: string, location: RelayLocation, options: CreateRelayOptions): Promise<RelayEndpoint> {
    const scope = location.scope;
    const port = await findFreePort(LOOPBACK);
    const argv = buildRelayCommand(this.command, {
      relay: location.name,
      scope,
      node: nodeId,
      port: String(port),
      remotePort: String(options.remotePort),
    });

    logger.debug('Spawning tunnel process', { nodeId, scope, relay: location.name, port });
    const child = spawn(argv[0], argv.slice(1), { stdio: ['ignore', 'ignore', 'pipe'] });

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-2000);
    });

    const exited = new Promise<never>((_, reject) => {
      child.once('error', (error) => reject(new TunnelError(`Tunnel process failed to start: ${error.message}`)));
      child.once('exit', (code, signal) => {
        const detail = stderr.trim() || `code ${code ?? 'null'}${signal ? `, signal ${signal}` : ''}`;
        reject(new TunnelError(`Tunnel process exited before becoming ready: ${detail}`));
      });
    });

    try {
      const ready = await Promise.race([
        waitForPort(LOOPBACK, port, {
          timeoutMs: this.readyTimeoutMs,
          intervalMs: this.pollIntervalMs,
          signal: options.signal,
        }),
        exited,
      ]);
      if (!ready) {
        throw new TunnelError(`Tunnel did not open port ${port} within ${this.readyTimeoutMs}ms`);
      }
    } catch (error) {
      child.kill('SIGTERM');
      throw error instanceof TunnelError ? error : new TunnelError(`Tunnel setup aborted: ${errorMessage(error)}`);
    }

    this.processes.set(port, child);
    return {
      relay: location.name,
      scope,
      nodeId,
      local: { host: LOOPBACK, port },
      remotePort: options.remotePort,
      ref: child.pid,
    };
  }

  async destroyRelay(endpoint: RelayEndpoint): Promise<void> {
    const child = this.processes.get(endpoint.local.port);
    if (!child) {
      return;
    }
    this.processes.delete(endpoint.local.port);
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
      logger.debug('Tunnel process terminated', { pid: child.pid, port: endpoint.local.port });
    }
  }

  isAlive(endpoint: RelayEndpoint): boolean {
    const child = this.processes.get(endpoint.local.port);
    return child !== undefined && child.exitCode === null && child.signalCode === null;
  }
}
