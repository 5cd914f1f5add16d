import { spawn } from 'child_process';
import { CommandOutput, Endpoint } from '../../models';
import { Connection, ConnectionCapability, ExecuteOptions } from '../../models/capabilities';
import { ConnectionError } from '../../utils/errors';
import { canConnect } from '../../utils/network';
import { logger } from '../../utils/logger';
import { config } from '../../config/config';

/** ssh reserves this exit status for its own failures. */
export const SSH_FAILURE_EXIT_CODE = 255;

export interface SshConnectorOptions {
  user?: string;
  keyPath?: string;
  /** Seconds. */
  connectTimeout?: number;
}

export function buildSshArgs(endpoint: Endpoint, options: Required<SshConnectorOptions>, command: string): string[] {
  const args = [
    '-o', 'BatchMode=yes',
    '-o', 'StrictHostKeyChecking=no',
    '-o', 'UserKnownHostsFile=/dev/null',
    '-o', 'LogLevel=ERROR',
    '-o', `ConnectTimeout=${options.connectTimeout}`,
    '-p', String(endpoint.port),
  ];
  if (options.keyPath) {
    args.push('-i', options.keyPath);
  }
  args.push(`${options.user}@${endpoint.host}`, command);
  return args;
}

class SshConnection implements Connection {
  readonly target: string;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly options: Required<SshConnectorOptions>
  ) {
    this.target = `${options.user}@${endpoint.host}:${endpoint.port}`;
  }

  execute(command: string, options: ExecuteOptions = {}): Promise<CommandOutput> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<CommandOutput>((resolve, reject) => {
      const child = spawn('ssh', buildSshArgs(this.endpoint, this.options, command), {
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      let stdout = '';
      let stderr = '';

      const onAbort = (): void => {
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.once('error', (error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(new ConnectionError(`Failed to start ssh: ${error.message}`, this.endpoint.host));
      });

      child.once('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        if (signal?.aborted) {
          reject(signal.reason);
          return;
        }
        if (code === SSH_FAILURE_EXIT_CODE) {
          const detail = stderr.trim() || 'ssh exited with status 255';
          reject(new ConnectionError(`SSH to ${this.target} failed: ${detail}`, this.endpoint.host));
          return;
        }
        resolve({ stdout, stderr, exitCode: code ?? -1 });
      });
    });
  }

  async close(): Promise<void> {
    // Each execute() is its own ssh process; nothing stays open between calls.
  }
}

/**
 * Connection capability backed by the system `ssh` client. Relayed
 * connections go to the tunnel's loopback endpoint.
 */
export class SshConnector implements ConnectionCapability {
  private readonly options: Required<SshConnectorOptions>;

  constructor(options: SshConnectorOptions = {}) {
    this.options = {
      user: options.user ?? config.ssh.user,
      keyPath: options.keyPath ?? config.ssh.keyPath,
      connectTimeout: options.connectTimeout ?? config.ssh.connectTimeout,
    };
  }

  async openDirect(endpoint: Endpoint): Promise<Connection> {
    return this.open(endpoint);
  }

  async openRelayed(endpoint: Endpoint): Promise<Connection> {
    return this.open(endpoint);
  }

  private async open(endpoint: Endpoint): Promise<Connection> {
    const reachable = await canConnect(endpoint.host, endpoint.port, this.options.connectTimeout * 1000);
    if (!reachable) {
      throw new ConnectionError(`Cannot reach ${endpoint.host}:${endpoint.port}`, endpoint.host);
    }
    logger.debug('SSH endpoint reachable', { host: endpoint.host, port: endpoint.port });
    return new SshConnection(endpoint, this.options);
  }
}
