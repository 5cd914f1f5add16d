import net from 'net';
import { sleep } from './clock';

export const LOOPBACK = '127.0.0.1';

/**
 * Asks the OS for a free TCP port on `host`.
 */
export function findFreePort(host: string = LOOPBACK): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('Could not determine allocated port'));
        return;
      }
      const { port } = address;
      server.close(() => resolve(port));
    });
  });
}

export function canConnect(host: string, port: number, timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (result: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

export interface WaitForPortOptions {
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Polls until something accepts connections on host:port. Resolves false if
 * the timeout passes first; rejects if the signal aborts.
 */
export async function waitForPort(host: string, port: number, options: WaitForPortOptions): Promise<boolean> {
  const intervalMs = options.intervalMs ?? 250;
  const deadline = Date.now() + options.timeoutMs;

  while (Date.now() < deadline) {
    if (options.signal?.aborted) {
      throw options.signal.reason;
    }
    if (await canConnect(host, port, Math.min(1000, intervalMs * 4))) {
      return true;
    }
    await sleep(intervalMs, options.signal);
  }
  return false;
}
