import { InvalidArgumentError } from 'commander';
import { DiscoverySource, RelayCatalog } from '../models/capabilities';
import { FleetService } from '../services/FleetService';
import { NodeFilter } from '../services/discovery/NodeDirectory';
import { FileDiscoverySource } from '../services/discovery/FileDiscoverySource';
import { HttpDiscoverySource } from '../services/discovery/HttpDiscoverySource';
import { SshConnector } from '../services/connection/SshConnector';
import { CommandRelayProvider } from '../services/relay/CommandRelayProvider';
import { autoApprovePolicy } from '../services/routing/RoutingResolver';
import { promptPolicy } from './prompt';
import { logger } from '../utils/logger';
import { config } from '../config/config';

export interface CommonOptions {
  pattern?: string;
  concurrency?: number;
  timeout?: number;
  deadline?: number;
  json?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function toFilter(options: CommonOptions): NodeFilter {
  return options.pattern ? { pattern: options.pattern } : {};
}

function createSource(): DiscoverySource & RelayCatalog {
  if (config.discovery.source === 'http') {
    return new HttpDiscoverySource({
      baseUrl: config.discovery.url,
      timeout: config.discovery.timeout,
      token: config.discovery.token || undefined,
    });
  }
  return new FileDiscoverySource(config.discovery.inventoryPath);
}

export function createFleet(options: CommonOptions = {}): FleetService {
  const source = createSource();
  const fleet = new FleetService({
    source,
    connector: new SshConnector(),
    relay: new CommandRelayProvider({ catalog: source }),
    policy: config.relay.autoApprove ? autoApprovePolicy : promptPolicy,
    maxConcurrency: options.concurrency,
  });
  fleet.start();
  return fleet;
}

let shuttingDown = false;

/**
 * Runs a command body against a fresh fleet and always tears the fleet down
 * afterwards, also on SIGINT/SIGTERM.
 */
export async function withFleet(
  options: CommonOptions,
  body: (fleet: FleetService, signal: AbortSignal) => Promise<void>
): Promise<void> {
  const fleet = createFleet(options);
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await body(fleet, controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await fleet.shutdown();
  }
}
