import {
  CommandOutput,
  Endpoint,
  NodeRecord,
  RelayEndpoint,
  RelayLocation,
  Report,
} from './index';

export type DiscoveredNode = Omit<NodeRecord, 'observedAt'>;

/**
 * Where fleet membership comes from. No ordering guarantee on the output.
 */
export interface DiscoverySource {
  readonly name: string;
  discover(): Promise<DiscoveredNode[]>;
}

/**
 * Lists the relays available to the fleet, one per scope.
 */
export interface RelayCatalog {
  listRelays(): Promise<RelayLocation[]>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface Connection {
  readonly target: string;
  execute(command: string, options?: ExecuteOptions): Promise<CommandOutput>;
  close(): Promise<void>;
}

/**
 * Opens connections to nodes. Both methods fail with ConnectionError.
 */
export interface ConnectionCapability {
  openDirect(endpoint: Endpoint): Promise<Connection>;
  openRelayed(endpoint: Endpoint): Promise<Connection>;
}

export interface CreateRelayOptions {
  remotePort: number;
  signal?: AbortSignal;
}

export interface RelayCapability {
  locateRelay(scope: string): Promise<RelayLocation | null>;
  /** Opens a tunnel to `nodeId` through the given, already approved, relay. */
  createRelay(nodeId: string, relay: RelayLocation, options: CreateRelayOptions): Promise<RelayEndpoint>;
  /** Idempotent; must not throw when the relay session is already gone. */
  destroyRelay(endpoint: RelayEndpoint): Promise<void>;
  isAlive?(endpoint: RelayEndpoint): boolean;
}

/**
 * Operator consent for tunnelling through a relay.
 */
export interface RelayPolicy {
  approve(location: RelayLocation): boolean | Promise<boolean>;
}

export interface ReportSink<T> {
  render(report: Report<T>): void | Promise<void>;
}
