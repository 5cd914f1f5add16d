export type NodeState = 'running' | 'stopped' | 'unknown';

export interface Endpoint {
  host: string;
  port: number;
}

export interface NodeRecord {
  readonly name: string;
  readonly addresses: {
    readonly publicAddress: string | null;
    readonly privateAddress: string | null;
  };
  readonly port: number;
  readonly relayEligible: boolean;
  readonly state: NodeState;
  /** Network or region the node lives in; relays are located per scope. */
  readonly scope: string | null;
  /** Time of the directory refresh that produced this record. */
  readonly observedAt: number;
}

export type RouteMode = 'direct' | 'relayed' | 'unreachable';

export type UnreachableReason =
  | 'no-route'
  | 'relay-unavailable'
  | 'relay-declined'
  | 'node-stopped'
  | 'direct-known-bad';

interface RoutePlanBase {
  readonly nodeId: string;
  readonly establishedAt: number;
}

export interface DirectRoutePlan extends RoutePlanBase {
  readonly mode: 'direct';
  readonly endpoint: Endpoint;
}

export interface RelayedRoutePlan extends RoutePlanBase {
  readonly mode: 'relayed';
  /** TunnelPool key of the tunnel entry serving this node. */
  readonly relayId: string;
  readonly relayScope: string;
  /** Name of the relay located for the scope. */
  readonly endpoint: string;
  readonly targetPort: number;
}

export interface UnreachableRoutePlan extends RoutePlanBase {
  readonly mode: 'unreachable';
  readonly reason: UnreachableReason;
  readonly detail: string;
}

export type RoutePlan = DirectRoutePlan | RelayedRoutePlan | UnreachableRoutePlan;

export interface RelayLocation {
  name: string;
  scope: string;
}

export interface RelayEndpoint {
  relay: string;
  scope: string;
  nodeId: string;
  local: Endpoint;
  remotePort: number;
  /** Driver-specific handle, e.g. the pid of the tunnel process. */
  ref?: number;
}

export interface TunnelHandle {
  readonly relayId: string;
  readonly tunnelId: string;
  readonly nodeId: string;
  readonly scope: string;
  readonly localEndpoint: Endpoint;
  readonly remoteEndpoint: string;
  readonly createdAt: number;
  readonly lastUsedAt: number;
  readonly refCount: number;
}

export interface CacheEntry<T> {
  readonly key: string;
  readonly value: T;
  readonly fetchedAt: number;
  readonly ttlMs: number;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type DispatchOutcome<T> =
  | { kind: 'success'; payload: T }
  | { kind: 'timeout'; reason: string }
  | { kind: 'connection-failed'; reason: string }
  | { kind: 'command-failed'; reason: string; exitCode: number | null; partialOutput?: string }
  | { kind: 'skipped'; reason: string };

export type OutcomeKind = DispatchOutcome<unknown>['kind'];

export interface DispatchResult<T> {
  nodeId: string;
  mode: RouteMode;
  outcome: DispatchOutcome<T>;
  elapsedMs: number;
}

export interface ReportCounts {
  total: number;
  succeeded: number;
  failed: number;
  timedOut: number;
  skipped: number;
}

export interface Report<T> {
  roundId: string;
  startedAt: number;
  completedAt: number;
  counts: ReportCounts;
  results: DispatchResult<T>[];
}

export interface ProcessInfo {
  pid: string;
  user: string;
  cpu: string;
  mem: string;
  command: string;
}

export interface NodeMetrics {
  loadAverage: [number, number, number] | null;
  cpuPercent: number | null;
  memoryUsedMb: number | null;
  memoryTotalMb: number | null;
  memoryPercent: number | null;
  topProcesses: ProcessInfo[];
}

export interface TerminalSession {
  nodeId: string;
  name: string;
  windows: number;
  createdAt: string;
  attached: boolean;
}
