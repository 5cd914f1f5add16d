export * from './models';
export * from './models/capabilities';
export * from './utils/errors';
export * from './utils/clock';
export * from './services/session/SessionCache';
export * from './services/discovery/NodeDirectory';
export * from './services/discovery/FileDiscoverySource';
export * from './services/discovery/HttpDiscoverySource';
export * from './services/routing/RoutingResolver';
export * from './services/routing/ReachabilityTracker';
export * from './services/relay/TunnelPool';
export * from './services/relay/CommandRelayProvider';
export * from './services/connection/SshConnector';
export * from './services/dispatch/Dispatcher';
export * from './services/dispatch/units';
export * from './services/report/Aggregator';
export * from './services/report/ReportRenderer';
export * from './services/report/LiveView';
export * from './services/FleetService';
export * from './config/config';
