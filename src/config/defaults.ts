export const defaultConfig = {
  discovery: {
    source: 'file',
    inventoryPath: 'inventory.json',
    url: 'http://localhost:3000',
    token: '',
    timeout: 10000,
  },
  directory: {
    ttlMs: 60000,
  },
  dispatch: {
    maxConcurrency: 10,
    perNodeTimeoutMs: 30000,
  },
  tunnel: {
    setupTimeoutMs: 30000,
    idleGraceMs: 300000,
    reapIntervalMs: 60000,
    maxTunnels: 10,
    backoffBaseMs: 5000,
    backoffMaxMs: 60000,
  },
  relay: {
    command:
      'az network bastion tunnel --name {relay} --resource-group {scope} --target-resource-id {node} --resource-port {remotePort} --port {port}',
    locateTtlMs: 300000,
    autoApprove: true,
  },
  routing: {
    preferPrivate: false,
    knownBadTtlMs: 60000,
  },
  ssh: {
    user: 'azureuser',
    keyPath: '',
    connectTimeout: 10,
  },
  sessions: {
    ttlMs: 30000,
  },
  live: {
    intervalMs: 10000,
  },
  logging: {
    level: 'info',
    file: '',
  },
};
