import dotenv from 'dotenv';
import { z } from 'zod';
import { defaultConfig } from './defaults';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const positiveInt = z.number().int().positive();

const configSchema = z.object({
  discovery: z.object({
    source: z.enum(['file', 'http']),
    inventoryPath: z.string().min(1),
    url: z.string().url(),
    token: z.string(),
    timeout: positiveInt,
  }),
  directory: z.object({
    ttlMs: positiveInt,
  }),
  dispatch: z.object({
    maxConcurrency: positiveInt,
    perNodeTimeoutMs: positiveInt,
  }),
  tunnel: z.object({
    setupTimeoutMs: positiveInt,
    idleGraceMs: z.number().int().nonnegative(),
    reapIntervalMs: positiveInt,
    maxTunnels: positiveInt,
    backoffBaseMs: z.number().int().nonnegative(),
    backoffMaxMs: z.number().int().nonnegative(),
  }),
  relay: z.object({
    command: z.string().min(1),
    locateTtlMs: positiveInt,
    autoApprove: z.boolean(),
  }),
  routing: z.object({
    preferPrivate: z.boolean(),
    knownBadTtlMs: positiveInt,
  }),
  ssh: z.object({
    user: z.string().min(1),
    keyPath: z.string(),
    connectTimeout: positiveInt,
  }),
  sessions: z.object({
    ttlMs: positiveInt,
  }),
  live: z.object({
    intervalMs: positiveInt,
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']),
    file: z.string(),
  }),
});

export type Config = z.infer<typeof configSchema>;

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : parseInt(raw, 10);
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

export function getConfig(): Config {
  const candidate = {
    discovery: {
      source: process.env.DISCOVERY_SOURCE || defaultConfig.discovery.source,
      inventoryPath: process.env.INVENTORY_PATH || defaultConfig.discovery.inventoryPath,
      url: process.env.DISCOVERY_URL || defaultConfig.discovery.url,
      token: process.env.DISCOVERY_TOKEN || defaultConfig.discovery.token,
      timeout: intFromEnv('DISCOVERY_TIMEOUT', defaultConfig.discovery.timeout),
    },
    directory: {
      ttlMs: intFromEnv('DIRECTORY_TTL_MS', defaultConfig.directory.ttlMs),
    },
    dispatch: {
      maxConcurrency: intFromEnv('MAX_CONCURRENCY', defaultConfig.dispatch.maxConcurrency),
      perNodeTimeoutMs: intFromEnv('PER_NODE_TIMEOUT_MS', defaultConfig.dispatch.perNodeTimeoutMs),
    },
    tunnel: {
      setupTimeoutMs: intFromEnv('TUNNEL_SETUP_TIMEOUT_MS', defaultConfig.tunnel.setupTimeoutMs),
      idleGraceMs: intFromEnv('TUNNEL_IDLE_GRACE_MS', defaultConfig.tunnel.idleGraceMs),
      reapIntervalMs: intFromEnv('TUNNEL_REAP_INTERVAL_MS', defaultConfig.tunnel.reapIntervalMs),
      maxTunnels: intFromEnv('MAX_TUNNELS', defaultConfig.tunnel.maxTunnels),
      backoffBaseMs: intFromEnv('TUNNEL_BACKOFF_BASE_MS', defaultConfig.tunnel.backoffBaseMs),
      backoffMaxMs: intFromEnv('TUNNEL_BACKOFF_MAX_MS', defaultConfig.tunnel.backoffMaxMs),
    },
    relay: {
      command: process.env.RELAY_COMMAND || defaultConfig.relay.command,
      locateTtlMs: intFromEnv('RELAY_LOCATE_TTL_MS', defaultConfig.relay.locateTtlMs),
      autoApprove: boolFromEnv('RELAY_AUTO_APPROVE', defaultConfig.relay.autoApprove),
    },
    routing: {
      preferPrivate: boolFromEnv('PREFER_PRIVATE_ADDRESS', defaultConfig.routing.preferPrivate),
      knownBadTtlMs: intFromEnv('KNOWN_BAD_TTL_MS', defaultConfig.routing.knownBadTtlMs),
    },
    ssh: {
      user: process.env.SSH_USER || defaultConfig.ssh.user,
      keyPath: process.env.SSH_KEY_PATH || defaultConfig.ssh.keyPath,
      connectTimeout: intFromEnv('SSH_CONNECT_TIMEOUT', defaultConfig.ssh.connectTimeout),
    },
    sessions: {
      ttlMs: intFromEnv('SESSION_CACHE_TTL_MS', defaultConfig.sessions.ttlMs),
    },
    live: {
      intervalMs: intFromEnv('LIVE_INTERVAL_MS', defaultConfig.live.intervalMs),
    },
    logging: {
      level: process.env.LOG_LEVEL || defaultConfig.logging.level,
      file: process.env.LOG_FILE || defaultConfig.logging.file,
    },
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

export const config = getConfig();
