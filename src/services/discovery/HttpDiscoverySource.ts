import axios, { AxiosInstance } from 'axios';
import { RelayLocation } from '../../models';
import { DiscoveredNode, DiscoverySource, RelayCatalog } from '../../models/capabilities';
import { NetworkError, ValidationError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { formatIssues, nodeListSchema, relayListSchema } from './schema';

export interface HttpDiscoveryOptions {
  baseUrl: string;
  timeout: number;
  token?: string;
}

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return typeof value === 'object' && value !== null && key in value;
}

export function toNetworkError(error: unknown): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }
  if (hasProperty(error, 'response') && hasProperty(error.response, 'status')) {
    const status = typeof error.response.status === 'number' ? error.response.status : undefined;
    const data = hasProperty(error.response, 'data') ? error.response.data : undefined;
    const detail =
      hasProperty(data, 'error') && typeof data.error === 'string' ? data.error : errorMessage(error);
    return new NetworkError(`Inventory API error: ${detail}`, status);
  }
  if (hasProperty(error, 'request')) {
    return new NetworkError('No response from inventory API');
  }
  return new NetworkError(`Inventory request error: ${errorMessage(error)}`);
}

/**
 * Fetches fleet membership from an inventory HTTP API (`GET /api/v1/nodes`,
 * `GET /api/v1/relays`).
 */
export class HttpDiscoverySource implements DiscoverySource, RelayCatalog {
  readonly name: string;
  private client: AxiosInstance;

  constructor(options: HttpDiscoveryOptions) {
    this.name = `http:${options.baseUrl}`;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      headers: {
        Accept: 'application/json',
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
      },
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw toNetworkError(error);
      }
    );
  }

  async discover(): Promise<DiscoveredNode[]> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/api/v1/nodes');
      body = response.data;
    } catch (error) {
      logger.error('Failed to fetch node inventory', { source: this.name, error: errorMessage(error) });
      throw toNetworkError(error);
    }

    const parsed = nodeListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(`Inventory API returned invalid nodes: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async listRelays(): Promise<RelayLocation[]> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/api/v1/relays');
      body = response.data;
    } catch (error) {
      logger.error('Failed to fetch relay list', { source: this.name, error: errorMessage(error) });
      throw toNetworkError(error);
    }

    const parsed = relayListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(`Inventory API returned invalid relays: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}
