import fs from 'fs/promises';
import path from 'path';
import { RelayLocation } from '../../models';
import { DiscoveredNode, DiscoverySource, RelayCatalog } from '../../models/capabilities';
import { ValidationError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { Inventory, formatIssues, inventorySchema } from './schema';

export async function loadInventory(inventoryPath: string): Promise<Inventory> {
  const resolved = path.resolve(inventoryPath);
  const raw = await fs.readFile(resolved, 'utf8');

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Inventory ${resolved} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = inventorySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(`Inventory ${resolved} is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Reads fleet membership, and the relay list, from a JSON inventory file on
 * every call.
 */
export class FileDiscoverySource implements DiscoverySource, RelayCatalog {
  readonly name: string;

  constructor(private readonly inventoryPath: string) {
    this.name = `file:${inventoryPath}`;
  }

  async discover(): Promise<DiscoveredNode[]> {
    const inventory = await loadInventory(this.inventoryPath);
    logger.debug('Inventory loaded', { path: this.inventoryPath, nodes: inventory.nodes.length });
    return inventory.nodes;
  }

  async listRelays(): Promise<RelayLocation[]> {
    const inventory = await loadInventory(this.inventoryPath);
    return inventory.relays;
  }
}
