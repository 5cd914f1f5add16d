import { z } from 'zod';
import { DiscoveredNode } from '../../models/capabilities';
import { RelayLocation } from '../../models';

const address = z.string().min(1).nullable().optional();

export const nodeEntrySchema = z
  .object({
    name: z.string().min(1),
    publicAddress: address,
    privateAddress: address,
    port: z.number().int().min(1).max(65535).default(22),
    relayEligible: z.boolean().default(false),
    state: z.enum(['running', 'stopped', 'unknown']).default('unknown'),
    scope: z.string().min(1).nullable().optional(),
  })
  .transform(
    (entry): DiscoveredNode => ({
      name: entry.name,
      addresses: {
        publicAddress: entry.publicAddress ?? null,
        privateAddress: entry.privateAddress ?? null,
      },
      port: entry.port,
      relayEligible: entry.relayEligible,
      state: entry.state,
      scope: entry.scope ?? null,
    })
  );

export const relayEntrySchema = z.object({
  name: z.string().min(1),
  scope: z.string().min(1),
});

export const inventorySchema = z.object({
  nodes: z.array(nodeEntrySchema),
  relays: z.array(relayEntrySchema).default([]),
});

export const nodeListSchema = z.union([
  z.array(nodeEntrySchema),
  z.object({ nodes: z.array(nodeEntrySchema) }).transform((body) => body.nodes),
]);

export const relayListSchema = z.union([
  z.array(relayEntrySchema),
  z.object({ relays: z.array(relayEntrySchema) }).transform((body) => body.relays),
]);

export interface Inventory {
  nodes: DiscoveredNode[];
  relays: RelayLocation[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
