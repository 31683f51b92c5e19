/**
 * Wire format of the `GET /agent-card` document and its conversion to and
 * from {@link CapabilityDescriptor}.
 */

import { z } from 'zod';
import type { Result } from '../utils/errors.js';
import type { CapabilityDescriptor, CapabilityOperation } from './types.js';

// Optional fields may be absent or null
const AgentCardCapabilitySchema = z.object({
  capabilityId: z.string().nullish(),
  path: z.string().nullish(),
  description: z.string().nullish(),
});

export const AgentCardSchema = z.object({
  serviceId: z.string().min(1),
  displayName: z.string().nullish(),
  description: z.string().nullish(),
  baseAddress: z.string().min(1),
  capabilities: z.array(AgentCardCapabilitySchema),
});

export type AgentCard = z.infer<typeof AgentCardSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an agent card received from the network.
 *
 * Capability entries without a `capabilityId` are dropped; a card left with
 * no operations is rejected.
 */
export function parseAgentCard(raw: unknown): Result<CapabilityDescriptor> {
  const parsed = AgentCardSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: `invalid agent card (${formatIssues(parsed.error)})` };
  }

  const card = parsed.data;
  const operations: CapabilityOperation[] = card.capabilities.flatMap((cap) =>
    cap.capabilityId
      ? [
          {
            capabilityId: cap.capabilityId,
            invocationPath: cap.path || undefined,
            description: cap.description ?? undefined,
          },
        ]
      : []
  );

  if (operations.length === 0) {
    return { success: false, error: 'agent card lists no capabilities' };
  }

  return {
    success: true,
    data: {
      serviceId: card.serviceId,
      displayName: card.displayName || card.serviceId,
      description: card.description ?? undefined,
      baseAddress: card.baseAddress,
      operations,
    },
  };
}

/**
 * Render a descriptor as the agent card a service serves.
 */
export function toAgentCard(descriptor: CapabilityDescriptor): AgentCard {
  return {
    serviceId: descriptor.serviceId,
    displayName: descriptor.displayName,
    ...(descriptor.description ? { description: descriptor.description } : {}),
    baseAddress: descriptor.baseAddress,
    capabilities: descriptor.operations.map((op) => ({
      capabilityId: op.capabilityId,
      ...(op.invocationPath ? { path: op.invocationPath } : {}),
      ...(op.description ? { description: op.description } : {}),
    })),
  };
}
