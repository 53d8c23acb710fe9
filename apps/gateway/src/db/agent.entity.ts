import { z } from 'zod';

/**
 * Subset of the A2A agent card the gateway reads. Unknown fields are kept
 * so the card round-trips through snapshots and list_agents untouched.
 */
export const agentCardSchema = z.object({
    name: z.string().min(1),
    url: z.string().optional(),
    description: z.string().optional(),
    version: z.string().optional(),
}).passthrough();

export type AgentCard = z.infer<typeof agentCardSchema>;

export interface AgentRecord {
    url: string;
    name: string;
    card: AgentCard;
    registered_at: Date;
}
