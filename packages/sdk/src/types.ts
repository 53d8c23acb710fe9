import { z } from 'zod';

export const TASK_STATES = ['pending', 'running', 'streaming', 'completed', 'error', 'cancelled'] as const;
export type TaskState = (typeof TASK_STATES)[number];

export const SORT_ORDERS = ['ascending', 'descending'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const artifactContentSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('text'), text: z.string() }),
    z.object({ type: z.literal('data'), data: z.record(z.unknown()) }),
    z.object({
        type: z.literal('file'),
        name: z.string().nullable(),
        mime_type: z.string().nullable(),
        uri: z.string().nullable(),
    }),
]);
export type ArtifactContent = z.infer<typeof artifactContentSchema>;

export const taskArtifactSchema = z.object({
    name: z.string(),
    contents: z.array(artifactContentSchema),
});
export type TaskArtifact = z.infer<typeof taskArtifactSchema>;

export const historyEntrySchema = z.object({
    role: z.string(),
    parts: z.array(artifactContentSchema),
});
export type HistoryEntry = z.infer<typeof historyEntrySchema>;

export const taskErrorSchema = z.object({
    code: z.union([z.string(), z.number()]),
    message: z.string(),
});

/**
 * Payload merged into a task from the remote agent's replies.
 * `error` is present only on failed tasks.
 */
export const taskResultSchema = z.object({
    message: z.string().nullable(),
    artifacts: z.array(taskArtifactSchema),
    history: z.array(historyEntrySchema).optional(),
    remote_state: z.string().optional(),
    error: taskErrorSchema.optional(),
});
export type TaskResult = z.infer<typeof taskResultSchema>;

export interface TaskSnapshot {
    gateway_id: string;
    agent_id: string | null;
    endpoint: string;
    state: TaskState;
    request_payload: string;
    session_id: string | null;
    result: TaskResult | null;
    created_at: Date;
    updated_at: Date;
}

export interface AgentDescriptor {
    url: string;
    name: string;
    card: Record<string, unknown>;
    registered_at: Date;
}

export interface UnregisterResult {
    url: string;
    name: string;
    removed_tasks: number;
}

export interface TaskListQuery {
    state?: TaskState;
    sort?: SortOrder;
    limit?: number;
}
