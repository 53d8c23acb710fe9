import { z } from 'zod';
import type { ArtifactContent, HistoryEntry, TaskArtifact, TaskResult } from '@relaygate/sdk';
import { TaskPatch, TaskRecord, taskState } from '../db/task.entity';
import { GatewayError, UnexpectedReplyShapeError, UpstreamError } from '../errors/gateway.errors';

// A2A: TaskNotFoundError
export const TASK_NOT_FOUND_CODE = -32001;

// `kind` is the current A2A discriminator; older agents send `type`.
const partSchema = z.object({
    kind: z.string().optional(),
    type: z.string().optional(),
    text: z.string().optional(),
    data: z.record(z.unknown()).optional(),
    file: z.object({
        name: z.string().optional(),
        mimeType: z.string().optional(),
        uri: z.string().optional(),
    }).passthrough().optional(),
}).passthrough();

const messageSchema = z.object({
    kind: z.literal('message').optional(),
    role: z.string(),
    parts: z.array(partSchema),
    contextId: z.string().optional(),
});

const artifactSchema = z.object({
    name: z.string().optional(),
    parts: z.array(partSchema),
});

const remoteTaskSchema = z.object({
    kind: z.literal('task').optional(),
    id: z.string(),
    contextId: z.string().optional(),
    status: z.object({
        state: z.string(),
        message: messageSchema.nullish(),
    }),
    artifacts: z.array(artifactSchema).nullish(),
    history: z.array(messageSchema).nullish(),
});

const statusUpdateSchema = z.object({
    kind: z.literal('status-update'),
    taskId: z.string(),
    contextId: z.string().optional(),
    status: z.object({
        state: z.string(),
        message: messageSchema.nullish(),
    }),
    final: z.boolean().optional(),
});

const artifactUpdateSchema = z.object({
    kind: z.literal('artifact-update'),
    taskId: z.string(),
    contextId: z.string().optional(),
    artifact: artifactSchema,
    append: z.boolean().optional(),
});

const errorEnvelopeSchema = z.object({
    error: z.object({
        code: z.number(),
        message: z.string(),
    }),
});

type RemotePart = z.infer<typeof partSchema>;
type RemoteMessage = z.infer<typeof messageSchema>;
type RemoteTask = z.infer<typeof remoteTaskSchema>;

export type ReplyClassification =
    | { kind: 'immediate-message'; message: string; contextId: string | null }
    | {
        kind: 'task-handle';
        taskId: string;
        remoteState: string;
        contextId: string | null;
        message: string | null;
        artifacts: TaskArtifact[];
        history?: HistoryEntry[];
    }
    | { kind: 'upstream-error'; code: number; message: string }
    | { kind: 'unrecognized'; detail: string };

export type StreamEventClassification =
    | ReplyClassification
    | {
        kind: 'status-update';
        taskId: string;
        remoteState: string;
        contextId: string | null;
        message: string | null;
        final: boolean;
    }
    | { kind: 'artifact-update'; taskId: string; contextId: string | null; artifact: TaskArtifact; append: boolean };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toContent(part: RemotePart): ArtifactContent | null {
    switch (part.kind ?? part.type) {
        case 'text':
            return part.text !== undefined ? { type: 'text', text: part.text } : null;
        case 'data':
            return part.data !== undefined ? { type: 'data', data: part.data } : null;
        case 'file':
            return part.file
                ? { type: 'file', name: part.file.name ?? null, mime_type: part.file.mimeType ?? null, uri: part.file.uri ?? null }
                : null;
        default:
            return null;
    }
}

function toContents(parts: RemotePart[]): ArtifactContent[] {
    return parts.map(toContent).filter((c): c is ArtifactContent => c !== null);
}

function textOf(message: RemoteMessage): string {
    return toContents(message.parts)
        .map(c => c.type === 'text' ? c.text : '')
        .filter(text => text.length > 0)
        .join(' ');
}

function statusText(message: RemoteMessage | null | undefined): string | null {
    const text = message ? textOf(message) : '';
    return text.length > 0 ? text : null;
}

function toArtifact(artifact: z.infer<typeof artifactSchema>): TaskArtifact {
    return { name: artifact.name ?? 'unnamed_artifact', contents: toContents(artifact.parts) };
}

function fromTask(task: RemoteTask): ReplyClassification {
    return {
        kind: 'task-handle',
        taskId: task.id,
        remoteState: task.status.state,
        contextId: task.contextId ?? null,
        message: statusText(task.status.message),
        artifacts: (task.artifacts ?? []).map(toArtifact),
        ...(task.history ? { history: task.history.map(m => ({ role: m.role, parts: toContents(m.parts) })) } : {}),
    };
}

function describeShape(value: unknown): string {
    if (typeof value === 'string') return 'non-JSON body';
    if (Array.isArray(value)) return 'array';
    if (isRecord(value)) {
        const keys = Object.keys(value);
        return keys.length > 0 ? `object with keys [${keys.join(', ')}]` : 'empty object';
    }
    return value === null ? 'null' : typeof value;
}

/**
 * Classifies a raw JSON-RPC reply. Total: anything that is not a recognizable
 * error, message or task comes back as `unrecognized`.
 */
export function classifyReply(raw: unknown): ReplyClassification {
    const failure = errorEnvelopeSchema.safeParse(raw);
    if (failure.success) {
        return { kind: 'upstream-error', code: failure.data.error.code, message: failure.data.error.message };
    }

    if (!isRecord(raw) || !('result' in raw)) {
        return { kind: 'unrecognized', detail: describeShape(raw) };
    }

    const result = raw.result;
    const declared = isRecord(result) ? result.kind : undefined;

    if (declared !== 'message') {
        const task = remoteTaskSchema.safeParse(result);
        if (task.success) return fromTask(task.data);
    }
    if (declared !== 'task') {
        const message = messageSchema.safeParse(result);
        if (message.success) {
            return { kind: 'immediate-message', message: textOf(message.data), contextId: message.data.contextId ?? null };
        }
    }

    return {
        kind: 'unrecognized',
        detail: typeof declared === 'string' ? `malformed ${declared} result` : `result is ${describeShape(result)}`,
    };
}

/**
 * Classifies one event of a `message/stream` reply. Besides everything
 * `classifyReply` knows, a stream carries status and artifact updates.
 */
export function classifyStreamEvent(raw: unknown): StreamEventClassification {
    const result = isRecord(raw) ? raw.result : undefined;
    const declared = isRecord(result) ? result.kind : undefined;

    if (declared === 'status-update') {
        const event = statusUpdateSchema.safeParse(result);
        if (!event.success) return { kind: 'unrecognized', detail: 'malformed status-update event' };
        return {
            kind: 'status-update',
            taskId: event.data.taskId,
            remoteState: event.data.status.state,
            contextId: event.data.contextId ?? null,
            message: statusText(event.data.status.message),
            final: event.data.final ?? false,
        };
    }

    if (declared === 'artifact-update') {
        const event = artifactUpdateSchema.safeParse(result);
        if (!event.success) return { kind: 'unrecognized', detail: 'malformed artifact-update event' };
        return {
            kind: 'artifact-update',
            taskId: event.data.taskId,
            contextId: event.data.contextId ?? null,
            artifact: toArtifact(event.data.artifact),
            append: event.data.append ?? false,
        };
    }

    return classifyReply(raw);
}

export function isTaskNotFound(reply: ReplyClassification): boolean {
    return reply.kind === 'upstream-error' && reply.code === TASK_NOT_FOUND_CODE;
}

export function stateFromRemote(remoteState: string, hasArtifacts: boolean): taskState {
    switch (remoteState) {
        case 'completed':
            return taskState.COMPLETED;
        case 'failed':
        case 'rejected':
            return taskState.ERROR;
        case 'canceled':
        case 'cancelled':
            return taskState.CANCELLED;
        default:
            return hasArtifacts ? taskState.STREAMING : taskState.RUNNING;
    }
}

export function failurePatch(error: GatewayError): TaskPatch {
    return {
        state: taskState.ERROR,
        result: { message: error.message, artifacts: [], error: { code: error.code, message: error.message } },
    };
}

export function patchFromReply(reply: ReplyClassification, gatewayId: string): TaskPatch {
    switch (reply.kind) {
        case 'immediate-message':
            return {
                state: taskState.COMPLETED,
                result: { message: reply.message, artifacts: [] },
                ...(reply.contextId ? { session_id: reply.contextId } : {}),
            };

        case 'task-handle': {
            const state = stateFromRemote(reply.remoteState, reply.artifacts.length > 0);
            const result: TaskResult = {
                message: reply.message,
                artifacts: reply.artifacts,
                remote_state: reply.remoteState,
                ...(reply.history ? { history: reply.history } : {}),
            };
            if (state === taskState.ERROR) {
                result.error = { code: reply.remoteState, message: reply.message ?? `Remote task ${reply.remoteState}` };
            }
            return {
                state,
                result,
                ...(reply.taskId !== gatewayId ? { agent_id: reply.taskId } : {}),
                ...(reply.contextId ? { session_id: reply.contextId } : {}),
            };
        }

        case 'upstream-error': {
            const error = new UpstreamError(reply.code, reply.message);
            return {
                state: taskState.ERROR,
                result: { message: error.message, artifacts: [], error: { code: reply.code, message: reply.message } },
            };
        }

        case 'unrecognized':
            return failurePatch(new UnexpectedReplyShapeError(reply.detail));
    }
}

function identityPatch(taskId: string, contextId: string | null, gatewayId: string): TaskPatch {
    return {
        ...(taskId !== gatewayId ? { agent_id: taskId } : {}),
        ...(contextId ? { session_id: contextId } : {}),
    };
}

// Same name replaces the earlier artifact, or extends it when the agent sends a chunk to append.
export function mergeArtifact(artifacts: TaskArtifact[], next: TaskArtifact, append: boolean): TaskArtifact[] {
    const index = artifacts.findIndex(a => a.name === next.name);
    if (index === -1) return [...artifacts, next];

    const merged = append
        ? { name: next.name, contents: [...artifacts[index].contents, ...next.contents] }
        : next;
    return artifacts.map((a, i) => i === index ? merged : a);
}

/**
 * Patch for one stream event, folded onto what is stored. Artifact updates
 * move the task to streaming; status updates keep the artifacts gathered so far.
 */
export function patchFromStreamEvent(
    event: StreamEventClassification,
    current: Readonly<TaskRecord>,
    gatewayId: string,
): TaskPatch {
    const artifacts = current.result?.artifacts ?? [];
    const remoteState = current.result?.remote_state;

    switch (event.kind) {
        case 'status-update': {
            const state = stateFromRemote(event.remoteState, artifacts.length > 0);
            const result: TaskResult = {
                message: event.message ?? current.result?.message ?? null,
                artifacts,
                remote_state: event.remoteState,
            };
            if (state === taskState.ERROR) {
                result.error = { code: event.remoteState, message: event.message ?? `Remote task ${event.remoteState}` };
            }
            return { state, result, ...identityPatch(event.taskId, event.contextId, gatewayId) };
        }

        case 'artifact-update':
            return {
                state: taskState.STREAMING,
                result: {
                    message: current.result?.message ?? null,
                    artifacts: mergeArtifact(artifacts, event.artifact, event.append),
                    ...(remoteState ? { remote_state: remoteState } : {}),
                },
                ...identityPatch(event.taskId, event.contextId, gatewayId),
            };

        default:
            return patchFromReply(event, gatewayId);
    }
}
