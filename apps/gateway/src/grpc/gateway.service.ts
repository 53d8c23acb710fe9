import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';
import { SORT_ORDERS } from '@relaygate/sdk';
import { AgentRecord } from '../db/agent.entity';
import { TaskRecord, parseTaskState } from '../db/task.entity';
import { AgentCardError, AgentNotRegisteredError, TaskNotFoundError } from '../errors/gateway.errors';
import { TaskListFilter } from '../repositories/task.store';
import { Gateway } from '../services/gateway';

const TAG = '[GatewayService]';

interface AgentDescriptor {
    url: string;
    name: string;
    card: Buffer;
    registered_at: string;
}

interface TaskSnapshot {
    gateway_id: string;
    agent_id: string;
    endpoint: string;
    state: string;
    request_payload: string;
    session_id: string;
    result: Buffer;
    created_at: string;
    updated_at: string;
}

interface UrlRequest {
    url: string;
}

interface ListAgentsResponse {
    agents: AgentDescriptor[];
}

interface UnregisterAgentResponse {
    url: string;
    name: string;
    removed_tasks: number;
}

interface SendMessageRequest {
    endpoint: string;
    message: string;
    session_id: string;
}

interface GetTaskResultRequest {
    gateway_id: string;
    history_length: number;
}

interface CancelTaskRequest {
    gateway_id: string;
}

interface GetTaskListRequest {
    state: string;
    sort: string;
    limit: number;
}

interface GetTaskListResponse {
    tasks: TaskSnapshot[];
}

class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

// proto3 has no null; absent values travel as empty strings and empty bytes
export function toTaskSnapshot(task: TaskRecord): TaskSnapshot {
    return {
        gateway_id: task.gateway_id,
        agent_id: task.agent_id ?? '',
        endpoint: task.endpoint,
        state: task.state,
        request_payload: task.request_payload,
        session_id: task.session_id ?? '',
        result: task.result ? Buffer.from(JSON.stringify(task.result)) : Buffer.from(''),
        created_at: task.created_at.toISOString(),
        updated_at: task.updated_at.toISOString(),
    };
}

export function toAgentDescriptor(agent: AgentRecord): AgentDescriptor {
    return {
        url: agent.url,
        name: agent.name,
        card: Buffer.from(JSON.stringify(agent.card)),
        registered_at: agent.registered_at.toISOString(),
    };
}

export function toServiceError(error: unknown): grpc.ServerErrorResponse {
    const message = error instanceof Error ? error.message : 'Unknown error';
    const base = error instanceof Error ? error : new Error(message);

    if (error instanceof TaskNotFoundError || error instanceof AgentNotRegisteredError) {
        return Object.assign(base, { code: grpc.status.NOT_FOUND });
    }
    if (error instanceof InvalidArgumentError) {
        return Object.assign(base, { code: grpc.status.INVALID_ARGUMENT });
    }
    if (error instanceof AgentCardError) {
        return Object.assign(base, { code: grpc.status.UNAVAILABLE });
    }
    return Object.assign(base, { code: grpc.status.INTERNAL });
}

function requireField(value: string, field: string): string {
    const trimmed = (value ?? '').trim();
    if (!trimmed) throw new InvalidArgumentError(`${field} is required`);
    return trimmed;
}

export function parseListRequest(request: GetTaskListRequest): TaskListFilter {
    const filter: TaskListFilter = {};

    if (request.state) {
        const state = parseTaskState(request.state.toLowerCase());
        if (!state) throw new InvalidArgumentError(`unknown state: ${request.state}`);
        filter.state = state;
    }

    if (request.sort) {
        const sort = SORT_ORDERS.find(order => order === request.sort.toLowerCase());
        if (!sort) throw new InvalidArgumentError(`unknown sort order: ${request.sort}`);
        filter.sort = sort;
    } else {
        filter.sort = 'descending';
    }

    if (request.limit < 0) throw new InvalidArgumentError('limit must not be negative');
    if (request.limit > 0) filter.limit = request.limit;

    return filter;
}

/**
 * gRPC handlers for the gateway's boundary operations.
 * Caller mistakes map to NOT_FOUND / INVALID_ARGUMENT; task failures are not
 * errors here, they come back inside the task snapshot.
 */
export class GatewayServiceImpl {
    constructor(private readonly gateway: Gateway) { }

    async registerAgent(
        call: ServerUnaryCall<UrlRequest, AgentDescriptor>,
        callback: sendUnaryData<AgentDescriptor>
    ) {
        try {
            const agent = await this.gateway.registerAgent(requireField(call.request.url, 'url'));
            callback(null, toAgentDescriptor(agent));
        } catch (error) {
            console.error(`${TAG} registerAgent error:`, error);
            callback(toServiceError(error));
        }
    }

    listAgents(
        _call: ServerUnaryCall<Record<string, never>, ListAgentsResponse>,
        callback: sendUnaryData<ListAgentsResponse>
    ) {
        callback(null, { agents: this.gateway.listAgents().map(toAgentDescriptor) });
    }

    unregisterAgent(
        call: ServerUnaryCall<UrlRequest, UnregisterAgentResponse>,
        callback: sendUnaryData<UnregisterAgentResponse>
    ) {
        try {
            const outcome = this.gateway.unregisterAgent(requireField(call.request.url, 'url'));
            callback(null, { url: outcome.url, name: outcome.name, removed_tasks: outcome.removedTasks });
        } catch (error) {
            console.error(`${TAG} unregisterAgent error:`, error);
            callback(toServiceError(error));
        }
    }

    async sendMessage(
        call: ServerUnaryCall<SendMessageRequest, TaskSnapshot>,
        callback: sendUnaryData<TaskSnapshot>
    ) {
        try {
            const { endpoint, message, session_id } = call.request;
            const task = await this.gateway.sendMessage(
                requireField(endpoint, 'endpoint'),
                requireField(message, 'message'),
                session_id || null,
            );
            callback(null, toTaskSnapshot(task));
        } catch (error) {
            console.error(`${TAG} sendMessage error:`, error);
            callback(toServiceError(error));
        }
    }

    /**
     * Writes a snapshot for every change the stream makes to the task, then
     * the final one if the last write did not already carry it.
     */
    async sendMessageStream(call: ServerWritableStream<SendMessageRequest, TaskSnapshot>) {
        let lastWritten: string | null = null;
        const write = (task: TaskRecord) => {
            if (call.cancelled) return;
            call.write(toTaskSnapshot(task));
            lastWritten = task.updated_at.toISOString();
        };

        try {
            const { endpoint, message, session_id } = call.request;
            const task = await this.gateway.sendMessageStream(
                requireField(endpoint, 'endpoint'),
                requireField(message, 'message'),
                session_id || null,
                write,
            );
            if (lastWritten !== task.updated_at.toISOString()) write(task);
            call.end();
        } catch (error) {
            console.error(`${TAG} sendMessageStream error:`, error);
            call.emit('error', toServiceError(error));
        }
    }

    async getTaskResult(
        call: ServerUnaryCall<GetTaskResultRequest, TaskSnapshot>,
        callback: sendUnaryData<TaskSnapshot>
    ) {
        try {
            const { gateway_id, history_length } = call.request;
            const task = await this.gateway.getTaskResult(
                requireField(gateway_id, 'gateway_id'),
                history_length > 0 ? history_length : undefined,
            );
            callback(null, toTaskSnapshot(task));
        } catch (error) {
            console.error(`${TAG} getTaskResult error:`, error);
            callback(toServiceError(error));
        }
    }

    async cancelTask(
        call: ServerUnaryCall<CancelTaskRequest, TaskSnapshot>,
        callback: sendUnaryData<TaskSnapshot>
    ) {
        try {
            const task = await this.gateway.cancelTask(requireField(call.request.gateway_id, 'gateway_id'));
            callback(null, toTaskSnapshot(task));
        } catch (error) {
            console.error(`${TAG} cancelTask error:`, error);
            callback(toServiceError(error));
        }
    }

    getTaskList(
        call: ServerUnaryCall<GetTaskListRequest, GetTaskListResponse>,
        callback: sendUnaryData<GetTaskListResponse>
    ) {
        try {
            const tasks = this.gateway.getTaskList(parseListRequest(call.request));
            callback(null, { tasks: tasks.map(toTaskSnapshot) });
        } catch (error) {
            console.error(`${TAG} getTaskList error:`, error);
            callback(toServiceError(error));
        }
    }
}
