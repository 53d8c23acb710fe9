import * as grpc from '@grpc/grpc-js';
import { z } from 'zod';
import { GATEWAY_PROTO_PATH, loadProto, lookupService } from './proto';
import {
    AgentDescriptor,
    TASK_STATES,
    TaskListQuery,
    TaskSnapshot,
    UnregisterResult,
    taskResultSchema,
} from './types';

type GrpcCallback<T> = (err: grpc.ServiceError | null, res: T) => void;

function rpc<T>(fn: (cb: GrpcCallback<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        fn((err, res) => err ? reject(err) : resolve(res));
    });
}

const wireTaskSchema = z.object({
    gateway_id: z.string(),
    agent_id: z.string(),
    endpoint: z.string(),
    state: z.enum(TASK_STATES),
    request_payload: z.string(),
    session_id: z.string(),
    result: z.instanceof(Buffer),
    created_at: z.string(),
    updated_at: z.string(),
});

const wireAgentSchema = z.object({
    url: z.string(),
    name: z.string(),
    card: z.instanceof(Buffer),
    registered_at: z.string(),
});

const wireUnregisterSchema = z.object({
    url: z.string(),
    name: z.string(),
    removed_tasks: z.number(),
});

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
    return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function parseJsonBytes(bytes: Buffer): unknown {
    return bytes.length > 0 ? JSON.parse(bytes.toString('utf-8')) : null;
}

// proto3 has no null: empty strings and empty bytes stand for absent values
export function parseTaskSnapshot(raw: unknown): TaskSnapshot {
    const wire = wireTaskSchema.parse(raw);
    const result = parseJsonBytes(wire.result);

    return {
        gateway_id: wire.gateway_id,
        agent_id: wire.agent_id || null,
        endpoint: wire.endpoint,
        state: wire.state,
        request_payload: wire.request_payload,
        session_id: wire.session_id || null,
        result: result === null ? null : taskResultSchema.parse(result),
        created_at: new Date(wire.created_at),
        updated_at: new Date(wire.updated_at),
    };
}

export function parseAgentDescriptor(raw: unknown): AgentDescriptor {
    const wire = wireAgentSchema.parse(raw);
    return {
        url: wire.url,
        name: wire.name,
        card: z.record(z.unknown()).parse(parseJsonBytes(wire.card) ?? {}),
        registered_at: new Date(wire.registered_at),
    };
}

export interface GatewayClient {
    registerAgent(url: string): Promise<AgentDescriptor>;
    listAgents(): Promise<AgentDescriptor[]>;
    unregisterAgent(url: string): Promise<UnregisterResult>;
    sendMessage(endpoint: string, message: string, sessionId?: string): Promise<TaskSnapshot>;
    /** Yields the task after every streamed change; the last snapshot is the settled one. */
    sendMessageStream(endpoint: string, message: string, sessionId?: string): AsyncIterable<TaskSnapshot>;
    getTaskResult(gatewayId: string, historyLength?: number): Promise<TaskSnapshot>;
    cancelTask(gatewayId: string): Promise<TaskSnapshot>;
    getTaskList(query?: TaskListQuery): Promise<TaskSnapshot[]>;
    close(): void;
}

export function createGatewayClient(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): GatewayClient {
    const GatewayService = lookupService(loadProto(GATEWAY_PROTO_PATH), 'relaygate.GatewayService');
    const client = new GatewayService(address, credentials);

    const call = (method: string, request: object) =>
        rpc<unknown>(cb => client[method](request, cb));

    async function* stream(method: string, request: object): AsyncGenerator<TaskSnapshot> {
        const responses: unknown = client[method](request);
        if (!isAsyncIterable(responses)) {
            throw new Error(`${method} did not open a server stream`);
        }
        for await (const raw of responses) {
            yield parseTaskSnapshot(raw);
        }
    }

    return {
        registerAgent: url =>
            call('registerAgent', { url }).then(parseAgentDescriptor),

        listAgents: () =>
            call('listAgents', {})
                .then(r => z.object({ agents: z.array(z.unknown()) }).parse(r).agents.map(parseAgentDescriptor)),

        unregisterAgent: url =>
            call('unregisterAgent', { url }).then(r => wireUnregisterSchema.parse(r)),

        sendMessage: (endpoint, message, sessionId) =>
            call('sendMessage', { endpoint, message, session_id: sessionId ?? '' }).then(parseTaskSnapshot),

        sendMessageStream: (endpoint, message, sessionId) =>
            stream('sendMessageStream', { endpoint, message, session_id: sessionId ?? '' }),

        getTaskResult: (gatewayId, historyLength) =>
            call('getTaskResult', { gateway_id: gatewayId, history_length: historyLength ?? 0 }).then(parseTaskSnapshot),

        cancelTask: gatewayId =>
            call('cancelTask', { gateway_id: gatewayId }).then(parseTaskSnapshot),

        getTaskList: (query = {}) =>
            call('getTaskList', { state: query.state ?? '', sort: query.sort ?? '', limit: query.limit ?? 0 })
                .then(r => z.object({ tasks: z.array(z.unknown()) }).parse(r).tasks.map(parseTaskSnapshot)),

        close: () => client.close(),
    };
}
