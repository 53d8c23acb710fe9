import { AgentCard, AgentRecord } from '../../src/db/agent.entity';
import { AgentCardError } from '../../src/errors/gateway.errors';
import { AgentCardResolver, RemoteInvoker, SendMessageParams } from '../../src/services/remote-invoker';

export const AGENT_URL = 'http://agent.test';

export function messageReply(text: string, id: string = 'req-1') {
    return {
        jsonrpc: '2.0',
        id,
        result: { kind: 'message', role: 'agent', messageId: 'm-1', parts: [{ kind: 'text', text }] },
    };
}

export function taskReply(
    taskId: string,
    state: string,
    extra: { message?: string; artifacts?: { name: string; text: string }[]; contextId?: string } = {},
) {
    return {
        jsonrpc: '2.0',
        id: taskId,
        result: {
            kind: 'task',
            id: taskId,
            ...(extra.contextId ? { contextId: extra.contextId } : {}),
            status: {
                state,
                ...(extra.message
                    ? { message: { kind: 'message', role: 'agent', parts: [{ kind: 'text', text: extra.message }] } }
                    : {}),
            },
            ...(extra.artifacts
                ? { artifacts: extra.artifacts.map(a => ({ name: a.name, parts: [{ kind: 'text', text: a.text }] })) }
                : {}),
        },
    };
}

export function errorReply(code: number, message: string) {
    return { jsonrpc: '2.0', id: 'req-1', error: { code, message } };
}

export function statusEvent(
    taskId: string,
    state: string,
    extra: { message?: string; final?: boolean; contextId?: string } = {},
) {
    return {
        jsonrpc: '2.0',
        id: 'req-1',
        result: {
            kind: 'status-update',
            taskId,
            ...(extra.contextId ? { contextId: extra.contextId } : {}),
            status: {
                state,
                ...(extra.message
                    ? { message: { kind: 'message', role: 'agent', parts: [{ kind: 'text', text: extra.message }] } }
                    : {}),
            },
            final: extra.final ?? false,
        },
    };
}

export function artifactEvent(taskId: string, name: string, text: string, append = false) {
    return {
        jsonrpc: '2.0',
        id: 'req-1',
        result: {
            kind: 'artifact-update',
            taskId,
            artifact: { name, parts: [{ kind: 'text', text }] },
            append,
        },
    };
}

export function agentRecord(url: string = AGENT_URL, name = 'Stub Agent'): AgentRecord {
    return { url, name, card: { name }, registered_at: new Date('2026-01-01T00:00:00.000Z') };
}

type SendHandler = (agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal) => Promise<unknown>;
type StreamHandler = (agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal) => AsyncIterable<unknown>;
type GetHandler = (agent: AgentRecord, taskId: string, historyLength?: number) => Promise<unknown>;
type CancelHandler = (agent: AgentRecord, taskId: string) => Promise<unknown>;

/**
 * In-process stand-in for a remote A2A agent. Handlers are swapped per test;
 * every call is recorded.
 */
export class StubAgent implements RemoteInvoker, AgentCardResolver {
    readonly cards = new Map<string, AgentCard>();
    readonly sends: SendMessageParams[] = [];
    readonly sendSignals: AbortSignal[] = [];
    readonly gets: { taskId: string; historyLength?: number }[] = [];
    readonly cancels: string[] = [];

    onSend: SendHandler = async () => messageReply('ok');
    onStream: StreamHandler = async function* () {
        yield messageReply('ok');
    };
    onGet: GetHandler = async (_agent, taskId) => taskReply(taskId, 'working');
    onCancel: CancelHandler = async (_agent, taskId) => taskReply(taskId, 'canceled');

    async resolveCard(endpoint: string): Promise<AgentCard> {
        const card = this.cards.get(endpoint);
        if (!card) throw new AgentCardError(endpoint, 'HTTP 404');
        return card;
    }

    sendMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): Promise<unknown> {
        this.sends.push(params);
        if (signal) this.sendSignals.push(signal);
        return this.onSend(agent, params, signal);
    }

    streamMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): AsyncIterable<unknown> {
        this.sends.push(params);
        if (signal) this.sendSignals.push(signal);
        return this.onStream(agent, params, signal);
    }

    getTask(agent: AgentRecord, taskId: string, historyLength?: number): Promise<unknown> {
        this.gets.push({ taskId, historyLength });
        return this.onGet(agent, taskId, historyLength);
    }

    cancelTask(agent: AgentRecord, taskId: string): Promise<unknown> {
        this.cancels.push(taskId);
        return this.onCancel(agent, taskId);
    }
}
