import { v7 as uuid } from 'uuid';
import { AgentCard, AgentRecord, agentCardSchema } from '../db/agent.entity';
import { AgentCardError, GatewayError, TransportFailureError, describeError } from '../errors/gateway.errors';

const TAG = '[invoker]';

export interface SendMessageParams {
    gatewayId: string;
    text: string;
    sessionId: string | null;
}

/**
 * One outbound call to a remote agent. Each method resolves with the raw
 * reply body (classified later) and rejects with TransportFailureError when
 * the agent could not be reached, or with the signal's reason when aborted.
 */
export interface RemoteInvoker {
    sendMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): Promise<unknown>;
    // One raw reply per streamed event. An agent that answers without a stream yields its single reply.
    streamMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): AsyncIterable<unknown>;
    getTask(agent: AgentRecord, taskId: string, historyLength?: number, signal?: AbortSignal): Promise<unknown>;
    cancelTask(agent: AgentRecord, taskId: string, signal?: AbortSignal): Promise<unknown>;
}

export interface AgentCardResolver {
    resolveCard(endpoint: string): Promise<AgentCard>;
}

export type RemoteOutcome =
    | { ok: true; reply: unknown }
    | { ok: false; error: unknown };

// Turns a remote call into a promise that never rejects, so it can be raced,
// handed to a background unit and awaited more than once.
export function settle(call: Promise<unknown>): Promise<RemoteOutcome> {
    return call.then(
        reply => ({ ok: true as const, reply }),
        error => ({ ok: false as const, error }),
    );
}

export interface HttpInvokerOptions {
    timeoutMs: number;
}

interface HttpExchange {
    ok: boolean;
    status: number;
    text: string;
}

/**
 * A2A JSON-RPC 2.0 over HTTP.
 * Agent cards live at `<endpoint>/.well-known/agent.json`; RPCs go to the
 * card's `url` when it has one, otherwise to the registered endpoint.
 */
export class A2AHttpInvoker implements RemoteInvoker, AgentCardResolver {
    constructor(private readonly options: HttpInvokerOptions) { }

    async resolveCard(endpoint: string): Promise<AgentCard> {
        const cardUrl = `${endpoint.replace(/\/+$/, '')}/.well-known/agent.json`;
        let body: unknown;
        try {
            const res = await this.exchange(cardUrl, { method: 'GET', headers: { accept: 'application/json' } });
            if (!res.ok) {
                throw new AgentCardError(endpoint, `HTTP ${res.status}`);
            }
            body = JSON.parse(res.text);
        } catch (err) {
            if (err instanceof AgentCardError) throw err;
            throw new AgentCardError(endpoint, describeError(err));
        }

        const parsed = agentCardSchema.safeParse(body);
        if (!parsed.success) {
            throw new AgentCardError(endpoint, `invalid agent card (${parsed.error.issues.map(i => i.path.join('.') || i.message).join(', ')})`);
        }
        return parsed.data;
    }

    sendMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): Promise<unknown> {
        return this.call(agent, params.gatewayId, 'message/send', messageParams(params), signal);
    }

    /**
     * `message/stream` over server-sent events. The remote timeout applies
     * between chunks, so a stream stays open while the agent keeps sending.
     * Leaving the iteration early closes the connection.
     */
    async *streamMessage(agent: AgentRecord, params: SendMessageParams, signal?: AbortSignal): AsyncGenerator<unknown> {
        if (signal?.aborted) throw signal.reason;

        const target = agent.card.url ?? agent.url;
        const controller = new AbortController();
        const onAbort = () => controller.abort(signal?.reason);
        signal?.addEventListener('abort', onAbort, { once: true });
        let timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
        const touch = () => {
            clearTimeout(timer);
            timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
        };

        try {
            const res = await fetch(target, {
                method: 'POST',
                headers: { 'content-type': 'application/json', accept: 'text/event-stream' },
                body: JSON.stringify({ jsonrpc: '2.0', id: params.gatewayId, method: 'message/stream', params: messageParams(params) }),
                signal: controller.signal,
            });

            const contentType = res.headers.get('content-type') ?? '';
            if (!res.body || !contentType.includes('text/event-stream')) {
                const body = parseBody(await res.text());
                if (!res.ok && !isJsonRpcEnvelope(body)) {
                    throw new TransportFailureError(`message/stream to ${target} failed with HTTP ${res.status}`);
                }
                yield body;
                return;
            }

            const reader = res.body.getReader();
            const decoder = new TextDecoder();
            let buffer = '';
            let data: string[] = [];

            while (true) {
                const { done, value } = await reader.read();
                if (done) break;
                touch();

                buffer += decoder.decode(value, { stream: true });
                const lines = buffer.split(/\r?\n/);
                buffer = lines.pop() ?? '';

                for (const line of lines) {
                    if (line.startsWith('data:')) {
                        data.push(line.slice(5).trimStart());
                    } else if (line === '' && data.length > 0) {
                        yield parseBody(data.join('\n'));
                        data = [];
                    }
                }
            }
            buffer += decoder.decode();
            if (buffer.startsWith('data:')) data.push(buffer.slice(5).trimStart());
            if (data.length > 0) yield parseBody(data.join('\n'));
        } catch (err) {
            if (signal?.aborted) throw signal.reason;
            if (err instanceof GatewayError) throw err;
            if (controller.signal.aborted) {
                throw new TransportFailureError(`stream from ${target} idle for more than ${this.options.timeoutMs}ms`, { cause: err });
            }
            console.error(`${TAG} stream from ${target} failed:`, describeError(err));
            throw new TransportFailureError(`stream from ${target} failed: ${describeError(err)}`, { cause: err });
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
            controller.abort();
        }
    }

    getTask(agent: AgentRecord, taskId: string, historyLength?: number, signal?: AbortSignal): Promise<unknown> {
        return this.call(agent, taskId, 'tasks/get', {
            id: taskId,
            ...(historyLength !== undefined ? { historyLength } : {}),
        }, signal);
    }

    cancelTask(agent: AgentRecord, taskId: string, signal?: AbortSignal): Promise<unknown> {
        return this.call(agent, taskId, 'tasks/cancel', { id: taskId }, signal);
    }

    private async call(
        agent: AgentRecord,
        requestId: string,
        method: string,
        params: Record<string, unknown>,
        signal?: AbortSignal,
    ): Promise<unknown> {
        const target = agent.card.url ?? agent.url;
        const res = await this.exchange(target, {
            method: 'POST',
            headers: { 'content-type': 'application/json', accept: 'application/json' },
            body: JSON.stringify({ jsonrpc: '2.0', id: requestId, method, params }),
        }, signal);

        const body = parseBody(res.text);

        // JSON-RPC errors may arrive with a non-2xx status; keep them for the classifier
        if (!res.ok && !isJsonRpcEnvelope(body)) {
            throw new TransportFailureError(`${method} to ${target} failed with HTTP ${res.status}`);
        }
        return body;
    }

    // The body is read before the timer and the abort listener are released.
    private async exchange(url: string, init: RequestInit, signal?: AbortSignal): Promise<HttpExchange> {
        if (signal?.aborted) throw signal.reason;

        const controller = new AbortController();
        const onAbort = () => controller.abort(signal?.reason);
        signal?.addEventListener('abort', onAbort, { once: true });
        const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

        try {
            const res = await fetch(url, { ...init, signal: controller.signal });
            return { ok: res.ok, status: res.status, text: await res.text() };
        } catch (err) {
            if (signal?.aborted) throw signal.reason;
            if (controller.signal.aborted) {
                throw new TransportFailureError(`request to ${url} timed out after ${this.options.timeoutMs}ms`, { cause: err });
            }
            console.error(`${TAG} request to ${url} failed:`, describeError(err));
            throw new TransportFailureError(`request to ${url} failed: ${describeError(err)}`, { cause: err });
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }
}

function messageParams(params: SendMessageParams): Record<string, unknown> {
    return {
        message: {
            kind: 'message',
            role: 'user',
            parts: [{ kind: 'text', text: params.text }],
            messageId: uuid(),
            ...(params.sessionId ? { contextId: params.sessionId } : {}),
        },
    };
}

// Non-JSON bodies are returned as text; the classifier reports them as an unexpected shape.
function parseBody(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

function isJsonRpcEnvelope(body: unknown): boolean {
    return typeof body === 'object' && body !== null && ('result' in body || 'error' in body);
}
