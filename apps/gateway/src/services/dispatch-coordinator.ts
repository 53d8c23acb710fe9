import { v7 as uuid } from 'uuid';
import { TaskRecord, isTerminal, taskState } from '../db/task.entity';
import { AgentRecord } from '../db/agent.entity';
import { AgentNotRegisteredError } from '../errors/gateway.errors';
import { AgentDirectory } from '../repositories/agent.directory';
import { TaskStore } from '../repositories/task.store';
import { TIMED_OUT, waitAtMost } from '../utils/delay';
import { BackgroundReconciler } from './background-reconciler';
import { asGatewayError, mergeOutcome } from './reconcile';
import { RemoteInvoker, SendMessageParams, settle } from './remote-invoker';
import { classifyStreamEvent, failurePatch, patchFromStreamEvent } from './reply-classifier';

const TAG = '[dispatch]';

export const PENDING_PLACEHOLDER = 'Task accepted; the agent has not replied yet. Poll get_task_result for updates.';

export interface DispatchConfig {
    immediateResponseTimeoutMs: number;
}

export type StreamListener = (task: TaskRecord) => void;

/**
 * Race-then-continue: the caller waits at most `immediateResponseTimeoutMs`
 * for the agent's first reply. The send itself is never cut short by that
 * wait; a late reply is picked up by the BackgroundReconciler.
 */
export class DispatchCoordinator {
    constructor(
        private readonly tasks: TaskStore,
        private readonly agents: AgentDirectory,
        private readonly invoker: RemoteInvoker,
        private readonly reconciler: BackgroundReconciler,
        private readonly config: DispatchConfig,
    ) { }

    async dispatch(endpoint: string, payload: string, sessionId: string | null = null): Promise<TaskRecord> {
        const opened = this.open(endpoint, payload, sessionId);
        if ('rejected' in opened) return opened.rejected;
        const { gatewayId, agent } = opened;

        console.log(`${TAG} task ${gatewayId} -> '${agent.name}' (${endpoint})`);

        const controller = new AbortController();
        const inFlight = settle(
            this.invoker.sendMessage(agent, { gatewayId, text: payload, sessionId }, controller.signal),
        );

        const outcome = await waitAtMost(inFlight, this.config.immediateResponseTimeoutMs);

        if (outcome === TIMED_OUT) {
            console.log(`${TAG} task ${gatewayId} still running after ${this.config.immediateResponseTimeoutMs}ms, continuing in background`);
            const pending = this.tasks.update(gatewayId, () => ({
                result: { message: PENDING_PLACEHOLDER, artifacts: [] },
            }));
            if (!pending) {
                controller.abort();
                return this.detached(gatewayId, endpoint, payload, sessionId);
            }
            this.reconciler.spawn(gatewayId, controller, inFlight);
            return pending;
        }

        const merged = mergeOutcome(this.tasks, gatewayId, outcome);
        if (!merged) {
            return this.detached(gatewayId, endpoint, payload, sessionId);
        }

        if (!isTerminal(merged.state)) {
            this.reconciler.spawn(gatewayId, controller);
        }
        console.log(`${TAG} task ${gatewayId} replied in time (state: ${merged.state})`);
        return merged;
    }

    /**
     * Sends over `message/stream` and follows the stream to its end, handing
     * every stored change to `onUpdate`. The stream runs as the task's
     * background unit, so cancel and shutdown stop it. A stream that ends
     * before the task does is followed up by polling.
     */
    async stream(
        endpoint: string,
        payload: string,
        sessionId: string | null,
        onUpdate: StreamListener,
    ): Promise<TaskRecord> {
        const opened = this.open(endpoint, payload, sessionId);
        if ('rejected' in opened) return opened.rejected;
        const { gatewayId, agent } = opened;

        console.log(`${TAG} task ${gatewayId} -> '${agent.name}' (${endpoint}, streaming)`);

        const controller = new AbortController();
        const params: SendMessageParams = { gatewayId, text: payload, sessionId };
        this.reconciler.track(gatewayId, controller, () => this.consume(agent, params, controller.signal, onUpdate));
        await this.reconciler.wait(gatewayId);

        const settled = this.tasks.get(gatewayId);
        if (!settled) return this.detached(gatewayId, endpoint, payload, sessionId);

        if (!isTerminal(settled.state) && !controller.signal.aborted) {
            console.log(`${TAG} task ${gatewayId} stream ended in state ${settled.state}, polling from here`);
            this.reconciler.spawn(gatewayId, new AbortController());
        }
        return settled;
    }

    private async consume(
        agent: AgentRecord,
        params: SendMessageParams,
        signal: AbortSignal,
        onUpdate: StreamListener,
    ): Promise<void> {
        const gatewayId = params.gatewayId;
        try {
            for await (const raw of this.invoker.streamMessage(agent, params, signal)) {
                if (signal.aborted) return;

                const event = classifyStreamEvent(raw);
                const merged = this.tasks.update(gatewayId, current => patchFromStreamEvent(event, current, gatewayId));
                if (!merged) return;
                onUpdate(merged);

                if (isTerminal(merged.state) || (event.kind === 'status-update' && event.final)) return;
            }
        } catch (err) {
            if (signal.aborted) return;
            console.error(`${TAG} task ${gatewayId} stream failed:`, asGatewayError(err).message);
            const failed = this.tasks.update(gatewayId, () => failurePatch(asGatewayError(err)));
            if (failed) onUpdate(failed);
        }
    }

    // Every send starts as a pending record; an unknown endpoint ends it as error right away.
    private open(endpoint: string, payload: string, sessionId: string | null):
        { gatewayId: string; agent: AgentRecord } | { rejected: TaskRecord } {
        const gatewayId = uuid();
        const agent = this.agents.get(endpoint);

        this.tasks.create({
            gateway_id: gatewayId,
            agent_id: null,
            endpoint,
            request_payload: payload,
            session_id: sessionId,
            state: taskState.PENDING,
            result: null,
        });

        if (agent) return { gatewayId, agent };

        console.warn(`${TAG} task ${gatewayId} rejected: ${endpoint} is not registered`);
        const rejected = this.tasks.update(gatewayId, () => failurePatch(new AgentNotRegisteredError(endpoint)))
            ?? this.detached(gatewayId, endpoint, payload, sessionId);
        return { rejected };
    }

    // The record was removed with its endpoint mid-dispatch; report it without re-inserting.
    private detached(gatewayId: string, endpoint: string, payload: string, sessionId: string | null): TaskRecord {
        const error = new AgentNotRegisteredError(endpoint);
        const now = new Date();
        return {
            gateway_id: gatewayId,
            agent_id: null,
            endpoint,
            request_payload: payload,
            session_id: sessionId,
            state: taskState.ERROR,
            result: { message: error.message, artifacts: [], error: { code: error.code, message: error.message } },
            created_at: now,
            updated_at: now,
        };
    }
}
