import { TaskRecord, isTerminal, taskState } from '../db/task.entity';
import { AgentNotRegisteredError, TaskNotFoundError } from '../errors/gateway.errors';
import { AgentDirectory } from '../repositories/agent.directory';
import { TaskListFilter, TaskStore } from '../repositories/task.store';
import { BackgroundReconciler } from './background-reconciler';
import { asGatewayError, mergeOutcome } from './reconcile';
import { RemoteInvoker, settle } from './remote-invoker';
import { classifyReply, failurePatch, patchFromReply } from './reply-classifier';

const TAG = '[query]';

export const CANCELLED_MESSAGE = 'Task cancelled successfully';

/**
 * Read side of the gateway. Only mutates a task by merging a fresh status read or
 * by recording the outcome of a cancel request.
 */
export class QueryService {
    constructor(
        private readonly tasks: TaskStore,
        private readonly agents: AgentDirectory,
        private readonly invoker: RemoteInvoker,
        private readonly reconciler: BackgroundReconciler,
    ) { }

    /**
     * Terminal tasks are returned as stored. Anything else gets one fresh
     * `tasks/get` read merged in first, so callers can refresh faster than
     * the poll interval.
     */
    async getResult(gatewayId: string, historyLength?: number): Promise<TaskRecord> {
        const task = this.require(gatewayId);
        if (isTerminal(task.state)) return task;

        const agent = this.agents.get(task.endpoint);
        if (!agent) throw new AgentNotRegisteredError(task.endpoint);

        const outcome = await settle(this.invoker.getTask(agent, task.agent_id ?? gatewayId, historyLength));
        return mergeOutcome(this.tasks, gatewayId, outcome, { lenientNotFound: true }) ?? this.require(gatewayId);
    }

    list(filter: TaskListFilter = {}): TaskRecord[] {
        return this.tasks.list(filter);
    }

    /**
     * Cancelling a finished task returns it unchanged. Otherwise the cancel is
     * forwarded; success ends the task as cancelled, any failure ends it as
     * error.
     */
    async cancel(gatewayId: string): Promise<TaskRecord> {
        const task = this.require(gatewayId);
        if (isTerminal(task.state)) return task;

        const agent = this.agents.get(task.endpoint);
        if (!agent) throw new AgentNotRegisteredError(task.endpoint);

        console.log(`${TAG} cancelling task ${gatewayId} on ${task.endpoint}`);
        const outcome = await settle(this.invoker.cancelTask(agent, task.agent_id ?? gatewayId));

        const updated = this.tasks.update(gatewayId, () => {
            if (!outcome.ok) return failurePatch(asGatewayError(outcome.error));

            const reply = classifyReply(outcome.reply);
            switch (reply.kind) {
                case 'upstream-error':
                case 'unrecognized':
                    return patchFromReply(reply, gatewayId);
                case 'immediate-message':
                    return {
                        state: taskState.CANCELLED,
                        result: { message: reply.message || CANCELLED_MESSAGE, artifacts: [] },
                    };
                case 'task-handle':
                    return {
                        state: taskState.CANCELLED,
                        result: { message: reply.message ?? CANCELLED_MESSAGE, artifacts: reply.artifacts, remote_state: reply.remoteState },
                        ...(reply.taskId !== gatewayId ? { agent_id: reply.taskId } : {}),
                    };
            }
        });

        this.reconciler.stop(gatewayId);
        return updated ?? this.require(gatewayId);
    }

    private require(gatewayId: string): TaskRecord {
        const task = this.tasks.get(gatewayId);
        if (!task) throw new TaskNotFoundError(gatewayId);
        return task;
    }
}
