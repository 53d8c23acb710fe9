import { AgentRecord } from '../db/agent.entity';
import { TaskRecord } from '../db/task.entity';
import { AgentNotRegisteredError } from '../errors/gateway.errors';
import { AgentDirectory } from '../repositories/agent.directory';
import { TaskListFilter, TaskStore } from '../repositories/task.store';
import { BackgroundReconciler, ReconcilerConfig } from './background-reconciler';
import { DispatchConfig, DispatchCoordinator, StreamListener } from './dispatch-coordinator';
import { QueryService } from './query.service';
import { AgentCardResolver, RemoteInvoker } from './remote-invoker';

const TAG = '[gateway]';

export type GatewayConfig = DispatchConfig & ReconcilerConfig;

export interface GatewaySnapshot {
    agents: Record<string, AgentRecord>;
    tasks: Record<string, TaskRecord>;
}

export interface UnregisterOutcome {
    url: string;
    name: string;
    removedTasks: number;
}

/**
 * The boundary operations a caller transport exposes. Owns one TaskStore and
 * one AgentDirectory and wires them into the dispatch, reconcile and query
 * components.
 */
export class Gateway {
    readonly tasks = new TaskStore();
    readonly agents: AgentDirectory;
    readonly reconciler: BackgroundReconciler;
    private readonly coordinator: DispatchCoordinator;
    private readonly query: QueryService;

    constructor(invoker: RemoteInvoker & AgentCardResolver, config: GatewayConfig) {
        this.agents = new AgentDirectory(invoker);
        this.reconciler = new BackgroundReconciler(this.tasks, this.agents, invoker, config);
        this.coordinator = new DispatchCoordinator(this.tasks, this.agents, invoker, this.reconciler, config);
        this.query = new QueryService(this.tasks, this.agents, invoker, this.reconciler);
    }

    registerAgent(url: string): Promise<AgentRecord> {
        return this.agents.register(url);
    }

    listAgents(): AgentRecord[] {
        return this.agents.list();
    }

    // Tasks of the endpoint are deleted, not orphaned; their loops see the record gone and exit.
    unregisterAgent(url: string): UnregisterOutcome {
        const agent = this.agents.remove(url);
        if (!agent) throw new AgentNotRegisteredError(url);

        for (const task of this.tasks.list()) {
            if (task.endpoint === url) this.reconciler.stop(task.gateway_id);
        }
        const removedTasks = this.tasks.deleteByEndpoint(url);
        console.log(`${TAG} unregistered '${agent.name}', removed ${removedTasks} tasks`);
        return { url, name: agent.name, removedTasks };
    }

    sendMessage(endpoint: string, message: string, sessionId: string | null = null): Promise<TaskRecord> {
        return this.coordinator.dispatch(endpoint, message, sessionId);
    }

    // Resolves with the record as the stream left it; `onUpdate` sees every change on the way.
    sendMessageStream(
        endpoint: string,
        message: string,
        sessionId: string | null,
        onUpdate: StreamListener,
    ): Promise<TaskRecord> {
        return this.coordinator.stream(endpoint, message, sessionId, onUpdate);
    }

    getTaskResult(gatewayId: string, historyLength?: number): Promise<TaskRecord> {
        return this.query.getResult(gatewayId, historyLength);
    }

    cancelTask(gatewayId: string): Promise<TaskRecord> {
        return this.query.cancel(gatewayId);
    }

    getTaskList(filter: TaskListFilter = {}): TaskRecord[] {
        return this.query.list(filter);
    }

    snapshot(): GatewaySnapshot {
        return { agents: this.agents.snapshot(), tasks: this.tasks.snapshot() };
    }

    /**
     * Loads persisted tables. Tasks whose endpoint is no longer registered
     * are dropped; unfinished ones get a background unit again.
     */
    restore(snapshot: GatewaySnapshot): void {
        this.agents.restore(snapshot.agents);

        const kept = Object.fromEntries(
            Object.entries(snapshot.tasks).filter(([, task]) => this.agents.has(task.endpoint)),
        );
        const dropped = Object.keys(snapshot.tasks).length - Object.keys(kept).length;
        if (dropped > 0) {
            console.warn(`${TAG} dropped ${dropped} restored tasks without a registered endpoint`);
        }

        this.tasks.restore(kept);
        this.reconciler.resume(this.tasks.nonTerminal());
    }

    async shutdown(): Promise<void> {
        await this.reconciler.drain();
    }
}
