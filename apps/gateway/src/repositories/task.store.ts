import type { SortOrder } from '@relaygate/sdk';
import {
    NewTaskRecord,
    TaskMutation,
    TaskPatch,
    TaskRecord,
    isTerminal,
    stateRank,
    taskState,
} from '../db/task.entity';

const TAG = '[task-store]';

export interface TaskListFilter {
    state?: taskState;
    sort?: SortOrder;
    limit?: number;
}

/**
 * Authoritative in-memory task table keyed by gateway_id.
 *
 * Every read-modify-write runs to completion without awaiting, so on the
 * event loop each update for a given id is atomic and updates are
 * linearizable per id. Records handed out are copies; callers never hold
 * a reference into the table.
 */
export class TaskStore {
    private tasks = new Map<string, TaskRecord>();
    private lastStamp = 0;

    get size(): number {
        return this.tasks.size;
    }

    create(record: NewTaskRecord): string {
        if (this.tasks.has(record.gateway_id)) {
            throw new Error(`Task ${record.gateway_id} already exists`);
        }
        const now = this.stamp();
        this.tasks.set(record.gateway_id, structuredClone({ ...record, created_at: now, updated_at: now }));
        return record.gateway_id;
    }

    get(gatewayId: string): TaskRecord | undefined {
        const task = this.tasks.get(gatewayId);
        return task ? structuredClone(task) : undefined;
    }

    has(gatewayId: string): boolean {
        return this.tasks.has(gatewayId);
    }

    /**
     * Applies the patch returned by `mutation`. Terminal records are left
     * untouched, a state that would move the task backwards is dropped, and
     * an agent_id never replaces a different one. Returns the stored record
     * after the call, or undefined if the task does not exist.
     */
    update(gatewayId: string, mutation: TaskMutation): TaskRecord | undefined {
        const current = this.tasks.get(gatewayId);
        if (!current) return undefined;
        if (isTerminal(current.state)) return structuredClone(current);

        const patch = mutation(structuredClone(current));
        if (!patch) return structuredClone(current);

        const next: TaskRecord = { ...current, ...this.sanitize(current, patch), updated_at: this.stamp() };
        this.tasks.set(gatewayId, structuredClone(next));
        return structuredClone(next);
    }

    deleteByEndpoint(endpoint: string): number {
        let removed = 0;
        for (const [id, task] of this.tasks) {
            if (task.endpoint === endpoint) {
                this.tasks.delete(id);
                removed++;
            }
        }
        if (removed > 0) {
            console.log(`${TAG} removed ${removed} tasks for ${endpoint}`);
        }
        return removed;
    }

    list(filter: TaskListFilter = {}): TaskRecord[] {
        const direction = filter.sort === 'ascending' ? 1 : -1;
        const rows = Array.from(this.tasks.values())
            .filter(task => filter.state === undefined || task.state === filter.state)
            .sort((a, b) => direction * (a.updated_at.getTime() - b.updated_at.getTime()));

        const limited = filter.limit && filter.limit > 0 ? rows.slice(0, filter.limit) : rows;
        return limited.map(task => structuredClone(task));
    }

    nonTerminal(): TaskRecord[] {
        return Array.from(this.tasks.values())
            .filter(task => !isTerminal(task.state))
            .map(task => structuredClone(task));
    }

    // Retention: drops terminal tasks last touched before `cutoff`.
    evictTerminalBefore(cutoff: Date): string[] {
        const evicted: string[] = [];
        for (const [id, task] of this.tasks) {
            if (isTerminal(task.state) && task.updated_at.getTime() < cutoff.getTime()) {
                this.tasks.delete(id);
                evicted.push(id);
            }
        }
        return evicted;
    }

    snapshot(): Record<string, TaskRecord> {
        return Object.fromEntries(
            Array.from(this.tasks.entries()).map(([id, task]) => [id, structuredClone(task)]),
        );
    }

    restore(records: Record<string, TaskRecord>): void {
        this.tasks.clear();
        for (const [id, task] of Object.entries(records)) {
            this.tasks.set(id, structuredClone({ ...task, gateway_id: id }));
            this.lastStamp = Math.max(this.lastStamp, task.updated_at.getTime());
        }
        console.log(`${TAG} restored ${this.tasks.size} tasks`);
    }

    private sanitize(current: TaskRecord, patch: TaskPatch): TaskPatch {
        const applied: TaskPatch = { ...patch };

        if (applied.state !== undefined && stateRank(applied.state) < stateRank(current.state)) {
            delete applied.state;
        }
        if (applied.agent_id !== undefined && current.agent_id !== null && applied.agent_id !== current.agent_id) {
            console.warn(`${TAG} task ${current.gateway_id} keeps agent_id ${current.agent_id}, ignoring ${applied.agent_id}`);
            delete applied.agent_id;
        }
        if (applied.session_id !== undefined && current.session_id !== null) {
            delete applied.session_id;
        }
        return applied;
    }

    // Strictly increasing wall-clock stamps keep updated_at ordering total.
    private stamp(): Date {
        this.lastStamp = Math.max(Date.now(), this.lastStamp + 1);
        return new Date(this.lastStamp);
    }
}
