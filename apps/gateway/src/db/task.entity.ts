import type { TaskResult } from '@relaygate/sdk';

/**
 * Lifecycle states for gateway tasks.
 * Tasks progress: PENDING → RUNNING/STREAMING → COMPLETED/ERROR/CANCELLED
 */
export enum taskState {
    PENDING = 'pending',
    RUNNING = 'running',
    STREAMING = 'streaming',
    COMPLETED = 'completed',
    ERROR = 'error',
    CANCELLED = 'cancelled'
}

export const TERMINAL_STATES: ReadonlySet<taskState> = new Set([
    taskState.COMPLETED,
    taskState.ERROR,
    taskState.CANCELLED,
]);

export function isTerminal(state: taskState): boolean {
    return TERMINAL_STATES.has(state);
}

// pending < running/streaming < terminal; a transition may never lower the rank
export function stateRank(state: taskState): number {
    if (isTerminal(state)) return 2;
    return state === taskState.PENDING ? 0 : 1;
}

export function parseTaskState(value: string): taskState | undefined {
    return Object.values(taskState).find(state => state === value);
}

/**
 * The gateway's record of one unit of work delegated to a remote agent.
 * Keyed by gateway_id; agent_id is only ever used for outbound calls.
 */
export interface TaskRecord {
    gateway_id: string;
    agent_id: string | null;
    endpoint: string;
    request_payload: string;
    session_id: string | null;
    state: taskState;
    result: TaskResult | null;
    created_at: Date;
    updated_at: Date;
}

export type NewTaskRecord = Omit<TaskRecord, 'created_at' | 'updated_at'>;

export type TaskPatch = Partial<Pick<TaskRecord, 'state' | 'result' | 'agent_id' | 'session_id'>>;

export type TaskMutation = (current: Readonly<TaskRecord>) => TaskPatch | null;
