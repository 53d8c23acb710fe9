import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { deserialize, serialize, taskResultSchema } from '@relaygate/sdk';
import { agentCardSchema } from '../db/agent.entity';
import { taskState } from '../db/task.entity';
import { describeError } from '../errors/gateway.errors';
import { Gateway, GatewaySnapshot } from './gateway';

const TAG = '[snapshot]';

export const AGENTS_FILE = 'registered_agents.json';
export const TASKS_FILE = 'tasks.json';

const MAX_SNAPSHOT_SIZE = 256 * 1024 * 1024;

const agentTableSchema = z.record(z.object({
    url: z.string(),
    name: z.string(),
    card: agentCardSchema,
    registered_at: z.date(),
}));

const taskTableSchema = z.record(z.object({
    gateway_id: z.string(),
    agent_id: z.string().nullable(),
    endpoint: z.string(),
    request_payload: z.string(),
    session_id: z.string().nullable(),
    state: z.nativeEnum(taskState),
    result: taskResultSchema.nullable(),
    created_at: z.date(),
    updated_at: z.date(),
}));

export interface SnapshotConfig {
    dataDir: string;
    intervalMs: number;
}

/**
 * Persists the agent registry and task table as two flat documents.
 * Loading never fails startup: a missing or malformed file is an empty table.
 */
export class SnapshotService {
    private intervalHandle: NodeJS.Timeout | null = null;
    private current: Promise<void> | null = null;
    private queued: Promise<void> | null = null;

    constructor(
        private readonly gateway: Gateway,
        private readonly config: SnapshotConfig,
    ) { }

    async load(): Promise<GatewaySnapshot> {
        const snapshot: GatewaySnapshot = {
            agents: await this.readTable(AGENTS_FILE, agentTableSchema),
            tasks: await this.readTable(TASKS_FILE, taskTableSchema),
        };
        this.gateway.restore(snapshot);
        return snapshot;
    }

    /**
     * Writes both tables. A call made while a write is in flight waits for it
     * and then writes again, so the caller's view of the tables is on disk
     * when it resolves. Calls arriving during the same write share one
     * trailing write.
     */
    save(): Promise<void> {
        if (!this.current) {
            this.current = this.write().finally(() => {
                this.current = null;
            });
            return this.current;
        }

        if (!this.queued) {
            const next = () => {
                this.queued = null;
                return this.save();
            };
            this.queued = this.current.then(next, next);
        }
        return this.queued;
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }
        console.log(`${TAG} periodic save every ${this.config.intervalMs}ms to ${this.config.dataDir}`);
        this.intervalHandle = setInterval(() => this.tick(), this.config.intervalMs);
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    private async tick(): Promise<void> {
        try {
            await this.save();
        } catch (err) {
            console.error(`${TAG} periodic save failed:`, err);
        }
    }

    private async write(): Promise<void> {
        const { agents, tasks } = this.gateway.snapshot();
        await fs.mkdir(this.config.dataDir, { recursive: true });
        await this.writeTable(AGENTS_FILE, agents);
        await this.writeTable(TASKS_FILE, tasks);
        console.log(`${TAG} saved ${Object.keys(agents).length} agents, ${Object.keys(tasks).length} tasks`);
    }

    private async readTable<T>(file: string, schema: z.ZodType<Record<string, T>, z.ZodTypeDef, unknown>): Promise<Record<string, T>> {
        const filePath = path.join(this.config.dataDir, file);

        let raw: string;
        try {
            raw = await fs.readFile(filePath, 'utf-8');
        } catch (err) {
            console.warn(`${TAG} ${filePath} not readable (${describeError(err)}), starting empty`);
            return {};
        }

        try {
            const parsed = schema.safeParse(deserialize(raw) ?? {});
            if (parsed.success) return parsed.data;
            console.error(`${TAG} ${filePath} is malformed, starting empty:`, parsed.error.issues[0]?.message);
        } catch (err) {
            console.error(`${TAG} ${filePath} could not be decoded, starting empty:`, describeError(err));
        }
        return {};
    }

    // Written beside the target and renamed into place.
    private async writeTable(file: string, table: Record<string, unknown>): Promise<void> {
        const filePath = path.join(this.config.dataDir, file);
        const tmpPath = `${filePath}.tmp`;
        await fs.writeFile(tmpPath, serialize(table, MAX_SNAPSHOT_SIZE), 'utf-8');
        await fs.rename(tmpPath, filePath);
    }
}
