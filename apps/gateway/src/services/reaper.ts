import { TaskStore } from '../repositories/task.store';

const TAG = '[reaper]';

// Retention for finished tasks. Unfinished tasks are never reaped here; the
// reconciler's poll limit bounds how long those stay open.
export class Reaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly tasks: TaskStore,
        private readonly retentionSeconds = 7 * 24 * 60 * 60,
        private readonly intervalMs = 60_000,
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        if (this.retentionSeconds <= 0) {
            console.log(`${TAG} retention disabled`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms, retention: ${this.retentionSeconds}s)`);

        this.reap();
        this.intervalHandle = setInterval(() => this.reap(), this.intervalMs);
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    reap(now: Date = new Date()): string[] {
        if (this.isReaping || this.retentionSeconds <= 0) return [];
        this.isReaping = true;

        try {
            const cutoff = new Date(now.getTime() - this.retentionSeconds * 1000);
            const evicted = this.tasks.evictTerminalBefore(cutoff);
            if (evicted.length > 0) {
                console.log(`${TAG} evicted ${evicted.length} finished tasks: ${evicted.join(', ')}`);
            }
            return evicted;
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return [];
        } finally {
            this.isReaping = false;
        }
    }
}
