import { TaskRecord, isTerminal } from '../db/task.entity';
import { PollLimitExceededError } from '../errors/gateway.errors';
import { AgentDirectory } from '../repositories/agent.directory';
import { TaskStore } from '../repositories/task.store';
import { delay } from '../utils/delay';
import { mergeOutcome } from './reconcile';
import { RemoteInvoker, RemoteOutcome, settle } from './remote-invoker';
import { failurePatch } from './reply-classifier';

const TAG = '[reconciler]';

export interface ReconcilerConfig {
    pollIntervalMs: number;
    maxPolls: number;
}

interface BackgroundUnit {
    controller: AbortController;
    done: Promise<void>;
}

/**
 * Polls the remote agent for every task that is not yet terminal and merges
 * what it sees into the TaskStore. One unit per gateway_id; each unit
 * removes itself from the outstanding set when its loop exits.
 */
export class BackgroundReconciler {
    private readonly outstanding = new Map<string, BackgroundUnit>();

    constructor(
        private readonly tasks: TaskStore,
        private readonly agents: AgentDirectory,
        private readonly invoker: RemoteInvoker,
        private readonly config: ReconcilerConfig,
    ) { }

    get outstandingCount(): number {
        return this.outstanding.size;
    }

    isTracking(gatewayId: string): boolean {
        return this.outstanding.has(gatewayId);
    }

    /**
     * Starts the loop for `gatewayId`. `inFlight` is the send still running
     * from dispatch; its reply is merged before the first poll. Aborting
     * `controller` stops both.
     */
    spawn(gatewayId: string, controller: AbortController, inFlight?: Promise<RemoteOutcome>): boolean {
        return this.track(gatewayId, controller, () => this.run(gatewayId, controller.signal, inFlight));
    }

    /**
     * Registers any background work for `gatewayId` as its unit, so that
     * `stop`, `wait` and `drain` reach it. Used directly for streamed sends.
     */
    track(gatewayId: string, controller: AbortController, work: () => Promise<void>): boolean {
        if (this.outstanding.has(gatewayId)) {
            console.warn(`${TAG} task ${gatewayId} already has a background unit`);
            return false;
        }

        const unit: BackgroundUnit = { controller, done: Promise.resolve() };
        this.outstanding.set(gatewayId, unit);
        unit.done = work()
            .catch(err => console.error(`${TAG} task ${gatewayId} unit failed:`, err))
            .finally(() => {
                if (this.outstanding.get(gatewayId) === unit) {
                    this.outstanding.delete(gatewayId);
                }
            });
        return true;
    }

    // Restarts loops for tasks restored from a snapshot.
    resume(records: TaskRecord[]): number {
        let resumed = 0;
        for (const record of records) {
            if (!isTerminal(record.state) && this.spawn(record.gateway_id, new AbortController())) {
                resumed++;
            }
        }
        if (resumed > 0) {
            console.log(`${TAG} resumed ${resumed} background units`);
        }
        return resumed;
    }

    stop(gatewayId: string): void {
        this.outstanding.get(gatewayId)?.controller.abort();
    }

    async wait(gatewayId: string): Promise<void> {
        await this.outstanding.get(gatewayId)?.done;
    }

    // Snapshot-and-drain: abort every unit outstanding now and wait for all of them.
    async drain(): Promise<void> {
        const units = Array.from(this.outstanding.values());
        if (units.length === 0) return;

        console.log(`${TAG} draining ${units.length} background units`);
        for (const unit of units) {
            unit.controller.abort();
        }
        await Promise.allSettled(units.map(unit => unit.done));
    }

    private async run(gatewayId: string, signal: AbortSignal, inFlight?: Promise<RemoteOutcome>): Promise<void> {
        if (inFlight) {
            const outcome = await inFlight;
            if (signal.aborted) return;
            const merged = mergeOutcome(this.tasks, gatewayId, outcome);
            console.log(`${TAG} task ${gatewayId} late reply merged (state: ${merged?.state ?? 'removed'})`);
        }

        let polls = 0;
        while (!signal.aborted) {
            const current = this.tasks.get(gatewayId);
            if (!current || isTerminal(current.state)) return;

            if (polls >= this.config.maxPolls) {
                console.warn(`${TAG} task ${gatewayId} gave up after ${polls} polls`);
                this.tasks.update(gatewayId, () => failurePatch(new PollLimitExceededError(polls)));
                return;
            }

            if (!(await delay(this.config.pollIntervalMs, signal))) return;

            const latest = this.tasks.get(gatewayId);
            if (!latest || isTerminal(latest.state)) return;

            const agent = this.agents.get(latest.endpoint);
            if (!agent) {
                console.warn(`${TAG} task ${gatewayId} endpoint ${latest.endpoint} is gone, stopping`);
                return;
            }

            const outcome = await settle(
                this.invoker.getTask(agent, latest.agent_id ?? gatewayId, undefined, signal),
            );
            if (signal.aborted) return;

            polls++;
            mergeOutcome(this.tasks, gatewayId, outcome, { lenientNotFound: true });
        }
    }
}
