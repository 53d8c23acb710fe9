import { TaskRecord } from '../db/task.entity';
import { GatewayError, TransportFailureError, describeError } from '../errors/gateway.errors';
import { TaskStore } from '../repositories/task.store';
import { RemoteOutcome } from './remote-invoker';
import { classifyReply, failurePatch, isTaskNotFound, patchFromReply } from './reply-classifier';

export interface MergeOptions {
    // Remote bookkeeping can lag behind a fresh task; "not found" then means "not yet".
    lenientNotFound?: boolean;
}

export function asGatewayError(error: unknown): GatewayError {
    return error instanceof GatewayError ? error : new TransportFailureError(describeError(error), { cause: error });
}

/**
 * Merges one remote outcome into the stored record. Returns the record as
 * stored afterwards, or undefined if the task no longer exists.
 */
export function mergeOutcome(
    tasks: TaskStore,
    gatewayId: string,
    outcome: RemoteOutcome,
    options: MergeOptions = {},
): TaskRecord | undefined {
    if (!outcome.ok) {
        return tasks.update(gatewayId, () => failurePatch(asGatewayError(outcome.error)));
    }

    const reply = classifyReply(outcome.reply);
    if (options.lenientNotFound && isTaskNotFound(reply)) {
        return tasks.get(gatewayId);
    }
    return tasks.update(gatewayId, () => patchFromReply(reply, gatewayId));
}
