export type GatewayErrorCode =
    | 'AGENT_NOT_REGISTERED'
    | 'TASK_NOT_FOUND'
    | 'UPSTREAM_ERROR'
    | 'UNEXPECTED_REPLY_SHAPE'
    | 'TRANSPORT_FAILURE'
    | 'AGENT_CARD_ERROR'
    | 'POLL_LIMIT_EXCEEDED';

export abstract class GatewayError extends Error {
    abstract readonly code: GatewayErrorCode;
}

export class AgentNotRegisteredError extends GatewayError {
    readonly code = 'AGENT_NOT_REGISTERED';

    constructor(public readonly endpoint: string) {
        super(`Agent not registered: ${endpoint}`);
        this.name = 'AgentNotRegisteredError';
    }
}

export class TaskNotFoundError extends GatewayError {
    readonly code = 'TASK_NOT_FOUND';

    constructor(public readonly gatewayId: string) {
        super(`Task ID not found: ${gatewayId}`);
        this.name = 'TaskNotFoundError';
    }
}

export class UpstreamError extends GatewayError {
    readonly code = 'UPSTREAM_ERROR';

    constructor(
        public readonly upstreamCode: number,
        public readonly upstreamMessage: string,
    ) {
        super(`Agent Error: ${upstreamMessage} (Code: ${upstreamCode})`);
        this.name = 'UpstreamError';
    }
}

export class UnexpectedReplyShapeError extends GatewayError {
    readonly code = 'UNEXPECTED_REPLY_SHAPE';

    constructor(detail: string) {
        super(`Unexpected reply shape: ${detail}`);
        this.name = 'UnexpectedReplyShapeError';
    }
}

// Network or HTTP failure talking to an agent. Not raised by the
// immediate-response timeout, which never fails a task.
export class TransportFailureError extends GatewayError {
    readonly code = 'TRANSPORT_FAILURE';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransportFailureError';
    }
}

export class AgentCardError extends GatewayError {
    readonly code = 'AGENT_CARD_ERROR';

    constructor(public readonly endpoint: string, reason: string) {
        super(`Failed to resolve agent card at ${endpoint}: ${reason}`);
        this.name = 'AgentCardError';
    }
}

export class PollLimitExceededError extends GatewayError {
    readonly code = 'POLL_LIMIT_EXCEEDED';

    constructor(public readonly polls: number) {
        super(`Task still not finished after ${polls} status polls`);
        this.name = 'PollLimitExceededError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
