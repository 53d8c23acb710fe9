import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';

interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Reports SERVING once the gateway has restored its snapshot.
 */
export class HealthService {
    constructor(private readonly isReady: () => boolean) { }

    check(
        _call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: this.currentStatus() });
    }

    watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: this.currentStatus() });
        call.end();
    }

    private currentStatus(): ServingStatus {
        return this.isReady() ? 'SERVING' : 'NOT_SERVING';
    }
}
