import * as grpc from '@grpc/grpc-js';

interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'SERVING' | 'NOT_SERVING';

interface HealthCheckResponse {
    status: ServingStatus;
}

export interface HealthProbe {
    name: string;
    check(): Promise<unknown>;
}

/**
 * Standard gRPC health check service implementation.
 * Reports SERVING only while every dependency probe (Postgres, Redis) answers.
 */
export class HealthService {
    constructor(private readonly probes: HealthProbe[]) { }

    async status(): Promise<ServingStatus> {
        try {
            for (const probe of this.probes) {
                await probe.check();
            }
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    check(
        _call: grpc.ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: grpc.sendUnaryData<HealthCheckResponse>,
    ): void {
        this.status().then(
            (status) => callback(null, { status }),
            (err) => callback({ code: grpc.status.INTERNAL, details: String(err) }),
        );
    }

    watch(call: grpc.ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): void {
        this.status().then(
            (status) => {
                call.write({ status });
                call.end();
            },
            (err) => call.destroy(err instanceof Error ? err : new Error(String(err))),
        );
    }
}
