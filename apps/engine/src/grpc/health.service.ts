import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';

interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

interface HealthCheckResponse {
    status: ServingStatus;
}

export interface Pingable {
    ping(): Promise<unknown>;
}

/**
 * Standard gRPC health check.
 * Serving only while both Postgres and Redis answer.
 */
export class HealthService {
    constructor(
        private readonly db: { query(sql: string): Promise<unknown> },
        private readonly redis: Pingable,
    ) { }

    async status(): Promise<ServingStatus> {
        try {
            await this.db.query('SELECT 1');
            await this.redis.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: await this.status() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: await this.status() });
        call.end();
    }
}
