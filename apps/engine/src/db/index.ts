import Redis from 'ioredis';
import { Pool } from 'pg';

/**
 * Shared pool for the repositories and the health check.
 * Sized for one engine process: the poller's batch plus the gRPC handlers.
 */
export function createPool(databaseUrl: string): Pool {
    return new Pool({
        connectionString: databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Only the periodic jobs' leader locks live in Redis. */
export function createRedis(redisUrl: string): Redis {
    return new Redis(redisUrl);
}
