import { v4 as uuid } from 'uuid';
import { z } from 'zod';

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    PORT: int(50051),
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
    WORKER_ID: z.string().min(1).optional(),
    POLL_BATCH_SIZE: int(10),
    MAX_QUEUE_SIZE: int(1000),
    MAX_EVENT_LOOP_LAG: int(100),
    HEARTBEAT_INTERVAL_MS: int(5000),
    RUNNER_STALE_SECONDS: int(300),
    JOB_REAPER_INTERVAL_MS: int(10_000),
    TIMEOUT_CHECK_INTERVAL_MS: int(300_000),
    REMINDER_EXTENSION_HOURS: int(24),
    RETENTION_DAYS: int(30),
    RETENTION_INTERVAL_MS: int(3_600_000),
    METRICS_INTERVAL_MS: int(300_000),
    METRICS_WINDOW_HOURS: int(24),
    MAX_STEPS_PER_PASS: int(100),
    JOB_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    LEADER_TTL_SECONDS: int(30),
    TOOLS_URL: z.string().url().default('http://localhost:8001'),
    DECISION_URL: z.string().url().default('http://localhost:8002'),
    CONTEXT_URL: z.string().url().default('http://localhost:8003'),
});

export interface EngineConfig {
    port: number;
    databaseUrl: string;
    redisUrl: string;
    workerId: string;
    pollBatchSize: number;
    maxQueueSize: number;
    maxEventLoopLag: number;
    heartbeatIntervalMs: number;
    runnerStaleSeconds: number;
    jobReaperIntervalMs: number;
    timeoutCheckIntervalMs: number;
    reminderExtensionHours: number;
    retentionDays: number;
    retentionIntervalMs: number;
    metricsIntervalMs: number;
    metricsWindowHours: number;
    maxStepsPerPass: number;
    jobMaxRetries: number;
    leaderTtlSeconds: number;
    toolsUrl: string;
    decisionUrl: string;
    contextUrl: string;
}

// Empty strings count as unset so `FOO=` in .env falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value;
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid environment: ${issues}`);
    }
    const e = parsed.data;

    return {
        port: e.PORT,
        databaseUrl: e.DATABASE_URL,
        redisUrl: e.REDIS_URL,
        workerId: e.WORKER_ID ?? `worker-${uuid().slice(0, 8)}`,
        pollBatchSize: e.POLL_BATCH_SIZE,
        maxQueueSize: e.MAX_QUEUE_SIZE,
        maxEventLoopLag: e.MAX_EVENT_LOOP_LAG,
        heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
        runnerStaleSeconds: e.RUNNER_STALE_SECONDS,
        jobReaperIntervalMs: e.JOB_REAPER_INTERVAL_MS,
        timeoutCheckIntervalMs: e.TIMEOUT_CHECK_INTERVAL_MS,
        reminderExtensionHours: e.REMINDER_EXTENSION_HOURS,
        retentionDays: e.RETENTION_DAYS,
        retentionIntervalMs: e.RETENTION_INTERVAL_MS,
        metricsIntervalMs: e.METRICS_INTERVAL_MS,
        metricsWindowHours: e.METRICS_WINDOW_HOURS,
        maxStepsPerPass: e.MAX_STEPS_PER_PASS,
        jobMaxRetries: e.JOB_MAX_RETRIES,
        leaderTtlSeconds: e.LEADER_TTL_SECONDS,
        toolsUrl: e.TOOLS_URL,
        decisionUrl: e.DECISION_URL,
        contextUrl: e.CONTEXT_URL,
    };
}
