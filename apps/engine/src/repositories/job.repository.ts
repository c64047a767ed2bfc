import { Pool } from 'pg';
import { fromColumn, toColumn } from '@proactive/sdk';
import { EngineJobEntity, jobKind, jobStatus } from '../db/engine_job.entity';
import { toRecord } from '../engine/context';
import { EnqueueOptions, JobLifecycle, JobQueue, JobSource, ReapedJob, StaleJobRecovery } from './types';

interface JobRow extends Omit<EngineJobEntity, 'payload' | 'error'> {
    payload: unknown;
    error: unknown;
}

function toJob(row: JobRow): EngineJobEntity {
    return {
        ...row,
        payload: toRecord(fromColumn(row.payload)),
        error: row.error === null ? null : toRecord(row.error),
    };
}

type ReapedRow = Pick<EngineJobEntity, 'id' | 'kind' | 'workflow_id' | 'attempt'>;

function reaped(rows: ReapedRow[], action: ReapedJob['action']): ReapedJob[] {
    return rows.map((row) => ({ id: row.id, kind: row.kind, workflow_id: row.workflow_id, attempt: row.attempt, action }));
}

function errorToJson(error: unknown): Record<string, unknown> {
    return error instanceof Error
        ? { message: error.message, name: error.name, stack: error.stack }
        : { message: String(error) };
}

export class JobRepository implements JobQueue, JobSource, JobLifecycle, StaleJobRecovery {
    constructor(private readonly pool: Pool, private readonly defaultMaxRetries = 3) { }

    async enqueue(kind: jobKind, workflowId: string, opts: EnqueueOptions = {}): Promise<EngineJobEntity> {
        const res = await this.pool.query<JobRow>(
            `INSERT INTO engine_jobs (kind, workflow_id, payload, max_retries)
             VALUES ($1, $2, $3, $4)
             RETURNING *`,
            [kind, workflowId, toColumn(opts.payload ?? {}), opts.maxRetries ?? this.defaultMaxRetries],
        );
        const row = res.rows[0];
        if (!row) throw new Error(`Job ${kind} for ${workflowId} was not returned after insert`);
        return toJob(row);
    }

    async findById(id: string): Promise<EngineJobEntity | null> {
        const res = await this.pool.query<JobRow>('SELECT * FROM engine_jobs WHERE id = $1', [id]);
        const row = res.rows[0];
        return row ? toJob(row) : null;
    }

    async dequeue(batchSize: number, workerId: string): Promise<EngineJobEntity[]> {
        const query = `
            WITH next_jobs AS (
                SELECT id FROM engine_jobs
                WHERE status = $1 AND (scheduled_at <= NOW() OR scheduled_at IS NULL)
                ORDER BY created_at ASC
                LIMIT $2
                FOR UPDATE SKIP LOCKED
            )
            UPDATE engine_jobs
            SET
                status = $3,
                worker_id = $4,
                heartbeat_at = NOW(),
                attempt = attempt + 1,
                updated_at = NOW()
            FROM next_jobs
            WHERE engine_jobs.id = next_jobs.id
            RETURNING engine_jobs.*
        `;
        const res = await this.pool.query<JobRow>(query, [jobStatus.PENDING, batchSize, jobStatus.RUNNING, workerId]);
        return res.rows.map(toJob);
    }

    async updateHeartbeat(id: string): Promise<void> {
        await this.pool.query('UPDATE engine_jobs SET heartbeat_at = NOW() WHERE id = $1', [id]);
    }

    async complete(id: string): Promise<void> {
        await this.pool.query(
            'UPDATE engine_jobs SET status = $1, completed_at = NOW(), updated_at = NOW() WHERE id = $2',
            [jobStatus.COMPLETED, id],
        );
    }

    async fail(id: string, error: unknown): Promise<void> {
        await this.pool.query(
            'UPDATE engine_jobs SET status = $1, error = $2, completed_at = NOW(), updated_at = NOW() WHERE id = $3',
            [jobStatus.FAILED, JSON.stringify(errorToJson(error)), id],
        );
    }

    async scheduleRetry(id: string, delayMs: number, error: unknown): Promise<void> {
        const query = `
            UPDATE engine_jobs
            SET
                status = $1,
                scheduled_at = NOW() + ($2 || ' milliseconds')::INTERVAL,
                error = $3,
                heartbeat_at = NULL,
                worker_id = NULL,
                updated_at = NOW()
            WHERE id = $4
        `;

        await this.pool.query(query, [jobStatus.PENDING, delayMs, JSON.stringify(errorToJson(error)), id]);
    }

    // Same budget as JobRunner: attempt counts dequeues, so attempt <= max_retries may run again
    async requeueStale(staleSeconds: number): Promise<ReapedJob[]> {
        const requeued = await this.pool.query<ReapedRow>(
            `UPDATE engine_jobs
             SET status = $1, worker_id = NULL, heartbeat_at = NULL, scheduled_at = NULL, updated_at = NOW()
             WHERE status = $2
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
               AND attempt <= max_retries
             RETURNING id, kind, workflow_id, attempt`,
            [jobStatus.PENDING, jobStatus.RUNNING, staleSeconds],
        );

        const failed = await this.pool.query<ReapedRow>(
            `UPDATE engine_jobs
             SET status = $1,
                 error = jsonb_build_object('message', 'Job exceeded max retries after worker failure', 'code', 'MAX_RETRIES_EXCEEDED'),
                 completed_at = NOW(),
                 updated_at = NOW()
             WHERE status = $2
               AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
               AND attempt > max_retries
             RETURNING id, kind, workflow_id, attempt`,
            [jobStatus.FAILED, jobStatus.RUNNING, staleSeconds],
        );

        return [...reaped(requeued.rows, 'requeued'), ...reaped(failed.rows, 'failed')];
    }

    async purgeFinished(retentionDays: number): Promise<number> {
        const res = await this.pool.query(
            `DELETE FROM engine_jobs
             WHERE status = ANY($1) AND completed_at < NOW() - (INTERVAL '1 day' * $2)`,
            [[jobStatus.COMPLETED, jobStatus.FAILED], retentionDays],
        );
        return res.rowCount ?? 0;
    }
}
