import { Pool, QueryResult } from 'pg';
import { StepDescriptor, fromColumn, toColumn } from '@proactive/sdk';
import {
    NewWorkflow,
    TERMINAL_STATUSES,
    WorkflowActivity,
    WorkflowContext,
    WorkflowEntity,
    emptyStatusCounts,
    workflowStatus,
} from '../db/workflow.entity';
import { TransactionManager } from '../db/transaction.manager';
import { CONTEXT_KEY, mergeContext, mergeExternalResponse, toRecord } from '../engine/context';
import { CANCELLED_WAIT_MESSAGE, stepStatus } from '../db/workflow_step.entity';
import { ListOptions, WorkflowStore } from './types';

interface WorkflowRow {
    id: string;
    user_id: string;
    workflow_type: string;
    name: string;
    description: string | null;
    status: workflowStatus;
    input_data: unknown;
    context: unknown;
    timeout_at: Date | null;
    retry_count: number;
    max_retries: number;
    error_message: string | null;
    runner_id: string | null;
    heartbeat_at: Date | null;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}

function toWorkflow(row: WorkflowRow): WorkflowEntity {
    return {
        ...row,
        input_data: toRecord(fromColumn(row.input_data)),
        context: toRecord(fromColumn(row.context)),
    };
}

function first(res: QueryResult<WorkflowRow>): WorkflowEntity | null {
    const row = res.rows[0];
    return row ? toWorkflow(row) : null;
}

function changed(res: QueryResult): boolean {
    return (res.rowCount ?? 0) > 0;
}

export class WorkflowRepository implements WorkflowStore {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: Pool) {
        this.tx = new TransactionManager(pool);
    }

    async createWithSteps(workflow: NewWorkflow, steps: StepDescriptor[]): Promise<WorkflowEntity> {
        return this.tx.run(async (client) => {
            const res = await client.query<WorkflowRow>(
                `INSERT INTO workflows (id, user_id, workflow_type, name, description, input_data, context, max_retries)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                 RETURNING *`,
                [
                    workflow.id,
                    workflow.user_id,
                    workflow.workflow_type,
                    workflow.name,
                    workflow.description,
                    toColumn(workflow.input_data),
                    toColumn({}),
                    workflow.max_retries ?? 2,
                ],
            );

            for (const step of steps) {
                await client.query(
                    `INSERT INTO workflow_steps (workflow_id, step_number, name, step_type, config)
                     VALUES ($1, $2, $3, $4, $5)`,
                    [workflow.id, step.step_number, step.name, step.step_type, toColumn(step.config)],
                );
            }

            const created = first(res);
            if (!created) throw new Error(`Workflow ${workflow.id} was not returned after insert`);
            return created;
        });
    }

    async findById(id: string): Promise<WorkflowEntity | null> {
        return first(await this.pool.query<WorkflowRow>('SELECT * FROM workflows WHERE id = $1', [id]));
    }

    async findForUser(id: string, userId: string): Promise<WorkflowEntity | null> {
        return first(await this.pool.query<WorkflowRow>(
            'SELECT * FROM workflows WHERE id = $1 AND user_id = $2',
            [id, userId],
        ));
    }

    async listForUser(userId: string, opts: ListOptions): Promise<WorkflowEntity[]> {
        const res = opts.status
            ? await this.pool.query<WorkflowRow>(
                'SELECT * FROM workflows WHERE user_id = $1 AND status = $2 ORDER BY created_at DESC LIMIT $3',
                [userId, opts.status, opts.limit],
            )
            : await this.pool.query<WorkflowRow>(
                'SELECT * FROM workflows WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2',
                [userId, opts.limit],
            );
        return res.rows.map(toWorkflow);
    }

    async claimForRun(id: string, runnerId: string, staleSeconds: number): Promise<WorkflowEntity | null> {
        // Single statement: a concurrent claimer re-evaluates the WHERE after the row lock and loses
        const res = await this.pool.query<WorkflowRow>(
            `UPDATE workflows
             SET status = $2, runner_id = $3, heartbeat_at = NOW(), updated_at = NOW()
             WHERE id = $1
               AND (status = $4
                    OR (status = $2 AND (runner_id = $3 OR heartbeat_at IS NULL
                                         OR heartbeat_at < NOW() - (INTERVAL '1 second' * $5))))
             RETURNING *`,
            [id, workflowStatus.RUNNING, runnerId, workflowStatus.PENDING, staleSeconds],
        );
        return first(res);
    }

    async claimForResume(
        id: string,
        runnerId: string,
        responseData: Record<string, unknown>,
        receivedAt: Date,
        awaitingStep?: number,
    ): Promise<WorkflowEntity | null> {
        return this.tx.run(async (client) => {
            const locked = first(await client.query<WorkflowRow>(
                'SELECT * FROM workflows WHERE id = $1 FOR UPDATE',
                [id],
            ));
            if (!locked || locked.status !== workflowStatus.WAITING) return null;

            const suspended = await client.query<{ id: string; step_number: number; output_data: unknown }>(
                'SELECT id, step_number, output_data FROM workflow_steps WHERE workflow_id = $1 AND status = $2 FOR UPDATE',
                [id, stepStatus.RUNNING],
            );
            if (awaitingStep !== undefined && !suspended.rows.some((step) => step.step_number === awaitingStep)) {
                return null;
            }

            const context = mergeExternalResponse(locked.context, responseData, receivedAt);
            for (const step of suspended.rows) {
                const output = { ...toRecord(fromColumn(step.output_data)), response: context[CONTEXT_KEY.externalResponse] };
                await client.query(
                    'UPDATE workflow_steps SET status = $2, output_data = $3, completed_at = NOW() WHERE id = $1',
                    [step.id, stepStatus.COMPLETED, toColumn(output)],
                );
            }

            return first(await client.query<WorkflowRow>(
                `UPDATE workflows
                 SET status = $2, runner_id = $3, heartbeat_at = NOW(), timeout_at = NULL,
                     context = $4, updated_at = NOW()
                 WHERE id = $1
                 RETURNING *`,
                [id, workflowStatus.RUNNING, runnerId, toColumn(context)],
            ));
        });
    }

    async heartbeat(id: string, runnerId: string): Promise<void> {
        await this.pool.query(
            'UPDATE workflows SET heartbeat_at = NOW() WHERE id = $1 AND runner_id = $2 AND status = $3',
            [id, runnerId, workflowStatus.RUNNING],
        );
    }

    async mergeContext(id: string, runnerId: string, patch: WorkflowContext): Promise<boolean> {
        return this.tx.run(async (client) => {
            const locked = first(await client.query<WorkflowRow>(
                'SELECT * FROM workflows WHERE id = $1 AND runner_id = $2 AND status = $3 FOR UPDATE',
                [id, runnerId, workflowStatus.RUNNING],
            ));
            if (!locked) return false;

            await client.query(
                'UPDATE workflows SET context = $2, updated_at = NOW() WHERE id = $1',
                [id, toColumn(mergeContext(locked.context, patch))],
            );
            return true;
        });
    }

    async markWaiting(id: string, runnerId: string, timeoutAt: Date): Promise<boolean> {
        return changed(await this.pool.query(
            `UPDATE workflows
             SET status = $3, timeout_at = $4, runner_id = NULL, heartbeat_at = NULL, updated_at = NOW()
             WHERE id = $1 AND runner_id = $2 AND status = $5`,
            [id, runnerId, workflowStatus.WAITING, timeoutAt, workflowStatus.RUNNING],
        ));
    }

    async markCompleted(id: string, runnerId: string): Promise<boolean> {
        return changed(await this.pool.query(
            `UPDATE workflows
             SET status = $3, completed_at = NOW(), runner_id = NULL, heartbeat_at = NULL, updated_at = NOW()
             WHERE id = $1 AND runner_id = $2 AND status = $4`,
            [id, runnerId, workflowStatus.COMPLETED, workflowStatus.RUNNING],
        ));
    }

    async markFailed(id: string, runnerId: string, message: string): Promise<boolean> {
        return changed(await this.pool.query(
            `UPDATE workflows
             SET status = $3, error_message = $4, completed_at = NOW(), runner_id = NULL, heartbeat_at = NULL, updated_at = NOW()
             WHERE id = $1 AND runner_id = $2 AND status = $5`,
            [id, runnerId, workflowStatus.FAILED, message, workflowStatus.RUNNING],
        ));
    }

    // A suspended wait step is settled with its workflow; a step a live pass is executing is left to that pass
    async cancel(id: string, userId: string): Promise<WorkflowEntity | null> {
        return this.tx.run(async (client) => {
            const locked = first(await client.query<WorkflowRow>(
                'SELECT * FROM workflows WHERE id = $1 AND user_id = $2 FOR UPDATE',
                [id, userId],
            ));
            if (!locked || TERMINAL_STATUSES.includes(locked.status)) return null;

            if (locked.status === workflowStatus.WAITING) {
                await client.query(
                    `UPDATE workflow_steps SET status = $3, error_message = $4, completed_at = NOW()
                     WHERE workflow_id = $1 AND status = $2`,
                    [id, stepStatus.RUNNING, stepStatus.FAILED, CANCELLED_WAIT_MESSAGE],
                );
            }

            return first(await client.query<WorkflowRow>(
                `UPDATE workflows
                 SET status = $2, completed_at = NOW(), timeout_at = NULL, runner_id = NULL, heartbeat_at = NULL, updated_at = NOW()
                 WHERE id = $1
                 RETURNING *`,
                [id, workflowStatus.CANCELLED],
            ));
        });
    }

    async remindExpired(extensionHours: number): Promise<WorkflowEntity[]> {
        const res = await this.pool.query<WorkflowRow>(
            `UPDATE workflows
             SET retry_count = retry_count + 1,
                 timeout_at = NOW() + (INTERVAL '1 hour' * $2),
                 updated_at = NOW()
             WHERE id IN (
                 SELECT id FROM workflows
                 WHERE status = $1 AND timeout_at < NOW() AND retry_count < max_retries
                 FOR UPDATE SKIP LOCKED
             )
             RETURNING *`,
            [workflowStatus.WAITING, extensionHours],
        );
        return res.rows.map(toWorkflow);
    }

    async failExpired(message: string): Promise<WorkflowEntity[]> {
        return this.tx.run(async (client) => {
            const res = await client.query<WorkflowRow>(
                `UPDATE workflows
                 SET status = $2, error_message = $3, completed_at = NOW(), timeout_at = NULL, updated_at = NOW()
                 WHERE id IN (
                     SELECT id FROM workflows
                     WHERE status = $1 AND timeout_at < NOW() AND retry_count >= max_retries
                     FOR UPDATE SKIP LOCKED
                 )
                 RETURNING *`,
                [workflowStatus.WAITING, workflowStatus.FAILED, message],
            );
            const ids = res.rows.map((row) => row.id);
            if (ids.length > 0) {
                // Only the suspended wait step is running under a waiting workflow
                await client.query(
                    `UPDATE workflow_steps SET status = $3, error_message = $4, completed_at = NOW()
                     WHERE workflow_id = ANY($1) AND status = $2`,
                    [ids, stepStatus.RUNNING, stepStatus.FAILED, message],
                );
            }
            return res.rows.map(toWorkflow);
        });
    }

    async purgeTerminal(retentionDays: number): Promise<string[]> {
        return this.tx.run(async (client) => {
            const res = await client.query<{ id: string }>(
                `SELECT id FROM workflows
                 WHERE status = ANY($1) AND completed_at < NOW() - (INTERVAL '1 day' * $2)
                 FOR UPDATE SKIP LOCKED`,
                [TERMINAL_STATUSES, retentionDays],
            );
            const ids = res.rows.map((row) => row.id);
            if (ids.length === 0) return [];

            await client.query('DELETE FROM workflow_steps WHERE workflow_id = ANY($1)', [ids]);
            await client.query('DELETE FROM workflows WHERE id = ANY($1)', [ids]);
            return ids;
        });
    }

    async activity(windowHours: number): Promise<WorkflowActivity> {
        // COUNT(*) is bigint; pg hands it back as a string
        const grouped = await this.pool.query<{ status: workflowStatus; count: string }>(
            'SELECT status, COUNT(*) AS count FROM workflows GROUP BY status',
        );
        const recent = await this.pool.query<{ created: string; completed: string }>(
            `SELECT
                 COUNT(*) FILTER (WHERE created_at >= NOW() - (INTERVAL '1 hour' * $1)) AS created,
                 COUNT(*) FILTER (WHERE status = $2 AND completed_at >= NOW() - (INTERVAL '1 hour' * $1)) AS completed
             FROM workflows`,
            [windowHours, workflowStatus.COMPLETED],
        );

        const byStatus = emptyStatusCounts();
        for (const row of grouped.rows) byStatus[row.status] = Number(row.count);

        return {
            by_status: byStatus,
            created_recent: Number(recent.rows[0]?.created ?? 0),
            completed_recent: Number(recent.rows[0]?.completed ?? 0),
            window_hours: windowHours,
        };
    }
}
