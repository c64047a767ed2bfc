import { Pool, QueryResult } from 'pg';
import { StepType, fromColumn, toColumn } from '@proactive/sdk';
import { WorkflowStepEntity, stepStatus } from '../db/workflow_step.entity';
import { StepStore } from './types';

interface StepRow {
    id: string;
    workflow_id: string;
    step_number: number;
    name: string;
    step_type: StepType;
    config: unknown;
    status: stepStatus;
    output_data: unknown;
    error_message: string | null;
    started_at: Date | null;
    completed_at: Date | null;
}

function toStep(row: StepRow): WorkflowStepEntity {
    return {
        ...row,
        config: fromColumn(row.config),
        output_data: fromColumn(row.output_data) ?? null,
    };
}

function first(res: QueryResult<StepRow>): WorkflowStepEntity | null {
    const row = res.rows[0];
    return row ? toStep(row) : null;
}

export class StepRepository implements StepStore {
    constructor(private readonly pool: Pool) { }

    async findByWorkflowId(workflowId: string): Promise<WorkflowStepEntity[]> {
        const res = await this.pool.query<StepRow>(
            'SELECT * FROM workflow_steps WHERE workflow_id = $1 ORDER BY step_number ASC',
            [workflowId],
        );
        return res.rows.map(toStep);
    }

    async markRunning(id: string): Promise<WorkflowStepEntity | null> {
        // A running row here was orphaned by a crashed pass; the caller holds the workflow lease
        return first(await this.pool.query<StepRow>(
            `UPDATE workflow_steps
             SET status = $2, started_at = NOW()
             WHERE id = $1 AND status = ANY($3)
             RETURNING *`,
            [id, stepStatus.RUNNING, [stepStatus.PENDING, stepStatus.RUNNING]],
        ));
    }

    async markCompleted(id: string, output: unknown): Promise<void> {
        await this.pool.query(
            `UPDATE workflow_steps
             SET status = $2, output_data = $3, completed_at = NOW()
             WHERE id = $1 AND status = $4`,
            [id, stepStatus.COMPLETED, toColumn(output), stepStatus.RUNNING],
        );
    }

    async markSuspended(id: string, output: unknown): Promise<void> {
        await this.pool.query(
            'UPDATE workflow_steps SET output_data = $2 WHERE id = $1 AND status = $3',
            [id, toColumn(output), stepStatus.RUNNING],
        );
    }

    async markFailed(id: string, message: string): Promise<void> {
        await this.pool.query(
            `UPDATE workflow_steps
             SET status = $2, error_message = $3, completed_at = NOW()
             WHERE id = $1 AND status = $4`,
            [id, stepStatus.FAILED, message, stepStatus.RUNNING],
        );
    }
}
