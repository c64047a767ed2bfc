import { StepType } from '@proactive/sdk';

/**
 * Lifecycle states for individual workflow steps.
 * A step leaves PENDING once and never runs again after COMPLETED or FAILED.
 */
export enum stepStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    SKIPPED = 'skipped'
}

/** Error recorded on a suspended wait step when its workflow is cancelled. */
export const CANCELLED_WAIT_MESSAGE = 'cancelled while waiting for response';

/**
 * A single unit of work within a workflow, ordered by step_number.
 * `config` stays in its stored form here; executors validate it per step kind.
 */
export interface WorkflowStepEntity {
    id: string;
    workflow_id: string;
    step_number: number;  // 1-based, unique within workflow
    name: string;
    step_type: StepType;
    config: unknown;
    status: stepStatus;
    output_data: unknown;
    error_message: string | null;
    started_at: Date | null;
    completed_at: Date | null;
}
