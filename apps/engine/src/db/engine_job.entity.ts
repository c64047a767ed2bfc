/**
 * Lifecycle states for dispatcher jobs.
 * Jobs progress: PENDING → RUNNING → COMPLETED/FAILED, or back to PENDING on retry.
 */
export enum jobStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed'
}

export enum jobKind {
    RUN_WORKFLOW = 'run_workflow',
    RESUME_WORKFLOW = 'resume_workflow',
    SEND_REMINDER = 'send_reminder'
}

/**
 * A unit of work for the worker pool: one driver pass or one reminder.
 * Retries of a job replay the whole pass; committed steps are never re-run.
 */
export interface EngineJobEntity {
    id: string;
    kind: jobKind;
    workflow_id: string;
    payload: Record<string, unknown>;
    status: jobStatus;
    scheduled_at: Date | null;
    worker_id: string | null;
    heartbeat_at: Date | null;  // For dead worker detection
    attempt: number;
    max_retries: number;
    error: Record<string, unknown> | null;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}
