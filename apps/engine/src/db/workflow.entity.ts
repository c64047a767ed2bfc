/**
 * Lifecycle states for workflow instances.
 * PENDING → RUNNING → WAITING/COMPLETED/FAILED; WAITING → RUNNING on resume.
 * CANCELLED is reachable from any non-terminal state.
 */
export enum workflowStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    WAITING = 'waiting',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export const TERMINAL_STATUSES: readonly workflowStatus[] = [
    workflowStatus.COMPLETED,
    workflowStatus.FAILED,
    workflowStatus.CANCELLED,
];

export function isTerminal(status: workflowStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export type WorkflowContext = Record<string, unknown>;

export type StatusCounts = Record<workflowStatus, number>;

export function emptyStatusCounts(): StatusCounts {
    return {
        [workflowStatus.PENDING]: 0,
        [workflowStatus.RUNNING]: 0,
        [workflowStatus.WAITING]: 0,
        [workflowStatus.COMPLETED]: 0,
        [workflowStatus.FAILED]: 0,
        [workflowStatus.CANCELLED]: 0,
    };
}

/** Row counts per status plus what was created and completed in the last `window_hours`. */
export interface WorkflowActivity {
    by_status: StatusCounts;
    created_recent: number;
    completed_recent: number;
    window_hours: number;
}

/**
 * One durable execution of a template for one user.
 * Payload columns are decoded from their stored superjson form.
 */
export interface WorkflowEntity {
    id: string;
    user_id: string;
    workflow_type: string;
    name: string;
    description: string | null;
    status: workflowStatus;
    input_data: Record<string, unknown>;  // Immutable snapshot
    context: WorkflowContext;             // Grows during execution
    timeout_at: Date | null;              // Set only while waiting
    retry_count: number;
    max_retries: number;
    error_message: string | null;
    runner_id: string | null;             // Lease of the active driver pass
    heartbeat_at: Date | null;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}

export interface NewWorkflow {
    id: string;
    user_id: string;
    workflow_type: string;
    name: string;
    description: string | null;
    input_data: Record<string, unknown>;
    max_retries?: number;
}
