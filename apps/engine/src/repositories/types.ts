import type { StepDescriptor } from '@proactive/sdk';
import type { NewWorkflow, WorkflowActivity, WorkflowContext, WorkflowEntity, workflowStatus } from '../db/workflow.entity';
import type { WorkflowStepEntity } from '../db/workflow_step.entity';
import type { EngineJobEntity, jobKind } from '../db/engine_job.entity';

export interface ListOptions {
    status?: workflowStatus;
    limit: number;
}

/**
 * Authoritative state of workflow rows. Every transition out of
 * pending/waiting is a compare-and-set; in-pass transitions are guarded
 * by the runner id that claimed the row.
 */
export interface WorkflowStore {
    createWithSteps(workflow: NewWorkflow, steps: StepDescriptor[]): Promise<WorkflowEntity>;
    findById(id: string): Promise<WorkflowEntity | null>;
    findForUser(id: string, userId: string): Promise<WorkflowEntity | null>;
    listForUser(userId: string, opts: ListOptions): Promise<WorkflowEntity[]>;

    /** pending → running; re-entry by the same runner; takeover of a stale lease. */
    claimForRun(id: string, runnerId: string, staleSeconds: number): Promise<WorkflowEntity | null>;
    /**
     * waiting → running under a row lock: folds the reply into the context
     * and completes the suspended wait step with the reply attached.
     * With `awaitingStep`, the claim is refused unless that step is the one
     * still suspended, so a reply cannot answer a later wait.
     */
    claimForResume(
        id: string,
        runnerId: string,
        responseData: Record<string, unknown>,
        receivedAt: Date,
        awaitingStep?: number,
    ): Promise<WorkflowEntity | null>;
    heartbeat(id: string, runnerId: string): Promise<void>;
    mergeContext(id: string, runnerId: string, patch: WorkflowContext): Promise<boolean>;
    markWaiting(id: string, runnerId: string, timeoutAt: Date): Promise<boolean>;
    markCompleted(id: string, runnerId: string): Promise<boolean>;
    markFailed(id: string, runnerId: string, message: string): Promise<boolean>;
    cancel(id: string, userId: string): Promise<WorkflowEntity | null>;

    remindExpired(extensionHours: number): Promise<WorkflowEntity[]>;
    failExpired(message: string): Promise<WorkflowEntity[]>;
    purgeTerminal(retentionDays: number): Promise<string[]>;
    activity(windowHours: number): Promise<WorkflowActivity>;
}

export interface StepStore {
    findByWorkflowId(workflowId: string): Promise<WorkflowStepEntity[]>;
    /** pending → running; also re-arms a running step orphaned by a crashed pass. */
    markRunning(id: string): Promise<WorkflowStepEntity | null>;
    markCompleted(id: string, output: unknown): Promise<void>;
    /** Records a wait step's deadline; the step stays running until the reply arrives. */
    markSuspended(id: string, output: unknown): Promise<void>;
    markFailed(id: string, message: string): Promise<void>;
}

export interface EnqueueOptions {
    payload?: Record<string, unknown>;
    maxRetries?: number;
}

export interface JobQueue {
    enqueue(kind: jobKind, workflowId: string, opts?: EnqueueOptions): Promise<EngineJobEntity>;
}

export interface JobSource {
    dequeue(batchSize: number, workerId: string): Promise<EngineJobEntity[]>;
}

/** What a worker does with a job it has dequeued. */
export interface JobLifecycle {
    updateHeartbeat(id: string): Promise<void>;
    complete(id: string): Promise<void>;
    fail(id: string, error: unknown): Promise<void>;
    scheduleRetry(id: string, delayMs: number, error: unknown): Promise<void>;
}

export interface ReapedJob {
    id: string;
    kind: jobKind;
    workflow_id: string;
    attempt: number;
    action: 'requeued' | 'failed';
}

/** Jobs left running by a worker that stopped heartbeating. */
export interface StaleJobRecovery {
    /** Back to pending while attempts remain, otherwise failed. */
    requeueStale(staleSeconds: number): Promise<ReapedJob[]>;
}
