import { jobKind } from '../db/engine_job.entity';
import { DriverResult, ExecutionDriver, newRunnerId } from '../engine/driver';
import type { JobQueue } from '../repositories/types';

export type DispatchReceipt =
    | { queued: true; jobId: string }
    | { queued: false; result: DriverResult };

/** Hands driver passes to whatever runs them. */
export interface TaskDispatcher {
    dispatchRun(workflowId: string): Promise<DispatchReceipt>;
    /** `awaitingStep` pins the reply to the wait step it answers. */
    dispatchResume(workflowId: string, responseData: Record<string, unknown>, awaitingStep?: number): Promise<DispatchReceipt>;
}

/** Enqueues engine jobs; workers pick them up with SKIP LOCKED and retry with backoff. */
export class QueueDispatcher implements TaskDispatcher {
    constructor(private readonly jobs: JobQueue) { }

    async dispatchRun(workflowId: string): Promise<DispatchReceipt> {
        const job = await this.jobs.enqueue(jobKind.RUN_WORKFLOW, workflowId);
        return { queued: true, jobId: job.id };
    }

    async dispatchResume(workflowId: string, responseData: Record<string, unknown>, awaitingStep?: number): Promise<DispatchReceipt> {
        const payload: Record<string, unknown> = { response_data: responseData };
        if (awaitingStep !== undefined) payload.awaiting_step = awaitingStep;
        const job = await this.jobs.enqueue(jobKind.RESUME_WORKFLOW, workflowId, { payload });
        return { queued: true, jobId: job.id };
    }
}

/** Runs the pass in the caller. Used by tests and single-process setups. */
export class InlineDispatcher implements TaskDispatcher {
    constructor(private readonly driver: ExecutionDriver) { }

    async dispatchRun(workflowId: string): Promise<DispatchReceipt> {
        return { queued: false, result: await this.driver.runWorkflow(workflowId) };
    }

    async dispatchResume(workflowId: string, responseData: Record<string, unknown>, awaitingStep?: number): Promise<DispatchReceipt> {
        return { queued: false, result: await this.driver.resumeWorkflow(workflowId, responseData, newRunnerId(), awaitingStep) };
    }
}
