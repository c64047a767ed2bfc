import { v7 as uuidv7 } from 'uuid';
import { WorkflowEntity, workflowStatus } from '../db/workflow.entity';
import { WorkflowStepEntity, stepStatus } from '../db/workflow_step.entity';
import type { StepStore, WorkflowStore } from '../repositories/types';
import { EngineCollaborators, executeStep } from './executors';

const TAG = '[driver]';

export interface DriverOptions {
    /** Seconds after which a running row's lease may be taken over. */
    staleSeconds: number;
    maxStepsPerPass: number;
    now: () => Date;
}

export interface DriverResult {
    workflowId: string;
    status: workflowStatus | null;
    stepsExecuted: number;
    noop: boolean;
}

const DEFAULTS: DriverOptions = {
    staleSeconds: 300,
    maxStepsPerPass: 100,
    now: () => new Date(),
};

export function newRunnerId(): string {
    return `pass-${uuidv7()}`;
}

function isRunnable(step: WorkflowStepEntity): boolean {
    return step.status === stepStatus.PENDING || step.status === stepStatus.RUNNING;
}

/**
 * Advances a workflow through its steps until it suspends, completes,
 * fails or is taken away from this pass. Each call is one "pass";
 * exclusivity comes from the claim in the store, not from this class.
 */
export class ExecutionDriver {
    private readonly opts: DriverOptions;

    constructor(
        private readonly workflows: WorkflowStore,
        private readonly steps: StepStore,
        private readonly services: EngineCollaborators,
        opts: Partial<DriverOptions> = {},
    ) {
        this.opts = { ...DEFAULTS, ...opts };
    }

    async runWorkflow(workflowId: string, runnerId = newRunnerId()): Promise<DriverResult> {
        const claimed = await this.workflows.claimForRun(workflowId, runnerId, this.opts.staleSeconds);
        if (!claimed) return this.noop(workflowId, 'run');

        console.log(`${TAG} ${workflowId} claimed by ${runnerId}`);
        return this.drive(claimed, runnerId);
    }

    async resumeWorkflow(
        workflowId: string,
        responseData: Record<string, unknown>,
        runnerId = newRunnerId(),
        awaitingStep?: number,
    ): Promise<DriverResult> {
        const claimed = await this.workflows.claimForResume(workflowId, runnerId, responseData, this.opts.now(), awaitingStep);
        if (!claimed) return this.noop(workflowId, 'resume');

        console.log(`${TAG} ${workflowId} resumed by ${runnerId}`);
        return this.drive(claimed, runnerId);
    }

    private async noop(workflowId: string, trigger: 'run' | 'resume'): Promise<DriverResult> {
        const current = await this.workflows.findById(workflowId);
        console.warn(`${TAG} ${trigger} of ${workflowId} skipped (status: ${current?.status ?? 'missing'})`);
        return { workflowId, status: current?.status ?? null, stepsExecuted: 0, noop: true };
    }

    private async drive(claimed: WorkflowEntity, runnerId: string): Promise<DriverResult> {
        const id = claimed.id;
        let executed = 0;
        const result = (status: workflowStatus | null): DriverResult =>
            ({ workflowId: id, status, stepsExecuted: executed, noop: false });

        for (;;) {
            // Re-read every iteration: cancellation or a lease takeover ends the pass.
            const workflow = await this.workflows.findById(id);
            if (!workflow || workflow.status !== workflowStatus.RUNNING || workflow.runner_id !== runnerId) {
                console.log(`${TAG} ${id} left the pass (status: ${workflow?.status ?? 'missing'})`);
                return result(workflow?.status ?? null);
            }

            const all = await this.steps.findByWorkflowId(id);
            const next = all.find(isRunnable);

            if (!next) {
                if (!(await this.workflows.markCompleted(id, runnerId))) return this.afterLostLease(id, executed);
                console.log(`${TAG} ${id} completed after ${executed} steps this pass`);
                return result(workflowStatus.COMPLETED);
            }

            if (executed >= this.opts.maxStepsPerPass) {
                const message = `exceeded ${this.opts.maxStepsPerPass} steps in one pass`;
                if (!(await this.workflows.markFailed(id, runnerId, message))) return this.afterLostLease(id, executed);
                console.error(`${TAG} ${id} failed: ${message}`);
                return result(workflowStatus.FAILED);
            }

            const step = await this.steps.markRunning(next.id);
            if (!step) {
                console.warn(`${TAG} ${id} step ${next.step_number} was taken by another pass`);
                return result(workflow.status);
            }

            const outcome = await executeStep(step, {
                workflow,
                priorSteps: all.filter((s) => s.status === stepStatus.COMPLETED),
                services: this.services,
                now: this.opts.now,
            });
            executed++;

            if (!outcome.success) {
                await this.steps.markFailed(step.id, outcome.error);
                if (!(await this.workflows.markFailed(id, runnerId, outcome.error))) return this.afterLostLease(id, executed);
                console.error(`${TAG} ${id} step ${step.step_number} (${step.step_type}) failed: ${outcome.error}`);
                return result(workflowStatus.FAILED);
            }

            // A suspending step stays running; the resume claim completes it.
            if (outcome.suspend) {
                await this.steps.markSuspended(step.id, outcome.output);
            } else {
                await this.steps.markCompleted(step.id, outcome.output);
            }
            if (outcome.contextPatch && Object.keys(outcome.contextPatch).length > 0) {
                await this.workflows.mergeContext(id, runnerId, outcome.contextPatch);
            }

            if (outcome.suspend) {
                const parked = await this.workflows.markWaiting(id, runnerId, outcome.timeoutAt);
                if (!parked) return this.afterLostLease(id, executed);
                console.log(`${TAG} ${id} waiting after step ${step.step_number} until ${outcome.timeoutAt.toISOString()}`);
                return result(workflowStatus.WAITING);
            }
        }
    }

    private async afterLostLease(id: string, executed: number): Promise<DriverResult> {
        const current = await this.workflows.findById(id);
        console.warn(`${TAG} ${id} lease lost before the transition (status: ${current?.status ?? 'missing'})`);
        return { workflowId: id, status: current?.status ?? null, stepsExecuted: executed, noop: false };
    }
}
