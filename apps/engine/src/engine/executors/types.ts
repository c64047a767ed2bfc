import type { ContextRetrieval, DecisionEngine, ToolExecutionService } from '@proactive/sdk';
import type { WorkflowContext, WorkflowEntity } from '../../db/workflow.entity';
import type { WorkflowStepEntity } from '../../db/workflow_step.entity';

export interface EngineCollaborators {
    tools: ToolExecutionService;
    decisions: DecisionEngine;
    retrieval: ContextRetrieval;
}

export interface StepContext {
    workflow: WorkflowEntity;
    /** Completed steps before the current one, in step_number order. */
    priorSteps: WorkflowStepEntity[];
    services: EngineCollaborators;
    now: () => Date;
}

/**
 * Result of one step handler. Expected failures are values, not exceptions;
 * only a suspending outcome carries a deadline.
 */
export type StepOutcome =
    | { success: true; suspend: false; output: unknown; contextPatch?: WorkflowContext }
    | { success: true; suspend: true; output: unknown; timeoutAt: Date; contextPatch?: WorkflowContext }
    | { success: false; error: string };

export function failure(error: string): StepOutcome {
    return { success: false, error };
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
