import type { WorkflowEntity } from '../db/workflow.entity';
import type { WorkflowStepEntity } from '../db/workflow_step.entity';

export function userRequest(workflow: WorkflowEntity): string {
    const request = workflow.input_data.user_request;
    return typeof request === 'string' && request.length > 0 ? request : workflow.name;
}

/**
 * Prompt for an ai_decision step: the instruction, the original request,
 * then every completed step's output in order.
 */
export function buildDecisionPrompt(
    instruction: string,
    request: string,
    priorSteps: WorkflowStepEntity[],
): string {
    const lines = [instruction, '', 'Original request:', request, '', 'Results of previous steps:'];
    if (priorSteps.length === 0) {
        lines.push('(none)');
    }
    for (const step of priorSteps) {
        lines.push(`Step ${step.step_number} (${step.name}): ${JSON.stringify(step.output_data ?? null)}`);
    }
    return lines.join('\n');
}
