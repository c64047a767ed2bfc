import type { StepScope } from '../context';
import type { StepContext } from './types';

export function buildScope(ctx: StepContext): StepScope {
    const steps: Record<number, unknown> = {};
    for (const step of ctx.priorSteps) {
        steps[step.step_number] = step.output_data;
    }
    return { input: ctx.workflow.input_data, context: ctx.workflow.context, steps };
}
