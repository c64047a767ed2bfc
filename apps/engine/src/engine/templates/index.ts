import type { StepDescriptor } from '@proactive/sdk';
import { followUpEmailTemplate } from './follow-up-email';
import { genericTemplate } from './generic';
import { GeneratedWorkflow, TemplateOptions, TemplateRegistry } from './registry';
import { scheduleAppointmentTemplate } from './schedule-appointment';

export * from './registry';

export function createTemplateRegistry(): TemplateRegistry {
    const registry = new TemplateRegistry(genericTemplate);
    registry.register(scheduleAppointmentTemplate);
    registry.register(followUpEmailTemplate);
    return registry;
}

export const defaultTemplates = createTemplateRegistry();

export function generateWorkflow(
    workflowType: string,
    input: Record<string, unknown>,
    opts: Partial<TemplateOptions> = {},
    registry: TemplateRegistry = defaultTemplates,
): GeneratedWorkflow {
    return registry.resolve(workflowType).generate(workflowType, input, { now: opts.now ?? new Date() });
}

export function generateSteps(
    workflowType: string,
    input: Record<string, unknown>,
    opts: Partial<TemplateOptions> = {},
): StepDescriptor[] {
    return generateWorkflow(workflowType, input, opts).steps;
}
