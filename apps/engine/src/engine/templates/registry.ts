import { StepDescriptor, StepDescriptorInput, stepDescriptorSchema } from '@proactive/sdk';
import { z } from 'zod';
import { TemplateInputError } from '../../errors';

export interface TemplateOptions {
    /** Reference time for any absolute window a template computes. */
    now: Date;
}

export interface GeneratedWorkflow {
    name: string;
    /** Caller input with `user_request` filled in. */
    input: Record<string, unknown>;
    steps: StepDescriptor[];
}

export interface TemplateDefinition<S extends z.ZodTypeAny> {
    name: string;
    description: string;
    input: S;
    title(input: z.infer<S>, workflowType: string): string;
    request(input: z.infer<S>, workflowType: string): string;
    steps(input: z.infer<S>, opts: TemplateOptions): StepDescriptorInput[];
}

export interface WorkflowTemplate {
    name: string;
    description: string;
    generate(workflowType: string, input: Record<string, unknown>, opts: TemplateOptions): GeneratedWorkflow;
}

const stepsSchema = z.array(stepDescriptorSchema).min(1);

export function defineTemplate<S extends z.ZodTypeAny>(def: TemplateDefinition<S>): WorkflowTemplate {
    return {
        name: def.name,
        description: def.description,
        generate(workflowType, rawInput, opts) {
            const parsed = def.input.safeParse(rawInput);
            if (!parsed.success) {
                throw new TemplateInputError(
                    workflowType,
                    parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
                );
            }

            const data: z.infer<S> = parsed.data;
            const steps = stepsSchema.parse(def.steps(data, opts));
            steps.forEach((step, idx) => {
                if (step.step_number !== idx + 1) {
                    throw new Error(`Template ${def.name} emitted step ${step.step_number} at position ${idx + 1}`);
                }
            });

            const userRequest = typeof rawInput.user_request === 'string' && rawInput.user_request.length > 0
                ? rawInput.user_request
                : def.request(data, workflowType);

            return {
                name: def.title(data, workflowType),
                input: { ...rawInput, user_request: userRequest },
                steps,
            };
        },
    };
}

export class TemplateRegistry {
    private templates = new Map<string, WorkflowTemplate>();
    private static readonly NAME_PATTERN = /^[a-z0-9_]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    constructor(private readonly fallback: WorkflowTemplate) {}

    register(template: WorkflowTemplate): WorkflowTemplate {
        const { name } = template;
        if (!name || name.length === 0) {
            throw new Error('Template name cannot be empty');
        }
        if (name.length > TemplateRegistry.MAX_NAME_LENGTH) {
            throw new Error(`Template name exceeds maximum length of ${TemplateRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!TemplateRegistry.NAME_PATTERN.test(name)) {
            throw new Error('Template name must contain only lowercase letters, digits, and underscores');
        }
        if (this.templates.has(name)) {
            throw new Error(`Template "${name}" is already registered.`);
        }
        this.templates.set(name, template);
        return template;
    }

    get(name: string): WorkflowTemplate | undefined {
        return this.templates.get(name);
    }

    /** Registered template, or the generic one for unknown types. */
    resolve(name: string): WorkflowTemplate {
        return this.templates.get(name) ?? this.fallback;
    }

    list(): string[] {
        return Array.from(this.templates.keys());
    }
}
