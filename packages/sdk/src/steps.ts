import { z } from 'zod';

/**
 * The closed set of step kinds a workflow template can emit.
 * Each kind has exactly one config schema and one executor.
 */
export const STEP_TYPE = {
    TOOL_CALL: 'tool_call',
    AI_DECISION: 'ai_decision',
    WAIT_FOR_RESPONSE: 'wait_for_response',
    SEND_EMAIL: 'send_email',
    SCHEDULE_MEETING: 'schedule_meeting',
} as const;

export type StepType = (typeof STEP_TYPE)[keyof typeof STEP_TYPE];

/** Tool names bound to the convenience step kinds. */
export const FIXED_TOOL = {
    send_email: 'send_email',
    schedule_meeting: 'create_calendar_event',
} as const;

const argumentsSchema = z.record(z.unknown());

/**
 * Copies a value out of a tool result into the workflow context.
 * `from` is a dot path inside the tool's `result`; `tool` narrows which
 * tool call to read when a step makes several (ai_decision).
 */
export const captureSchema = z.object({
    from: z.string().min(1),
    as: z.string().min(1),
    tool: z.string().min(1).optional(),
});

export type Capture = z.infer<typeof captureSchema>;

export const conditionSchema = z.object({
    path: z.string().min(1),
    op: z.enum(['equals', 'not_equals', 'exists']),
    value: z.unknown().optional(),
});

export type Condition = z.infer<typeof conditionSchema>;

export const toolCallConfigSchema = z.object({
    tool_name: z.string().min(1),
    arguments: argumentsSchema.default({}),
    capture: z.array(captureSchema).default([]),
});

export const aiDecisionConfigSchema = z.object({
    instruction: z.string().min(1),
    allow_tools: z.boolean().default(true),
    capture: z.array(captureSchema).default([]),
});

export const waitForResponseConfigSchema = z.object({
    timeout_hours: z.number().positive(),
    waiting_for: z.string().min(1).default('email_response'),
    expected_responses: z.array(z.string().min(1)).min(1),
    condition: conditionSchema.optional(),
});

export const sendEmailConfigSchema = z.object({
    arguments: z.object({
        to: z.string().min(1),
        subject: z.string().min(1),
        body: z.string().min(1),
    }).catchall(z.unknown()),
});

export const scheduleMeetingConfigSchema = z.object({
    arguments: z.object({
        title: z.string().min(1),
        start_datetime: z.string().min(1),
        end_datetime: z.string().min(1),
    }).catchall(z.unknown()),
    capture: z.array(captureSchema).default([]),
});

export type ToolCallConfig = z.infer<typeof toolCallConfigSchema>;
export type AiDecisionConfig = z.infer<typeof aiDecisionConfigSchema>;
export type WaitForResponseConfig = z.infer<typeof waitForResponseConfigSchema>;
export type SendEmailConfig = z.infer<typeof sendEmailConfigSchema>;
export type ScheduleMeetingConfig = z.infer<typeof scheduleMeetingConfigSchema>;

const base = {
    step_number: z.number().int().positive(),
    name: z.string().min(1),
};

export const stepDescriptorSchema = z.discriminatedUnion('step_type', [
    z.object({ ...base, step_type: z.literal(STEP_TYPE.TOOL_CALL), config: toolCallConfigSchema }),
    z.object({ ...base, step_type: z.literal(STEP_TYPE.AI_DECISION), config: aiDecisionConfigSchema }),
    z.object({ ...base, step_type: z.literal(STEP_TYPE.WAIT_FOR_RESPONSE), config: waitForResponseConfigSchema }),
    z.object({ ...base, step_type: z.literal(STEP_TYPE.SEND_EMAIL), config: sendEmailConfigSchema }),
    z.object({ ...base, step_type: z.literal(STEP_TYPE.SCHEDULE_MEETING), config: scheduleMeetingConfigSchema }),
]);

/** A step as produced by a template, before it is persisted. */
export type StepDescriptor = z.infer<typeof stepDescriptorSchema>;

/** Input shape accepted by the descriptor schema (defaults still optional). */
export type StepDescriptorInput = z.input<typeof stepDescriptorSchema>;

/** Config payload for a given step kind. */
export type StepConfigOf<T extends StepType> = Extract<StepDescriptor, { step_type: T }>['config'];

/** A persisted step's kind and config, narrowed together. */
export type TypedStepConfig = {
    [K in StepType]: { step_type: K; config: StepConfigOf<K> };
}[StepType];

const STEP_TYPES: ReadonlySet<string> = new Set(Object.values(STEP_TYPE));

export function isStepType(value: string): value is StepType {
    return STEP_TYPES.has(value);
}

/**
 * Validates a stored config against the schema of its step kind.
 * Throws the ZodError unchanged; the caller owns the reporting.
 */
export function parseStepConfig(stepType: StepType, config: unknown): TypedStepConfig {
    switch (stepType) {
        case STEP_TYPE.TOOL_CALL:
            return { step_type: stepType, config: toolCallConfigSchema.parse(config) };
        case STEP_TYPE.AI_DECISION:
            return { step_type: stepType, config: aiDecisionConfigSchema.parse(config) };
        case STEP_TYPE.WAIT_FOR_RESPONSE:
            return { step_type: stepType, config: waitForResponseConfigSchema.parse(config) };
        case STEP_TYPE.SEND_EMAIL:
            return { step_type: stepType, config: sendEmailConfigSchema.parse(config) };
        case STEP_TYPE.SCHEDULE_MEETING:
            return { step_type: stepType, config: scheduleMeetingConfigSchema.parse(config) };
    }
}
