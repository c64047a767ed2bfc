import { STEP_TYPE, isStepType, parseStepConfig, stepDescriptorSchema } from '../src/steps';

describe('stepDescriptorSchema', () => {
    test('fills defaults for a tool call', () => {
        const parsed = stepDescriptorSchema.parse({
            step_number: 1,
            name: 'Find contact',
            step_type: 'tool_call',
            config: { tool_name: 'search_contacts' },
        });

        expect(parsed.step_type).toBe('tool_call');
        expect(parsed.config).toEqual({ tool_name: 'search_contacts', arguments: {}, capture: [] });
    });

    test('rejects a wait step without expected responses', () => {
        const result = stepDescriptorSchema.safeParse({
            step_number: 5,
            name: 'Wait',
            step_type: 'wait_for_response',
            config: { timeout_hours: 24, expected_responses: [] },
        });
        expect(result.success).toBe(false);
    });

    test('rejects an unknown step kind', () => {
        const result = stepDescriptorSchema.safeParse({
            step_number: 1,
            name: 'Branch',
            step_type: 'branch',
            config: {},
        });
        expect(result.success).toBe(false);
    });

    test('requires a recipient on send_email', () => {
        const result = stepDescriptorSchema.safeParse({
            step_number: 3,
            name: 'Send',
            step_type: 'send_email',
            config: { arguments: { subject: 'Hi', body: 'Hello' } },
        });
        expect(result.success).toBe(false);
    });
});

describe('parseStepConfig', () => {
    test('narrows the config to its step kind', () => {
        const typed = parseStepConfig(STEP_TYPE.WAIT_FOR_RESPONSE, {
            timeout_hours: 48,
            expected_responses: ['time_selection'],
        });

        expect(typed.step_type).toBe('wait_for_response');
        if (typed.step_type === STEP_TYPE.WAIT_FOR_RESPONSE) {
            expect(typed.config.waiting_for).toBe('email_response');
            expect(typed.config.timeout_hours).toBe(48);
        }
    });

    test('throws on a config that does not match its kind', () => {
        expect(() => parseStepConfig(STEP_TYPE.AI_DECISION, { tool_name: 'x' })).toThrow();
    });
});

describe('isStepType', () => {
    test('recognises the closed set', () => {
        expect(isStepType('schedule_meeting')).toBe(true);
        expect(isStepType('delay')).toBe(false);
    });
});
