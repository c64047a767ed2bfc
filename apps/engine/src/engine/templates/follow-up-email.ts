import { STEP_TYPE } from '@proactive/sdk';
import { z } from 'zod';
import { defineTemplate } from './registry';

export const followUpEmailInput = z.object({
    contact_email: z.string().email(),
    context: z.string().optional(),
    custom_message: z.string().optional(),
    subject: z.string().min(1).optional(),
}).passthrough();

export const DEFAULT_FOLLOW_UP_SUBJECT = 'Following up';

export const followUpEmailTemplate = defineTemplate({
    name: 'follow_up_email',
    description: 'Looks up past correspondence, drafts and sends a follow-up, logs it in the CRM',
    input: followUpEmailInput,
    title: (input) => `Follow up with ${input.contact_email}`,
    request: (input) => `Send a follow-up e-mail to ${input.contact_email}`,
    steps: (input) => {
        const subject = input.subject ?? DEFAULT_FOLLOW_UP_SUBJECT;
        const notes = [
            input.context ? `Background: ${input.context}` : null,
            input.custom_message ? `Include this message: ${input.custom_message}` : null,
        ].filter((line): line is string => line !== null);

        return [
            {
                step_number: 1,
                name: 'Search e-mail history',
                step_type: STEP_TYPE.TOOL_CALL,
                config: {
                    tool_name: 'search_email_history',
                    arguments: { query: '{{input.contact_email}}', limit: 5 },
                },
            },
            {
                step_number: 2,
                name: 'Draft follow-up',
                step_type: STEP_TYPE.AI_DECISION,
                config: {
                    instruction: [
                        `Write the body of a short follow-up e-mail to ${input.contact_email} based on the e-mail history from step 1.`,
                        ...notes,
                        'Reply with the e-mail body only.',
                    ].join('\n'),
                    allow_tools: false,
                },
            },
            {
                step_number: 3,
                name: 'Send follow-up',
                step_type: STEP_TYPE.SEND_EMAIL,
                config: {
                    arguments: { to: '{{input.contact_email}}', subject, body: '{{steps.2.response}}' },
                },
            },
            {
                step_number: 4,
                name: 'Log CRM note',
                step_type: STEP_TYPE.TOOL_CALL,
                config: {
                    tool_name: 'add_crm_note',
                    arguments: { contact_email: '{{input.contact_email}}', note: `Sent follow-up e-mail "${subject}"` },
                },
            },
        ];
    },
});
