import { FIXED_TOOL, ReminderDispatch, ReminderOutcome, ReminderRequest, ToolExecutionService } from '@proactive/sdk';

const TAG = '[reminder]';

export const REMINDER_SUBJECT_PREFIX = 'Reminder: ';
export const DEFAULT_ORIGINAL_SUBJECT = 'Previous Message';

export const REMINDER_BODY = [
    'Hi,',
    '',
    'I wanted to follow up on my previous message.',
    '',
    "I understand you might be busy, but I'd appreciate a reply when you have a moment. " +
        'If none of the times I suggested work for you, feel free to suggest others.',
    '',
    'Thank you for your time.',
    '',
    'Best regards',
].join('\n');

/**
 * Re-sends a nudge through the send_email tool when the workflow is
 * waiting on an e-mail it sent; anything else only gets a log line.
 */
export class ToolReminderDispatch implements ReminderDispatch {
    constructor(private readonly tools: ToolExecutionService) { }

    async sendReminder(reminder: ReminderRequest): Promise<ReminderOutcome> {
        const { context, workflowId } = reminder;
        const to = context.email_sent_to;

        if (context.waiting_for_response !== 'email_response' || typeof to !== 'string') {
            console.log(`${TAG} generic reminder for ${workflowId} (attempt ${reminder.attempt})`);
            return { delivered: false, reason: 'no e-mail recipient recorded' };
        }

        const original = typeof context.original_email_subject === 'string'
            ? context.original_email_subject
            : DEFAULT_ORIGINAL_SUBJECT;

        const res = await this.tools.execute(
            FIXED_TOOL.send_email,
            { to, subject: `${REMINDER_SUBJECT_PREFIX}${original}`, body: REMINDER_BODY },
            reminder.userId,
        );
        if (!res.success) {
            throw new Error(`Reminder for ${workflowId} failed: ${res.error ?? 'unknown error'}`);
        }

        console.log(`${TAG} e-mail reminder for ${workflowId} sent (attempt ${reminder.attempt})`);
        return { delivered: true, channel: 'email', to };
    }
}
