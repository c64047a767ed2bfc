import { STEP_TYPE } from '@proactive/sdk';
import { z } from 'zod';
import { defineTemplate } from './registry';

export const scheduleAppointmentInput = z.object({
    contact_name: z.string().min(1),
    preferred_date: z.string().min(1).optional(),
    duration: z.number().int().positive().default(60),  // minutes
    message: z.string().optional(),
}).passthrough();

const AVAILABILITY_WINDOW_MS = 24 * 60 * 60 * 1000;
export const FIRST_REPLY_TIMEOUT_HOURS = 24;
export const NEGOTIATION_TIMEOUT_HOURS = 48;

/**
 * Find contact → pick one → read calendar → propose times → wait →
 * check the answer → (wait again if the slot was taken) → book and confirm.
 */
export const scheduleAppointmentTemplate = defineTemplate({
    name: 'schedule_appointment',
    description: 'Negotiates a meeting time with a contact over e-mail and books it',
    input: scheduleAppointmentInput,
    title: (input) => `Schedule meeting with ${input.contact_name}`,
    request: (input) =>
        `Schedule a ${input.duration}-minute meeting with ${input.contact_name}` +
        (input.preferred_date ? ` on ${input.preferred_date}` : ''),
    steps: (input, { now }) => {
        const windowEnd = new Date(now.getTime() + AVAILABILITY_WINDOW_MS);
        const personalNote = input.message ? `\nInclude this note from the user: ${input.message}` : '';
        const preferred = input.preferred_date ? ` Prefer slots on ${input.preferred_date}.` : '';

        return [
            {
                step_number: 1,
                name: 'Find contact',
                step_type: STEP_TYPE.TOOL_CALL,
                config: {
                    tool_name: 'search_contacts',
                    arguments: { query: '{{input.contact_name}}', limit: 5 },
                    capture: [{ from: 'contacts', as: 'contacts' }],
                },
            },
            {
                step_number: 2,
                name: 'Select contact',
                step_type: STEP_TYPE.AI_DECISION,
                config: {
                    instruction: `Pick the contact from step 1 that best matches "${input.contact_name}" and state their name and e-mail address.`,
                },
            },
            {
                step_number: 3,
                name: 'Check availability',
                step_type: STEP_TYPE.TOOL_CALL,
                config: {
                    tool_name: 'get_calendar_availability',
                    arguments: {
                        start_date: now.toISOString(),
                        end_date: windowEnd.toISOString(),
                        duration_minutes: input.duration,
                    },
                    capture: [{ from: 'free_slots', as: 'free_slots' }],
                },
            },
            {
                step_number: 4,
                name: 'Propose times',
                step_type: STEP_TYPE.AI_DECISION,
                config: {
                    instruction:
                        `Write to the selected contact proposing up to three of the free slots from step 3 for a ${input.duration}-minute meeting.${preferred} ` +
                        `Ask them to pick one or suggest another time, and send it with send_email.${personalNote}`,
                },
            },
            {
                step_number: 5,
                name: 'Wait for reply',
                step_type: STEP_TYPE.WAIT_FOR_RESPONSE,
                config: {
                    timeout_hours: FIRST_REPLY_TIMEOUT_HOURS,
                    waiting_for: 'email_response',
                    expected_responses: ['time_selection', 'alternative_times', 'decline'],
                },
            },
            {
                step_number: 6,
                name: 'Process reply',
                step_type: STEP_TYPE.AI_DECISION,
                config: {
                    instruction:
                        'The contact replied: {{context.external_response}}\n' +
                        'Work out which time they chose or proposed and confirm it is still free with check_calendar_slot. ' +
                        'If it is taken, reply with send_email offering other free slots. If they declined, say so.',
                    capture: [{ tool: 'check_calendar_slot', from: 'available', as: 'slot_available' }],
                },
            },
            {
                step_number: 7,
                name: 'Wait for new time',
                step_type: STEP_TYPE.WAIT_FOR_RESPONSE,
                config: {
                    timeout_hours: NEGOTIATION_TIMEOUT_HOURS,
                    waiting_for: 'email_response',
                    expected_responses: ['time_selection', 'decline'],
                    condition: { path: 'context.slot_available', op: 'equals', value: false },
                },
            },
            {
                step_number: 8,
                name: 'Book and confirm',
                step_type: STEP_TYPE.AI_DECISION,
                config: {
                    instruction:
                        'Latest reply from the contact: {{context.external_response}}\n' +
                        `Unless they declined, book the agreed time as a ${input.duration}-minute event titled "Meeting with ${input.contact_name}" using create_calendar_event with the contact as attendee, ` +
                        'record it with add_crm_note, and send a confirmation with send_email.',
                },
            },
        ];
    },
});
