import { STEP_TYPE } from '@proactive/sdk';
import { z } from 'zod';
import { defineTemplate } from './registry';

// One open-ended decision with the whole tool catalogue.
export const genericTemplate = defineTemplate({
    name: 'generic',
    description: 'Hands the request to the decision engine in a single step',
    input: z.record(z.unknown()),
    title: (_input, workflowType) => `Workflow: ${workflowType}`,
    request: (_input, workflowType) => `Complete the ${workflowType.replace(/_/g, ' ')} task`,
    steps: () => [
        {
            step_number: 1,
            name: 'Handle request',
            step_type: STEP_TYPE.AI_DECISION,
            config: {
                instruction: "Carry out the user's request. Use the available tools where they help, then summarise what was done.",
                allow_tools: true,
            },
        },
    ],
});
