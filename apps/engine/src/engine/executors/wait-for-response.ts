import type { WaitForResponseConfig } from '@proactive/sdk';
import { CONTEXT_KEY, evaluateCondition } from '../context';
import { buildScope } from './scope';
import type { StepContext, StepOutcome } from './types';

const HOUR_MS = 60 * 60 * 1000;

// No polling here: the deadline is recorded and the driver yields.
export function executeWaitForResponse(config: WaitForResponseConfig, ctx: StepContext): StepOutcome {
    if (config.condition && !evaluateCondition(config.condition, buildScope(ctx))) {
        return {
            success: true,
            suspend: false,
            output: { waited: false, waiting_for: config.waiting_for, reason: 'condition not met' },
        };
    }

    const timeoutAt = new Date(ctx.now().getTime() + config.timeout_hours * HOUR_MS);
    return {
        success: true,
        suspend: true,
        timeoutAt,
        output: {
            waiting_for: config.waiting_for,
            timeout_at: timeoutAt.toISOString(),
            expected_responses: config.expected_responses,
        },
        contextPatch: { [CONTEXT_KEY.waitingForResponse]: config.waiting_for },
    };
}
