import { FIXED_TOOL, STEP_TYPE, TypedStepConfig, parseStepConfig } from '@proactive/sdk';
import { ZodError } from 'zod';
import type { WorkflowStepEntity } from '../../db/workflow_step.entity';
import { InvalidStepConfigError } from '../../errors';
import { executeAiDecision } from './ai-decision';
import { invokeTool } from './tool-call';
import { StepContext, StepOutcome, errorMessage, failure } from './types';
import { executeWaitForResponse } from './wait-for-response';

export * from './types';

function parseConfig(step: WorkflowStepEntity): TypedStepConfig {
    try {
        return parseStepConfig(step.step_type, step.config);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new InvalidStepConfigError(
                step.step_number,
                step.step_type,
                err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
            );
        }
        throw err;
    }
}

function dispatch(typed: TypedStepConfig, ctx: StepContext): Promise<StepOutcome> | StepOutcome {
    switch (typed.step_type) {
        case STEP_TYPE.TOOL_CALL:
            return invokeTool(typed.config.tool_name, typed.config.arguments, typed.config.capture, ctx);
        case STEP_TYPE.AI_DECISION:
            return executeAiDecision(typed.config, ctx);
        case STEP_TYPE.WAIT_FOR_RESPONSE:
            return executeWaitForResponse(typed.config, ctx);
        case STEP_TYPE.SEND_EMAIL:
            return invokeTool(FIXED_TOOL.send_email, typed.config.arguments, [], ctx);
        case STEP_TYPE.SCHEDULE_MEETING:
            return invokeTool(FIXED_TOOL.schedule_meeting, typed.config.arguments, typed.config.capture, ctx);
        default: {
            const unreachable: never = typed;
            throw new Error(`Unhandled step type: ${JSON.stringify(unreachable)}`);
        }
    }
}

/** Runs one step. Never throws: anything unexpected becomes a failed outcome. */
export async function executeStep(step: WorkflowStepEntity, ctx: StepContext): Promise<StepOutcome> {
    try {
        return await dispatch(parseConfig(step), ctx);
    } catch (err) {
        return failure(errorMessage(err));
    }
}
