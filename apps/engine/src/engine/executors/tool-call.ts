import { Capture, FIXED_TOOL, ToolResult } from '@proactive/sdk';
import type { WorkflowContext } from '../../db/workflow.entity';
import { resolveArguments } from '../../utils/template';
import { applyCaptures } from '../context';
import { buildScope } from './scope';
import { StepContext, StepOutcome, errorMessage, failure } from './types';

/** Facts a sent e-mail leaves behind for reminders. */
export function emailFacts(toolName: string, args: Record<string, unknown>): WorkflowContext {
    if (toolName !== FIXED_TOOL.send_email) return {};
    const facts: WorkflowContext = {};
    if (typeof args.to === 'string') facts.email_sent_to = args.to;
    if (typeof args.subject === 'string') facts.original_email_subject = args.subject;
    return facts;
}

/**
 * Shared mechanics of tool_call, send_email and schedule_meeting:
 * resolve placeholders, run the tool as the workflow's owner, capture.
 */
export async function invokeTool(
    toolName: string,
    rawArgs: Record<string, unknown>,
    captures: Capture[],
    ctx: StepContext,
): Promise<StepOutcome> {
    const args = resolveArguments(rawArgs, buildScope(ctx));

    let res: ToolResult;
    try {
        res = await ctx.services.tools.execute(toolName, args, ctx.workflow.user_id);
    } catch (err) {
        return failure(`Tool ${toolName} threw: ${errorMessage(err)}`);
    }

    if (!res.success) {
        return failure(`Tool ${toolName} failed: ${res.error ?? 'unknown error'}`);
    }

    return {
        success: true,
        suspend: false,
        output: { tool_name: toolName, arguments: args, result: res.result ?? null },
        contextPatch: {
            ...applyCaptures(captures, [{ tool_name: toolName, success: true, result: res.result }]),
            ...emailFacts(toolName, args),
        },
    };
}
