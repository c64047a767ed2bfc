import type {
    AiDecisionConfig,
    ConversationMessage,
    Decision,
    ExecutedToolCall,
    RetrievedContext,
    ToolCallRequest,
    ToolDefinition,
} from '@proactive/sdk';
import type { WorkflowContext } from '../../db/workflow.entity';
import { renderTemplate } from '../../utils/template';
import { applyCaptures } from '../context';
import { buildDecisionPrompt, userRequest } from '../prompt';
import { buildScope } from './scope';
import { emailFacts } from './tool-call';
import { StepContext, StepOutcome, errorMessage, failure } from './types';

async function runToolCall(call: ToolCallRequest, ctx: StepContext): Promise<ExecutedToolCall> {
    const base = { call_id: call.id, tool_name: call.name, arguments: call.arguments };
    try {
        const res = await ctx.services.tools.execute(call.name, call.arguments, ctx.workflow.user_id);
        return { ...base, ...res };
    } catch (err) {
        return { ...base, success: false, error: errorMessage(err) };
    }
}

/**
 * One round of reasoning: decide, run whatever tools were requested
 * one after another, then let the engine read the results once.
 * Tool failures are reported back to the engine, not to the step.
 */
export async function executeAiDecision(config: AiDecisionConfig, ctx: StepContext): Promise<StepOutcome> {
    const { retrieval, decisions, tools } = ctx.services;
    const request = userRequest(ctx.workflow);

    let retrieved: RetrievedContext;
    let catalogue: ToolDefinition[] = [];
    try {
        retrieved = await retrieval.contextFor(request, ctx.workflow.user_id);
        if (config.allow_tools) catalogue = await tools.listTools();
    } catch (err) {
        return failure(`Context retrieval failed: ${errorMessage(err)}`);
    }

    const instruction = renderTemplate(config.instruction, buildScope(ctx));
    const prompt = buildDecisionPrompt(instruction, request, ctx.priorSteps);

    let decision: Decision;
    try {
        decision = await decisions.decide(prompt, retrieved.text, catalogue);
    } catch (err) {
        return failure(`Decision engine error: ${errorMessage(err)}`);
    }

    const executed: ExecutedToolCall[] = [];
    let response = decision.narrative;

    if (config.allow_tools && decision.tool_calls.length > 0) {
        for (const call of decision.tool_calls) {
            executed.push(await runToolCall(call, ctx));
        }

        const history: ConversationMessage[] = [{ role: 'user', content: prompt }];
        if (decision.narrative) history.push({ role: 'assistant', content: decision.narrative });

        try {
            const followUp = await decisions.continue(history, executed, retrieved.text, catalogue);
            response = followUp.narrative;
        } catch (err) {
            return failure(`Decision engine error: ${errorMessage(err)}`);
        }
    }

    let contextPatch: WorkflowContext = applyCaptures(config.capture, executed);
    for (const call of executed) {
        if (call.success) contextPatch = { ...contextPatch, ...emailFacts(call.tool_name, call.arguments) };
    }

    return {
        success: true,
        suspend: false,
        output: { response, tool_results: executed, sources: retrieved.sources.length },
        contextPatch,
    };
}
