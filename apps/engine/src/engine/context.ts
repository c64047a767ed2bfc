import type { Capture, Condition } from '@proactive/sdk';
import type { WorkflowContext } from '../db/workflow.entity';
import { getByDotPath, isRecord } from '../utils/dotPath';

/** Reserved context keys written by the engine itself. */
export const CONTEXT_KEY = {
    externalResponse: 'external_response',
    responseHistory: 'response_history',
    waitingForResponse: 'waiting_for_response',
} as const;

/** What placeholders, captures and conditions can see. */
export interface StepScope {
    input: Record<string, unknown>;
    context: WorkflowContext;
    steps: Record<number, unknown>;  // step_number → output_data
}

export function mergeContext(context: WorkflowContext, patch: WorkflowContext): WorkflowContext {
    return { ...context, ...patch };
}

/**
 * Folds an external reply into the context: the latest reply under
 * `external_response`, every reply appended to `response_history`.
 */
export function mergeExternalResponse(
    context: WorkflowContext,
    responseData: Record<string, unknown>,
    receivedAt: Date,
): WorkflowContext {
    const entry = { ...responseData, received_at: receivedAt.toISOString() };
    const previous = context[CONTEXT_KEY.responseHistory];
    const history = Array.isArray(previous) ? previous : [];
    return {
        ...context,
        [CONTEXT_KEY.externalResponse]: entry,
        [CONTEXT_KEY.responseHistory]: [...history, entry],
    };
}

export function evaluateCondition(condition: Condition, scope: StepScope): boolean {
    const actual = getByDotPath(scope, condition.path);
    switch (condition.op) {
        case 'exists':
            return actual !== undefined && actual !== null;
        case 'equals':
            return actual === condition.value;
        case 'not_equals':
            return actual !== condition.value;
    }
}

/**
 * Applies capture rules to the results of the tools a step called.
 * Only successful results are read; later calls of the same tool win.
 */
export function applyCaptures(
    captures: Capture[],
    results: ReadonlyArray<{ tool_name: string; success: boolean; result?: unknown }>,
): WorkflowContext {
    const patch: WorkflowContext = {};
    for (const capture of captures) {
        for (const r of results) {
            if (!r.success) continue;
            if (capture.tool && capture.tool !== r.tool_name) continue;
            const value = getByDotPath(r.result, capture.from);
            if (value !== undefined) patch[capture.as] = value;
        }
    }
    return patch;
}

export function toRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}
