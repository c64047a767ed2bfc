// Contracts of the services the engine drives but does not implement.
// Concrete tools, the reasoning model and retrieval live behind these.

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export interface ToolResult {
    success: boolean;
    result?: unknown;
    error?: string;
}

export interface ToolExecutionService {
    listTools(): Promise<ToolDefinition[]>;
    execute(toolName: string, args: Record<string, unknown>, userId: string): Promise<ToolResult>;
}

export interface ToolCallRequest {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
}

/** A tool call the engine has already executed, fed back to the decision engine. */
export interface ExecutedToolCall extends ToolResult {
    call_id: string;
    tool_name: string;
    arguments: Record<string, unknown>;
}

export interface ConversationMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface Decision {
    narrative: string;
    tool_calls: ToolCallRequest[];
}

export interface DecisionEngine {
    decide(prompt: string, context: string, tools: ToolDefinition[]): Promise<Decision>;
    continue(
        history: ConversationMessage[],
        toolResults: ExecutedToolCall[],
        context: string,
        tools: ToolDefinition[],
    ): Promise<Decision>;
}

export interface RetrievedContext {
    text: string;
    sources: unknown[];
}

export interface ContextRetrieval {
    contextFor(query: string, userId: string): Promise<RetrievedContext>;
}

export interface ReminderRequest {
    workflowId: string;
    userId: string;
    /** How many reminders have been issued, this one included. */
    attempt: number;
    context: Record<string, unknown>;
}

export type ReminderOutcome =
    | { delivered: true; channel: 'email'; to: string }
    | { delivered: false; reason: string };

/** Out-of-band nudge for a workflow stuck waiting on a reply. */
export interface ReminderDispatch {
    sendReminder(reminder: ReminderRequest): Promise<ReminderOutcome>;
}
