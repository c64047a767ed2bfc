import type {
    ContextRetrieval,
    ConversationMessage,
    Decision,
    DecisionEngine,
    ExecutedToolCall,
    RetrievedContext,
    ToolDefinition,
    ToolExecutionService,
    ToolResult,
} from '@proactive/sdk';
import { z } from 'zod';

const toolDefinitionSchema = z.object({
    name: z.string(),
    description: z.string().default(''),
    parameters: z.record(z.unknown()).default({}),
});

const toolResultSchema = z.object({
    success: z.boolean(),
    result: z.unknown().optional(),
    error: z.string().optional(),
});

const decisionSchema = z.object({
    narrative: z.string().default(''),
    tool_calls: z.array(z.object({
        id: z.string(),
        name: z.string(),
        arguments: z.record(z.unknown()).default({}),
    })).default([]),
});

const retrievedContextSchema = z.object({
    text: z.string().default(''),
    sources: z.array(z.unknown()).default([]),
});

export class CollaboratorError extends Error {
    constructor(public service: string, message: string, public status?: number) {
        super(`${service}: ${message}`);
        this.name = 'CollaboratorError';
    }
}

export interface HttpClientOptions {
    timeoutMs?: number;
    headers?: Record<string, string>;
}

function errorText(err: unknown): string {
    if (err instanceof Error && err.name === 'AbortError') return 'request aborted (timeout)';
    return err instanceof Error ? err.message : String(err);
}

/**
 * Minimal JSON-over-HTTP client shared by the collaborator adapters.
 * One attempt per call: retries belong to the job queue.
 */
export class JsonHttpClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;

    constructor(private readonly service: string, baseUrl: string, opts: HttpClientOptions = {}) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeoutMs = opts.timeoutMs ?? 30_000;
        this.headers = opts.headers ?? {};
    }

    async request<T>(method: 'GET' | 'POST', path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body?: unknown): Promise<T> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        let res: Response;
        try {
            res = await fetch(`${this.baseUrl}${path}`, {
                method,
                headers: { 'content-type': 'application/json', ...this.headers },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: controller.signal,
            });
        } catch (err) {
            throw new CollaboratorError(this.service, errorText(err));
        } finally {
            clearTimeout(timeout);
        }

        const text = await res.text();
        if (!res.ok) {
            throw new CollaboratorError(this.service, `HTTP ${res.status}: ${text.slice(0, 200)}`, res.status);
        }

        let json: unknown;
        try {
            json = text.length > 0 ? JSON.parse(text) : null;
        } catch {
            throw new CollaboratorError(this.service, 'response is not JSON', res.status);
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new CollaboratorError(this.service, `unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, res.status);
        }
        return parsed.data;
    }
}

export class HttpToolService implements ToolExecutionService {
    private readonly http: JsonHttpClient;

    constructor(baseUrl: string, opts?: HttpClientOptions) {
        this.http = new JsonHttpClient('tools', baseUrl, opts);
    }

    listTools(): Promise<ToolDefinition[]> {
        return this.http.request('GET', '/tools', z.array(toolDefinitionSchema));
    }

    // Transport failures become a failed result; the executor decides what that means.
    async execute(toolName: string, args: Record<string, unknown>, userId: string): Promise<ToolResult> {
        try {
            return await this.http.request('POST', '/execute', toolResultSchema, {
                tool_name: toolName,
                arguments: args,
                user_id: userId,
            });
        } catch (err) {
            return { success: false, error: errorText(err) };
        }
    }
}

export class HttpDecisionEngine implements DecisionEngine {
    private readonly http: JsonHttpClient;

    constructor(baseUrl: string, opts?: HttpClientOptions) {
        this.http = new JsonHttpClient('decision', baseUrl, opts);
    }

    decide(prompt: string, context: string, tools: ToolDefinition[]): Promise<Decision> {
        return this.http.request('POST', '/decide', decisionSchema, { prompt, context, tools });
    }

    continue(
        history: ConversationMessage[],
        toolResults: ExecutedToolCall[],
        context: string,
        tools: ToolDefinition[],
    ): Promise<Decision> {
        return this.http.request('POST', '/continue', decisionSchema, {
            history,
            tool_results: toolResults,
            context,
            tools,
        });
    }
}

export class HttpContextRetrieval implements ContextRetrieval {
    private readonly http: JsonHttpClient;

    constructor(baseUrl: string, opts?: HttpClientOptions) {
        this.http = new JsonHttpClient('context', baseUrl, opts);
    }

    contextFor(query: string, userId: string): Promise<RetrievedContext> {
        return this.http.request('POST', '/context', retrievedContextSchema, { query, user_id: userId });
    }
}
