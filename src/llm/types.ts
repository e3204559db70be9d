export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
    id: string;
    type: 'function';
    function: {
        name: string;
        /** JSON-encoded arguments */
        arguments: string;
    };
}

export interface ChatMessage {
    role: ChatRole;
    content: string | null;
    tool_calls?: ToolCall[];
    tool_call_id?: string;
}

export interface ToolSpec {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: {
            type: 'object';
            properties: Record<string, { type: string; description: string }>;
            required: string[];
        };
    };
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
}

export interface ChatRequest {
    model: string;
    messages: ChatMessage[];
    tools?: ToolSpec[];
    maxTokens?: number;
    temperature?: number;
    /** Aborts the HTTP request; never sent to the model */
    signal?: AbortSignal;
}

export interface ChatResult {
    message: ChatMessage;
    usage: TokenUsage;
}

export interface ChatClient {
    chat(request: ChatRequest, task?: string): Promise<ChatResult>;
}

export interface LlmResponse {
    success: boolean;
    errorMessage?: string;
    content: string;
}

/**
 * Handle on a session run that is still going
 */
export interface StreamingHandler {
    /** Resolves true once the run finished, false if the timeout hit first */
    await(timeoutMs: number): Promise<boolean>;
    isSuccess(): boolean;
    getError(): string | undefined;
    getContent(): string;
}

export interface LlmSession {
    run(prompt: string): Promise<LlmResponse>;
    runStream(prompt: string): StreamingHandler;
    /** Stop the run: the request in flight is aborted and no further tool runs */
    cancel(): void;
}

export interface SessionOptions {
    systemPrompt: string;
    /** Conversation window kept besides the system prompt */
    maxMessages: number;
    maxIterations: number;
    timeoutMs: number;
    /** Tool names the model may call */
    capabilities: ReadonlySet<string>;
    onTokens?: (usage: TokenUsage) => void;
    label?: string;
}

export interface SessionFactory {
    create(options: SessionOptions): LlmSession;
}
