import { CovloopConfig } from '../config/schema';
import { ToolArgs, ToolDefinition, ToolRegistry } from '../tools/ToolRegistry';
import { TimeoutError, withTimeout } from '../utils/async';
import logger from '../utils/logger';
import { ResponseStreamingHandler } from './StreamingHandler';
import {
    ChatClient,
    ChatMessage,
    LlmResponse,
    LlmSession,
    SessionFactory,
    SessionOptions,
    StreamingHandler,
    ToolSpec,
} from './types';

export function toToolSpec(tool: ToolDefinition): ToolSpec {
    const properties: Record<string, { type: string; description: string }> = {};
    const required: string[] = [];
    for (const [name, param] of Object.entries(tool.parameters)) {
        properties[name] = { type: param.type, description: param.description };
        if (param.required) {
            required.push(name);
        }
    }
    return {
        type: 'function',
        function: {
            name: tool.name,
            description: tool.description,
            parameters: { type: 'object', properties, required },
        },
    };
}

export function parseToolArguments(raw: string): ToolArgs {
    if (!raw.trim()) {
        return {};
    }
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('tool arguments must be a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * One bounded tool-calling conversation. Sessions are cheap and meant to be
 * used for a single step, so nothing carries over between methods.
 */
export class AgentSession implements LlmSession {
    private readonly messages: ChatMessage[] = [];
    private cancelled = false;
    private controller?: AbortController;

    constructor(
        private readonly client: ChatClient,
        private readonly registry: ToolRegistry,
        private readonly llm: CovloopConfig['llm'],
        private readonly options: SessionOptions
    ) {}

    async run(prompt: string): Promise<LlmResponse> {
        this.cancelled = false;
        this.controller = new AbortController();
        try {
            return await withTimeout(this.converse(prompt), this.options.timeoutMs, `Session ${this.options.label ?? ''}`.trim());
        } catch (error) {
            if (error instanceof TimeoutError) {
                this.cancel();
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`❌ Session ${this.options.label ?? ''} failed: ${message}`);
            return { success: false, errorMessage: message, content: '' };
        }
    }

    runStream(prompt: string): StreamingHandler {
        return new ResponseStreamingHandler(this.run(prompt));
    }

    /**
     * Abort the request in flight. No tool runs after this returns.
     */
    cancel(): void {
        this.cancelled = true;
        this.controller?.abort();
    }

    history(): readonly ChatMessage[] {
        return this.messages;
    }

    private async converse(prompt: string): Promise<LlmResponse> {
        const invoker = this.registry.scoped(this.options.capabilities);
        const tools = this.registry.definitions(this.options.capabilities).map(toToolSpec);
        this.messages.push({ role: 'user', content: prompt });

        let lastContent = '';
        for (let iteration = 1; iteration <= this.options.maxIterations; iteration++) {
            if (this.cancelled) {
                return { success: false, errorMessage: 'Session cancelled', content: lastContent };
            }

            const { message, usage } = await this.client.chat(
                {
                    model: this.llm.model,
                    messages: this.window(),
                    tools,
                    maxTokens: this.llm.max_tokens,
                    temperature: this.llm.temperature,
                    signal: this.controller?.signal,
                },
                this.options.label
            );
            this.options.onTokens?.(usage);
            if (this.cancelled) {
                return { success: false, errorMessage: 'Session cancelled', content: lastContent };
            }
            this.messages.push(message);
            lastContent = message.content ?? lastContent;

            if (!message.tool_calls || message.tool_calls.length === 0) {
                return { success: true, content: message.content ?? '' };
            }

            for (const call of message.tool_calls) {
                if (this.cancelled) {
                    return { success: false, errorMessage: 'Session cancelled', content: lastContent };
                }
                let result: string;
                try {
                    result = await invoker.invoke(call.function.name, parseToolArguments(call.function.arguments));
                } catch (error) {
                    result = `ERROR: ${error instanceof Error ? error.message : String(error)}`;
                }
                this.messages.push({ role: 'tool', tool_call_id: call.id, content: result });
            }
        }

        return {
            success: false,
            errorMessage: `Reached the limit of ${this.options.maxIterations} tool iterations`,
            content: lastContent,
        };
    }

    /**
     * System prompt, the task prompt, then the most recent messages. The task
     * prompt is never trimmed and the tail never starts with tool results
     * whose call was cut off.
     */
    private window(): ChatMessage[] {
        const [prompt, ...rest] = this.messages;
        const keep = Math.max(this.options.maxMessages - 1, 0);
        let recent = keep > 0 ? rest.slice(-keep) : [];
        while (recent.length > 0 && recent[0].role === 'tool') {
            recent = recent.slice(1);
        }
        return [{ role: 'system', content: this.options.systemPrompt }, prompt, ...recent];
    }
}

export class AgentSessionFactory implements SessionFactory {
    constructor(
        private readonly client: ChatClient,
        private readonly registry: ToolRegistry,
        private readonly llm: CovloopConfig['llm']
    ) {}

    create(options: SessionOptions): LlmSession {
        return new AgentSession(this.client, this.registry, this.llm, options);
    }
}
