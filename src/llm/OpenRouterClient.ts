import axios from 'axios';
import logger from '../utils/logger';
import { sleep } from '../utils/async';
import { ChatClient, ChatMessage, ChatRequest, ChatResult, ToolCall } from './types';

export enum LLMErrorCategory {
    AUTH_ERROR = 'AUTH_ERROR',
    RATE_LIMIT = 'RATE_LIMIT',
    MODEL_ERROR = 'MODEL_ERROR',
    SERVER_ERROR = 'SERVER_ERROR',
    UNKNOWN = 'UNKNOWN',
}

export class LLMError extends Error {
    constructor(
        message: string,
        public category: LLMErrorCategory,
        public modelId: string,
        public task?: string,
        public rawMessage?: string,
        public suggestedRemediation?: string
    ) {
        super(message);
        this.name = 'LLMError';
    }
}

interface CompletionChoice {
    message?: {
        content?: string | null;
        tool_calls?: ToolCall[];
    };
}

interface CompletionResponse {
    choices?: CompletionChoice[];
    usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
    };
}

export interface OpenRouterOptions {
    apiKey?: string;
    baseUrl?: string;
    appName?: string;
    timeout?: number;
    maxRetries?: number;
}

function errorMessageOf(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('error' in data)) {
        return undefined;
    }
    const inner = data.error;
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
    }
    return undefined;
}

/**
 * OpenAI-compatible chat completions over OpenRouter, with tool calls
 */
export class OpenRouterClient implements ChatClient {
    private apiKey: string;
    private baseUrl: string;
    private appName: string;
    private timeout: number;
    private maxRetries: number;

    constructor(options: OpenRouterOptions = {}) {
        this.apiKey = options.apiKey || process.env.OPENROUTER_API_KEY || '';
        this.baseUrl = options.baseUrl || process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1';
        this.appName = options.appName || process.env.OPENROUTER_APP_NAME || 'covloop';
        this.timeout = options.timeout ?? 60000;
        this.maxRetries = options.maxRetries ?? 3;

        if (!this.apiKey) {
            logger.warn('Missing OPENROUTER_API_KEY - OpenRouterClient initialized without API key');
        }
    }

    async chat(request: ChatRequest, task?: string): Promise<ChatResult> {
        if (!this.apiKey) {
            throw new LLMError(
                'Missing OPENROUTER_API_KEY',
                LLMErrorCategory.AUTH_ERROR,
                request.model,
                task,
                undefined,
                'Please set OPENROUTER_API_KEY in your .env file.'
            );
        }

        return this.retryWithBackoff(() => this.makeRequest(request, task), request.model);
    }

    private async makeRequest(request: ChatRequest, task?: string): Promise<ChatResult> {
        try {
            const headers: Record<string, string> = {
                'Authorization': `Bearer ${this.apiKey}`,
                'Content-Type': 'application/json',
                'X-Title': this.appName,
            };

            const response = await axios.post<CompletionResponse>(
                `${this.baseUrl}/chat/completions`,
                {
                    model: request.model,
                    messages: request.messages,
                    tools: request.tools && request.tools.length > 0 ? request.tools : undefined,
                    max_tokens: request.maxTokens,
                    temperature: request.temperature,
                },
                {
                    headers,
                    timeout: this.timeout,
                    signal: request.signal,
                }
            );

            const choice = response.data?.choices?.[0]?.message;
            if (!choice) {
                throw new LLMError(
                    'No message in OpenRouter response',
                    LLMErrorCategory.SERVER_ERROR,
                    request.model,
                    task
                );
            }

            const message: ChatMessage = {
                role: 'assistant',
                content: choice.content ?? null,
            };
            if (choice.tool_calls && choice.tool_calls.length > 0) {
                message.tool_calls = choice.tool_calls;
            }

            return {
                message,
                usage: {
                    promptTokens: response.data.usage?.prompt_tokens ?? 0,
                    completionTokens: response.data.usage?.completion_tokens ?? 0,
                },
            };
        } catch (error) {
            if (error instanceof LLMError) {
                throw error;
            }
            return this.handleAxiosError(error, request.model, task);
        }
    }

    private async retryWithBackoff<T>(fn: () => Promise<T>, model: string): Promise<T> {
        let attempt = 0;

        while (true) {
            try {
                return await fn();
            } catch (error) {
                attempt++;
                if (attempt > this.maxRetries || !(error instanceof LLMError) || error.category !== LLMErrorCategory.RATE_LIMIT) {
                    throw error;
                }

                // Exponential backoff: 1s, 2s, 4s
                const delay = Math.pow(2, attempt - 1) * 1000;
                logger.warn(`Rate limit hit for ${model}. Retrying in ${delay}ms (Attempt ${attempt}/${this.maxRetries})`);
                await sleep(delay);
            }
        }
    }

    private handleAxiosError(error: unknown, model: string, task?: string): never {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const data: unknown = error.response?.data;
            const rawMessage = JSON.stringify(data);
            const errorMessage = errorMessageOf(data) ?? error.message;

            let category = LLMErrorCategory.UNKNOWN;
            let remediation = '';

            if (status === 401 || status === 403 || errorMessage.includes('User not found')) {
                category = LLMErrorCategory.AUTH_ERROR;
                remediation = 'Check your OPENROUTER_API_KEY in .env or environment.';
            } else if (status === 429 || errorMessage.includes('rate-limited') || errorMessage.includes('Rate limit')) {
                category = LLMErrorCategory.RATE_LIMIT;
                remediation = 'Wait a moment or check your plan limits.';
            } else if (status === 404 || errorMessage.includes('No endpoints found')) {
                category = LLMErrorCategory.MODEL_ERROR;
                remediation = `Model ${model} not available. Check llm.model or OPENROUTER_MODEL.`;
            } else if (status && status >= 500) {
                category = LLMErrorCategory.SERVER_ERROR;
                remediation = 'OpenRouter upstream error. Try again later.';
            }

            throw new LLMError(
                `OpenRouter error: ${status} - ${errorMessage}`,
                category,
                model,
                task,
                rawMessage,
                remediation
            );
        }

        throw new LLMError(
            `Unknown error: ${error instanceof Error ? error.message : String(error)}`,
            LLMErrorCategory.UNKNOWN,
            model,
            task
        );
    }
}
