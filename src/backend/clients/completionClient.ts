/**
 * Completion Client
 *
 * Wrapper for an OpenAI-compatible chat-completion endpoint (xAI by default).
 * The client only knows how to send a message list and return the generated
 * text; it throws CompletionError for every failure and leaves the decision
 * of what to show the user to its callers.
 *
 * Endpoint used:
 * - POST {baseUrl}/chat/completions
 */

import { z } from 'zod';
import { CompletionMessage, GenerationOptions } from '../../shared/types';

/**
 * Configuration for the completion client.
 */
export interface CompletionClientConfig {
    /** Base URL of the API, without the trailing /chat/completions */
    baseUrl: string;
    /** Bearer token sent in the Authorization header */
    apiKey: string;
    /** Model used when a call does not name one */
    defaultModel: string;
    /** Sampling temperature used when a call does not set one */
    temperature: number;
    /** Maximum number of generated tokens */
    maxTokens: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

export const DEFAULT_COMPLETION_CONFIG: CompletionClientConfig = {
    baseUrl: 'https://api.x.ai/v1',
    apiKey: '',
    defaultModel: 'grok-3',
    temperature: 0.7,
    maxTokens: 150,
    timeoutMs: 30000,
};

/**
 * Error codes for the ways a completion call can fail.
 */
export enum CompletionErrorCode {
    /** The service could not be reached */
    CONNECTION_FAILED = 'CONNECTION_FAILED',
    /** The request exceeded timeoutMs */
    TIMEOUT = 'TIMEOUT',
    /** The API key was rejected (401/403) */
    UNAUTHORIZED = 'UNAUTHORIZED',
    /** Any other non-2xx response */
    API_ERROR = 'API_ERROR',
    /** A 2xx response without usable generated text */
    MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

export class CompletionError extends Error {
    constructor(
        message: string,
        public readonly code: CompletionErrorCode,
        public readonly status?: number,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'CompletionError';
    }
}

/**
 * The part of the chat-completion response body we read.
 */
const completionResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string(),
                }),
            })
        )
        .min(1),
});

const errorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string() })]),
});

/**
 * Contract for anything that can turn a message list into generated text.
 * The app tests substitute a fake implementation.
 */
export interface ICompletionClient {
    generateChatCompletion(messages: CompletionMessage[], options?: GenerationOptions): Promise<string>;
}

export class CompletionClient implements ICompletionClient {
    private readonly config: CompletionClientConfig;

    constructor(config: Partial<CompletionClientConfig> = {}) {
        this.config = { ...DEFAULT_COMPLETION_CONFIG, ...config };
    }

    /**
     * Send a chat-style message list and return the first choice's text.
     *
     * @returns The generated text, trimmed
     * @throws CompletionError if the call fails or the body has no usable text
     */
    async generateChatCompletion(
        messages: CompletionMessage[],
        options: GenerationOptions = {}
    ): Promise<string> {
        const model = options.model ?? this.config.defaultModel;
        const timeoutMs = this.config.timeoutMs;

        // The deadline covers the response body as well as the headers
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const response = await fetch(`${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${this.config.apiKey}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({
                    model,
                    messages,
                    temperature: options.temperature ?? this.config.temperature,
                    max_tokens: options.maxTokens ?? this.config.maxTokens,
                }),
                signal: controller.signal,
            });

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            return this.extractContent(await this.readJson(response));
        } catch (error) {
            if (controller.signal.aborted) {
                throw new CompletionError(
                    `Request timed out after ${timeoutMs}ms`,
                    CompletionErrorCode.TIMEOUT,
                    undefined,
                    error instanceof Error ? error : undefined
                );
            }
            throw this.wrapError(error, 'Failed to generate completion');
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private async readJson(response: Response): Promise<unknown> {
        try {
            return await response.json();
        } catch (error) {
            throw new CompletionError(
                'Completion response was not valid JSON',
                CompletionErrorCode.MALFORMED_RESPONSE,
                response.status,
                error instanceof Error ? error : undefined
            );
        }
    }

    private extractContent(body: unknown): string {
        const parsed = completionResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new CompletionError(
                'Completion response did not contain choices[0].message.content',
                CompletionErrorCode.MALFORMED_RESPONSE
            );
        }

        const content = parsed.data.choices[0].message.content.trim();
        if (content.length === 0) {
            throw new CompletionError(
                'Completion response contained empty text',
                CompletionErrorCode.MALFORMED_RESPONSE
            );
        }

        return content;
    }

    /**
     * Map a non-2xx response to a CompletionError.
     * - 401/403: the API key was rejected
     * - anything else: generic API error carrying the service's message
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        const statusLine = `HTTP ${response.status}: ${response.statusText}`;
        let errorMessage: string;

        try {
            const parsed = errorBodySchema.safeParse(await response.json());
            if (parsed.success) {
                const { error } = parsed.data;
                errorMessage = typeof error === 'string' ? error : error.message;
            } else {
                errorMessage = statusLine;
            }
        } catch {
            errorMessage = statusLine;
        }

        if (response.status === 401 || response.status === 403) {
            throw new CompletionError(
                `Completion API rejected the credentials: ${errorMessage}`,
                CompletionErrorCode.UNAUTHORIZED,
                response.status
            );
        }

        throw new CompletionError(
            `Completion API error: ${errorMessage}`,
            CompletionErrorCode.API_ERROR,
            response.status
        );
    }

    /**
     * Make sure every error leaving the client is a CompletionError.
     */
    private wrapError(error: unknown, context: string): CompletionError {
        if (error instanceof CompletionError) {
            return error;
        }

        // Node's fetch reports network failures as TypeError('fetch failed')
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new CompletionError(
                `Cannot connect to the completion service at ${this.config.baseUrl}`,
                CompletionErrorCode.CONNECTION_FAILED,
                undefined,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new CompletionError(
            `${context}: ${message}`,
            CompletionErrorCode.UNKNOWN,
            undefined,
            error instanceof Error ? error : undefined
        );
    }
}

export function createCompletionClient(config?: Partial<CompletionClientConfig>): CompletionClient {
    return new CompletionClient(config);
}
