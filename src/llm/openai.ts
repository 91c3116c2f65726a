/**
 * @file OpenAI Client
 *
 * Chat-completions client implementing the engine's `LlmCompleter`
 * capability. The resolved Galaxy prompt is sent as the single user
 * message. Requests are bounded by `timeoutMs`; failures surface as
 * `LLMError` and are not retried here.
 *
 * @module llm
 */

import { z } from 'zod';
import type { LlmCompleter, OpenAIClientConfig } from './types.js';
import { LLMError, errorMessage_resolve } from '../core/errors.js';

const DEFAULT_BASE_URL: string = 'https://api.openai.com/v1';

const ChatResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional()
                })
            })
        )
        .default([])
});

const ErrorResponseSchema = z.object({
    error: z.object({ message: z.string() }).optional()
});

/**
 * Client for the OpenAI Chat Completions API.
 */
export class OpenAIClient implements LlmCompleter {
    private readonly apiKey: string | undefined;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly maxTokens: number;
    private readonly temperature: number;

    constructor(config: OpenAIClientConfig) {
        this.apiKey = config.apiKey;
        this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = config.timeoutMs;
        this.maxTokens = config.maxTokens ?? 500;
        this.temperature = config.temperature ?? 0.7;
    }

    /**
     * Send one prompt and return the assistant's text.
     *
     * @throws {LLMError} On a missing key, timeout, transport failure,
     *   non-2xx status or malformed response body
     */
    async complete(model: string, prompt: string): Promise<string> {
        if (!this.apiKey) {
            throw new LLMError('OPENAI_API_KEY is not configured.');
        }

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json'
                },
                body: JSON.stringify({
                    model,
                    messages: [{ role: 'user', content: prompt }],
                    max_tokens: this.maxTokens,
                    temperature: this.temperature
                }),
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (e: unknown) {
            if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
                throw new LLMError(`OpenAI request timed out after ${this.timeoutMs} ms`, null, { cause: e });
            }
            throw new LLMError(`OpenAI request failed: ${errorMessage_resolve(e)}`, null, { cause: e });
        }

        const body: unknown = await response.json().catch((): unknown => null);

        if (!response.ok) {
            const parsedError = ErrorResponseSchema.safeParse(body);
            const detail: string = parsedError.success && parsedError.data.error
                ? parsedError.data.error.message
                : 'Unknown OpenAI API Error';
            throw new LLMError(`OpenAI API error (${response.status}): ${detail}`, response.status);
        }

        const parsed = ChatResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new LLMError('OpenAI response had an unexpected shape', response.status);
        }
        const content: string | null | undefined = parsed.data.choices[0]?.message.content;
        if (!content || !content.trim()) {
            throw new LLMError('OpenAI response contained no content', response.status);
        }
        return content;
    }
}
