/**
 * @file LLM Capability Types
 *
 * @module llm
 */

/**
 * Opaque completion capability consumed by the engine. Implementations
 * throw `LLMError` on network, authentication or provider failures and
 * never retry.
 */
export interface LlmCompleter {
    complete(model: string, prompt: string): Promise<string>;
}

/**
 * Connection settings for the OpenAI chat-completions client.
 */
export interface OpenAIClientConfig {
    apiKey: string | undefined;
    baseUrl?: string;
    timeoutMs: number;
    maxTokens?: number;
    temperature?: number;
}
