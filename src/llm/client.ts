import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

export interface OpenAiClientOptions {
    apiKey: string;
    baseUrl?: string;
    timeoutMs: number;
    maxRetries: number;
}

/**
 * The slice of the OpenAI SDK the scorer uses; tests supply an in-process fake
 */
export interface ChatCompletionClient {
    chat: {
        completions: {
            create(params: ChatCompletionCreateParamsNonStreaming): Promise<{
                choices: Array<{ message: { content: string | null } }>;
            }>;
        };
    };
}

export function createOpenAiClient(options: OpenAiClientOptions): ChatCompletionClient {
    // baseURL must already include the /v1 suffix for OpenAI-compatible servers
    return new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: options.maxRetries,
        ...(options.baseUrl !== undefined && { baseURL: options.baseUrl }),
    });
}
