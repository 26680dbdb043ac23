import * as litellm from 'litellm';
import * as dotenv from 'dotenv';
import { ILLMClient, ChatMessage, ChatCompletionOptions } from "./ILLMClient";
import { LITELLM_API_KEY_ENV_VAR, DEFAULT_MODEL_NAME, DEFAULT_TEMPERATURE, DEFAULT_MAX_TOKENS } from "./llmConstants";
import { dbg, describeError } from "../utils";

// Load environment variables
dotenv.config();

export type CompletionFn = typeof litellm.completion;

export class LiteLLMClient implements ILLMClient {
    private apiKey: string | undefined;

    /**
     * @param completionFn - litellm's completion function; replaceable for tests.
     */
    constructor(private readonly completionFn: CompletionFn = litellm.completion) {
        // LiteLLM can often infer keys from environment (e.g., OPENAI_API_KEY)
        // However, if a specific LITELLM_API_KEY is provided (e.g., for a proxy),
        // we store it to pass explicitly.
        this.apiKey = process.env[LITELLM_API_KEY_ENV_VAR];
        if (this.apiKey) {
            dbg(`Found ${LITELLM_API_KEY_ENV_VAR}, will pass it to litellm.`);
        } else {
            dbg(`${LITELLM_API_KEY_ENV_VAR} not found. Relying on provider-specific keys (e.g., OPENAI_API_KEY) for litellm.`);
        }
    }

    async chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: ChatCompletionOptions
    ): Promise<string> {
        const messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }> = [];
        if (options?.systemPrompt) {
            messages.push({ role: 'system', content: options.systemPrompt });
        }
        for (const msg of history) {
            messages.push({ role: msg.role === 'user' ? 'user' : 'assistant', content: msg.content });
        }
        messages.push({ role: 'user', content: prompt });

        // Determine effective model, using default if not provided
        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        let responseContent: string | null | undefined;
        try {
            dbg('--- Calling LiteLLM API --- (via LiteLLMClient)');
            dbg(`Using model for API call: ${effectiveModel}`);

            const response = await this.completionFn({
                model: effectiveModel,
                messages: messages,
                temperature: DEFAULT_TEMPERATURE,
                max_tokens: DEFAULT_MAX_TOKENS,
                stream: false,
                // Only passed when explicitly configured; otherwise litellm reads provider keys itself
                ...(this.apiKey ? { apiKey: this.apiKey } : {}),
            });
            dbg('--- LiteLLM API Call Complete --- (via LiteLLMClient)');
            responseContent = response.choices?.[0]?.message?.content;
        } catch (error) {
            console.error("Error calling LiteLLM API via LiteLLMClient:", describeError(error));
            // Include model name in error for better debugging
            throw new Error(`Failed to communicate with LiteLLM (Model: ${effectiveModel}): ${describeError(error)}`, { cause: error });
        }

        if (!responseContent) {
            console.warn("LiteLLM API call returned successfully but contained no content.");
            throw new Error("LiteLLM API call returned successfully but contained no content.");
        }
        return responseContent;
    }
}
