import OpenAI from "openai";
import * as dotenv from 'dotenv';
import { ILLMClient, ChatMessage, ChatCompletionOptions } from "./ILLMClient";
import { OPENAI_API_KEY_ENV_VAR, BASE_URL_ENV_VAR, DEFAULT_MODEL_NAME, DEFAULT_TEMPERATURE, DEFAULT_MAX_TOKENS } from "./llmConstants";
import { ConfigurationError } from "../errors";
import { dbg, describeError } from "../utils";

// Load environment variables
dotenv.config();

/**
 * The slice of the OpenAI SDK this client uses. Lets tests hand in a fake.
 */
export interface ChatCompletionsApi {
    create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

/**
 * OpenAIClient implements the ILLMClient interface on top of OpenAI's chat completions API.
 * It handles API authentication, base URL configuration, and message formatting.
 */
export class OpenAIClient implements ILLMClient {
    /** Chat completions endpoint of the SDK client */
    private completions: ChatCompletionsApi;

    /**
     * Initializes a new OpenAIClient instance.
     * Sets up the OpenAI client with the API key and optional base URL from environment variables,
     * unless a completions API is injected.
     * @throws ConfigurationError if no completions API is injected and the OpenAI API key is not set
     */
    constructor(completions?: ChatCompletionsApi) {
        if (completions) {
            this.completions = completions;
            return;
        }

        const apiKey = process.env[OPENAI_API_KEY_ENV_VAR] || '';
        if (!apiKey) {
            const errorMessage = `OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`;
            console.warn(errorMessage);
            throw new ConfigurationError(errorMessage, 'OpenAIClient');
        }

        const baseURL = process.env[BASE_URL_ENV_VAR] || '';
        if (!baseURL) {
            dbg(`${BASE_URL_ENV_VAR} is not set in environment variables. Using default OpenAI URL.`);
            this.completions = new OpenAI({ apiKey }).chat.completions;
        } else {
            dbg(`Using base URL: ${baseURL}`);
            this.completions = new OpenAI({ apiKey, baseURL }).chat.completions;
        }
    }

    /**
     * Makes a chat completion request to OpenAI's API.
     * @param history - Array of previous chat messages
     * @param prompt - The current user prompt to send
     * @param options - Model, system prompt and sampling overrides
     * @returns Promise resolving to the AI's response text
     * @throws Error if API call fails or returns empty content
     */
    async chatCompletion(
        history: ChatMessage[],
        prompt: string,
        options?: ChatCompletionOptions
    ): Promise<string> {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
        if (options?.systemPrompt) {
            messages.push({ role: 'system', content: options.systemPrompt });
        }
        // Anything that is not a user turn was produced by the assistant
        for (const msg of history) {
            if (msg.role === 'user') {
                messages.push({ role: 'user', content: msg.content });
            } else {
                messages.push({ role: 'assistant', content: msg.content });
            }
        }
        messages.push({ role: 'user', content: prompt });

        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        let responseContent: string | null | undefined;
        try {
            dbg('--- Calling OpenAI API --- (via OpenAIClient)');
            dbg(`Using model for API call: ${effectiveModel}`);

            const completion = await this.completions.create({
                model: effectiveModel,
                messages: messages,
                temperature: DEFAULT_TEMPERATURE,
                max_tokens: DEFAULT_MAX_TOKENS,
            });
            dbg('--- OpenAI API Call Complete --- (via OpenAIClient)');
            responseContent = completion.choices[0]?.message?.content;
        } catch (error) {
            console.error("Error calling OpenAI API via OpenAIClient:", describeError(error));
            throw new Error(`Failed to communicate with OpenAI (Model: ${effectiveModel}): ${describeError(error)}`, { cause: error });
        }

        if (!responseContent) {
            console.warn("OpenAI API call returned successfully but contained no content.");
            throw new Error("OpenAI API call returned successfully but contained no content.");
        }
        return responseContent;
    }
}
