import * as dotenv from 'dotenv';
import { dbg, describeError } from "../utils";
import { OpenAIClient } from './OpenAIClient';
import { LiteLLMClient } from './LiteLLMClient';
import { ILLMClient, ChatMessage } from './ILLMClient';
import { Role } from '../memory/memory_types';
import {
    LLM_PROVIDER_ENV_VAR,
    OPENAI_PROVIDER,
    LITELLM_PROVIDER,
    OPENAI_API_KEY_ENV_VAR,
    LITELLM_API_KEY_ENV_VAR,
} from './llmConstants';

// Load environment variables
dotenv.config();

export type HistoryMessage = { role: Role; content: string };

// Singleton instance for the LLM client
let clientInstance: ILLMClient | null = null;

/**
 * Factory function to get the configured LLM client instance.
 * Creates the instance on first call based on the LLM_PROVIDER environment variable
 * (openai by default, or litellm).
 * @returns The singleton instance of the configured ILLMClient.
 * @throws Error if the required API key for the selected provider is missing.
 */
export function getLLMClient(): ILLMClient {
    if (clientInstance) {
        return clientInstance;
    }

    const requested = (process.env[LLM_PROVIDER_ENV_VAR] || OPENAI_PROVIDER).trim().toLowerCase();
    let provider = requested;
    if (requested !== OPENAI_PROVIDER && requested !== LITELLM_PROVIDER) {
        console.warn(`Unrecognized LLM_PROVIDER "${requested}". Falling back to ${OPENAI_PROVIDER}.`);
        provider = OPENAI_PROVIDER;
    }

    try {
        if (provider === LITELLM_PROVIDER) {
            if (!process.env[LITELLM_API_KEY_ENV_VAR]) {
                console.warn(`${LITELLM_API_KEY_ENV_VAR} is not set. LiteLLM will rely on provider-specific keys.`);
            }
            dbg('Using LiteLLM provider.');
            clientInstance = new LiteLLMClient();
        } else {
            if (!process.env[OPENAI_API_KEY_ENV_VAR]) {
                console.warn(`${OPENAI_API_KEY_ENV_VAR} is not set.`);
            }
            dbg('Using OpenAI provider.');
            clientInstance = new OpenAIClient();
        }
    } catch (error) {
        console.error(`Failed to initialize ${provider} client: ${describeError(error)}`);
        throw error; // Re-throw error after logging
    }

    return clientInstance;
}

/**
 * Drops the cached client so that the next getLLMClient call reads the environment again.
 */
export function resetLLMClient(): void {
    clientInstance = null;
}

/**
 * Calls the configured LLM provider's Chat Completions API.
 *
 * @param history The conversation history, using internal roles ('user', 'agent').
 * @param prompt The specific user prompt/instruction for this turn.
 * @param modelName Optional model name to override the provider's default.
 * @param systemPrompt Optional system message placed before the history.
 * @param client The client to use; the configured singleton by default.
 * @returns The content of the LLM's response.
 * @throws Error if API key is missing, API call fails, or response is empty.
 */
export async function callTheLLM(
    history: HistoryMessage[],
    prompt: string,
    modelName?: string,
    systemPrompt?: string,
    client: ILLMClient = getLLMClient()
): Promise<string> {
    // Map internal roles ('user', 'agent') to the roles the client interface expects
    const mappedHistory: ChatMessage[] = history.map(msg => ({
        role: msg.role === 'agent' ? 'assistant' : 'user',
        content: msg.content
    }));

    // Pass undefined to let clients handle defaults
    const effectiveModel = modelName && modelName.trim() !== '' ? modelName : undefined;

    try {
        dbg(`Model requested: ${effectiveModel || 'Provider Default'}`);
        const responseContent = await client.chatCompletion(mappedHistory, prompt, { modelName: effectiveModel, systemPrompt });
        dbg('--- LLM Call Complete ---');

        if (!responseContent) {
            throw new Error("LLM call returned empty content.");
        }
        return responseContent;
    } catch (error) {
        console.error("Error during LLM call:", describeError(error));
        throw new Error(`LLM API call failed: ${describeError(error)}`, { cause: error });
    }
}
