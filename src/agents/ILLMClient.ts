import { Role } from '../memory/memory_types';

// Expand Role slightly for internal use by clients,
// while callTheLLM takes the stricter 'user' | 'agent'.
type ExtendedRole = Role | 'assistant' | 'system';

export type ChatMessage = {
    role: ExtendedRole;
    content: string;
};

export interface ChatCompletionOptions {
    modelName?: string;
    systemPrompt?: string;
}

export interface ILLMClient {
    /**
     * Calls the underlying LLM provider's chat completions API.
     *
     * @param history The conversation history (already mapped to provider roles).
     * @param prompt The specific user prompt for this turn.
     * @returns The content of the LLM's response.
     * @throws Error on API errors or an empty reply.
     */
    chatCompletion(
        history: Array<ChatMessage>,
        prompt: string,
        options?: ChatCompletionOptions
    ): Promise<string>;
}
