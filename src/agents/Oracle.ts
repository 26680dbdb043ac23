import { ILLMClient } from './ILLMClient';
import { callTheLLM, getLLMClient } from './LLMUtils';

/**
 * Text in, text out. The agents' only view of the LLM.
 */
export interface Oracle {
    query(prompt: string): Promise<string>;
}

export const ORACLE_SYSTEM_PROMPT =
    'You decide the next action of an assistant. Reply with exactly one action record in the requested format and nothing else.';

/**
 * Oracle backed by the configured chat completion client. Each query is a single, history-free
 * user message under a fixed system message: the agent already puts its conversation into the prompt.
 */
export class LLMOracle implements Oracle {
    constructor(
        private readonly modelName?: string,
        private readonly client?: ILLMClient,
        private readonly systemPrompt: string = ORACLE_SYSTEM_PROMPT
    ) {}

    async query(prompt: string): Promise<string> {
        const reply = await callTheLLM([], prompt, this.modelName, this.systemPrompt, this.client ?? getLLMClient());
        return reply.trim();
    }
}
