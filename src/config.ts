import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_MODEL_NAME } from './agents/llmConstants';

// Memory and context defaults
export const DEFAULT_MAX_MEMORY = 10;
export const DEFAULT_CONTEXT_EXPIRY_MINUTES = 30;
export const DEFAULT_CONTEXT_EXPIRY_MS = DEFAULT_CONTEXT_EXPIRY_MINUTES * 60 * 1000;

// Shared context keys
export const LOCATION_SLOT = 'location';

// Intent routing
export const INTENTS = ['weather', 'time', 'clothing'] as const;
export type Intent = typeof INTENTS[number];

export const INTENT_KEYWORDS: Readonly<Record<Intent, readonly string[]>> = {
    weather: ['weather', 'temperature', 'forecast', 'rain', 'snow', 'sunny', 'cloud', 'humid', 'wind'],
    time: ['time', 'clock', "o'clock", 'hour'],
    clothing: ['wear', 'clothing', 'clothes', 'outfit', 'dress', 'jacket', 'coat', 'umbrella'],
};

// Requests for the whole picture go to every agent
export const SUMMARY_KEYWORDS: readonly string[] = ['summarize', 'summary', 'rundown', 'brief', 'tell me about'];

export const DEFAULT_INTENTS: readonly Intent[] = ['weather'];

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const settingsSchema = z.object({
    LLM_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL_NAME),
    MAX_MEMORY: z.coerce.number().int().positive().default(DEFAULT_MAX_MEMORY),
    CONTEXT_EXPIRY_MINUTES: z.coerce.number().positive().default(DEFAULT_CONTEXT_EXPIRY_MINUTES),
    DEBUG: booleanFlag.default('false'),
    PARALLEL_FAN_OUT: booleanFlag.default('false'),
});

export interface AppSettings {
    modelName: string;
    maxMemory: number;
    contextExpiryMs: number;
    verbose: boolean;
    parallelFanOut: boolean;
    promptsConfigPath?: string;
}

/**
 * Reads the settings from the environment. Empty variables count as unset.
 *
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
    const raw = Object.fromEntries(
        Object.keys(settingsSchema.shape)
            .map(key => [key, env[key]?.trim()])
            .filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = settingsSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid settings: ${problems.join('; ')}`, 'Settings', { problems });
    }

    return {
        modelName: parsed.data.LLM_MODEL,
        maxMemory: parsed.data.MAX_MEMORY,
        contextExpiryMs: parsed.data.CONTEXT_EXPIRY_MINUTES * 60 * 1000,
        verbose: parsed.data.DEBUG,
        parallelFanOut: parsed.data.PARALLEL_FAN_OUT,
    };
}
