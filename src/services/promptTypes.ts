import { z } from 'zod';

/**
 * Shape of a prompts configuration file:
 * `{ "prompts": { "<agentName>": { "<promptKey>": { "inputs": [...], "path": "..." } } } }`
 */
export const promptsConfigSchema = z.object({
    prompts: z.record(z.record(z.object({
        // Placeholder names the template expects; informational only
        inputs: z.array(z.string()).default([]),
        path: z.string().min(1),
    }))),
});

export type FullPromptsConfig = z.infer<typeof promptsConfigSchema>;

/** Values substituted for `{{key}}` placeholders. */
export type PromptContext = Readonly<Record<string, string | number>>;
