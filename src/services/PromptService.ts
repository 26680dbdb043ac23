import * as fs from 'fs/promises';
import * as path from 'path';
import { FullPromptsConfig, PromptContext, promptsConfigSchema } from './promptTypes';
import { describeError } from '../utils';

// Default templates ship next to the agents: <agents>/prompts/<agentName>/<promptKey>.txt
export const DEFAULT_PROMPTS_DIR = path.resolve(__dirname, '..', 'agents', 'prompts');

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
    defaultPromptsDir?: string;
}

// --- PromptService Class ---
export class PromptService {
    private loadedConfig?: FullPromptsConfig;
    private readonly configFilePath?: string;
    private readonly configDir?: string;
    private readonly templateCache = new Map<string, string>();

    // Store injected dependencies or defaults
    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;
    private readonly defaultPromptsDir: string;

    constructor(configFilePath?: string, deps?: PromptServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;
        this.defaultPromptsDir = deps?.defaultPromptsDir || DEFAULT_PROMPTS_DIR;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    private async _ensureConfigLoaded(): Promise<void> {
        if (this.configFilePath && !this.loadedConfig) {
            try {
                const fileContent = await this._readFile(this.configFilePath);
                this.loadedConfig = promptsConfigSchema.parse(JSON.parse(fileContent));
            } catch (error) {
                // Covers a missing file, malformed JSON and a config of the wrong shape
                throw new Error(`Failed to load or parse prompt configuration file: ${this.configFilePath}. Original error: ${describeError(error)}`);
            }
        }
    }

    /**
     * Loads the template for an agent's prompt and fills in its `{{placeholders}}`.
     * A template named in the prompts configuration wins over the default one.
     * Templates are read once per service instance.
     */
    public async getFormattedPrompt(
        agentName: string,
        promptKey: string,
        context: PromptContext
    ): Promise<string> {
        await this._ensureConfigLoaded();

        const templatePath = this._templatePath(agentName, promptKey);
        let promptText = this.templateCache.get(templatePath);
        if (promptText === undefined) {
            try {
                promptText = await this._readFile(templatePath);
            } catch (error) {
                throw new Error(`Error loading prompt file ${templatePath} for agent ${agentName}, prompt ${promptKey}. Original error: ${describeError(error)}`);
            }
            if (!promptText) {
                throw new Error(`Failed to load prompt for agent ${agentName}, prompt ${promptKey}.`);
            }
            this.templateCache.set(templatePath, promptText);
        }

        for (const [key, value] of Object.entries(context)) {
            // Escape special characters in the key; replace with a function so `$` in values stays literal
            const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
            const regex = new RegExp(`{{${escapedKey}}}`, 'g');
            promptText = promptText.replace(regex, () => String(value));
        }

        return promptText;
    }

    private _templatePath(agentName: string, promptKey: string): string {
        const customPromptConfig = this.loadedConfig?.prompts[agentName]?.[promptKey];
        if (customPromptConfig) {
            return this._resolvePath(customPromptConfig.path);
        }
        return this.resolvePathFn(this.defaultPromptsDir, agentName, `${promptKey}.txt`);
    }

    private async _readFile(filePath: string): Promise<string> {
        try {
            return await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Reading file ${filePath} failed: ${describeError(error)}`);
        }
    }

    private _resolvePath(promptPath: string): string {
        if (this.isAbsoluteFn(promptPath)) {
            return promptPath;
        }
        // Relative paths in a prompts configuration are relative to that file
        if (this.configDir) {
            return this.resolvePathFn(this.configDir, promptPath);
        }
        return this.resolvePathFn(promptPath);
    }
}
