import { AgentFailure, ConfigurationError, logFailure } from '../errors';
import { Capability, normalizeArgs } from '../capabilities/Capability';
import { ConversationMemory } from '../memory/ConversationMemory';
import { AGENT_ROLE, TurnRecord, USER_ROLE } from '../memory/memory_types';
import { PromptService } from '../services/PromptService';
import { dbg, describeError } from '../utils';
import { ActionDirective, RESPONSE_FORMAT, RESPOND_TO_USER, parseActionDirective } from './actionDirective';
import { Oracle } from './Oracle';
import { formatCapabilities, formatCallContext } from './agentUtils';

export const AGENT_FAILURE_REPLY = "I'm sorry, I had trouble processing your request. Please try again.";

const PROMPT_AGENT = 'Agent';
const PROMPT_KEY = 'decide';

/** Ambient slots the orchestrator hands to an agent for one call. */
export type CallContext = Readonly<Record<string, string>>;

/** What the orchestrator needs from an agent. */
export interface MemoryView {
    readonly turns: readonly TurnRecord[];
    readonly length: number;
    readonly maxMemory: number;
}

export interface ConversationalAgent {
    readonly name: string;
    process(utterance: string, context?: CallContext): Promise<string>;
}

export interface AgentOptions {
    name: string;
    description: string;
    capabilities: readonly Capability[];
    oracle: Oracle;
    promptService?: PromptService;
    maxMemory?: number;
}

export function capabilityKey(name: string): string {
    return name.trim().toLowerCase();
}

/**
 * An LLM-mediated specialist. Each call records the user's words, asks the oracle whether to use
 * one of the agent's capabilities or answer directly, and carries out that decision.
 */
export class Agent implements ConversationalAgent {
    readonly name: string;
    readonly description: string;
    private readonly capabilities = new Map<string, Capability>();
    private readonly conversation: ConversationMemory;
    private readonly oracle: Oracle;
    private readonly promptService: PromptService;

    constructor(options: AgentOptions) {
        this.name = options.name;
        this.description = options.description;
        this.oracle = options.oracle;
        this.promptService = options.promptService ?? new PromptService();
        this.conversation = new ConversationMemory(options.maxMemory);

        for (const capability of options.capabilities) {
            this.register(capability);
        }
    }

    private register(capability: Capability): void {
        const key = capabilityKey(capability.name());
        if (!key) {
            throw new ConfigurationError('Capability name must not be empty.', this.component);
        }
        if (key === RESPOND_TO_USER) {
            throw new ConfigurationError(`Capability name "${RESPOND_TO_USER}" is reserved.`, this.component);
        }
        if (this.capabilities.has(key)) {
            throw new ConfigurationError(`Duplicate capability "${key}".`, this.component);
        }
        this.capabilities.set(key, capability);
    }

    private get component(): string {
        return `Agent[${this.name}]`;
    }

    /** Read-only view of the agent's conversation; it follows later turns. */
    get memory(): MemoryView {
        const conversation = this.conversation;
        return {
            get turns() {
                return conversation.turns;
            },
            get length() {
                return conversation.length;
            },
            maxMemory: conversation.maxMemory,
        };
    }

    get capabilityNames(): string[] {
        return [...this.capabilities.keys()];
    }

    async process(utterance: string, context: CallContext = {}): Promise<string> {
        this.conversation.append(USER_ROLE, utterance);

        let directive: ActionDirective;
        try {
            directive = await this.decide(context);
        } catch (error) {
            const failure = error instanceof AgentFailure
                ? error
                : new AgentFailure(`Agent could not decide: ${describeError(error)}`, this.name, {}, { cause: error });
            logFailure(failure, this.component, { utterance, context });
            return AGENT_FAILURE_REPLY;
        }

        return this.dispatch(directive);
    }

    private async decide(context: CallContext): Promise<ActionDirective> {
        const prompt = await this.promptService.getFormattedPrompt(PROMPT_AGENT, PROMPT_KEY, {
            agentName: this.name,
            agentDescription: this.description,
            conversation: this.conversation.toTranscript(),
            context: formatCallContext(context),
            capabilities: formatCapabilities([...this.capabilities.values()]),
            respondAction: RESPOND_TO_USER,
            responseFormat: RESPONSE_FORMAT,
        });

        const reply = await this.oracle.query(prompt);
        this.conversation.append(AGENT_ROLE, reply);

        const parsed = parseActionDirective(reply);
        if (!parsed.success) {
            throw new AgentFailure(parsed.error.message, this.name, { reply }, { cause: parsed.error });
        }
        dbg(`${this.component}: action=${parsed.data.action}`);
        return parsed.data;
    }

    // Capability failures are absorbed by the capability; anything else escaping here reaches the orchestrator
    private async dispatch(directive: ActionDirective): Promise<string> {
        const key = capabilityKey(directive.action);
        const capability = this.capabilities.get(key);
        if (capability) {
            return capability.invoke(directive.args);
        }
        if (key !== RESPOND_TO_USER) {
            dbg(`${this.component}: unknown action "${directive.action}", answering with its args.`);
        }
        return normalizeArgs(directive.args);
    }
}
