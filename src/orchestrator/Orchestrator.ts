import { logFailure, toUserMessage } from '../errors';
import { SharedContext } from '../memory/SharedContext';
import { SessionRunnableConfig, dbg, newGraphConfig, newSessionId } from '../utils';
import { AgentRegistry, createFanOutNode } from './FanOutNode';
import { OrchestratorGraph, compileOrchestratorGraph } from './graph';
import { DEFAULT_ROUTING_RULES, RoutingRules, createIntentClassifierNode } from './IntentClassifierNode';
import { createMergeNode } from './MergeNode';
import { createSlotResolutionNode } from './SlotResolutionNode';

export interface OrchestratorOptions {
    agents: AgentRegistry;
    context?: SharedContext;
    routing?: RoutingRules;
    /** Ask the routed agents concurrently. Replies keep intent order either way. */
    parallelFanOut?: boolean;
    sessionId?: string;
}

/**
 * Top-level coordinator for one conversation. Each turn classifies the utterance, resolves the
 * location, asks the routed agents and merges their replies. A turn never rejects: whatever
 * escapes the agents becomes a sentence for the user.
 */
export class Orchestrator {
    readonly sessionId: string;
    readonly context: SharedContext;
    private readonly graph: OrchestratorGraph;
    private readonly config: SessionRunnableConfig;

    constructor(options: OrchestratorOptions) {
        this.sessionId = options.sessionId ?? newSessionId();
        this.context = options.context ?? new SharedContext();
        this.config = newGraphConfig(this.sessionId);
        this.graph = compileOrchestratorGraph({
            classifyIntent: createIntentClassifierNode(options.routing ?? DEFAULT_ROUTING_RULES),
            resolveSlots: createSlotResolutionNode(this.context),
            fanOut: createFanOutNode(options.agents, { parallel: options.parallelFanOut ?? false }),
            merge: createMergeNode(),
        });
    }

    async process(utterance: string): Promise<string> {
        dbg(`Orchestrator[${this.sessionId}]: "${utterance}"`);
        try {
            const result = await this.graph.invoke({ utterance }, this.config);
            return result.response;
        } catch (error) {
            logFailure(error, 'Orchestrator', { sessionId: this.sessionId, utterance });
            return toUserMessage(error);
        }
    }

    /** Forgets the remembered location and any other shared slots. */
    resetContext(): void {
        this.context.clear();
    }
}
