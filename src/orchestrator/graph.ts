import { Annotation, END, START, StateGraph } from '@langchain/langgraph';
import { Intent } from '../config';

// Node names
export const CLASSIFY_INTENT = 'classifyIntent';
export const RESOLVE_SLOTS = 'resolveSlots';
export const FAN_OUT = 'fanOut';
export const MERGE = 'merge';

/** State that flows through one orchestrator turn. Every field is replaced by the node that writes it. */
export const OrchestratorState = Annotation.Root({
    utterance: Annotation<string>({ reducer: (_current, update) => update, default: () => '' }),
    intents: Annotation<Intent[]>({ reducer: (_current, update) => update, default: () => [] }),
    location: Annotation<string>({ reducer: (_current, update) => update, default: () => '' }),
    replies: Annotation<string[]>({ reducer: (_current, update) => update, default: () => [] }),
    response: Annotation<string>({ reducer: (_current, update) => update, default: () => '' }),
});

export type TurnState = typeof OrchestratorState.State;
export type TurnUpdate = typeof OrchestratorState.Update;

export type TurnNode = (state: TurnState) => Promise<TurnUpdate>;

export interface OrchestratorNodes {
    classifyIntent: TurnNode;
    resolveSlots: TurnNode;
    fanOut: TurnNode;
    merge: TurnNode;
}

/**
 * Wires the turn pipeline: classifyIntent -> resolveSlots -> fanOut -> merge.
 */
export function createWorkflow(nodes: OrchestratorNodes) {
    return new StateGraph(OrchestratorState)
        .addNode(CLASSIFY_INTENT, nodes.classifyIntent)
        .addNode(RESOLVE_SLOTS, nodes.resolveSlots)
        .addNode(FAN_OUT, nodes.fanOut)
        .addNode(MERGE, nodes.merge)
        .addEdge(START, CLASSIFY_INTENT)
        .addEdge(CLASSIFY_INTENT, RESOLVE_SLOTS)
        .addEdge(RESOLVE_SLOTS, FAN_OUT)
        .addEdge(FAN_OUT, MERGE)
        .addEdge(MERGE, END);
}

export function compileOrchestratorGraph(nodes: OrchestratorNodes) {
    return createWorkflow(nodes).compile();
}

export type OrchestratorGraph = ReturnType<typeof compileOrchestratorGraph>;
