import { LOCATION_SLOT, Intent } from '../config';
import { ConversationalAgent } from '../agents/Agent';
import { dbg } from '../utils';
import { TurnNode } from './graph';

export type AgentRegistry = Readonly<Partial<Record<Intent, ConversationalAgent>>>;

export interface FanOutOptions {
    parallel?: boolean;
}

/**
 * Asks the agent of every intent, in intent order, and keeps the replies that say something.
 * Intents without a registered agent are skipped.
 */
export async function fanOut(
    agents: AgentRegistry,
    intents: readonly Intent[],
    utterance: string,
    location: string,
    options: FanOutOptions = {}
): Promise<string[]> {
    const routed: ConversationalAgent[] = [];
    for (const intent of intents) {
        const agent = agents[intent];
        if (agent) {
            routed.push(agent);
        } else {
            dbg(`FanOut: no agent registered for intent "${intent}", skipping.`);
        }
    }

    const context = { [LOCATION_SLOT]: location };
    let replies: string[];
    if (options.parallel) {
        replies = await Promise.all(routed.map(agent => agent.process(utterance, context)));
    } else {
        replies = [];
        for (const agent of routed) {
            replies.push(await agent.process(utterance, context));
        }
    }

    return replies.filter(reply => reply.trim() !== '');
}

export function createFanOutNode(agents: AgentRegistry, options: FanOutOptions = {}): TurnNode {
    return async state => ({
        replies: await fanOut(agents, state.intents, state.utterance, state.location, options),
    });
}
