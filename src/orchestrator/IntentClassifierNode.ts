import { DEFAULT_INTENTS, INTENTS, INTENT_KEYWORDS, Intent, SUMMARY_KEYWORDS } from '../config';
import { RoutingAmbiguity, logFailure } from '../errors';
import { dbg } from '../utils';
import { TurnNode } from './graph';

export interface RoutingRules {
    keywords: Readonly<Record<Intent, readonly string[]>>;
    summaryKeywords: readonly string[];
    defaultIntents: readonly Intent[];
}

export const DEFAULT_ROUTING_RULES: RoutingRules = {
    keywords: INTENT_KEYWORDS,
    summaryKeywords: SUMMARY_KEYWORDS,
    defaultIntents: DEFAULT_INTENTS,
};

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords match at the start of a word: "wearing" hits "wear", "sometimes" misses "time"
function mentions(utterance: string, keyword: string): boolean {
    return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}`).test(utterance);
}

/**
 * Maps an utterance to the intents it mentions, in the fixed order weather, time, clothing.
 * Never returns an empty list: an utterance that mentions nothing gets the default intents.
 */
export function classifyIntents(utterance: string, rules: RoutingRules = DEFAULT_ROUTING_RULES): Intent[] {
    const text = utterance.toLowerCase();

    if (rules.summaryKeywords.some(keyword => mentions(text, keyword))) {
        return [...INTENTS];
    }

    const matched = INTENTS.filter(intent => rules.keywords[intent].some(keyword => mentions(text, keyword)));
    if (matched.length > 0) {
        return matched;
    }

    logFailure(
        new RoutingAmbiguity('No intent keywords matched; using the default intents.', { defaultIntents: rules.defaultIntents }),
        'IntentClassifier',
        { utterance },
        'debug'
    );
    return [...rules.defaultIntents];
}

export function createIntentClassifierNode(rules: RoutingRules = DEFAULT_ROUTING_RULES): TurnNode {
    return async state => {
        const intents = classifyIntents(state.utterance, rules);
        dbg(`IntentClassifier: ${intents.join(', ')}`);
        return { intents };
    };
}
