import { LOCATION_SLOT } from '../config';
import { SlotResolutionFailure } from '../errors';
import { SharedContext } from '../memory/SharedContext';
import { dbg } from '../utils';
import { TurnNode } from './graph';

const LOCATION_MARKER = 'in';
const EDGE_PUNCTUATION = /^[\s"'`.,!?;:()[\]]+|[\s"'`.,!?;:()[\]]+$/g;

/**
 * Picks a location out of an utterance: everything after the first standalone "in",
 * or the last word when there is no "in" with something after it.
 */
export function extractLocation(utterance: string): string {
    const tokens = utterance.trim().split(/\s+/).filter(token => token !== '');
    const marker = tokens.findIndex(token => token.toLowerCase() === LOCATION_MARKER);
    const candidate = marker !== -1 && marker < tokens.length - 1
        ? tokens.slice(marker + 1).join(' ')
        : tokens[tokens.length - 1] ?? '';
    return candidate.replace(EDGE_PUNCTUATION, '');
}

/**
 * Resolves the location for this turn. A location already in the shared context wins over
 * whatever the utterance names. The result is written back so the next turn reuses it.
 *
 * @throws SlotResolutionFailure when neither the context nor the utterance yields a location.
 */
export function resolveLocation(utterance: string, context: SharedContext): string {
    const location = context.get(LOCATION_SLOT) ?? extractLocation(utterance);
    if (!location) {
        throw new SlotResolutionFailure('Could not determine a location from the request.', 'SlotResolution', location, { utterance });
    }
    context.update(LOCATION_SLOT, location);
    return location;
}

export function createSlotResolutionNode(context: SharedContext): TurnNode {
    return async state => {
        const location = resolveLocation(state.utterance, context);
        dbg(`SlotResolution: location=${location}`);
        return { location };
    };
}
