import { TurnNode } from './graph';

export const NO_REPLY_RESPONSE = "I apologize, but I couldn't process your request.";
export const REPLY_SEPARATOR = '\n\n';

export function mergeReplies(replies: readonly string[]): string {
    return replies.length > 0 ? replies.join(REPLY_SEPARATOR) : NO_REPLY_RESPONSE;
}

export function createMergeNode(): TurnNode {
    return async state => ({ response: mergeReplies(state.replies) });
}
