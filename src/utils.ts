import * as uuid from 'uuid';
import { RunnableConfig } from '@langchain/core/runnables';

export interface SessionGraphConfigurable {
    thread_id: string;
}

export interface SessionRunnableConfig extends RunnableConfig {
    configurable: SessionGraphConfigurable;
}

let verbose = false;

/**
 * Turns debug output on or off. Off by default so that the chat shell stays readable.
 */
export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function dbg(s: string) {
    if (verbose) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

export function newSessionId(): string {
    return uuid.v4();
}

/**
 * Creates the runnable config for one orchestrator graph invocation.
 * The thread id ties every invocation of a conversation to the same session.
 *
 * @param threadId - Session id to reuse; a fresh one is generated when omitted.
 */
export function newGraphConfig(threadId: string = newSessionId()): SessionRunnableConfig {
    return { configurable: { thread_id: threadId } };
}

/**
 * Renders any thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}
