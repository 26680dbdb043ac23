import { AppSettings } from '../config';
import { createOrchestrator } from '../orchestrator/createOrchestrator';
import { ShellSession } from '../cli/shell';
import { dbg, say } from '../utils';

/**
 * Handles the 'ask' command: runs a single turn through a fresh orchestrator and prints the reply.
 *
 * @param inputText - The question, already joined from the command's words
 * @param session - Orchestrator to use; one is built from the settings when omitted
 * @throws Error when no question is given
 */
export async function runAsk(
    inputText: string,
    settings: AppSettings,
    session: ShellSession = createOrchestrator(settings),
): Promise<string> {
    const question = inputText.trim();
    if (!question) {
        throw new Error("No input provided for the 'ask' command.");
    }

    dbg(`Asking: "${question}"`);
    const reply = await session.process(question);
    say(reply);
    return reply;
}
