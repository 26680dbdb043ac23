import { AppSettings } from '../config';
import { createOrchestrator } from '../orchestrator/createOrchestrator';
import { InputFn, ShellSession, startShell } from '../cli/shell';
import { dbg } from '../utils';

/**
 * Handles the 'chat' command: one orchestrator serves the whole interactive session.
 */
export async function runChat(
    settings: AppSettings,
    session: ShellSession = createOrchestrator(settings),
    readInput?: InputFn,
): Promise<void> {
    dbg(`Starting chat with model ${settings.modelName}.`);
    await startShell(session, readInput);
    dbg('Chat session ended.');
}
