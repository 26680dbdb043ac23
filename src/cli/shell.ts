import inquirer from 'inquirer';
import { dbg, say } from '../utils';

const RESET_COMMAND = 'reset';
const SHELL_PROMPT = 'daybrief> ';

export const GREETING = [
    "Hi there! I'm your personal assistant for weather updates, time information and clothing recommendations.",
    'I can help you plan your day and choose an outfit that suits the weather.',
    '',
    'Here are some things you can ask me:',
    "  What's the weather like in New York?",
    '  What should I wear today?',
    '  Give me a summary of my day',
    '  What time is it in London?',
    '',
    `Type 'exit' when you're done, or '${RESET_COMMAND}' to forget the current location.`,
];

export const FOLLOW_UP_PROMPTS = [
    'What else would you like to know?',
    'Is there anything else I can help you with?',
    'What other information would be helpful?',
    'Feel free to ask me anything else!',
    'Would you like to know anything else about the weather or what to wear?',
    "I'm here to help - what's on your mind?",
    'Need any other assistance?',
    "Anything else you'd like to check?",
];

export const EXIT_PHRASES: readonly string[] = [
    'exit', 'bye', 'quit', 'no', 'nope', "that's all", 'that is all',
    'nothing else', "i'm good", 'im good', 'i am good', 'thanks',
    'thank you', "that's it", 'that will be all',
];

export const GOODBYE_MESSAGES = [
    'Take care! Have a great day!',
    'Goodbye! Stay warm and stylish!',
    'See you next time! Have a wonderful day!',
    'Thanks for chatting! Stay amazing!',
    'Bye for now! Remember to dress for the weather!',
];

export const RESET_REPLY = "Okay, I've forgotten the location. Where are you interested in?";

/** The part of the orchestrator the shell talks to. */
export interface ShellSession {
    process(utterance: string): Promise<string>;
    resetContext(): void;
}

export type InputFn = (message: string) => Promise<string>;

/**
 * Prompts the user for one line of input.
 * Shows the follow-up question above the `daybrief> ` prompt.
 */
export async function getCommandInput(message: string): Promise<string> {
    say('');
    say(message);
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: SHELL_PROMPT }
    ]);
    return answers.command.trim();
}

/** Cycles through a fixed list of lines, starting with the first. */
export class Rotation {
    private index = 0;

    constructor(private readonly items: readonly string[]) {}

    next(): string {
        const item = this.items[this.index];
        this.index = (this.index + 1) % this.items.length;
        return item;
    }
}

export function isExitPhrase(input: string): boolean {
    return EXIT_PHRASES.includes(input.trim().toLowerCase());
}

/**
 * Starts the interactive chat loop.
 *
 * Every line goes to the orchestrator, except:
 * - an exit phrase, which ends the session with a goodbye
 * - 'reset', which forgets the remembered location
 * - an empty line, which is ignored
 *
 * @param session - The orchestrator serving this conversation
 * @param readInput - Source of user lines; the inquirer prompt by default
 */
export async function startShell(session: ShellSession, readInput: InputFn = getCommandInput): Promise<void> {
    GREETING.forEach(line => say(line));

    const followUps = new Rotation(FOLLOW_UP_PROMPTS);
    const goodbyes = new Rotation(GOODBYE_MESSAGES);

    let shellRunning = true;
    while (shellRunning) {
        const commandInput = (await readInput(followUps.next())).trim();

        switch (true) {
            case commandInput === '':
                break;
            case isExitPhrase(commandInput):
                say('');
                say(goodbyes.next());
                shellRunning = false;
                break;
            case commandInput.toLowerCase() === RESET_COMMAND:
                session.resetContext();
                dbg('Shell: shared context cleared.');
                say(RESET_REPLY);
                break;
            default: {
                const reply = await session.process(commandInput);
                say('');
                say(reply);
                break;
            }
        }
    }
}
