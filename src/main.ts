#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { AppSettings, loadSettings } from './config';
import { AssistantError } from './errors';
import { dbg, describeError, setVerbose } from './utils';
import { runAsk } from './commands/ask';
import { runChat } from './commands/chat';

const GENERAL_ERROR = 1;
const ASK_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

interface GlobalOptions {
  model?: string;
  promptsConfig?: string;
  maxMemory?: number;
  contextExpiry?: number;
  parallel?: boolean;
  verbose?: boolean;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

/**
 * Environment settings with the command line's global options laid over them.
 */
export function resolveSettings(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): AppSettings {
  const settings = loadSettings(env);
  return {
    modelName: options.model ?? settings.modelName,
    maxMemory: options.maxMemory ?? settings.maxMemory,
    contextExpiryMs: options.contextExpiry !== undefined ? options.contextExpiry * 60 * 1000 : settings.contextExpiryMs,
    verbose: options.verbose ?? settings.verbose,
    parallelFanOut: options.parallel ?? settings.parallelFanOut,
    promptsConfigPath: options.promptsConfig ? path.resolve(options.promptsConfig) : undefined,
  };
}

function settingsOrExit(program: Command): AppSettings {
  try {
    const settings = resolveSettings(program.opts<GlobalOptions>());
    setVerbose(settings.verbose);
    dbg(`Using model: ${settings.modelName}`);
    if (settings.promptsConfigPath) {
      dbg(`Using prompts configuration file: ${settings.promptsConfigPath}`);
    }
    return settings;
  } catch (error) {
    console.error(error instanceof AssistantError ? error.message : `Failed to load settings: ${describeError(error)}`);
    process.exit(GENERAL_ERROR);
  }
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('daybrief')
    .version('1.0.0')
    .description('Daybrief - weather, local time and what to wear, in one answer')
    .option('-m, --model <model_name>', 'AI model to use')
    .option('--prompts-config <path>', 'Path to a JSON file for custom prompt configurations')
    .option('--max-memory <turns>', 'Records each agent keeps in its conversation memory', positiveInteger)
    .option('--context-expiry <minutes>', 'Minutes before the remembered location is forgotten', positiveNumber)
    .option('--parallel', 'Ask the routed agents concurrently')
    .option('-v, --verbose', 'Print debug output');

  // --- Define Commands ---

  // 'ask' command
  program
    .command('ask')
    .description('Ask a single question and print the answer')
    .argument('<input...>', 'The question')
    .action(async (inputParts: string[]) => {
      const settings = settingsOrExit(program);
      try {
        await runAsk(inputParts.join(' '), settings);
        dbg('Ask command finished successfully.');
      } catch (error) {
        console.error(`Ask command failed: ${describeError(error)}`);
        process.exit(ASK_ERROR);
      }
    });

  // 'chat' command
  program
    .command('chat', { isDefault: true })
    .description('Start an interactive conversation')
    .action(async () => {
      const settings = settingsOrExit(program);
      try {
        await runChat(settings);
      } catch (error) {
        console.error(`Chat session failed: ${describeError(error)}`);
        process.exit(GENERAL_ERROR);
      }
    });

  // --- Parse and Execute ---
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Errors while parsing the command line itself
    console.error(`Error during command parsing or execution: ${describeError(error)}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Unhandled application error: ${describeError(error)}`);
    process.exit(UNHANDLED_ERROR);
  });
}
