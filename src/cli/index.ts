#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands
 * of the `crag` command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createCoursesCommand } from './commands/courses.js';
import { createIndexCommand } from './commands/index.js';
import { createOutlineCommand } from './commands/outline.js';
import { createSearchCommand } from './commands/search.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

/**
 * Version from package.json, which sits two levels up from both
 * src/cli/ and dist/cli/.
 */
function readVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    // Fall through to the placeholder
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('crag')
  .description('Course materials assistant - index lesson scripts and ask questions about them')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('crag index ./docs')}                        Index a folder of course scripts
  ${chalk.cyan('crag ask "What does lesson 2 cover?"')}     Ask a question about the courses
  ${chalk.cyan('crag chat')}                                Start an interactive chat
  ${chalk.cyan('crag search "retrieval" -c "Advanced"')}    Search course content directly
  ${chalk.cyan('crag outline "Advanced Retrieval"')}        Show a course outline
  ${chalk.cyan('crag courses')}                             List indexed courses
  ${chalk.cyan('crag config set search.max_results 8')}     Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// COMMANDS
// ============================================================================

program.addCommand(createIndexCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createOutlineCommand(getContext));
program.addCommand(createCoursesCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: crag --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
