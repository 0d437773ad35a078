/**
 * Chat Command
 *
 * Interactive multi-turn Q&A. One session per chat, so follow-up
 * questions see the last few exchanges.
 *
 * ```
 * crag chat
 *   ├── /help     list commands
 *   ├── /courses  list indexed courses
 *   ├── /clear    forget the conversation so far
 *   ├── /exit     leave (also /quit, Ctrl+C, Ctrl+D)
 *   └── anything else is a question → CourseAssistant.query(question, session)
 * ```
 *
 * A failed question prints its error and the REPL keeps going.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline';

import type { CommandContext } from '../types.js';
import type { CourseAssistant } from '../../agent/course-assistant.js';
import { formatCitations } from '../../agent/citations.js';
import { loadConfig } from '../../config/loader.js';
import { CLIError } from '../../errors/index.js';
import { createCourseAssistant } from '../runtime.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Mutable state for one chat.
 */
export interface ChatState {
  assistant: CourseAssistant;
  sessionId: string;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  handler: (state: ChatState, ctx: CommandContext) => boolean;
}

// ============================================================================
// REPL Commands
// ============================================================================

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: (_state, ctx) => {
      ctx.log(chalk.bold('Commands:'));
      for (const command of REPL_COMMANDS) {
        ctx.log(`  ${chalk.cyan(`/${command.name}`.padEnd(10))} ${command.description}`);
      }
      return true;
    },
  },
  {
    name: 'courses',
    aliases: ['c'],
    description: 'List indexed courses',
    handler: (state, ctx) => {
      const { totalCourses, courseTitles } = state.assistant.getCourseAnalytics();
      if (totalCourses === 0) {
        ctx.log(chalk.yellow('No courses indexed yet. Run: crag index ./docs'));
        return true;
      }
      ctx.log(chalk.bold(`${totalCourses} course${totalCourses === 1 ? '' : 's'}:`));
      for (const title of courseTitles) {
        ctx.log(`  - ${title}`);
      }
      return true;
    },
  },
  {
    name: 'clear',
    aliases: [],
    description: 'Forget the conversation so far',
    handler: (state, ctx) => {
      state.assistant.clearSession(state.sessionId);
      ctx.log(chalk.dim('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Leave the chat',
    handler: (_state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Match `/name` or an alias. Unknown slash words are not commands.
 */
export function parseREPLCommand(input: string): REPLCommand | undefined {
  if (!input.startsWith('/')) return undefined;
  const word = input.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';
  return REPL_COMMANDS.find((command) => command.name === word || command.aliases.includes(word));
}

// ============================================================================
// Line Handling
// ============================================================================

async function handleQuestion(question: string, state: ChatState, ctx: CommandContext): Promise<void> {
  const { answer, sources } = await state.assistant.query(question, state.sessionId);

  ctx.log('');
  ctx.log(answer || chalk.dim('(no answer)'));
  if (sources.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim(formatCitations(sources)));
  }
  ctx.log('');
}

/**
 * Process one line of input.
 *
 * @returns false when the chat should end
 */
export async function handleChatLine(line: string, state: ChatState, ctx: CommandContext): Promise<boolean> {
  const input = line.trim();
  if (!input) return true;

  if (input.startsWith('/')) {
    const command = parseREPLCommand(input);
    if (!command) {
      ctx.log(chalk.yellow(`Unknown command: ${input}. Type /help for commands.`));
      return true;
    }
    return command.handler(state, ctx);
  }

  try {
    await handleQuestion(input, state, ctx);
  } catch (error) {
    if (error instanceof CLIError) {
      ctx.error(error.message);
      if (error.hint) {
        ctx.log(chalk.dim(error.hint));
      }
    } else {
      ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return true;
}

// ============================================================================
// REPL Loop
// ============================================================================

/**
 * Streams the REPL reads from and prompts to.
 */
export interface ChatIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Main REPL loop using readline.
 *
 * Lines are handled one at a time: input arriving while an answer is being
 * generated waits its turn. When input ends (Ctrl+D, or the end of piped
 * input) the loop resolves after the queued lines are answered; `/exit`
 * drops whatever is still queued.
 */
function runChatREPL(state: ChatState, ctx: CommandContext, io: ChatIO): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: io.input,
      output: io.output,
      prompt: chalk.cyan('crag> '),
    });

    let queue: Promise<void> = Promise.resolve();
    let closed = false;
    let exited = false;

    rl.on('line', (line) => {
      queue = queue
        .then(async () => {
          if (exited) return;
          const keepGoing = await handleChatLine(line, state, ctx);
          if (!keepGoing) {
            exited = true;
            if (!closed) rl.close();
          } else if (!closed) {
            rl.prompt();
          }
        })
        .catch((error: unknown) => {
          ctx.error(error instanceof Error ? error.message : String(error));
          if (!closed) rl.prompt();
        });
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => {
      closed = true;
      void queue.then(() => resolve());
    });

    const { totalCourses } = state.assistant.getCourseAnalytics();
    ctx.log(chalk.bold('Course assistant'));
    ctx.log(chalk.dim(`${totalCourses} course${totalCourses === 1 ? '' : 's'} indexed. Type /help for commands.`));
    ctx.log('');
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 * @param io - Terminal streams, stdin and stdout unless given
 * @returns Configured Commander command
 */
export function createChatCommand(
  getContext: () => CommandContext,
  io: ChatIO = { input: process.stdin, output: process.stdout }
): Command {
  return new Command('chat').description('Interactive multi-turn chat about your courses').action(async () => {
    const ctx = getContext();

    if (ctx.options.json) {
      throw new CLIError('chat does not support --json', 'Use: crag ask "<question>" --json');
    }

    const assistant = createCourseAssistant(loadConfig(), ctx);
    const state: ChatState = { assistant, sessionId: assistant.createSession() };
    ctx.debug(`Session: ${state.sessionId}`);

    await runChatREPL(state, ctx, io);
  });
}
