/**
 * Ask Command
 *
 * One question, one answer with cited sources:
 *
 *   crag ask "What does lesson 2 of the retrieval course cover?"
 *   crag ask "Who teaches prompt design?" --json
 *
 * The model decides whether to search course content or fetch an outline;
 * see CourseAssistant. A failure anywhere prints one error and no partial
 * answer.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { formatCitations } from '../../agent/citations.js';
import type { Source } from '../../agent/tools/types.js';
import { createCourseAssistant } from '../runtime.js';
import { parseInput, QuestionSchema } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * JSON output format for the ask command.
 */
interface AskOutputJSON {
  question: string;
  answer: string;
  sources: Source[];
  metadata: {
    model: string;
    totalMs: number;
  };
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 * @returns Configured Commander command
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Natural language question about the indexed courses')
    .description('Ask a question about your course materials')
    .action(async (rawQuestion: string) => {
      const ctx = getContext();
      const startTime = performance.now();

      const question = parseInput(QuestionSchema, rawQuestion, 'question');
      ctx.debug(`Question: "${question}"`);

      const config = loadConfig();
      const assistant = createCourseAssistant(config, ctx);
      ctx.debug(`Model: ${config.model}, tool rounds: ${config.orchestrator.max_tool_rounds}`);

      const { answer, sources } = await assistant.query(question);
      const totalMs = performance.now() - startTime;

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question,
          answer,
          sources,
          metadata: { model: config.model, totalMs: Math.round(totalMs) },
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(answer || chalk.dim('(no answer)'));

      if (sources.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Sources:'));
        ctx.log(formatCitations(sources));
      }

      if (ctx.options.verbose) {
        ctx.log('');
        ctx.log(chalk.dim('─'.repeat(50)));
        ctx.log(chalk.dim(`Total: ${totalMs.toFixed(0)}ms`));
        ctx.log(chalk.dim(`Model: ${config.model}`));
      }
    });
}
