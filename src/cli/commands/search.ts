/**
 * Search Command
 *
 * Full-text search over course content, without the language model:
 *
 *   crag search "chunk overlap"
 *   crag search "ranking" --course retrieval --lesson 3
 *   crag search "prompts" --limit 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { noResultsMessage } from '../../agent/tools/search-tool.js';
import { CLIError } from '../../errors/index.js';
import type { SearchResults } from '../../search/types.js';
import { truncate } from '../../utils/table.js';
import { openCourseStore } from '../runtime.js';
import { parseInput, SearchArgsSchema, SearchOptionsSchema } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw command options, as strings from Commander.
 */
interface SearchCommandOptions {
  course?: string;
  lesson?: string;
  limit?: string;
}

const PREVIEW_LENGTH = 200;

// ============================================================================
// Formatting
// ============================================================================

/**
 * One numbered entry per match: location, score and a one-line preview.
 */
export function formatSearchResults(results: SearchResults): string {
  return results.documents
    .map((document, i) => {
      const meta = results.metadata[i];
      const location =
        meta === undefined
          ? ''
          : meta.lessonNumber !== null
            ? `${meta.courseTitle} - Lesson ${meta.lessonNumber}`
            : meta.courseTitle;
      const score = (results.scores[i] ?? 0).toFixed(2);
      const preview = truncate(document.replace(/\s+/g, ' '), PREVIEW_LENGTH);
      return `${chalk.bold(`[${i + 1}] ${location}`)} ${chalk.dim(`(${score})`)}\n    ${preview}`;
    })
    .join('\n\n');
}

// ============================================================================
// Command Factory
// ============================================================================

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Words to search for')
    .description('Search course content')
    .option('-c, --course <name>', 'Limit to one course (partial names work)')
    .option('-l, --lesson <number>', 'Limit to one lesson number')
    .option('-n, --limit <number>', 'Maximum results (default: search.max_results)')
    .action((rawQuery: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const { query } = parseInput(SearchArgsSchema, { query: rawQuery }, 'search query');
      const options = parseInput(SearchOptionsSchema, cmdOptions, 'search options');
      ctx.debug(`Query: "${query}" options: ${JSON.stringify(options)}`);

      const store = openCourseStore(loadConfig(), ctx);
      const results = store.search({
        query,
        courseName: options.course,
        lessonNumber: options.lesson,
        limit: options.limit,
      });

      if (results.error !== null) {
        throw new CLIError(results.error, 'Run: crag courses  to see indexed courses');
      }

      if (ctx.options.json) {
        const matches = results.documents.map((content, i) => ({
          content,
          score: results.scores[i],
          ...results.metadata[i],
        }));
        console.log(JSON.stringify({ query, count: matches.length, results: matches }, null, 2));
        return;
      }

      if (results.documents.length === 0) {
        ctx.log(chalk.yellow(noResultsMessage(options.course, options.lesson)));
        return;
      }

      ctx.log(formatSearchResults(results));
    });
}
