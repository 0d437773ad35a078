/**
 * Index Command
 *
 * Adds every course document in a folder to the course store.
 *
 * Usage:
 *   crag index                 Index the configured docs_path
 *   crag index ./docs          Index a specific folder
 *   crag index ./docs --clear  Drop existing courses first
 *   crag index --json          Print the result as JSON
 *
 * Courses whose title is already indexed are skipped; a file that fails to
 * parse is reported and the rest still get indexed.
 */

import { Command } from 'commander';
import { resolve, relative } from 'node:path';
import { existsSync, statSync } from 'node:fs';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { ingestCourseFolder } from '../../indexer/pipeline.js';
import type { IngestResult } from '../../indexer/types.js';
import { CLIError } from '../../errors/index.js';
import { chunkingFromConfig, openCourseStore } from '../runtime.js';

/**
 * Command-specific options.
 */
interface IndexCommandOptions {
  clear?: boolean;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function showSummary(ctx: CommandContext, result: IngestResult, folder: string): void {
  ctx.log(
    `${chalk.green('✓')} Added ${plural(result.coursesAdded, 'course')} (${plural(result.chunksAdded, 'chunk')})`
  );

  if (result.skipped.length > 0) {
    ctx.log(chalk.dim(`  Already indexed: ${result.skipped.join(', ')}`));
  }
  if (result.errors.length > 0) {
    const failed = result.errors.map((failure) => relative(folder, failure.path));
    ctx.log(chalk.yellow(`  ${plural(failed.length, 'file')} could not be indexed: ${failed.join(', ')}`));
  }
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('[folder]', 'Folder of course documents (defaults to docs_path from config)')
    .description('Index course documents for searching')
    .option('--clear', 'Remove all indexed courses before indexing', false)
    .action(async (folder: string | undefined, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const folderPath = resolve(folder ?? config.docs_path);
      if (!existsSync(folderPath)) {
        throw new CLIError(`Path does not exist: ${folderPath}`, 'Check the path and try again', 3);
      }
      if (!statSync(folderPath).isDirectory()) {
        throw new CLIError(
          `Path is not a directory: ${folderPath}`,
          'crag index takes a folder of course documents, not a file'
        );
      }

      ctx.debug(`Indexing folder: ${folderPath}`);
      ctx.debug(`Chunking: ${config.chunking.chunk_size} chars, ${config.chunking.chunk_overlap} overlap`);

      const store = openCourseStore(config, ctx);

      let spinner: Ora | null = null;
      if (!ctx.options.json && process.stdout.isTTY) {
        spinner = ora({ text: 'Scanning course documents...', prefixText: chalk.cyan('Indexing') }).start();
      }

      let result: IngestResult;
      try {
        result = await ingestCourseFolder(store, folderPath, {
          chunking: chunkingFromConfig(config),
          clearExisting: cmdOptions.clear,
          logger: ctx,
          onFile: (path, index, total) => {
            if (spinner) {
              spinner.text = `[${index + 1}/${total}] ${relative(folderPath, path)}`;
            }
          },
        });
      } catch (error) {
        spinner?.fail('Indexing failed');
        throw error;
      }

      spinner?.stop();

      if (ctx.options.json) {
        console.log(JSON.stringify({ folder: folderPath, ...result }, null, 2));
        return;
      }

      showSummary(ctx, result, folderPath);
      ctx.log(chalk.dim(`${plural(store.getCourseCount(), 'course')} indexed in total`));
    });
}
