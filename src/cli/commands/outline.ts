/**
 * Outline Command
 *
 *   crag outline "retrieval"          Outline of the best-matching course
 *   crag outline "retrieval" --json   Course, link, instructor and lessons as JSON
 *
 * Course names resolve the same way the assistant's tools resolve them.
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { formatOutline } from '../../agent/tools/outline-tool.js';
import { CLIError } from '../../errors/index.js';
import { openCourseStore } from '../runtime.js';

export function createOutlineCommand(getContext: () => CommandContext): Command {
  return new Command('outline')
    .argument('<course>', 'Course title or part of it')
    .description('Show the lessons of a course')
    .action((courseName: string) => {
      const ctx = getContext();
      const store = openCourseStore(loadConfig(), ctx);

      const course = store.getCourseOutline(courseName);
      if (course === undefined) {
        throw new CLIError(`No course found matching '${courseName}'`, 'Run: crag courses  to see indexed courses');
      }
      ctx.debug(`Resolved '${courseName}' to '${course.title}'`);

      if (ctx.options.json) {
        console.log(JSON.stringify(course, null, 2));
        return;
      }

      ctx.log(formatOutline(course));
    });
}
