/**
 * Courses Command
 *
 * Lists indexed courses:
 *   crag courses         - table of courses
 *   crag courses --json  - course summaries as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { formatTable, type Column } from '../../utils/table.js';
import { openCourseStore } from '../runtime.js';

type CourseColumn = 'title' | 'instructor' | 'lessons' | 'chunks';

const COLUMNS: Column<CourseColumn>[] = [
  { header: 'Title', key: 'title', maxWidth: 48 },
  { header: 'Instructor', key: 'instructor', maxWidth: 24 },
  { header: 'Lessons', key: 'lessons', align: 'right' },
  { header: 'Chunks', key: 'chunks', align: 'right' },
];

/**
 * Create the courses command
 */
export function createCoursesCommand(getContext: () => CommandContext): Command {
  return new Command('courses')
    .alias('ls')
    .description('List indexed courses')
    .action(() => {
      const ctx = getContext();
      const store = openCourseStore(loadConfig(), ctx);

      const courses = store.listCourses();
      ctx.debug(`Found ${courses.length} course(s)`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ count: courses.length, courses }, null, 2));
        return;
      }

      if (courses.length === 0) {
        ctx.log(chalk.yellow('No courses indexed yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('crag index ./docs')}`);
        return;
      }

      const rows = courses.map((course) => ({
        title: course.title,
        instructor: course.instructor ?? '-',
        lessons: course.lessonCount.toLocaleString(),
        chunks: course.chunkCount.toLocaleString(),
      }));

      ctx.log(formatTable(COLUMNS, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${courses.length} course${courses.length === 1 ? '' : 's'} indexed`));
    });
}
