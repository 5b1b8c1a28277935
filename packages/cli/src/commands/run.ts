/**
 * drover run - Run tasks from a JSON file
 *
 * Usage:
 *   drover run tasks.json --pool-size 2 --format json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import { formatError, type Outcome, type TaskResult } from '@drover/core';
import { formatOutcomes, parseFormat } from '../format.js';
import { withManager, type CommonOptions } from './shared.js';

/**
 * Read one task or an array of tasks from a JSON file
 */
export function readTaskFile(path: string): unknown[] {
  const content: unknown = JSON.parse(fs.readFileSync(path, 'utf-8'));
  return Array.isArray(content) ? content : [content];
}

export const runCommand = new Command('run')
  .description('Run one task or an array of tasks from a JSON file, concurrently')
  .argument('<file>', 'JSON file with a task or an array of tasks')
  .option('-p, --pool-size <n>', 'Maximum concurrent browser sessions')
  .option('-t, --timeout <ms>', 'Default per-task timeout in milliseconds')
  .option('-r, --retries <n>', 'Default crash retries per task')
  .option('--chrome <path>', 'Chrome executable')
  .option('--no-headless', 'Show the browser window')
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Log pool and driver activity', false)
  .action(async (file: string, options: CommonOptions) => {
    const spinner = ora();

    try {
      const format = parseFormat(options.format);
      const inputs = readTaskFile(file);

      spinner.start(`Running ${inputs.length} task(s)...`);
      const outcomes: Outcome<TaskResult>[] = await withManager(options, (manager) =>
        Promise.all(inputs.map((input) => manager.submit(input)))
      );

      const failed = outcomes.filter((outcome) => !outcome.success).length;
      if (failed > 0) {
        spinner.warn(`${outcomes.length - failed} succeeded, ${failed} failed`);
        process.exitCode = 1;
      } else {
        spinner.succeed(`${outcomes.length} task(s) completed`);
      }

      console.log(formatOutcomes(outcomes, format));
    } catch (error) {
      spinner.fail('Run failed');
      console.error(chalk.red(formatError(error)));
      process.exitCode = 1;
    }
  });
