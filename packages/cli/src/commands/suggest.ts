/**
 * drover suggest - Collect search-box autocomplete suggestions
 *
 * Usage:
 *   drover suggest "running sho" --url https://shop.example.com
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildAutocompleteTask, formatError } from '@drover/core';
import { formatSuggestions, parseFormat } from '../format.js';
import { parseInteger, withManager, type CommonOptions } from './shared.js';

interface SuggestOptions extends CommonOptions {
  url: string;
  input?: string;
  settle?: string;
}

export const suggestCommand = new Command('suggest')
  .description('Type a query into a search box and print the suggestions shown')
  .argument('<query>', 'Text to type')
  .requiredOption('-u, --url <url>', 'Page hosting the search box')
  .option('-i, --input <selector>', 'Search input selector')
  .option('-s, --settle <ms>', 'Pause after load and after typing', '2000')
  .option('-t, --timeout <ms>', 'Task timeout in milliseconds')
  .option('-r, --retries <n>', 'Crash retries')
  .option('--chrome <path>', 'Chrome executable')
  .option('--no-headless', 'Show the browser window')
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Log pool and driver activity', false)
  .action(async (query: string, options: SuggestOptions) => {
    const spinner = ora();

    try {
      const format = parseFormat(options.format);
      const input = buildAutocompleteTask({
        url: options.url,
        query,
        inputSelector: options.input,
        settleMs: options.settle === undefined ? undefined : parseInteger('settle', options.settle),
      });

      spinner.start(`Collecting suggestions from ${options.url}...`);
      const outcome = await withManager({ ...options, poolSize: '1' }, (manager) => manager.submit(input));

      if (outcome.success) {
        spinner.succeed(`Done in ${outcome.value.metadata.durationMs}ms`);
      } else {
        spinner.fail('Lookup failed');
        process.exitCode = 1;
      }

      console.log(formatSuggestions(query, outcome, format));
    } catch (error) {
      spinner.fail('Lookup failed');
      console.error(chalk.red(formatError(error)));
      process.exitCode = 1;
    }
  });
