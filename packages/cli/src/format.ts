/**
 * Output formatting for CLI commands
 */

import chalk from 'chalk';
import { formatError, type Outcome, type TaskResult } from '@drover/core';

export type OutputFormat = 'text' | 'json';

/**
 * Parse the --format option
 */
export function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new Error(`Unknown format: ${value} (expected text or json)`);
}

/**
 * JSON shape of one outcome
 */
export function outcomeToJson(outcome: Outcome<TaskResult>): Record<string, unknown> {
  if (outcome.success) {
    const { metadata } = outcome.value;
    return {
      success: true,
      taskId: outcome.value.taskId,
      data: outcome.value.data,
      metadata: {
        ...metadata,
        startedAt: metadata.startedAt.toISOString(),
        completedAt: metadata.completedAt.toISOString(),
      },
    };
  }
  return { success: false, error: outcome.error.toJSON() };
}

/**
 * Render the outcomes of `drover run`
 */
export function formatOutcomes(outcomes: Outcome<TaskResult>[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(outcomes.map(outcomeToJson), null, 2);
  }

  return outcomes.map((outcome) => formatOutcomeText(outcome)).join('\n\n');
}

function formatOutcomeText(outcome: Outcome<TaskResult>): string {
  if (!outcome.success) {
    return chalk.red(`✗ ${formatError(outcome.error)}`);
  }

  const { taskId, data, metadata } = outcome.value;
  const retries = metadata.retryCount > 0 ? `, ${metadata.retryCount} retry` : '';
  const lines = [chalk.green(`✓ ${taskId}`) + chalk.gray(` (${metadata.durationMs}ms${retries})`)];

  for (const [field, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      lines.push(`  ${chalk.bold(field)}:`);
      for (const item of value) {
        lines.push(`    - ${item}`);
      }
    } else {
      lines.push(`  ${chalk.bold(field)}: ${value ?? chalk.gray('(none)')}`);
    }
  }

  return lines.join('\n');
}

/**
 * Render the outcome of `drover suggest`
 */
export function formatSuggestions(
  query: string,
  outcome: Outcome<TaskResult>,
  format: OutputFormat
): string {
  const suggestions = outcome.success ? toList(outcome.value.data.suggestions) : [];

  if (format === 'json') {
    return JSON.stringify(
      outcome.success
        ? { query, suggestions, metadata: outcomeToJson(outcome).metadata }
        : { query, error: outcome.error.toJSON() },
      null,
      2
    );
  }

  if (!outcome.success) {
    return chalk.red(`✗ ${formatError(outcome.error)}`);
  }
  if (suggestions.length === 0) {
    return chalk.yellow(`No suggestions found for "${query}"`);
  }

  return [
    chalk.bold(`Suggestions for "${query}":`),
    ...suggestions.map((suggestion, i) => `  ${i + 1}. ${suggestion}`),
  ].join('\n');
}

function toList(value: string | string[] | null | undefined): string[] {
  if (Array.isArray(value)) return value;
  return value ? [value] : [];
}
