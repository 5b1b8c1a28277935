/**
 * Autocomplete task preset
 *
 * Builds a task that types a query into a search box and collects the
 * suggestions the page renders underneath it.
 */

import { Errors } from '../errors.js';
import type { TaskInput } from '../types/task.js';

/**
 * Selectors commonly used for suggestion dropdowns, tried in order
 */
export const DEFAULT_SUGGESTION_SELECTORS: readonly string[] = [
  "div[class*='cursor-pointer'] span",
  'div.cursor-pointer span',
  "[role='option']",
  "div[class*='search'] div[class*='result']",
  "div[class*='suggestion']",
  "div[class*='autocomplete'] span",
  "ul[class*='suggestions'] li",
  "div[class*='dropdown'] div",
];

export const DEFAULT_SEARCH_INPUT_SELECTOR = "input[type='search'], input[type='text']";

export interface AutocompleteTaskOptions {
  /** Page hosting the search box */
  url: string;
  /** Text to type */
  query: string;
  inputSelector?: string;
  suggestionSelectors?: readonly string[];
  /** Pause after load and after typing, for client-side rendering */
  settleMs?: number;
  /** How long to wait for the search box */
  inputTimeoutMs?: number;
  /** Cap on suggestions found by the broad fallback scan */
  fallbackLimit?: number;
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Build the task input for an autocomplete lookup
 *
 * Suggestions shorter than three characters are ignored. When none of the
 * suggestion selectors match, any div, span or li mentioning the query is
 * taken instead.
 */
export function buildAutocompleteTask(options: AutocompleteTaskOptions): TaskInput {
  const query = options.query.trim();
  if (query.length === 0) {
    throw Errors.invalidTask('Query is required and cannot be empty');
  }

  const inputSelector = options.inputSelector ?? DEFAULT_SEARCH_INPUT_SELECTOR;
  const settleMs = options.settleMs ?? 2000;

  return {
    target: options.url,
    actions: [
      { type: 'navigate' },
      { type: 'wait', durationMs: settleMs },
      { type: 'waitForSelector', selector: inputSelector, timeoutMs: options.inputTimeoutMs ?? 10_000 },
      { type: 'fill', selector: inputSelector, value: '' },
      { type: 'type', selector: inputSelector, text: query },
      { type: 'wait', durationMs: settleMs },
    ],
    extract: {
      suggestions: {
        selectors: [...(options.suggestionSelectors ?? DEFAULT_SUGGESTION_SELECTORS)],
        multiple: true,
        minLength: 2,
        unique: true,
        fallback: {
          selector: 'div, span, li',
          contains: query,
          maxLength: 200,
          limit: options.fallbackLimit ?? 10,
        },
      },
    },
    timeoutMs: options.timeoutMs,
    maxRetries: options.maxRetries,
  };
}
