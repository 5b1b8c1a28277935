import { describe, it, expect } from 'vitest';
import {
  buildAutocompleteTask,
  DEFAULT_SEARCH_INPUT_SELECTOR,
  DEFAULT_SUGGESTION_SELECTORS,
} from '../../tasks/autocomplete.js';
import { createTask } from '../../schemas/task.js';

describe('buildAutocompleteTask', () => {
  it('types the trimmed query and extracts suggestions', () => {
    const input = buildAutocompleteTask({ url: 'https://shop.example.com', query: ' shoes ' });

    expect(input.target).toBe('https://shop.example.com');
    expect(input.actions).toEqual([
      { type: 'navigate' },
      { type: 'wait', durationMs: 2000 },
      { type: 'waitForSelector', selector: DEFAULT_SEARCH_INPUT_SELECTOR, timeoutMs: 10_000 },
      { type: 'fill', selector: DEFAULT_SEARCH_INPUT_SELECTOR, value: '' },
      { type: 'type', selector: DEFAULT_SEARCH_INPUT_SELECTOR, text: 'shoes' },
      { type: 'wait', durationMs: 2000 },
    ]);
    expect(input.extract).toEqual({
      suggestions: {
        selectors: [...DEFAULT_SUGGESTION_SELECTORS],
        multiple: true,
        minLength: 2,
        unique: true,
        fallback: { selector: 'div, span, li', contains: 'shoes', maxLength: 200, limit: 10 },
      },
    });
  });

  it('applies custom options', () => {
    const input = buildAutocompleteTask({
      url: 'https://shop.example.com',
      query: 'hat',
      inputSelector: '#q',
      suggestionSelectors: ['.hint'],
      settleMs: 0,
      timeoutMs: 9000,
      maxRetries: 0,
    });

    expect(input.actions?.[2]).toEqual({ type: 'waitForSelector', selector: '#q', timeoutMs: 10_000 });
    expect(input.actions?.[1]).toEqual({ type: 'wait', durationMs: 0 });
    expect(input.extract?.suggestions?.selectors).toEqual(['.hint']);
    expect(input.timeoutMs).toBe(9000);
    expect(input.maxRetries).toBe(0);
  });

  it('produces a valid task', () => {
    const task = createTask(buildAutocompleteTask({ url: 'https://shop.example.com', query: 'shoes' }), {
      timeoutMs: 30_000,
      maxRetries: 1,
    });

    expect(task.timeoutMs).toBe(30_000);
    expect(task.actions).toHaveLength(6);
  });

  it('rejects an empty query', () => {
    expect(() => buildAutocompleteTask({ url: 'https://shop.example.com', query: '   ' })).toThrow(
      'Query is required and cannot be empty'
    );
  });
});
