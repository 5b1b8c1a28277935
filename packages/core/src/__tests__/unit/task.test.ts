import { describe, it, expect } from 'vitest';
import { createTask, TaskInputSchema } from '../../schemas/task.js';
import { DroverError } from '../../errors.js';

const defaults = { timeoutMs: 1000, maxRetries: 1 };

function invalidTaskError(input: unknown): DroverError {
  try {
    createTask(input, defaults);
  } catch (error) {
    if (error instanceof DroverError) return error;
    throw error;
  }
  throw new Error('Expected createTask to throw');
}

describe('createTask', () => {
  it('applies defaults to minimal input', () => {
    const task = createTask({ target: 'https://example.com' }, defaults);

    expect(task.id).toMatch(/^task_/);
    expect(task.target).toBe('https://example.com');
    expect(task.actions).toEqual([{ type: 'navigate' }]);
    expect(task.extract).toEqual({});
    expect(task.timeoutMs).toBe(1000);
    expect(task.maxRetries).toBe(1);
  });

  it('keeps values supplied by the caller', () => {
    const task = createTask(
      {
        id: 'lookup-1',
        target: 'https://example.com',
        actions: [{ type: 'click', selector: '#go' }],
        extract: { title: { selectors: ['h1'] } },
        timeoutMs: 5000,
        maxRetries: 0,
      },
      defaults
    );

    expect(task.id).toBe('lookup-1');
    expect(task.actions).toEqual([{ type: 'click', selector: '#go' }]);
    expect(task.extract.title?.selectors).toEqual(['h1']);
    expect(task.timeoutMs).toBe(5000);
    expect(task.maxRetries).toBe(0);
  });

  it('returns a frozen task', () => {
    const task = createTask(
      { target: 'https://example.com', extract: { title: { selectors: ['h1'] } } },
      defaults
    );

    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.actions)).toBe(true);
    expect(Object.isFrozen(task.actions[0])).toBe(true);
    expect(Object.isFrozen(task.extract)).toBe(true);
    expect(Object.isFrozen(task.extract.title)).toBe(true);
  });

  it('does not share arrays with the input', () => {
    const actions = [{ type: 'navigate' }];
    const task = createTask({ target: 'https://example.com', actions }, defaults);

    actions.push({ type: 'navigate' });
    expect(task.actions).toHaveLength(1);
  });

  it('rejects a malformed target', () => {
    const error = invalidTaskError({ target: 'not-a-url' });

    expect(error.code).toBe('INVALID_TASK');
    expect(error.httpStatus).toBe(400);
    expect(error.details?.errors).toEqual([expect.objectContaining({ path: ['target'] })]);
  });

  it('rejects unknown action types', () => {
    const error = invalidTaskError({ target: 'https://example.com', actions: [{ type: 'scroll' }] });
    expect(error.code).toBe('INVALID_TASK');
  });

  it('rejects fields without selectors', () => {
    const error = invalidTaskError({ target: 'https://example.com', extract: { title: { selectors: [] } } });
    expect(error.message).toBe('Invalid task: extract.title.selectors: At least one selector is required');
  });

  it('rejects retry budgets above the limit', () => {
    expect(invalidTaskError({ target: 'https://example.com', maxRetries: 6 }).code).toBe('INVALID_TASK');
  });

  it('rejects non-object input', () => {
    expect(invalidTaskError(null).code).toBe('INVALID_TASK');
    expect(invalidTaskError('https://example.com').code).toBe('INVALID_TASK');
  });
});

describe('TaskInputSchema', () => {
  it('accepts every action type', () => {
    const result = TaskInputSchema.safeParse({
      target: 'https://example.com',
      actions: [
        { type: 'navigate', url: 'https://example.com/search', waitUntil: 'domcontentloaded' },
        { type: 'waitForSelector', selector: 'input', timeoutMs: 500 },
        { type: 'click', selector: 'input' },
        { type: 'fill', selector: 'input', value: '' },
        { type: 'type', selector: 'input', text: 'shoes', delayMs: 50 },
        { type: 'press', selector: 'input', key: 'Enter' },
        { type: 'wait', durationMs: 100 },
      ],
    });

    expect(result.success).toBe(true);
  });

  it('rejects a navigate action to a non-http URL', () => {
    const result = TaskInputSchema.safeParse({
      target: 'https://example.com',
      actions: [{ type: 'navigate', url: 'file:///etc/passwd' }],
    });

    expect(result.success).toBe(false);
  });
});
