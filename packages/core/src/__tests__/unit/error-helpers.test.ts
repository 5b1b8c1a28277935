import { describe, it, expect } from 'vitest';
import { formatError } from '../../utils/error-helpers.js';
import { DroverError } from '../../errors.js';

describe('formatError', () => {
  it('formats DroverError with code', () => {
    const error = new DroverError('INVALID_TASK', 'Bad task');
    expect(formatError(error)).toBe('[INVALID_TASK] Bad task');
  });

  it('formats regular Error with name', () => {
    expect(formatError(new TypeError('Not a function'))).toBe('[TypeError] Not a function');
  });

  it('returns string errors as-is', () => {
    expect(formatError('Something went wrong')).toBe('Something went wrong');
  });

  it('converts other values to string', () => {
    expect(formatError({ code: 'ERROR' })).toBe('[object Object]');
  });
});
