import { describe, it, expect } from 'vitest';
import { generatePrefixedId } from '../../utils/id.js';

describe('generatePrefixedId', () => {
  it('generates ID with prefix', () => {
    expect(generatePrefixedId('drv')).toMatch(/^drv_[a-zA-Z0-9_-]{12}$/);
  });

  it('generates unique prefixed IDs', () => {
    expect(generatePrefixedId('lease')).not.toBe(generatePrefixedId('lease'));
  });

  it('uses custom length for random part', () => {
    const id = generatePrefixedId('task', 8);
    expect(id.length).toBe(8 + 5); // 8 random + 'task_'
  });
});
