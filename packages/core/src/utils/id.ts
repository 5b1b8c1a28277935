/**
 * ID generation utilities
 */

import { nanoid } from 'nanoid';

/**
 * Generate a prefixed ID for categorization
 * @param prefix - Prefix to add (e.g., 'drv', 'task', 'lease')
 * @param length - Length of the random part (default: 12)
 */
export function generatePrefixedId(prefix: string, length: number = 12): string {
  return `${prefix}_${nanoid(length)}`;
}
