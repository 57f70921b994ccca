/**
 * @gatehouse/sortable-id
 *
 * 26-character, time-sortable, Crockford Base32 identifiers.
 *
 * @example
 * ```typescript
 * import { generate, isValid, SortableId } from '@gatehouse/sortable-id';
 *
 * const id = generate(); // "01JABCDE5Y8JY5ZQ0HZXEQ5Y8J"
 * isValid(id); // true
 * SortableId.from(id).getDate(); // creation time
 * ```
 */

export { SortableId, ENCODED_LENGTH, generate, isValid, getTimestamp } from './sortable-id.js';
