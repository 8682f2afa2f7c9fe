/**
 * API namespaces.
 *
 * - `query.*` — read-only selectors over buffers, commands and histories
 */

export { query } from './query.ts';
