/**
 * ResponseDecorator — Stale Data Advisory
 *
 * Pure function. Appends the stale-data warning to the last text block of
 * a successful read. Stale data is still served; the caller is told.
 */
import type { McpCallResult } from './types.js';

export const STALE_WARNING = '[Warning: cached data may be stale]';

/**
 * Return a copy of `result` with the warning appended after a blank line.
 * Error results and results without content are returned unchanged.
 */
export function annotateStale(result: McpCallResult): McpCallResult {
    if (result.isError || result.content.length === 0) return result;

    const content = [...result.content];
    const lastIndex = content.length - 1;
    const last = content[lastIndex];
    content[lastIndex] = { ...last, text: `${last.text}\n\n${STALE_WARNING}` };

    return { ...result, content };
}
