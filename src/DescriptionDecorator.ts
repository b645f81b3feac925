/**
 * DescriptionDecorator — Append Required Roles to Tool Descriptions
 *
 * Pure function. Tells the client which roles a tool needs before it
 * calls. Advisory only: the AuthorizationGate is the enforcement point.
 *
 * Idempotent: calling twice on the same tool produces the same result.
 */
import type { McpToolDef } from './types.js';

/** Regex to detect an existing role annotation at the end of the description. */
const REQUIRES_ROLE_PATTERN = /\s*\[Requires role: [^\]]*\]$/;

/**
 * Append `[Requires role: a | b]` to a tool's description.
 * Returns a shallow copy. With no roles the tool is returned unchanged.
 *
 * @example
 * decorateDescription(tool, ['reader', 'admin'])
 * // "List entities." → "List entities. [Requires role: admin | reader]"
 */
export function decorateDescription(
    tool: McpToolDef,
    roles: Iterable<string>,
): McpToolDef {
    const sorted = [...roles].sort();
    if (sorted.length === 0) return tool;

    const suffix = ` [Requires role: ${sorted.join(' | ')}]`;
    const base = (tool.description ?? '').replace(REQUIRES_ROLE_PATTERN, '');

    return { ...tool, description: base + suffix };
}
