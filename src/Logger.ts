/**
 * Logger — Structured Logging
 *
 * pino root logger. Components receive a Logger by injection and derive a
 * `component` child from it. Credentials are redacted wherever they appear.
 */
import { pino, type Logger } from 'pino';

export type { Logger };

const REDACT_PATHS = [
    'authorization',
    'token',
    'headers.authorization',
    '*.authorization',
    '*.token',
];

export function createLogger(level: string = 'info'): Logger {
    return pino({
        name: 'mcp-entity-cache',
        level,
        redact: {
            paths: REDACT_PATHS,
            censor: '[REDACTED]',
        },
    });
}

/** Child logger scoped to one component. */
export function componentLogger(parent: Logger, component: string): Logger {
    return parent.child({ component });
}
