/**
 * BearerToken — Credential Extraction
 *
 * Reads `Authorization: Bearer <token>` from the MCP request extra
 * (`extra.requestInfo.headers`, populated by the HTTP transports).
 */
import { z } from 'zod';
import { type Result, ok, err } from './Result.js';
import { AuthenticationError, ErrorCodes } from './errors.js';

const HeaderValueSchema = z.union([z.string(), z.array(z.string())]).optional();

const RequestExtraSchema = z.object({
    requestInfo: z.object({
        headers: z.record(HeaderValueSchema),
    }),
});

const BEARER_PREFIX = /^bearer\s+/i;

export function extractBearerToken(extra: unknown): Result<string, AuthenticationError> {
    const header = authorizationHeader(extra);
    if (header === undefined) {
        return err(new AuthenticationError(ErrorCodes.TOKEN_MISSING, 'No bearer token found in request'));
    }

    if (!BEARER_PREFIX.test(header)) {
        return err(new AuthenticationError(
            ErrorCodes.TOKEN_MALFORMED,
            'Authorization header must use the Bearer scheme',
        ));
    }

    const token = header.replace(BEARER_PREFIX, '').trim();
    if (!token) {
        return err(new AuthenticationError(ErrorCodes.TOKEN_MALFORMED, 'Bearer token is empty'));
    }
    return ok(token);
}

function authorizationHeader(extra: unknown): string | undefined {
    const parsed = RequestExtraSchema.safeParse(extra);
    if (!parsed.success) return undefined;

    for (const [name, value] of Object.entries(parsed.data.requestInfo.headers)) {
        if (name.toLowerCase() !== 'authorization') continue;
        const first = Array.isArray(value) ? value[0] : value;
        if (first !== undefined) return first;
    }
    return undefined;
}
