/**
 * EntityFetcher — Downstream Entity Source
 *
 * `GET {baseUrl}/entities` → validated, frozen-ready EntityRecords keyed by id.
 * Any non-2xx, transport failure, timeout, or malformed body is an
 * UpstreamFetchError.
 */
import { z } from 'zod';
import { type Result, ok, err } from './Result.js';
import { ErrorCodes, UpstreamFetchError } from './errors.js';
import { getJson, type HttpFailure } from './http.js';
import type { EntityRecord } from './types.js';

export interface EntityFetcher {
    fetchAll(signal?: AbortSignal): Promise<Result<ReadonlyMap<string, EntityRecord>, UpstreamFetchError>>;
}

export const EntityRecordSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    category: z.string(),
    metadata: z.record(z.string()).default({}),
});

const EntityListSchema = z.array(EntityRecordSchema);

export interface HttpEntityFetcherOptions {
    readonly baseUrl: string;
    readonly timeoutMs: number;
}

export class HttpEntityFetcher implements EntityFetcher {
    private readonly url: string;
    private readonly timeoutMs: number;

    constructor(options: HttpEntityFetcherOptions) {
        this.url = `${options.baseUrl.replace(/\/+$/, '')}/entities`;
        this.timeoutMs = options.timeoutMs;
    }

    async fetchAll(signal?: AbortSignal): Promise<Result<ReadonlyMap<string, EntityRecord>, UpstreamFetchError>> {
        const response = await getJson(this.url, { timeoutMs: this.timeoutMs, signal });
        if (!response.ok) return err(toUpstreamError(response.error));

        const parsed = EntityListSchema.safeParse(response.value);
        if (!parsed.success) {
            const first = parsed.error.issues[0];
            const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown issue';
            return err(new UpstreamFetchError(
                ErrorCodes.UPSTREAM_INVALID,
                `Malformed entity list from ${this.url} (${where})`,
            ));
        }

        // Duplicate ids: last one wins.
        const entities = new Map<string, EntityRecord>();
        for (const entity of parsed.data) {
            entities.set(entity.id, entity);
        }
        return ok(entities);
    }
}

function toUpstreamError(failure: HttpFailure): UpstreamFetchError {
    switch (failure.reason) {
        case 'status':
            return new UpstreamFetchError(ErrorCodes.UPSTREAM_HTTP, failure.message, failure.status);
        case 'timeout':
            return new UpstreamFetchError(ErrorCodes.UPSTREAM_TIMEOUT, failure.message);
        case 'aborted':
            return new UpstreamFetchError(ErrorCodes.UPSTREAM_ABORTED, failure.message);
        case 'invalid-json':
            return new UpstreamFetchError(ErrorCodes.UPSTREAM_INVALID, failure.message);
        case 'network':
            return new UpstreamFetchError(ErrorCodes.UPSTREAM_NETWORK, failure.message);
    }
}
