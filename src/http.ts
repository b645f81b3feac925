/**
 * http — JSON GET with a Fixed Timeout
 *
 * Shared by the entity fetcher and the identity verifier. Never throws:
 * every failure comes back as an HttpFailure with a reason the caller
 * maps onto its own error taxonomy.
 */
import { type Result, ok, err } from './Result.js';

export type HttpFailureReason = 'timeout' | 'aborted' | 'network' | 'status' | 'invalid-json';

export interface HttpFailure {
    readonly reason: HttpFailureReason;
    readonly message: string;
    readonly status?: number;
}

export interface GetJsonOptions {
    readonly timeoutMs: number;
    readonly headers?: Record<string, string>;
    /** Outer cancellation (e.g. shutdown); reported as `aborted`, not `timeout`. */
    readonly signal?: AbortSignal;
}

export async function getJson(url: string, options: GetJsonOptions): Promise<Result<unknown, HttpFailure>> {
    const { timeoutMs, headers, signal } = options;

    if (signal?.aborted) {
        return err({ reason: 'aborted', message: `Request to ${url} aborted` });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
        timedOut = true;
        controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
        const response = await fetch(url, {
            signal: controller.signal,
            redirect: 'error',
            headers: { Accept: 'application/json', ...headers },
        });

        if (!response.ok) {
            return err({
                reason: 'status',
                status: response.status,
                message: `HTTP ${response.status} from ${url}`,
            });
        }

        const text = await response.text();
        try {
            return ok(JSON.parse(text));
        } catch {
            return err({ reason: 'invalid-json', message: `Invalid JSON from ${url}` });
        }
    } catch (error) {
        if (timedOut) {
            return err({ reason: 'timeout', message: `Request to ${url} timed out after ${timeoutMs}ms` });
        }
        if (signal?.aborted) {
            return err({ reason: 'aborted', message: `Request to ${url} aborted` });
        }
        const detail = error instanceof Error ? error.message : String(error);
        return err({ reason: 'network', message: `Request to ${url} failed: ${detail}` });
    } finally {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
    }
}
