/**
 * CacheRefresher — Snapshot Lifecycle
 *
 * Owns the write side of the SnapshotHolder:
 * - initialLoad: eager first fetch (empty snapshot when no downstream)
 * - start/stop: the scheduled cycle, one tick every `ttlSeconds`
 * - forceRefresh: one synchronous cycle on behalf of an admin caller
 *
 * Scheduled ticks serve stale on error: a failed build is logged and the
 * previous snapshot stays. A forced refresh returns the failure instead.
 *
 * Build-and-swap sections run one at a time behind a write lock. Readers
 * go straight to the holder and never wait on it.
 */
import type { Logger } from './Logger.js';
import type { EntityFetcher } from './EntityFetcher.js';
import { ErrorCodes, UpstreamFetchError } from './errors.js';
import { type Result, ok, err } from './Result.js';
import { SnapshotHolder } from './SnapshotHolder.js';
import { createSnapshot, emptySnapshot } from './CacheSnapshot.js';
import { MAX_TIMER_DELAY_MS } from './Config.js';
import type { CacheSnapshot, Clock } from './types.js';

export interface CacheRefresherOptions {
    /** Absent ⇒ demo mode: empty cache, no scheduled cycle, refresh unavailable. */
    readonly fetcher?: EntityFetcher;
    readonly ttlSeconds: number;
    readonly logger: Logger;
    readonly clock?: Clock;
}

export class CacheRefresher {
    private readonly fetcher: EntityFetcher | undefined;
    private readonly ttlSeconds: number;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly holder: SnapshotHolder;

    /** Tail of the write queue. Failures surface through the caller's own promise. */
    private writeTail: Promise<unknown> = Promise.resolve();
    private cycle: { controller: AbortController; done: Promise<void> } | undefined;

    constructor(options: CacheRefresherOptions) {
        this.fetcher = options.fetcher;
        this.ttlSeconds = options.ttlSeconds;
        this.logger = options.logger;
        this.clock = options.clock ?? (() => new Date());
        this.holder = new SnapshotHolder(emptySnapshot(this.ttlSeconds, this.clock()));
    }

    get isConfigured(): boolean {
        return this.fetcher !== undefined;
    }

    get isRunning(): boolean {
        return this.cycle !== undefined;
    }

    /** Live snapshot. Never waits on a refresh in progress. */
    current(): CacheSnapshot {
        return this.holder.current();
    }

    /** One fetch wrapped into a snapshot. Complete snapshot or none. */
    async build(signal?: AbortSignal): Promise<Result<CacheSnapshot, UpstreamFetchError>> {
        if (!this.fetcher) {
            return err(new UpstreamFetchError(
                ErrorCodes.UPSTREAM_UNCONFIGURED,
                'No downstream API configured',
            ));
        }

        const fetched = await this.fetcher.fetchAll(signal);
        if (!fetched.ok) return fetched;

        return ok(createSnapshot(fetched.value.values(), this.ttlSeconds, this.clock()));
    }

    /**
     * Install the first snapshot. Without a fetcher this is an empty
     * snapshot and always succeeds; with one, failure is returned so the
     * bootstrap can refuse to serve.
     */
    async initialLoad(): Promise<Result<number, UpstreamFetchError>> {
        if (!this.fetcher) {
            this.holder.replace(emptySnapshot(this.ttlSeconds, this.clock()));
            this.logger.warn('no downstream configured; serving an empty cache');
            return ok(0);
        }

        const result = await this.refresh();
        if (result.ok) {
            this.logger.info({ entities: result.value }, 'initial cache load complete');
        } else {
            this.logger.error({ err: result.error }, 'initial cache load failed');
        }
        return result;
    }

    /** Synchronous refresh for an authorized caller. Not stale-tolerant. */
    async forceRefresh(): Promise<Result<number, UpstreamFetchError>> {
        const result = await this.refresh();
        if (result.ok) {
            this.logger.info({ entities: result.value }, 'cache refreshed on demand');
        } else {
            this.logger.error({ err: result.error }, 'forced cache refresh failed');
        }
        return result;
    }

    /** Begin the scheduled cycle. No-op without a fetcher or when already running. */
    start(): void {
        if (!this.fetcher || this.cycle) return;

        const controller = new AbortController();
        this.cycle = { controller, done: this.runCycle(controller.signal) };
        this.logger.info({ ttlSeconds: this.ttlSeconds }, 'scheduled refresh started');
    }

    /**
     * Cancel the scheduled cycle. Interrupts the sleep and any in-flight
     * fetch; an aborted build is never swapped in.
     */
    async stop(): Promise<void> {
        const cycle = this.cycle;
        if (!cycle) return;

        this.cycle = undefined;
        cycle.controller.abort();
        await cycle.done;
        this.logger.info('scheduled refresh stopped');
    }

    // ── Internals ───────────────────────────────────────────────────

    private async runCycle(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            await sleep(this.ttlSeconds * 1000, signal);
            if (signal.aborted) return;
            await this.scheduledTick(signal);
        }
    }

    /** One scheduled tick. Never rejects: failures stay inside the tick. */
    private async scheduledTick(signal: AbortSignal): Promise<void> {
        try {
            const result = await this.refresh(signal);
            if (result.ok) {
                this.logger.info(
                    { entities: result.value, refreshedAt: this.current().lastRefreshedAt.toISOString() },
                    'cache refreshed',
                );
            } else if (result.error.code === ErrorCodes.UPSTREAM_ABORTED) {
                this.logger.debug('scheduled refresh aborted by shutdown');
            } else {
                this.logger.error({ err: result.error }, 'cache refresh failed; serving stale data');
            }
        } catch (error) {
            this.logger.error({ err: error }, 'cache refresh threw; serving stale data');
        }
    }

    /** Build and swap under the write lock. */
    private refresh(signal?: AbortSignal): Promise<Result<number, UpstreamFetchError>> {
        return this.withWriteLock(async () => {
            const built = await this.build(signal);
            if (!built.ok) return built;
            if (signal?.aborted) {
                return err(new UpstreamFetchError(ErrorCodes.UPSTREAM_ABORTED, 'Refresh aborted'));
            }

            this.holder.replace(built.value);
            return ok(built.value.entities.size);
        });
    }

    private withWriteLock<T>(task: () => Promise<T>): Promise<T> {
        const run = this.writeTail.then(task, task);
        this.writeTail = run.catch(() => undefined);
        return run;
    }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Waits longer than
 * one timer can hold are split into several timers.
 */
async function sleep(ms: number, signal: AbortSignal): Promise<void> {
    let remaining = ms;
    while (remaining > 0 && !signal.aborted) {
        const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
        await sleepOnce(step, signal);
        remaining -= step;
    }
}

function sleepOnce(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}
