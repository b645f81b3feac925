/**
 * EntityCacheServer — Public Facade
 *
 * The single entry point for the package. Builds every component from a
 * ServerConfig (plus optional injected collaborators) and wires them onto
 * an MCP Server.
 *
 * Lifecycle:
 * - `start()`   eager initial load, then the scheduled refresh cycle
 * - `attachToServer(server)` register tool and resource handlers
 * - `stop()`    cancel the refresh cycle
 */
import type { ServerConfig } from './Config.js';
import { AuthorizationGate } from './AuthorizationGate.js';
import { CacheRefresher } from './CacheRefresher.js';
import { EntitlementResolver } from './EntitlementResolver.js';
import { createEntityTools } from './EntityTools.js';
import { HttpEntityFetcher, type EntityFetcher } from './EntityFetcher.js';
import { HttpIdentityVerifier, type IdentityVerifier } from './IdentityVerifier.js';
import { componentLogger, createLogger, type Logger } from './Logger.js';
import { ServerWrapper } from './ServerWrapper.js';
import { createStatusResources } from './StatusResources.js';
import type { CacheSnapshot, Clock } from './types.js';

/** Collaborators that replace the HTTP defaults (tests, custom transports). */
export interface EntityCacheServerDeps {
    /** Overrides the HTTP fetcher. Only used when `downstreamUrl` is set or `fetcher` is given. */
    readonly fetcher?: EntityFetcher;
    readonly verifier?: IdentityVerifier;
    readonly logger?: Logger;
    readonly clock?: Clock;
}

export class EntityCacheServer {
    readonly refresher: CacheRefresher;
    readonly resolver: EntitlementResolver;
    readonly gate: AuthorizationGate;

    private readonly wrapper: ServerWrapper;
    private readonly logger: Logger;

    constructor(config: ServerConfig, deps: EntityCacheServerDeps = {}) {
        const logger = deps.logger ?? createLogger(config.logLevel);
        const clock = deps.clock ?? (() => new Date());
        this.logger = componentLogger(logger, 'server');

        const fetcher = deps.fetcher ?? (config.downstreamUrl
            ? new HttpEntityFetcher({ baseUrl: config.downstreamUrl, timeoutMs: config.downstreamTimeoutMs })
            : undefined);
        const verifier = deps.verifier ?? new HttpIdentityVerifier({
            userinfoUrl: config.userinfoUrl,
            timeoutMs: config.identityTimeoutMs,
        });

        this.refresher = new CacheRefresher({
            fetcher,
            ttlSeconds: config.cacheTtlSeconds,
            logger: componentLogger(logger, 'refresher'),
            clock,
        });
        this.resolver = new EntitlementResolver({
            verifier,
            logger: componentLogger(logger, 'entitlements'),
            entryTtlSeconds: config.entitlementTtlSeconds,
            clock,
        });
        this.gate = new AuthorizationGate(this.resolver, componentLogger(logger, 'gate'));

        this.wrapper = new ServerWrapper(
            createEntityTools({ refresher: this.refresher, gate: this.gate, clock }),
            createStatusResources(() => this.refresher.current(), clock),
            componentLogger(logger, 'mcp'),
        );
    }

    /**
     * Load the first snapshot and begin the refresh cycle.
     *
     * @throws UpstreamFetchError when a downstream is configured and the initial fetch fails
     */
    async start(): Promise<void> {
        const loaded = await this.refresher.initialLoad();
        if (!loaded.ok) {
            throw loaded.error;
        }
        this.refresher.start();
        this.logger.info({ entities: loaded.value }, 'entity cache server started');
    }

    /** Register tool and resource handlers on a `Server` or `McpServer`. */
    attachToServer(server: unknown): void {
        this.wrapper.attach(server);
    }

    current(): CacheSnapshot {
        return this.refresher.current();
    }

    async stop(): Promise<void> {
        await this.refresher.stop();
    }
}
