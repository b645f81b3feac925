/**
 * mcp-entity-cache — Public API
 *
 * Entitlement-gated entity cache for MCP tool servers.
 * Serves a TTL snapshot of a slow upstream, keeps serving the last good
 * snapshot when a scheduled refresh fails, and checks roles and data
 * categories on every read.
 */

// Main class
export { EntityCacheServer } from './EntityCacheServer.js';
export type { EntityCacheServerDeps } from './EntityCacheServer.js';

// Types
export type {
    EntityRecord,
    CacheSnapshot,
    UserProfile,
    McpToolDef,
    McpCallResult,
    McpResourceDef,
    ToolProvider,
    ResourceProvider,
    Clock,
} from './types.js';
export type { Result } from './Result.js';
export { ok, err } from './Result.js';

// Errors
export {
    ErrorCodes,
    AuthenticationError,
    AuthorizationError,
    UpstreamFetchError,
} from './errors.js';
export type { ErrorCode, GateError } from './errors.js';

// Configuration & logging
export { resolveConfig, ConfigError, DEFAULT_CACHE_TTL_SECONDS, MAX_CACHE_TTL_SECONDS } from './Config.js';
export type { ServerConfig, RawConfig } from './Config.js';
export { createLogger, componentLogger } from './Logger.js';
export type { Logger } from './Logger.js';

// Pure functions
export { createSnapshot, emptySnapshot, isStale, categoriesOf, FrozenMap } from './CacheSnapshot.js';
export { extractBearerToken } from './BearerToken.js';
export { hasAnyRole, canAccessCategory, filterPermitted, checkEntityAccess } from './AuthorizationGate.js';
export { decorateDescription } from './DescriptionDecorator.js';
export { annotateStale, STALE_WARNING } from './ResponseDecorator.js';
export { listEntities, getEntity, refreshCache, READ_ROLES, ADMIN_ROLES } from './EntityTools.js';
export { cacheSummary, cacheHealth, SUMMARY_URI, HEALTH_URI } from './StatusResources.js';
export { hashToken } from './EntitlementResolver.js';

// Infrastructure
export { SnapshotHolder } from './SnapshotHolder.js';
export { CacheRefresher } from './CacheRefresher.js';
export { EntitlementResolver } from './EntitlementResolver.js';
export { AuthorizationGate } from './AuthorizationGate.js';
export { HttpEntityFetcher } from './EntityFetcher.js';
export type { EntityFetcher } from './EntityFetcher.js';
export { HttpIdentityVerifier } from './IdentityVerifier.js';
export type { IdentityVerifier } from './IdentityVerifier.js';
export { createEntityTools } from './EntityTools.js';
export { createStatusResources } from './StatusResources.js';
export { ServerWrapper } from './ServerWrapper.js';
export { resolveServer } from './ServerResolver.js';
export type { McpServerLike } from './ServerResolver.js';
