/**
 * CacheSnapshot — Immutable Entity Views
 *
 * Pure functions. A snapshot is frozen at construction and only ever
 * superseded, never patched. Staleness is informational.
 */
import type { CacheSnapshot, EntityRecord } from './types.js';

/**
 * Build a frozen snapshot. Records are copied and frozen so later
 * mutation of the caller's objects cannot leak in.
 */
export function createSnapshot(
    entities: Iterable<EntityRecord>,
    ttlSeconds: number,
    now: Date = new Date(),
): CacheSnapshot {
    const byId = new Map<string, EntityRecord>();
    for (const entity of entities) {
        byId.set(entity.id, freezeRecord(entity));
    }

    return Object.freeze({
        entities: new FrozenMap(byId),
        lastRefreshedAt: new Date(now.getTime()),
        ttlSeconds,
    });
}

/**
 * Read-only view over a private Map. Exposes no `set`, `delete` or
 * `clear`, so a snapshot's entity set cannot change at run time either.
 */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
    readonly #entries: Map<K, V>;

    constructor(entries: Iterable<readonly [K, V]>) {
        this.#entries = new Map(entries);
        Object.freeze(this);
    }

    get size(): number {
        return this.#entries.size;
    }

    get(key: K): V | undefined {
        return this.#entries.get(key);
    }

    has(key: K): boolean {
        return this.#entries.has(key);
    }

    forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
        this.#entries.forEach((value, key) => callback.call(thisArg, value, key, this));
    }

    keys() {
        return this.#entries.keys();
    }

    values() {
        return this.#entries.values();
    }

    entries() {
        return this.#entries.entries();
    }

    [Symbol.iterator]() {
        return this.#entries[Symbol.iterator]();
    }
}

/** Empty snapshot used when no downstream is configured. */
export function emptySnapshot(ttlSeconds: number, now: Date = new Date()): CacheSnapshot {
    return createSnapshot([], ttlSeconds, now);
}

/** `true` once the snapshot is strictly older than its TTL. */
export function isStale(snapshot: CacheSnapshot, now: Date = new Date()): boolean {
    const elapsedMs = now.getTime() - snapshot.lastRefreshedAt.getTime();
    return elapsedMs > snapshot.ttlSeconds * 1000;
}

/** Sorted unique categories present in the snapshot. */
export function categoriesOf(snapshot: CacheSnapshot): string[] {
    const categories = new Set<string>();
    for (const entity of snapshot.entities.values()) {
        categories.add(entity.category);
    }
    return [...categories].sort();
}

function freezeRecord(entity: EntityRecord): EntityRecord {
    return Object.freeze({
        id: entity.id,
        name: entity.name,
        category: entity.category,
        metadata: Object.freeze({ ...entity.metadata }),
    });
}
