/**
 * SnapshotHolder — The Current-Snapshot Slot
 *
 * Owns the single mutable reference to the live snapshot. Replacement is
 * one assignment, so a reader sees either the old or the new snapshot
 * in full. Readers take `current()` once per request and keep it.
 */
import type { CacheSnapshot } from './types.js';

export class SnapshotHolder {
    private snapshot: CacheSnapshot;

    constructor(initial: CacheSnapshot) {
        this.snapshot = initial;
    }

    current(): CacheSnapshot {
        return this.snapshot;
    }

    /** Swap in `next`; returns the snapshot it replaced. */
    replace(next: CacheSnapshot): CacheSnapshot {
        const previous = this.snapshot;
        this.snapshot = next;
        return previous;
    }
}
