/**
 * @module bucket-store
 * "Compact Layout" hash table holding self-describing entries.
 *
 * Architecture:
 * - Dense storage: entries and their spread hashes live in parallel arrays,
 *   so iteration is O(n) and follows insertion order until the first removal.
 * - Sparse lookup: a `Uint32Array` of 1-based dense indices (0 = empty slot),
 *   searched with linear probing.
 * - Removal: backward-shift repair of the probe chain, then swap & pop on the
 *   dense arrays.
 *
 * The store knows nothing about what an entry wraps. Two entries are the same
 * iff their hash codes match and `a.equals(b)` says so.
 */

import { spreadHash, type Hashable } from './equivalence';

export const DEFAULT_CAPACITY = 16;
export const DEFAULT_LOAD_FACTOR = 0.75;

/** Largest table the store ever builds. */
export const MAX_BUCKETS = 1 << 30;
/** Upper bound for the table allocated from a capacity hint alone. */
export const MAX_PRESIZED_BUCKETS = 1 << 16;
/** Load factors below this are raised to it. */
export const MIN_LOAD_FACTOR = 1 / 16;

/**
 * Smallest power of two table able to hold `capacity` entries below
 * `loadFactor`, capped at {@link MAX_BUCKETS}.
 */
export function bucketCountFor(capacity: number, loadFactor: number): number {
    let buckets = 2;
    while (buckets < MAX_BUCKETS && buckets * loadFactor < capacity) buckets *= 2;
    return buckets;
}

export class BucketStore<E extends Hashable<E>> implements Iterable<E> {

    // Dense arrays
    private _entries: E[] = [];
    private _hashes: number[] = [];

    // Sparse array (stores index + 1, where 0 means empty)
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;

    readonly initialCapacity: number;
    readonly loadFactor: number;

    constructor(initialCapacity: number = DEFAULT_CAPACITY, loadFactor: number = DEFAULT_LOAD_FACTOR) {
        this.initialCapacity = initialCapacity;
        this.loadFactor = Math.max(loadFactor, MIN_LOAD_FACTOR);
        this._bucketCount = this.presizedBucketCount();
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
    }

    // Sizing hints only pre-allocate up to MAX_PRESIZED_BUCKETS, real entries grow the rest.
    private presizedBucketCount(): number {
        return Math.min(bucketCountFor(this.initialCapacity, this.loadFactor), MAX_PRESIZED_BUCKETS);
    }

    get size(): number { return this._entries.length; }
    get bucketCount(): number { return this._bucketCount; }

    /** Entry at a dense position; iteration order. */
    at(index: number): E | undefined { return this._entries[index]; }

    ensureCapacity(capacity: number): void {
        if (capacity <= this._bucketCount * this.loadFactor) return;
        const target = bucketCountFor(capacity, this.loadFactor);
        if (target <= this._bucketCount) return;

        this._bucketCount = target;
        this._mask = this._bucketCount - 1;

        // Rebuild the lookup table only, the dense arrays stay where they are.
        this._indices = new Uint32Array(this._bucketCount);
        const hashes = this._hashes;
        for (let i = 0; i < hashes.length; i++) {
            let idx = hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    /** Slot in `_indices` holding an entry equal to `entry`, or -1. */
    private findSlot(entry: E, h: number): number {
        let idx = h & this._mask;
        while (true) {
            const ptr = this._indices[idx];
            if (ptr === 0) return -1;
            if (this._hashes[ptr - 1] === h && this._entries[ptr - 1].equals(entry)) return idx;
            idx = (idx + 1) & this._mask;
        }
    }

    /** The stored entry equal to `entry`, if any. */
    get(entry: E): E | undefined {
        const slot = this.findSlot(entry, spreadHash(entry.hashCode));
        return slot === -1 ? undefined : this._entries[this._indices[slot] - 1];
    }

    has(entry: E): boolean {
        return this.findSlot(entry, spreadHash(entry.hashCode)) !== -1;
    }

    /**
     * Inserts `entry` unless an equal one is stored.
     * @returns false when an equal entry already existed (it is kept as is).
     */
    add(entry: E): boolean {
        const h = spreadHash(entry.hashCode);
        let idx = h & this._mask;

        while (true) {
            const ptr = this._indices[idx];
            if (ptr === 0) break;
            if (this._hashes[ptr - 1] === h && this._entries[ptr - 1].equals(entry)) return false;
            idx = (idx + 1) & this._mask;
        }

        if (this._entries.length + 1 > this._bucketCount * this.loadFactor) {
            this.ensureCapacity(this._entries.length + 1);
            // Table was rebuilt, look for a free slot again.
            idx = h & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
        }
        // Probing needs at least one empty slot left.
        if (this._entries.length + 1 >= this._bucketCount) {
            throw new RangeError(`BucketStore is full (${this._bucketCount} buckets)`);
        }

        this._hashes.push(h);
        this._entries.push(entry);
        this._indices[idx] = this._entries.length;
        return true;
    }

    /** Removes the entry equal to `entry`. */
    delete(entry: E): boolean {
        if (this._entries.length === 0) return false;
        const slot = this.findSlot(entry, spreadHash(entry.hashCode));
        if (slot === -1) return false;
        this.removeSlot(slot);
        return true;
    }

    /**
     * Drops every entry for which `keep` returns false.
     * Walks the dense array backwards so that swap & pop only ever moves
     * entries that were already visited.
     * @returns the number of removed entries.
     */
    retainWhere(keep: (entry: E) => boolean): number {
        let removed = 0;
        for (let i = this._entries.length - 1; i >= 0; i--) {
            if (keep(this._entries[i])) continue;
            this.removeSlot(this.slotOfIndex(i));
            removed++;
        }
        return removed;
    }

    clear(): void {
        this._entries = [];
        this._hashes = [];
        this._bucketCount = this.presizedBucketCount();
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
    }

    [Symbol.iterator](): Iterator<E> { return this._entries[Symbol.iterator](); }

    /** Slot in `_indices` pointing at the dense position `index`. */
    private slotOfIndex(index: number): number {
        let idx = this._hashes[index] & this._mask;
        while (this._indices[idx] !== index + 1) idx = (idx + 1) & this._mask;
        return idx;
    }

    private removeSlot(slot: number): void {
        const ptr = this._indices[slot] - 1;

        // 1. Remove from lookup table (and fix probe chain)
        this.removeIndex(slot);

        // 2. Swap & pop on the dense arrays
        const lastEntry = this._entries.pop();
        const lastHash = this._hashes.pop();
        if (lastEntry === undefined || lastHash === undefined) return;

        if (ptr < this._entries.length) {
            this._entries[ptr] = lastEntry;
            this._hashes[ptr] = lastHash;
            this.updateIndexForEntry(lastHash, this._entries.length + 1, ptr + 1);
        }
    }

    /** Points the lookup table at the new dense position of a moved entry. */
    private updateIndexForEntry(hash: number, oldLoc: number, newLoc: number): void {
        let idx = hash & this._mask;
        while (true) {
            if (this._indices[idx] === oldLoc) {
                this._indices[idx] = newLoc;
                return;
            }
            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Repairs the open addressing probe chain.
     * Clearing a slot outright would cut off entries that collided and were
     * placed further down, so those are shifted back into the hole when it is
     * no farther from their ideal bucket than where they sit now.
     */
    private removeIndex(holeIdx: number): void {
        let i = (holeIdx + 1) & this._mask;
        while (this._indices[i] !== 0) {
            const ptr = this._indices[i];
            const ideal = this._hashes[ptr - 1] & this._mask;
            const distToHole = (holeIdx - ideal + this._bucketCount) & this._mask;
            const distToI = (i - ideal + this._bucketCount) & this._mask;

            if (distToHole < distToI) {
                this._indices[holeIdx] = ptr;
                holeIdx = i;
            }
            i = (i + 1) & this._mask;
        }
        this._indices[holeIdx] = 0;
    }
}
