/**
 * @module equivalence-set
 * A hash set whose notion of "same element" is supplied by the caller.
 *
 * Elements are never compared with `===` or their own methods. Each one is
 * wrapped in an {@link Entry} whose hash code and equality forward to the
 * {@link Equivalence} captured at construction, and the entries are kept in a
 * {@link BucketStore}. The store's deduplication therefore follows the
 * caller's functions only.
 *
 * Contracts:
 * - `equals`/`hash` must form a consistent equivalence (not checked).
 * - Elements must not change their equivalence class while stored.
 * - Mutating the set while iterating it is undefined behaviour.
 * - Not safe to share between workers.
 */

import { BucketStore, DEFAULT_CAPACITY, DEFAULT_LOAD_FACTOR } from './bucket-store';
import { hashValue, sameValue, type Equivalence, type Hashable } from './equivalence';
import { ConfigurationError, NoSuchElementError, isIncompatibleInput } from './errors';

// ============================================================================
// 1. CONFIGURATION
// ============================================================================

export interface EquivalenceSetOptions<T> extends Equivalence<T> {
    /** Inserted in iteration order; the first element of each class is kept. */
    initialElements?: Iterable<T> | null;
    /** Number of elements the set holds before its table first grows. */
    initialCapacity?: number;
    /** Maximum table occupancy, strictly between 0 and 1. */
    loadFactor?: number;
}

function validateOptions<T>(options: EquivalenceSetOptions<T>): void {
    if (options === null || typeof options !== 'object') {
        throw new ConfigurationError('EquivalenceSet requires an options object with equals and hash.');
    }
    if (typeof options.equals !== 'function') {
        throw new ConfigurationError('EquivalenceSet requires an equals function.');
    }
    if (typeof options.hash !== 'function') {
        throw new ConfigurationError('EquivalenceSet requires a hash function.');
    }
    const { initialCapacity, loadFactor } = options;
    if (initialCapacity !== undefined && !(Number.isInteger(initialCapacity) && initialCapacity >= 0)) {
        throw new ConfigurationError(`Illegal initial capacity: ${initialCapacity}`);
    }
    if (loadFactor !== undefined && !(Number.isFinite(loadFactor) && loadFactor > 0 && loadFactor < 1)) {
        throw new ConfigurationError(`Illegal load factor: ${loadFactor}`);
    }
}

// ============================================================================
// 2. ENTRY (internal)
// ============================================================================

/**
 * Storage wrapper for a single element. Its identity in the store is decided
 * entirely by the equivalence it carries.
 */
class Entry<T> implements Hashable<Entry<T>> {
    readonly value: T;
    readonly hashCode: number;
    private readonly equivalence: Equivalence<T>;

    /** Computes the hash up front, so an incompatible value fails here. */
    constructor(value: T, equivalence: Equivalence<T>) {
        this.value = value;
        this.equivalence = equivalence;
        this.hashCode = equivalence.hash(value);
    }

    equals(other: Entry<T>): boolean {
        if (this === other) return true;
        try {
            return this.equivalence.equals(this.value, other.value);
        } catch (error) {
            if (isIncompatibleInput(error)) return false;
            throw error;
        }
    }
}

// ============================================================================
// 3. CURSOR
// ============================================================================

/** Explicit single-pass iterator over the representatives of a set. */
export interface Cursor<T> {
    hasNext(): boolean;
    /** @throws NoSuchElementError when the cursor is exhausted. */
    next(): T;
}

class EntryCursor<T> implements Cursor<T> {
    private _index = 0;

    constructor(private readonly store: BucketStore<Entry<T>>) {}

    hasNext(): boolean {
        return this._index < this.store.size;
    }

    next(): T {
        const entry = this.store.at(this._index);
        if (entry === undefined) throw new NoSuchElementError();
        this._index++;
        return entry.value;
    }
}

// ============================================================================
// 4. EQUIVALENCE SET
// ============================================================================

export class EquivalenceSet<T> implements Iterable<T> {

    private readonly _equivalence: Equivalence<T>;
    private readonly _store: BucketStore<Entry<T>>;

    /**
     * @throws ConfigurationError if `equals` or `hash` is missing, or a sizing
     * hint is out of range.
     */
    constructor(options: EquivalenceSetOptions<T>) {
        validateOptions(options);

        this._equivalence = Object.freeze({
            equals: options.equals.bind(options),
            hash: options.hash.bind(options),
        });
        this._store = new BucketStore<Entry<T>>(
            options.initialCapacity ?? DEFAULT_CAPACITY,
            options.loadFactor ?? DEFAULT_LOAD_FACTOR,
        );

        const initial = options.initialElements;
        if (initial !== undefined && initial !== null) {
            if (Array.isArray(initial)) this._store.ensureCapacity(initial.length);
            for (const element of initial) this.add(element);
        }
    }

    /** A set built from `elements` under `equivalence`. */
    static of<T>(equivalence: Equivalence<T>, ...elements: T[]): EquivalenceSet<T> {
        return new EquivalenceSet<T>({
            equals: (a, b) => equivalence.equals(a, b),
            hash: (value) => equivalence.hash(value),
            initialElements: elements,
        });
    }

    /** A set using SameValue equality, i.e. behaving like a native `Set`. */
    static natural<T>(initialElements?: Iterable<T>): EquivalenceSet<T> {
        return new EquivalenceSet<T>({ equals: sameValue, hash: hashValue, initialElements });
    }

    get equivalence(): Equivalence<T> { return this._equivalence; }
    get size(): number { return this._store.size; }
    isEmpty(): boolean { return this._store.size === 0; }

    private wrap(element: T): Entry<T> {
        return new Entry(element, this._equivalence);
    }

    /** False (never an error) when the strategy cannot process `element`. */
    contains(element: T): boolean {
        try {
            return this._store.has(this.wrap(element));
        } catch (error) {
            if (isIncompatibleInput(error)) return false;
            throw error;
        }
    }

    /**
     * The stored representative of `element`'s class, or `undefined` when the
     * class is absent or the strategy cannot process `element`.
     */
    find(element: T): T | undefined {
        try {
            return this._store.get(this.wrap(element))?.value;
        } catch (error) {
            if (isIncompatibleInput(error)) return undefined;
            throw error;
        }
    }

    /**
     * Inserts `element` unless an equivalent one is stored already; the stored
     * representative is never replaced.
     * @returns true iff the set changed.
     */
    add(element: T): boolean {
        return this._store.add(this.wrap(element));
    }

    /**
     * Removes the representative of `element`'s class, which need not be
     * `element` itself.
     */
    remove(element: T): boolean {
        try {
            return this._store.delete(this.wrap(element));
        } catch (error) {
            if (isIncompatibleInput(error)) return false;
            throw error;
        }
    }

    /** Vacuously true for an empty input. */
    containsAll(elements: Iterable<T>): boolean {
        for (const element of elements) {
            if (!this.contains(element)) return false;
        }
        return true;
    }

    addAll(elements: Iterable<T>): boolean {
        let changed = false;
        for (const element of elements) {
            if (this.add(element)) changed = true;
        }
        return changed;
    }

    removeAll(elements: Iterable<T>): boolean {
        // Removing from the set being iterated would skip swapped-in entries.
        const source = elements === this ? this.toArray() : elements;
        let changed = false;
        for (const element of source) {
            if (this.remove(element)) changed = true;
        }
        return changed;
    }

    /**
     * Keeps only the representatives with an equivalent in `elements`.
     * Inputs the strategy cannot process are ignored.
     */
    retainAll(elements: Iterable<T>): boolean {
        const other = new EquivalenceSet<T>({
            equals: this._equivalence.equals,
            hash: this._equivalence.hash,
        });
        for (const element of elements) {
            try {
                other.add(element);
            } catch (error) {
                if (!isIncompatibleInput(error)) throw error;
            }
        }
        return this._store.retainWhere((entry) => other._store.has(entry)) > 0;
    }

    clear(): void {
        this._store.clear();
    }

    clone(): EquivalenceSet<T> {
        const copy = new EquivalenceSet<T>({
            equals: this._equivalence.equals,
            hash: this._equivalence.hash,
            initialCapacity: this._store.initialCapacity,
            loadFactor: this._store.loadFactor,
        });
        copy._store.ensureCapacity(this.size);
        // Entries are immutable and carry the same strategy, so they can be shared.
        for (const entry of this._store) copy._store.add(entry);
        return copy;
    }

    iterator(): Cursor<T> {
        return new EntryCursor(this._store);
    }

    *values(): IterableIterator<T> {
        for (const entry of this._store) yield entry.value;
    }

    [Symbol.iterator](): IterableIterator<T> { return this.values(); }

    forEach(fn: (value: T, set: EquivalenceSet<T>) => void): void {
        for (const entry of this._store) fn(entry.value, this);
    }

    /**
     * Copies the representatives into an array.
     *
     * With a `target` long enough, the elements are written to its front, every
     * remaining slot is set to `undefined` and `target` itself is returned.
     * A shorter `target` is left alone and a new array of exactly `size`
     * elements is returned instead.
     */
    toArray(): T[];
    toArray(target: Array<T | undefined>): Array<T | undefined>;
    toArray(target?: Array<T | undefined>): Array<T | undefined> {
        const size = this._store.size;
        if (target === undefined || target.length < size) {
            const result: T[] = new Array<T>(size);
            for (let i = 0; i < size; i++) result[i] = this.valueAt(i);
            return result;
        }
        for (let i = 0; i < size; i++) target[i] = this.valueAt(i);
        target.fill(undefined, size);
        return target;
    }

    private valueAt(index: number): T {
        const entry = this._store.at(index);
        if (entry === undefined) throw new RangeError(`No entry at ${index}`);
        return entry.value;
    }

    toString(): string {
        const parts: string[] = [];
        for (const entry of this._store) parts.push(String(entry.value));
        return `EquivalenceSet{${parts.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
