/**
 * @module equivalence
 * Strategy types and the default hash engine.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * A caller-supplied notion of "sameness" for values of type `T`.
 *
 * Contract (not enforced):
 * - `equals` is reflexive, symmetric and transitive over every value the set
 *   will see, including `undefined`/`null` if those are stored.
 * - `hash` is consistent with `equals`: equivalent values hash identically.
 */
export interface Equivalence<T> {
    equals(a: T, b: T): boolean;
    hash(value: T): number;
}

/**
 * Anything the backing store can hold. The store never looks inside an entry,
 * it only compares hash codes and asks the entry itself for equality.
 */
export interface Hashable<E> {
    readonly hashCode: number;
    equals(other: E): boolean;
}

// ============================================================================
// 2. HASH ENGINE (FNV-1a + integer mixing)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const floatBuffer = new ArrayBuffer(8);
const floatView = new Float64Array(floatBuffer);
const intView = new Int32Array(floatBuffer);

/**
 * Scrambles the low bits of a caller hash so that sequential or clustered
 * hash codes do not pile up in neighbouring buckets.
 * Non-integer input is truncated to 32 bits first (`NaN` becomes 0).
 */
export function spreadHash(hash: number): number {
    let h = hash | 0;
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    h = (h >> 16) ^ h;
    return h >>> 0;
}

function hashNumber(val: number): number {
    if ((val | 0) === val) return val | 0;

    floatView[0] = val;
    let h = FNV_OFFSET;
    h ^= intView[0];
    h = Math.imul(h, FNV_PRIME);
    h ^= intView[1];
    h = Math.imul(h, FNV_PRIME);
    return h | 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h | 0;
}

// Objects without a hashCode of their own get a stable identity number.
const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityHash(obj: object): number {
    let id = identities.get(obj);
    if (id === undefined) {
        id = nextIdentity++;
        identities.set(obj, id);
    }
    return id;
}

function hasHashCode(val: object): val is { hashCode: number } {
    return 'hashCode' in val && typeof val.hashCode === 'number';
}

/**
 * Hashes any value consistently with {@link sameValue}.
 * - `undefined` and `null`: 0.
 * - Numbers: 32-bit integers hash to themselves, everything else over its
 *   IEEE-754 bits.
 * - Strings, bigints and symbol descriptions: FNV-1a.
 * - Objects exposing a numeric `hashCode` use it; others get an identity hash.
 */
export function hashValue(val: unknown): number {
    if (val === undefined || val === null) return 0;
    if (typeof val === 'number') return hashNumber(val);
    if (typeof val === 'string') return hashString(val);
    if (typeof val === 'boolean') return val ? 1231 : 1237;
    if (typeof val === 'bigint') return hashString(val.toString());
    if (typeof val === 'symbol') return hashString(val.description ?? '');
    if (typeof val === 'object') return hasHashCode(val) ? val.hashCode : identityHash(val);
    if (typeof val === 'function') return identityHash(val);
    return 0;
}

/** SameValue equality (`Object.is`): `NaN` equals itself, `0` and `-0` differ. */
export function sameValue(a: unknown, b: unknown): boolean {
    return Object.is(a, b);
}

/** The strategy used by {@link EquivalenceSet.natural}. */
export const naturalEquivalence: Equivalence<unknown> = {
    equals: sameValue,
    hash: hashValue,
};
