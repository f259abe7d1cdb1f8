/**
 * @module equivalence-set
 * Hash sets with caller-defined equality.
 */

export { EquivalenceSet } from './equivalence-set';
export type { Cursor, EquivalenceSetOptions } from './equivalence-set';
export {
    BucketStore,
    DEFAULT_CAPACITY,
    DEFAULT_LOAD_FACTOR,
    MAX_BUCKETS,
    MAX_PRESIZED_BUCKETS,
    MIN_LOAD_FACTOR,
} from './bucket-store';
export { hashValue, sameValue, spreadHash, naturalEquivalence } from './equivalence';
export type { Equivalence, Hashable } from './equivalence';
export {
    ConfigurationError,
    IncompatibleElementError,
    NoSuchElementError,
    isIncompatibleInput,
} from './errors';
