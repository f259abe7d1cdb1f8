import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { EquivalenceSet, type Equivalence } from '../src';

/** Same value modulo 10, negatives included. */
const mod10: Equivalence<number> = {
    equals: (a, b) => classOf(a) === classOf(b),
    hash: (a) => classOf(a),
};

function classOf(value: number): number {
    return ((value % 10) + 10) % 10;
}

/**
 * Naive reference: an array of representatives scanned linearly.
 */
class SetModel {
    items: number[] = [];

    add(x: number): boolean {
        if (this.items.some((y) => mod10.equals(x, y))) return false;
        this.items.push(x);
        return true;
    }

    remove(x: number): boolean {
        const idx = this.items.findIndex((y) => mod10.equals(x, y));
        if (idx === -1) return false;
        this.items.splice(idx, 1);
        return true;
    }
}

const value = fc.integer({ min: -50, max: 50 });
const byNumber = (a: number, b: number) => a - b;

describe('EquivalenceSet properties', () => {
    test('an equivalent value is never added twice', () => {
        fc.assert(
            fc.property(value, value, (a, b) => {
                fc.pre(mod10.equals(a, b));
                const set = EquivalenceSet.of(mod10);
                expect(set.add(a)).toBe(true);
                expect(set.add(b)).toBe(false);
                expect(set.size).toBe(1);
            }),
        );
    });

    test('add then contains, remove then not contains', () => {
        fc.assert(
            fc.property(fc.array(value), value, (xs, a) => {
                const set = EquivalenceSet.of(mod10, ...xs);
                set.add(a);
                expect(set.contains(a)).toBe(true);
                expect(set.remove(a)).toBe(true);
                expect(set.contains(a)).toBe(false);
            }),
        );
    });

    test('size is the number of classes present', () => {
        fc.assert(
            fc.property(fc.array(value), (xs) => {
                const set = EquivalenceSet.of(mod10, ...xs);
                expect(set.size).toBe(new Set(xs.map(classOf)).size);
            }),
        );
    });

    test('the first value of each class is kept, in order', () => {
        fc.assert(
            fc.property(fc.array(value), (xs) => {
                const model = new SetModel();
                for (const x of xs) model.add(x);
                expect(EquivalenceSet.of(mod10, ...xs).toArray()).toEqual(model.items);
            }),
        );
    });

    test('retainAll of its own elements changes nothing', () => {
        fc.assert(
            fc.property(fc.array(value), (xs) => {
                const set = EquivalenceSet.of(mod10, ...xs);
                expect(set.retainAll(set.toArray())).toBe(false);
                expect(set.size).toBe(new Set(xs.map(classOf)).size);
            }),
        );
    });

    test('random add/remove sequences agree with the model', () => {
        const op = fc.record({ remove: fc.boolean(), x: value });
        fc.assert(
            fc.property(fc.array(op, { maxLength: 200 }), (ops) => {
                const set = EquivalenceSet.of(mod10);
                const model = new SetModel();
                for (const { remove, x } of ops) {
                    if (remove) expect(set.remove(x)).toBe(model.remove(x));
                    else expect(set.add(x)).toBe(model.add(x));
                }
                expect(set.size).toBe(model.items.length);
                expect(set.toArray().sort(byNumber)).toEqual(model.items.slice().sort(byNumber));
            }),
        );
    });
});
