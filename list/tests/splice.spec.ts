import { describe, it, expect } from 'vitest';
import { LinkedList, verifyChain } from '../src/index.js';

const listOf = <T>(...items: T[]) => LinkedList.from(items);

describe('splice', () => {

    it('splice moves everything to the end', () => {
        const a = listOf(1, 2);
        const b = listOf(3, 4, 5);
        expect(a.splice(b)).toEqual({ ok: true, value: undefined });
        expect(a.toArray()).toEqual([1, 2, 3, 4, 5]);
        expect(a.size).toBe(5);
        expect(a.getLast()).toEqual({ ok: true, value: 5 });
        expect(b.size).toBe(0);
        expect(b.toArray()).toEqual([]);
        expect(verifyChain(a)).toBeUndefined();
        expect(verifyChain(b)).toBeUndefined();
    });

    it('spliceAfter', () => {
        const a = listOf(1, 2);
        const b = listOf(3, 4);
        expect(a.spliceAfter(b, 0)).toEqual({ ok: true, value: undefined });
        expect(a.toArray()).toEqual([1, 3, 4, 2]);
        expect(b.isEmpty).toBe(true);
        expect(verifyChain(a)).toBeUndefined();
    });

    it('spliceAfter the tail', () => {
        const a = listOf(1, 2);
        a.spliceAfter(listOf(3), 1);
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(a.getLast()).toEqual({ ok: true, value: 3 });
        expect(verifyChain(a)).toBeUndefined();
    });

    it('spliceBefore the head', () => {
        const a = listOf(1, 2);
        a.spliceBefore(listOf(3, 4), 0);
        expect(a.toArray()).toEqual([3, 4, 1, 2]);
        expect(a.getFirst()).toEqual({ ok: true, value: 3 });
        expect(verifyChain(a)).toBeUndefined();
    });

    it('spliceBefore in the middle', () => {
        const a = listOf(1, 2, 3);
        a.spliceBefore(listOf(8, 9), 2);
        expect(a.toArray()).toEqual([1, 2, 8, 9, 3]);
        expect(verifyChain(a)).toBeUndefined();
    });

    it('splice into an empty list', () => {
        const a = new LinkedList<number>();
        a.splice(listOf(1, 2));
        expect(a.toArray()).toEqual([1, 2]);
        expect(verifyChain(a)).toBeUndefined();
    });

    it('splice of an empty list is a no-op', () => {
        const a = listOf(1);
        expect(a.splice(new LinkedList<number>())).toEqual({ ok: true, value: undefined });
        expect(a.spliceAfter(new LinkedList<number>(), 0)).toEqual({ ok: true, value: undefined });
        expect(a.toArray()).toEqual([1]);
    });

    it('splice of itself', () => {
        const a = listOf(1, 2);
        expect(a.splice(a)).toEqual({ ok: false, error: 'InvalidArgument' });
        expect(a.spliceBefore(a, 0)).toEqual({ ok: false, error: 'InvalidArgument' });
        expect(a.toArray()).toEqual([1, 2]);
    });

    it('index out of range leaves both lists alone', () => {
        const a = listOf(1, 2);
        const b = listOf(3);
        expect(a.spliceAfter(b, 2)).toEqual({ ok: false, error: 'IndexOutOfRange' });
        expect(a.spliceBefore(b, -1)).toEqual({ ok: false, error: 'IndexOutOfRange' });
        expect(a.toArray()).toEqual([1, 2]);
        expect(b.toArray()).toEqual([3]);
    });

    it('respects the target budget', () => {
        const a = LinkedList.from([1, 2], { maxSize: 3 });
        const b = listOf(3, 4);
        expect(a.splice(b)).toEqual({ ok: false, error: 'AllocationFailure' });
        expect(b.size).toBe(2);
    });

    it('source stays usable', () => {
        const a = listOf(1);
        const b = listOf(2);
        a.splice(b);
        b.add(3);
        b.addFirst(4);
        expect(b.toArray()).toEqual([4, 3]);
        expect(a.toArray()).toEqual([1, 2]);
        expect(verifyChain(a)).toBeUndefined();
        expect(verifyChain(b)).toBeUndefined();
    });
});
