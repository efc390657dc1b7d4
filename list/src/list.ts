import { createLog, Log, LogLevel } from '@chainlist/log';
import {
    Chain,
    copyChain,
    createChain,
    findNode,
    getNodeAt,
    isIndex,
    linkBefore,
    linkFirst,
    linkLast,
    spliceBetween,
    unlinkNode
} from './chain.js';
import { checkInvariants, reject } from './debug.js';
import { ListIterator, ReverseListIterator } from './iterator.js';
import { createNode, ListNode, swap } from './node.js';
import { ListOptions, ResolvedListOptions, resolveOptions } from './options.js';
import { ListErrorCode, ok, Result, unwrap } from './result.js';
import { Comparator, sortChain } from './sort.js';
import { chain } from './symbols.js';

/**
 * Doubly linked list. Positional access walks from the closer end.
 *
 * Every operation that can fail returns a `Result`; a failed operation leaves
 * the list as it was.
 */
export class LinkedList<T> implements Iterable<T> {
    readonly [chain]: Chain<T> = createChain<T>();
    private readonly options: ResolvedListOptions<T>;
    private readonly log: Log;

    constructor(options?: ListOptions<T>) {
        this.options = resolveOptions(options);
        this.log = createLog(this.options.tag);
    }

    /**
     * Builds a list holding `items` in order.
     * Throws `ListError` when they do not fit into `maxSize`.
     */
    static from<T>(items: Iterable<T>, options?: ListOptions<T>): LinkedList<T> {
        const list = new LinkedList<T>(options);
        for (const item of items) {
            unwrap(list.addLast(item));
        }
        return list;
    }

    get size(): number {
        return this[chain].size;
    }

    get isEmpty(): boolean {
        return this[chain].size === 0;
    }

    add(element: T): Result<void> {
        return this.addLast(element);
    }

    addFirst(element: T): Result<void> {
        if (!this.hasRoomFor(1)) {
            return this.reject('addFirst', 'AllocationFailure');
        }
        linkFirst(this[chain], createNode(element));
        this.changed('addFirst');
        return ok();
    }

    addLast(element: T): Result<void> {
        if (!this.hasRoomFor(1)) {
            return this.reject('addLast', 'AllocationFailure');
        }
        linkLast(this[chain], createNode(element));
        this.changed('addLast');
        return ok();
    }

    /**
     * Inserts `element` so that it ends up at `index`.
     * An empty list only takes `addFirst`/`addLast`.
     */
    addAt(element: T, index: number): Result<void> {
        if (this.isEmpty) {
            return this.reject('addAt', 'InvalidArgument');
        }
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('addAt', 'IndexOutOfRange');
        }
        if (!this.hasRoomFor(1)) {
            return this.reject('addAt', 'AllocationFailure');
        }
        linkBefore(this[chain], node, createNode(element));
        this.changed('addAt');
        return ok();
    }

    /**
     * Appends the elements of `other` in order; `other` is left unchanged.
     */
    addAll(other: LinkedList<T>): Result<void> {
        if (other.isEmpty) {
            return this.reject('addAll', 'InvalidArgument');
        }
        if (!this.hasRoomFor(other.size)) {
            return this.reject('addAll', 'AllocationFailure');
        }
        spliceBetween(this[chain], copyChain(other[chain], same), this[chain].tail, undefined);
        this.changed('addAll');
        return ok();
    }

    /**
     * Inserts the elements of `other` so that the first of them ends up at
     * `index`; `other` is left unchanged.
     */
    addAllAt(other: LinkedList<T>, index: number): Result<void> {
        if (other.isEmpty) {
            return this.reject('addAllAt', 'InvalidArgument');
        }
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('addAllAt', 'IndexOutOfRange');
        }
        if (!this.hasRoomFor(other.size)) {
            return this.reject('addAllAt', 'AllocationFailure');
        }
        spliceBetween(this[chain], copyChain(other[chain], same), node.p, node);
        this.changed('addAllAt');
        return ok();
    }

    removeAt(index: number): Result<T> {
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('removeAt', 'IndexOutOfRange');
        }
        return this.removeNode('removeAt', node);
    }

    /**
     * Removes the first element, from the head, that `equals` matches.
     */
    remove(element: T): Result<T> {
        const node = findNode(this[chain], element, this.options.equals);
        if (!node) {
            return this.reject('remove', 'NotFound');
        }
        return this.removeNode('remove', node);
    }

    removeFirst(): Result<T> {
        const node = this[chain].head;
        if (!node) {
            return this.reject('removeFirst', 'EmptyCollection');
        }
        return this.removeNode('removeFirst', node);
    }

    removeLast(): Result<T> {
        const node = this[chain].tail;
        if (!node) {
            return this.reject('removeLast', 'EmptyCollection');
        }
        return this.removeNode('removeLast', node);
    }

    /**
     * Empties the list. Returns `false` when it was already empty.
     */
    removeAll(): boolean {
        return this.unlinkAll('removeAll');
    }

    /**
     * Empties the list, handing every payload to `destroy` in list order.
     * Returns `false` when it was already empty.
     */
    removeAllAndDestroy(destroy: (element: T) => void): boolean {
        return this.unlinkAll('removeAllAndDestroy', destroy);
    }

    /**
     * Puts `element` at `index` and returns the payload it replaced.
     */
    replaceAt(element: T, index: number): Result<T> {
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('replaceAt', 'IndexOutOfRange');
        }
        const old = node.v;
        node.v = element;
        return ok(old);
    }

    getFirst(): Result<T> {
        const node = this[chain].head;
        return node ? ok(node.v) : this.reject('getFirst', 'EmptyCollection');
    }

    getLast(): Result<T> {
        const node = this[chain].tail;
        return node ? ok(node.v) : this.reject('getLast', 'EmptyCollection');
    }

    get(index: number): Result<T> {
        const node = getNodeAt(this[chain], index);
        return node ? ok(node.v) : this.reject('get', 'IndexOutOfRange');
    }

    /**
     * Moves every element of `other` to the end of this list, leaving `other`
     * empty. No element is copied.
     */
    splice(other: LinkedList<T>): Result<void> {
        const refused = this.refuseSplice('splice', other);
        if (refused) {
            return refused;
        }
        spliceBetween(this[chain], other[chain], this[chain].tail, undefined);
        this.changed('splice');
        return ok();
    }

    /**
     * Moves every element of `other` in front of the element at `index`.
     */
    spliceBefore(other: LinkedList<T>, index: number): Result<void> {
        const refused = this.refuseSplice('spliceBefore', other);
        if (refused) {
            return refused;
        }
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('spliceBefore', 'IndexOutOfRange');
        }
        spliceBetween(this[chain], other[chain], node.p, node);
        this.changed('spliceBefore');
        return ok();
    }

    /**
     * Moves every element of `other` right after the element at `index`.
     */
    spliceAfter(other: LinkedList<T>, index: number): Result<void> {
        const refused = this.refuseSplice('spliceAfter', other);
        if (refused) {
            return refused;
        }
        const node = getNodeAt(this[chain], index);
        if (!node) {
            return this.reject('spliceAfter', 'IndexOutOfRange');
        }
        spliceBetween(this[chain], other[chain], node, node.n);
        this.changed('spliceAfter');
        return ok();
    }

    reverse(): void {
        const state = this[chain];
        if (state.size < 2) {
            return;
        }
        let left = state.head;
        let right = state.tail;
        // an odd middle node stays where it is
        for (let i = 0; i < Math.floor(state.size / 2) && left && right; i++) {
            const nextLeft: ListNode<T> | undefined = left.n;
            const nextRight: ListNode<T> | undefined = right.p;
            swap(left, right);
            left = nextLeft;
            right = nextRight;
        }
        [state.head, state.tail] = [state.tail, state.head];
        state.generation++;
        this.changed('reverse');
    }

    /**
     * Stable in-place sort; `compare` must be a consistent total order.
     */
    sort(compare: Comparator<T>): void {
        const size = this.size;
        if (size < 2) {
            return;
        }
        this.log.start(`sorting ${size} elements`, LogLevel.verbose);
        sortChain(this[chain], compare);
        this.changed('sort');
        this.log.success(`sorted ${size} elements`);
    }

    /**
     * New list referencing the payloads from `begin` to `end`, both inclusive.
     */
    sublist(begin: number, end: number): Result<LinkedList<T>> {
        if (!isIndex(this[chain], begin) || !isIndex(this[chain], end) || begin > end) {
            return this.reject('sublist', 'IndexOutOfRange');
        }
        const sub = new LinkedList<T>(this.options);
        let node = getNodeAt(this[chain], begin);
        for (let i = begin; i <= end && node; i++) {
            linkLast(sub[chain], createNode(node.v));
            node = node.n;
        }
        return ok(sub);
    }

    copyShallow(): LinkedList<T> {
        return this.copyDeep(same);
    }

    /**
     * New list holding `clone` of every payload; `clone` is called once per
     * element, in order.
     */
    copyDeep(clone: (element: T) => T): LinkedList<T> {
        const copy = new LinkedList<T>(this.options);
        spliceBetween(copy[chain], copyChain(this[chain], clone), undefined, undefined);
        return copy;
    }

    toArray(): T[] {
        const result: T[] = [];
        for (let node = this[chain].head; node; node = node.n) {
            result.push(node.v);
        }
        return result;
    }

    /**
     * Number of elements `equals` matches.
     */
    contains(element: T): number {
        let count = 0;
        for (let node = this[chain].head; node; node = node.n) {
            if (this.options.equals(node.v, element)) {
                count++;
            }
        }
        return count;
    }

    /**
     * Index of the first element `equals` matches, -1 when there is none.
     */
    indexOf(element: T): number {
        let index = 0;
        for (let node = this[chain].head; node; node = node.n) {
            if (this.options.equals(node.v, element)) {
                return index;
            }
            index++;
        }
        return -1;
    }

    /**
     * Calls `fn` for every element in order. `fn` must not change the list.
     */
    forEach(fn: (element: T) => void): void {
        for (let node = this[chain].head; node; node = node.n) {
            fn(node.v);
        }
    }

    iterator(): ListIterator<T> {
        return new ListIterator(this[chain], this.options, this.log);
    }

    reverseIterator(): ReverseListIterator<T> {
        return new ReverseListIterator(this[chain], this.options, this.log);
    }

    [Symbol.iterator](): Iterator<T> {
        let current = this[chain].head;
        return {
            next: (): IteratorResult<T> => {
                const node = current;
                if (!node) {
                    return { done: true, value: undefined };
                }
                current = node.n;
                return { done: false, value: node.v };
            }
        };
    }

    private hasRoomFor(count: number) {
        return this[chain].size + count <= this.options.maxSize;
    }

    private refuseSplice(operation: string, other: LinkedList<T>): Result<never> | undefined {
        if (other === this) {
            return this.reject(operation, 'InvalidArgument');
        }
        if (!this.hasRoomFor(other.size)) {
            return this.reject(operation, 'AllocationFailure');
        }
        return undefined;
    }

    private removeNode(operation: string, node: ListNode<T>): Result<T> {
        const value = unlinkNode(this[chain], node);
        this.changed(operation);
        return ok(value);
    }

    private unlinkAll(operation: string, destroy?: (element: T) => void): boolean {
        const state = this[chain];
        if (!state.head) {
            return false;
        }
        for (let node: ListNode<T> | undefined = state.head; node; node = state.head) {
            const value = unlinkNode(state, node);
            destroy?.(value);
        }
        this.changed(operation);
        return true;
    }

    private reject(operation: string, error: ListErrorCode): Result<never> {
        return reject(this.log, operation, error);
    }

    private changed(operation: string) {
        checkInvariants(this[chain], this.log, operation);
    }
}

const same = <T>(value: T) => value;
