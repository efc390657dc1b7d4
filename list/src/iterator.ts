import type { Log } from '@chainlist/log';
import { Chain, linkAfter, linkBefore, linkFirst, linkLast, unlinkNode } from './chain.js';
import { checkInvariants, reject } from './debug.js';
import { createNode, ListNode } from './node.js';
import type { ResolvedListOptions } from './options.js';
import { ok, Result } from './result.js';

/**
 * Cursor over a list that may change the list around its position.
 *
 * Any structural change made to the list by another path (the list itself or
 * a second iterator) makes the iterator stale: `hasNext()` then reports
 * `false` and every other operation fails with `StaleIterator`.
 */
abstract class ChainIterator<T> {
    protected nextNode: ListNode<T> | undefined;
    protected lastNode: ListNode<T> | undefined = undefined;
    // elements returned so far and still in the list, plus those added here
    protected position = 0;
    private expectedGeneration: number;

    constructor(
        protected readonly chain: Chain<T>,
        private readonly options: ResolvedListOptions<T>,
        private readonly log: Log,
        start: ListNode<T> | undefined
    ) {
        this.nextNode = start;
        this.expectedGeneration = chain.generation;
    }

    protected abstract get name(): string;

    // successor in iteration order
    protected abstract step(node: ListNode<T>): ListNode<T> | undefined;

    // links a new node between the last returned node and the next one
    protected abstract place(node: ListNode<T>): void;

    /**
     * List index of the last returned element, -1 when there is none.
     */
    abstract index(): number;

    private get stale() {
        return this.chain.generation !== this.expectedGeneration;
    }

    private sync(operation: string) {
        this.expectedGeneration = this.chain.generation;
        checkInvariants(this.chain, this.log, `${this.name}.${operation}`);
    }

    hasNext(): boolean {
        return !this.stale && this.nextNode !== undefined;
    }

    next(): Result<T> {
        if (this.stale) {
            return reject(this.log, `${this.name}.next`, 'StaleIterator');
        }
        const node = this.nextNode;
        if (!node) {
            return reject(this.log, `${this.name}.next`, 'IndexOutOfRange');
        }
        this.lastNode = node;
        this.nextNode = this.step(node);
        this.position++;
        return ok(node.v);
    }

    /**
     * Removes the last returned element. Without an intervening `next` there
     * is nothing to remove and the call fails with `NotFound`.
     */
    remove(): Result<T> {
        if (this.stale) {
            return reject(this.log, `${this.name}.remove`, 'StaleIterator');
        }
        const node = this.lastNode;
        if (!node) {
            return reject(this.log, `${this.name}.remove`, 'NotFound');
        }
        const value = unlinkNode(this.chain, node);
        this.lastNode = undefined;
        this.position--;
        this.sync('remove');
        return ok(value);
    }

    add(element: T): Result<void> {
        if (this.stale) {
            return reject(this.log, `${this.name}.add`, 'StaleIterator');
        }
        if (this.chain.size >= this.options.maxSize) {
            return reject(this.log, `${this.name}.add`, 'AllocationFailure');
        }
        const node = createNode(element);
        this.place(node);
        this.lastNode = node;
        this.position++;
        this.sync('add');
        return ok();
    }

    replace(element: T): Result<T> {
        if (this.stale) {
            return reject(this.log, `${this.name}.replace`, 'StaleIterator');
        }
        const node = this.lastNode;
        if (!node) {
            return reject(this.log, `${this.name}.replace`, 'NotFound');
        }
        const old = node.v;
        node.v = element;
        return ok(old);
    }
}

export class ListIterator<T> extends ChainIterator<T> {
    constructor(chain: Chain<T>, options: ResolvedListOptions<T>, log: Log) {
        super(chain, options, log, chain.head);
    }

    protected get name() {
        return 'iterator';
    }

    protected step(node: ListNode<T>) {
        return node.n;
    }

    protected place(node: ListNode<T>) {
        if (this.nextNode) {
            linkBefore(this.chain, this.nextNode, node);
        } else {
            linkLast(this.chain, node);
        }
    }

    index(): number {
        return this.lastNode ? this.position - 1 : -1;
    }
}

export class ReverseListIterator<T> extends ChainIterator<T> {
    constructor(chain: Chain<T>, options: ResolvedListOptions<T>, log: Log) {
        super(chain, options, log, chain.tail);
    }

    protected get name() {
        return 'reverseIterator';
    }

    protected step(node: ListNode<T>) {
        return node.p;
    }

    protected place(node: ListNode<T>) {
        if (this.nextNode) {
            linkAfter(this.chain, this.nextNode, node);
        } else {
            linkFirst(this.chain, node);
        }
    }

    index(): number {
        return this.lastNode ? this.chain.size - this.position : -1;
    }
}
