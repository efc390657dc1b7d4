import { createNode, insertAfter, insertBefore, ListNode, unlink } from './node.js';

/**
 * Structural state of a list: the node chain plus its bookkeeping.
 * `generation` changes with every structural mutation so iterators can detect
 * that the chain moved under them.
 */
export type Chain<T> = {
    head: ListNode<T> | undefined;
    tail: ListNode<T> | undefined;
    size: number;
    generation: number;
};

export const createChain = <T>(): Chain<T> => ({ head: undefined, tail: undefined, size: 0, generation: 0 });

export const isIndex = (chain: Chain<unknown>, index: number) => Number.isInteger(index) && index >= 0 && index < chain.size;

/**
 * Walks from whichever end is closer, so at most size / 2 hops are made.
 */
export function getNodeAt<T>(chain: Chain<T>, index: number): ListNode<T> | undefined {
    if (!isIndex(chain, index)) {
        return undefined;
    }
    let node: ListNode<T> | undefined;
    if (index < chain.size / 2) {
        node = chain.head;
        for (let i = 0; i < index && node; i++) {
            node = node.n;
        }
    } else {
        node = chain.tail;
        for (let i = chain.size - 1; i > index && node; i--) {
            node = node.p;
        }
    }
    return node;
}

export function findNode<T>(chain: Chain<T>, element: T, equals: (a: T, b: T) => boolean): ListNode<T> | undefined {
    for (let node = chain.head; node; node = node.n) {
        if (equals(node.v, element)) {
            return node;
        }
    }
    return undefined;
}

export function linkFirst<T>(chain: Chain<T>, node: ListNode<T>) {
    if (chain.head) {
        linkBefore(chain, chain.head, node);
    } else {
        linkOnly(chain, node);
    }
}

export function linkLast<T>(chain: Chain<T>, node: ListNode<T>) {
    if (chain.tail) {
        linkAfter(chain, chain.tail, node);
    } else {
        linkOnly(chain, node);
    }
}

function linkOnly<T>(chain: Chain<T>, node: ListNode<T>) {
    node.n = node.p = undefined;
    chain.head = chain.tail = node;
    chain.size = 1;
    chain.generation++;
}

export function linkBefore<T>(chain: Chain<T>, base: ListNode<T>, node: ListNode<T>) {
    insertBefore(base, node);
    if (base === chain.head) {
        chain.head = node;
    }
    chain.size++;
    chain.generation++;
}

export function linkAfter<T>(chain: Chain<T>, base: ListNode<T>, node: ListNode<T>) {
    insertAfter(base, node);
    if (base === chain.tail) {
        chain.tail = node;
    }
    chain.size++;
    chain.generation++;
}

export function unlinkNode<T>(chain: Chain<T>, node: ListNode<T>): T {
    if (node === chain.head) {
        chain.head = node.n;
    }
    if (node === chain.tail) {
        chain.tail = node.p;
    }
    chain.size--;
    chain.generation++;
    return unlink(node);
}

/**
 * Builds a detached chain holding `map` of every payload, in order.
 */
export function copyChain<T>(source: Chain<T>, map: (value: T) => T): Chain<T> {
    const copy = createChain<T>();
    for (let node = source.head; node; node = node.n) {
        linkLast(copy, createNode(map(node.v)));
    }
    return copy;
}

/**
 * Moves the whole of `source` into the gap between `left` and `right` of
 * `target`. A missing boundary stands for the corresponding end of `target`.
 * Leaves `source` empty.
 */
export function spliceBetween<T>(target: Chain<T>, source: Chain<T>, left: ListNode<T> | undefined, right: ListNode<T> | undefined) {
    const { head: first, tail: last } = source;
    if (!first || !last) {
        return;
    }
    // link range
    first.p = left;
    last.n = right;
    // link target
    if (left) {
        left.n = first;
    } else {
        target.head = first;
    }
    if (right) {
        right.p = last;
    } else {
        target.tail = last;
    }
    target.size += source.size;
    target.generation++;

    source.head = source.tail = undefined;
    source.size = 0;
    source.generation++;
}
