import type { Chain } from './chain.js';
import { insertBefore, ListNode } from './node.js';

export type Comparator<T> = (a: T, b: T) => number;

// a contiguous, already linked stretch of the chain
type Run<T> = {
    first: ListNode<T>;
    last: ListNode<T>;
};

/**
 * Stable top-down merge sort done purely by relinking nodes.
 */
export function sortChain<T>(chain: Chain<T>, compare: Comparator<T>) {
    if (!chain.head || chain.size < 2) {
        return;
    }
    const run = split(chain.head, chain.size, compare);
    chain.head = run.first;
    chain.tail = run.last;
    chain.generation++;
}

function split<T>(begin: ListNode<T>, size: number, compare: Comparator<T>): Run<T> {
    if (size < 2) {
        return { first: begin, last: begin };
    }

    // on odd sizes the right half gets the extra node
    const leftSize = Math.floor(size / 2);
    const rightSize = size - leftSize;

    let center = begin;
    for (let i = 0; i < leftSize && center.n; i++) {
        center = center.n;
    }

    const left = split(begin, leftSize, compare);
    const right = split(center, rightSize, compare);

    return merge(left, right, leftSize, rightSize, compare);
}

/**
 * Merges two adjacent sorted runs (`left` directly followed by `right`).
 * A right node that sorts strictly before the current left node is moved in
 * front of it; on ties the left node stays first.
 */
function merge<T>(left: Run<T>, right: Run<T>, leftSize: number, rightSize: number, compare: Comparator<T>): Run<T> {
    let first = left.first;
    let l: ListNode<T> | undefined = left.first;
    let r: ListNode<T> | undefined = right.first;
    let leftTaken = 0;
    let rightTaken = 0;

    while (l && r && leftTaken < leftSize && rightTaken < rightSize) {
        if (compare(l.v, r.v) <= 0) {
            l = l.n;
            leftTaken++;
        } else {
            const next: ListNode<T> | undefined = r.n;
            insertBefore(l, r);
            if (l === first) {
                first = r;
            }
            r = next;
            rightTaken++;
        }
    }

    // the unfinished run already sits at the end
    return { first, last: rightTaken === rightSize ? left.last : right.last };
}
