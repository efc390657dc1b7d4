export type ListNode<T> = {
    v: T; // payload
    n: ListNode<T> | undefined; // next node
    p: ListNode<T> | undefined; // previous node
};

export const createNode = <T>(value: T): ListNode<T> => ({ v: value, n: undefined, p: undefined });

/**
 * Closes the gap a node leaves in its chain. The node keeps its own links.
 */
function close(node: ListNode<unknown>) {
    if (node.n) {
        node.n.p = node.p;
    }
    if (node.p) {
        node.p.n = node.n;
    }
}

/**
 * Moves `node` (attached or not) to sit right before `base`.
 * Head bookkeeping belongs to the caller.
 */
export function insertBefore<T>(base: ListNode<T>, node: ListNode<T>) {
    close(node);
    // link node
    node.p = base.p;
    node.n = base;
    // link chain
    if (base.p) {
        base.p.n = node;
    }
    base.p = node;
}

/**
 * Moves `node` (attached or not) to sit right after `base`.
 * Tail bookkeeping belongs to the caller.
 */
export function insertAfter<T>(base: ListNode<T>, node: ListNode<T>) {
    close(node);
    // link node
    node.n = base.n;
    node.p = base;
    // link chain
    if (base.n) {
        base.n.p = node;
    }
    base.n = node;
}

export function unlink<T>(node: ListNode<T>): T {
    close(node);
    node.n = node.p = undefined;
    return node.v;
}

/**
 * Exchanges chain positions of two distinct nodes of the same chain.
 */
export function swap<T>(a: ListNode<T>, b: ListNode<T>) {
    if (a.n === b) {
        swapAdjacent(a, b);
        return;
    }
    if (b.n === a) {
        swapAdjacent(b, a);
        return;
    }

    const aLeft = a.p;
    const aRight = a.n;
    const bLeft = b.p;
    const bRight = b.n;

    if (aLeft) aLeft.n = b;
    b.p = aLeft;
    if (aRight) aRight.p = b;
    b.n = aRight;

    if (bLeft) bLeft.n = a;
    a.p = bLeft;
    if (bRight) bRight.p = a;
    a.n = bRight;
}

// `left` is directly followed by `right`
function swapAdjacent<T>(left: ListNode<T>, right: ListNode<T>) {
    if (right.n) right.n.p = left;
    left.n = right.n;

    if (left.p) left.p.n = right;
    right.p = left.p;

    left.p = right;
    right.n = left;
}
