import { DEV } from 'esm-env';
import { Log, LogLevel } from '@chainlist/log';
import type { Chain } from './chain.js';
import type { LinkedList } from './list.js';
import { fail, ListErrorCode, Result } from './result.js';
import { chain } from './symbols.js';

/**
 * Debug configuration flag: verify the whole chain after every structural mutation
 */
export const CHECK_INVARIANTS = 1 << 0;

/**
 * Current debug configuration bitfield
 */
let debugConfigFlags = 0;

/**
 * Configure debug behavior using a bitfield of flags
 */
export const debugConfig = (flags: number): void => {
    debugConfigFlags = flags | 0;
};

/**
 * Walks the chain both ways and describes the first broken invariant, if any.
 */
export function describeBrokenInvariant(state: Chain<unknown>): string | undefined {
    const { head, tail, size } = state;
    if ((size === 0) !== (head === undefined) || (size === 0) !== (tail === undefined)) {
        return `size ${size} disagrees with head/tail presence`;
    }
    if (head?.p) {
        return 'head has a previous node';
    }
    if (tail?.n) {
        return 'tail has a next node';
    }
    let count = 0;
    let last = head;
    for (let node = head; node; node = node.n) {
        if (node.n && node.n.p !== node) {
            return `node ${count} is not the previous node of its successor`;
        }
        last = node;
        // a cycle would never end otherwise
        if (++count > size) {
            return `forward walk exceeds size ${size}`;
        }
    }
    if (count !== size) {
        return `forward walk counts ${count} nodes, size is ${size}`;
    }
    if (last !== tail) {
        return 'forward walk does not end at tail';
    }
    count = 0;
    for (let node = tail; node; node = node.p) {
        if (++count > size) {
            return `backward walk exceeds size ${size}`;
        }
    }
    if (count !== size) {
        return `backward walk counts ${count} nodes, size is ${size}`;
    }
    return undefined;
}

/**
 * Describes the first broken structural invariant of `list`, or `undefined`
 * when the list is sound.
 */
export const verifyChain = <T>(list: LinkedList<T>): string | undefined => describeBrokenInvariant(list[chain]);

/**
 * Reports a broken chain through the log.
 * Only runs in DEV mode and when configured
 */
export const checkInvariants = (state: Chain<unknown>, log: Log, context: string): void => {
    if (DEV && debugConfigFlags & CHECK_INVARIANTS) {
        const problem = describeBrokenInvariant(state);
        if (problem !== undefined) {
            log.fail(`${context} broke the list: ${problem}`);
        }
    }
};

/**
 * Logs a refused operation and builds its failed result.
 */
export const reject = (log: Log, operation: string, error: ListErrorCode): Result<never> => {
    log.update(`${operation} rejected: ${error}`, LogLevel.verbose);
    return fail(error);
};
