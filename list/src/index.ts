export { LinkedList } from './list.js';
export { ListIterator, ReverseListIterator } from './iterator.js';
export { ListError, unwrap } from './result.js';
export type { ListErrorCode, Result } from './result.js';
export type { ListOptions } from './options.js';
export type { Comparator } from './sort.js';
export { CHECK_INVARIANTS, debugConfig, verifyChain } from './debug.js';
