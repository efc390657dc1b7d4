import { ListError } from './result.js';

export interface ListOptions<T> {
    /**
     * Node budget. Operations that would grow the list past it fail with
     * `AllocationFailure` and leave the list untouched.
     */
    maxSize?: number;
    /**
     * Match predicate of `remove`, `contains` and `indexOf`.
     */
    equals?: (a: T, b: T) => boolean;
    /**
     * Tag of the list's log messages.
     */
    tag?: string;
}

export type ResolvedListOptions<T> = Required<ListOptions<T>>;

export const defaultTag = 'list';

export function resolveOptions<T>(options: ListOptions<T> = {}): ResolvedListOptions<T> {
    const { maxSize = Infinity, equals = Object.is, tag = defaultTag } = options;
    if (maxSize !== Infinity && !(Number.isInteger(maxSize) && maxSize >= 0)) {
        throw new ListError('InvalidArgument', `maxSize must be a non-negative integer, got ${maxSize}`);
    }
    if (typeof equals !== 'function') {
        throw new ListError('InvalidArgument', 'equals must be a function');
    }
    return { maxSize, equals, tag };
}
