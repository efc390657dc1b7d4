export type ListErrorCode =
    | 'IndexOutOfRange'
    | 'EmptyCollection'
    | 'InvalidArgument'
    | 'AllocationFailure'
    | 'NotFound'
    | 'StaleIterator';

export type Result<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: ListErrorCode };

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok<T>(value?: T): Result<T | undefined> {
    return { ok: true, value };
}

export const fail = (error: ListErrorCode): Result<never> => ({ ok: false, error });

export class ListError extends Error {
    readonly code: ListErrorCode;

    constructor(code: ListErrorCode, message: string = code) {
        super(message);
        this.name = 'ListError';
        this.code = code;
    }
}

/**
 * Returns the value of a successful result and throws `ListError` otherwise.
 */
export const unwrap = <T>(result: Result<T>): T => {
    if (result.ok) {
        return result.value;
    }
    throw new ListError(result.error);
};
