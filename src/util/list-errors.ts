import { getLogger } from "../logging/logging";

export type ListOperationErrorKind = "IndexOutOfBounds" | "OperationOnEmptyList" | "ElementNotFound" | "UnexpectedError";

/**
 * Failure reported by a list operation.
 *
 * `UnexpectedError` means a structural invariant of the list no longer holds. It points at a defect in the list
 * itself and is never part of normal control flow.
 */
export class ListOperationError extends Error {
    constructor(
        public readonly kind: ListOperationErrorKind,
        message: string,
    ) {
        super(message);
        this.name = "ListOperationError";
    }
}

export type Ok<T> = {
    ok: true;
    value: T;
};

export type Err = {
    ok: false;
    error: ListOperationError;
};

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export const done: Ok<void> = { ok: true, value: undefined };

function fail(kind: ListOperationErrorKind, message: string): Err {
    const error = new ListOperationError(kind, message);

    if (kind === "UnexpectedError") {
        getLogger().error(error);
    } else {
        getLogger().debug("%s: %s", kind, message);
    }

    return { ok: false, error };
}

export function indexOutOfBounds(index: number, size: number): Err {
    return fail("IndexOutOfBounds", `Index ${index} is out of bounds for size ${size}`);
}

export function emptyList(operation: string): Err {
    return fail("OperationOnEmptyList", `Cannot ${operation} on an empty list`);
}

export function elementNotFound(): Err {
    return fail("ElementNotFound", "Element not found in the list");
}

export function unexpected(detail: string): Err {
    return fail("UnexpectedError", "List invariant violated: " + detail);
}

/**
 * Checks a zero-based index against the current size. Indices that are not integers are out of bounds.
 */
export function checkIndex(index: number, size: number): Result<void> {
    if (!Number.isInteger(index) || index < 0 || index >= size) {
        return indexOutOfBounds(index, size);
    }

    return done;
}

export function isListOperationError(value: unknown): value is ListOperationError {
    return value instanceof ListOperationError;
}

/**
 * Returns the value of a successful result, or throws the error carried by a failed one.
 */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw result.error;
    }

    return result.value;
}
