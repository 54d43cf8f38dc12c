import { Result } from "./list-errors";

/**
 * Shared, mutable reference to an element.
 *
 * The list and any caller holding the same handle observe each other's writes to `value`. Membership and removal
 * compare handles by identity, so a new handle wrapping an equal value is a different element.
 */
export class Handle<T> {
    constructor(public value: T) {}
}

/**
 * Interface representing a generic List.
 */
export interface List<T> extends Iterable<Handle<T>> {
    /**
     * Appends an element at the end of the list.
     * @param item The handle to store.
     */
    add(item: Handle<T>): void;

    /**
     * Wraps a value in a new handle and appends it.
     * @param value The value to store.
     */
    addRaw(value: T): void;

    /**
     * Appends every handle of the iterable, in order.
     * @param items The handles to store.
     */
    addAll(items: Iterable<Handle<T>>): void;

    /**
     * Inserts an element so that it becomes the element at `index`.
     * @param item The handle to store.
     * @param index A position in `[0, size)`.
     */
    insertAt(item: Handle<T>, index: number): Result<void>;

    /**
     * Wraps a value in a new handle and inserts it so that it becomes the element at `index`.
     * @param value The value to store.
     * @param index A position in `[0, size)`.
     */
    insertRawAt(value: T, index: number): Result<void>;

    /**
     * Retrieves the element at the specified index.
     * @param index The index of the element to retrieve.
     * @returns The handle stored at `index`.
     */
    get(index: number): Result<Handle<T>>;

    /**
     * Removes the element stored under exactly this handle.
     * @param item The handle to remove.
     */
    remove(item: Handle<T>): Result<void>;

    /**
     * Removes the element at the specified index.
     * @param index The index of the element to remove.
     * @returns The removed handle.
     */
    removeAt(index: number): Result<Handle<T>>;

    /**
     * Checks whether this exact handle is stored in the list.
     */
    contains(item: Handle<T>): boolean;

    /**
     * Returns the number of elements in the list.
     */
    size(): number;

    /**
     * Checks if the list is empty.
     * @returns `true` if the list is empty, `false` otherwise.
     */
    isEmpty(): boolean;

    /**
     * Removes and returns the first element of the list.
     */
    shift(): Result<Handle<T>>;

    /**
     * Removes and returns the last element of the list.
     */
    pop(): Result<Handle<T>>;

    /**
     * Removes every element.
     */
    clear(): void;

    /**
     * Returns the handles from first to last.
     */
    toArray(): Handle<T>[];

    /**
     * Creates a list with new links over the same handles.
     * @returns A new list instance containing the same elements.
     */
    clone(): List<T>;

    /**
     * Creates an iterator over the elements of the list from first to last.
     * @returns An iterator over the elements of the list.
     */
    [Symbol.iterator](): Iterator<Handle<T>>;
}
