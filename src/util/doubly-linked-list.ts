import { Handle, List } from "./list";
import { Result, checkIndex, done, elementNotFound, emptyList, ok, unexpected } from "./list-errors";

export class DoublyLinkedNode<T> {
    public next: DoublyLinkedNode<T> | null = null;
    public prev: DoublyLinkedNode<T> | null = null;

    constructor(public readonly content: Handle<T>) {}

    /**
     * Detaches the forward neighbour, clearing its backward link as well.
     * @returns The detached neighbour, if any.
     */
    public breakNext(): DoublyLinkedNode<T> | null {
        const next = this.next;
        if (next !== null) {
            this.next = null;
            next.prev = null;
        }
        return next;
    }

    /**
     * Detaches the backward neighbour, clearing its forward link as well.
     * @returns The detached neighbour, if any.
     */
    public breakPrev(): DoublyLinkedNode<T> | null {
        const prev = this.prev;
        if (prev !== null) {
            this.prev = null;
            prev.next = null;
        }
        return prev;
    }
}

/**
 * Makes `second` the forward neighbour of `first` (and `first` the backward neighbour of `second`).
 * Whatever either side was linked to in that direction before is detached first.
 *
 * @returns The former forward neighbour of `first` and the former backward neighbour of `second`.
 */
export function linkNodes<T>(
    first: DoublyLinkedNode<T>,
    second: DoublyLinkedNode<T>,
): [DoublyLinkedNode<T> | null, DoublyLinkedNode<T> | null] {
    const firstOldNext = first.breakNext();
    const secondOldPrev = second.breakPrev();

    first.next = second;
    second.prev = first;

    return [firstOldNext, secondOldPrev];
}

/**
 * Class representing a doubly linked list.
 * Each node in the list contains a value and references to both the next and previous nodes.
 * Links only ever change through `linkNodes`, `breakNext` and `breakPrev`, which keep both directions in agreement.
 */
export class DoublyLinkedList<T> implements List<T> {
    protected head: DoublyLinkedNode<T> | null = null;
    protected tail: DoublyLinkedNode<T> | null = null;
    private length: number = 0;

    /**
     * Returns the number of elements in the linked list.
     */
    public size(): number {
        return this.length;
    }

    /**
     * Checks if the linked list is empty.
     */
    public isEmpty(): boolean {
        return this.size() === 0;
    }

    /**
     * Appends an element after the tail.
     */
    public add(item: Handle<T>): void {
        const newNode = new DoublyLinkedNode(item);
        if (this.tail === null) {
            this.head = newNode; // First element is both head and tail
        } else {
            linkNodes(this.tail, newNode);
        }
        this.tail = newNode;
        this.length++;
    }

    /**
     * Wraps `value` in a new handle and appends it.
     */
    public addRaw(value: T): void {
        this.add(new Handle(value));
    }

    /**
     * Adds all elements from the specified iterable to the linked list.
     */
    public addAll(items: Iterable<Handle<T>>): void {
        for (const item of items) {
            this.add(item);
        }
    }

    /**
     * Inserts an element in front of the element currently at `index`.
     * @param item The handle to store.
     * @param index A position in `[0, size)`; the new element ends up at this index.
     */
    public insertAt(item: Handle<T>, index: number): Result<void> {
        const check = checkIndex(index, this.length);
        if (!check.ok) {
            return check;
        }

        const newNode = new DoublyLinkedNode(item);
        if (index === 0) {
            if (this.head === null) {
                return unexpected("non-empty list has no head");
            }
            linkNodes(newNode, this.head);
            this.head = newNode;
            this.length++;
            return done;
        }

        const target = this.nodeAt(index);
        if (!target.ok) {
            return target;
        }
        const prev = target.value.prev;
        if (prev === null) {
            return unexpected(`node ${index} has no predecessor`);
        }

        linkNodes(prev, newNode);
        linkNodes(newNode, target.value);
        this.length++;
        return done;
    }

    /**
     * Wraps `value` in a new handle and inserts it at `index`.
     */
    public insertRawAt(value: T, index: number): Result<void> {
        return this.insertAt(new Handle(value), index);
    }

    /**
     * Retrieves the element at the specified index.
     * @param index The index of the element to retrieve.
     */
    public get(index: number): Result<Handle<T>> {
        const node = this.nodeAt(index);
        if (!node.ok) {
            return node;
        }
        return ok(node.value.content);
    }

    /**
     * Checks whether this exact handle is stored in the list.
     */
    public contains(item: Handle<T>): boolean {
        return this.find(item) !== null;
    }

    /**
     * Removes the node holding exactly `item`.
     */
    public remove(item: Handle<T>): Result<void> {
        if (this.head === null) {
            return emptyList("remove");
        }

        const node = this.find(item);
        if (node === null) {
            return elementNotFound();
        }

        const removed = this.unlink(node);
        return removed.ok ? done : removed;
    }

    /**
     * Removes and returns the element at the specified index.
     * @param index The index of the element to remove.
     */
    public removeAt(index: number): Result<Handle<T>> {
        const check = checkIndex(index, this.length);
        if (!check.ok) {
            return check;
        }

        if (index === 0) {
            return this.shift();
        }
        if (index === this.length - 1) {
            return this.pop();
        }

        const node = this.nodeAt(index);
        if (!node.ok) {
            return node;
        }
        return this.unlink(node.value);
    }

    /**
     * Removes and returns the first element from the linked list.
     */
    public shift(): Result<Handle<T>> {
        const removedNode = this.head;
        if (removedNode === null) {
            return emptyList("shift");
        }

        this.head = removedNode.breakNext();
        if (this.head === null) {
            this.tail = null; // List is now empty
        }
        this.length--;
        return ok(removedNode.content);
    }

    /**
     * Removes and returns the last element from the linked list.
     */
    public pop(): Result<Handle<T>> {
        const removedNode = this.tail;
        if (removedNode === null) {
            return emptyList("pop");
        }

        this.tail = removedNode.breakPrev();
        if (this.tail === null) {
            this.head = null; // List is now empty
        }
        this.length--;
        return ok(removedNode.content);
    }

    /**
     * Removes every element.
     */
    public clear(): void {
        this.head = null;
        this.tail = null;
        this.length = 0;
    }

    /**
     * Returns the handles from first to last.
     */
    public toArray(): Handle<T>[] {
        return Array.from(this);
    }

    /**
     * Creates a list with its own nodes over the same handles.
     */
    public clone(): DoublyLinkedList<T> {
        const newList = new DoublyLinkedList<T>();
        let current = this.head;
        while (current) {
            newList.add(current.content);
            current = current.next;
        }
        return newList;
    }

    /**
     * Walks the links from the head and checks them against `head`, `tail`, the recorded size, and the backward
     * link of every node.
     */
    public verify(): Result<void> {
        if (this.length === 0) {
            return this.head === null && this.tail === null ? done : unexpected("empty list still has nodes");
        }
        if (this.head === null || this.tail === null) {
            return unexpected(`list of size ${this.length} is missing its head or tail`);
        }
        if (this.head.prev !== null) {
            return unexpected("head has a backward link");
        }

        let count = 1;
        let current = this.head;
        while (current.next !== null) {
            if (count >= this.length) {
                return unexpected(`more than ${this.length} nodes reachable from the head`);
            }
            if (current.next.prev !== current) {
                return unexpected(`backward link of node ${count} does not match its forward link`);
            }
            current = current.next;
            count++;
        }

        if (count !== this.length) {
            return unexpected(`${count} nodes reachable, size is ${this.length}`);
        }
        if (current !== this.tail) {
            return unexpected("last reachable node is not the tail");
        }
        return done;
    }

    /**
     * Makes the DoublyLinkedList class iterable, allowing the use of for...of loops.
     * @returns An iterator over the elements of the list.
     */
    [Symbol.iterator](): Iterator<Handle<T>> {
        let current = this.head;

        return {
            next(): IteratorResult<Handle<T>> {
                if (current) {
                    const value = current.content;
                    current = current.next;
                    return { value, done: false };
                } else {
                    return { value: undefined, done: true };
                }
            },
        };
    }

    /**
     * Locates a node by index, walking from whichever end is closer.
     */
    private nodeAt(index: number): Result<DoublyLinkedNode<T>> {
        const check = checkIndex(index, this.length);
        if (!check.ok) {
            return check;
        }

        if (index === this.length - 1) {
            return this.tail === null ? unexpected("non-empty list has no tail") : ok(this.tail);
        }

        let current: DoublyLinkedNode<T> | null;
        if (index < this.length / 2) {
            current = this.head;
            for (let i = 0; i < index && current !== null; i++) {
                current = current.next;
            }
        } else {
            current = this.tail;
            for (let i = this.length - 1; i > index && current !== null; i--) {
                current = current.prev;
            }
        }
        return current === null ? unexpected(`chain ends before index ${index}`) : ok(current);
    }

    private find(item: Handle<T>): DoublyLinkedNode<T> | null {
        let current = this.head;
        while (current !== null && current.content !== item) {
            current = current.next;
        }
        return current;
    }

    /**
     * Removes a node known to be in the list and joins its neighbours.
     */
    private unlink(node: DoublyLinkedNode<T>): Result<Handle<T>> {
        if (node === this.head) {
            return this.shift();
        }
        if (node === this.tail) {
            return this.pop();
        }

        const prev = node.prev;
        const next = node.next;
        if (prev === null || next === null) {
            return unexpected("interior node is not linked on both sides");
        }

        // Detaches `node` from both neighbours on the way
        linkNodes(prev, next);
        this.length--;
        return ok(node.content);
    }
}
