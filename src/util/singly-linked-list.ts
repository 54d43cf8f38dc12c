import { Handle, List } from "./list";
import { Result, checkIndex, done, elementNotFound, emptyList, ok, unexpected } from "./list-errors";

export class SinglyLinkedNode<T> {
    constructor(
        public readonly content: Handle<T>,
        public next: SinglyLinkedNode<T> | null = null,
    ) {}
}

/**
 * Class representing a singly linked list.
 * Each node only knows its successor, so reaching the node before the tail takes a walk from the head.
 */
export class SinglyLinkedList<T> implements List<T> {
    protected head: SinglyLinkedNode<T> | null = null;
    protected tail: SinglyLinkedNode<T> | null = null;
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
     * Appends an element after the tail without walking the list.
     */
    public add(item: Handle<T>): void {
        const newNode = new SinglyLinkedNode(item);
        if (this.tail === null) {
            // First element is both head and tail
            this.head = newNode;
        } else {
            this.tail.next = newNode;
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
     * Inserts an element so that it becomes the element at `index`.
     * Anywhere but the head this walks to the node before `index` and relinks only that node.
     * @param item The handle to store.
     * @param index A position in `[0, size)`.
     */
    public insertAt(item: Handle<T>, index: number): Result<void> {
        const check = checkIndex(index, this.length);
        if (!check.ok) {
            return check;
        }

        if (index === 0) {
            this.head = new SinglyLinkedNode(item, this.head);
            this.length++;
            return done;
        }

        // Covers the tail position too: the new node goes in front of the current tail, which stays the tail
        const prev = this.nodeAt(index - 1);
        if (!prev.ok) {
            return prev;
        }
        const target = prev.value.next;
        if (target === null) {
            return unexpected(`node ${index - 1} has no successor`);
        }

        prev.value.next = new SinglyLinkedNode(item, target);
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
        return this.findPredecessor(item) !== undefined;
    }

    /**
     * Removes the first node holding exactly `item`, moving the tail back when that node was the tail.
     */
    public remove(item: Handle<T>): Result<void> {
        if (this.head === null) {
            return emptyList("remove");
        }

        const prev = this.findPredecessor(item);
        if (prev === undefined) {
            return elementNotFound();
        }

        if (prev === null) {
            const shifted = this.shift();
            return shifted.ok ? done : shifted;
        }

        const target = prev.next;
        if (target === null) {
            return unexpected("predecessor of a matched node has no successor");
        }

        prev.next = target.next;
        target.next = null;
        if (target === this.tail) {
            this.tail = prev;
        }
        this.length--;
        return done;
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

        const prev = this.nodeAt(index - 1);
        if (!prev.ok) {
            return prev;
        }
        const target = prev.value.next;
        if (target === null || target.next === null) {
            return unexpected(`interior node ${index} is not linked on both sides`);
        }

        prev.value.next = target.next;
        target.next = null;
        this.length--;
        return ok(target.content);
    }

    /**
     * Removes and returns the first element from the linked list.
     */
    public shift(): Result<Handle<T>> {
        const removedNode = this.head;
        if (removedNode === null) {
            return emptyList("shift");
        }

        this.head = removedNode.next;
        removedNode.next = null;
        if (this.head === null) {
            this.tail = null; // List is now empty
        }
        this.length--;
        return ok(removedNode.content);
    }

    /**
     * Removes and returns the last element from the linked list.
     * The node before the tail is found by walking from the head.
     */
    public pop(): Result<Handle<T>> {
        const removedNode = this.tail;
        if (removedNode === null) {
            return emptyList("pop");
        }

        if (this.length === 1) {
            this.head = null;
            this.tail = null;
            this.length = 0;
            return ok(removedNode.content);
        }

        const prev = this.nodeAt(this.length - 2);
        if (!prev.ok) {
            return prev;
        }
        if (prev.value.next !== removedNode) {
            return unexpected("node before the tail does not link to the tail");
        }

        prev.value.next = null;
        this.tail = prev.value;
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
    public clone(): SinglyLinkedList<T> {
        const newList = new SinglyLinkedList<T>();
        let current = this.head;
        while (current) {
            newList.add(current.content);
            current = current.next;
        }
        return newList;
    }

    /**
     * Walks the links from the head and checks them against `head`, `tail` and the recorded size.
     */
    public verify(): Result<void> {
        if (this.length === 0) {
            return this.head === null && this.tail === null ? done : unexpected("empty list still has nodes");
        }
        if (this.head === null || this.tail === null) {
            return unexpected(`list of size ${this.length} is missing its head or tail`);
        }

        let count = 1;
        let current = this.head;
        while (current.next !== null) {
            if (count >= this.length) {
                return unexpected(`more than ${this.length} nodes reachable from the head`);
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
     * Makes the SinglyLinkedList class iterable, allowing the use of for...of loops.
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

    private nodeAt(index: number): Result<SinglyLinkedNode<T>> {
        const check = checkIndex(index, this.length);
        if (!check.ok) {
            return check;
        }

        if (index === this.length - 1) {
            return this.tail === null ? unexpected("non-empty list has no tail") : ok(this.tail);
        }

        let current = this.head;
        for (let i = 0; i < index; i++) {
            if (current === null) {
                return unexpected(`chain ends before index ${index}`);
            }
            current = current.next;
        }
        return current === null ? unexpected(`chain ends before index ${index}`) : ok(current);
    }

    /**
     * Finds the node whose successor holds `item`.
     * @returns `null` when the head holds `item`, `undefined` when no node does.
     */
    private findPredecessor(item: Handle<T>): SinglyLinkedNode<T> | null | undefined {
        if (this.head === null) {
            return undefined;
        }
        if (this.head.content === item) {
            return null;
        }

        let prev = this.head;
        while (prev.next !== null) {
            if (prev.next.content === item) {
                return prev;
            }
            prev = prev.next;
        }
        return undefined;
    }
}
