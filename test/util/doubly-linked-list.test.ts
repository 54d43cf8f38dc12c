import { expect } from "chai";
import { DoublyLinkedList, DoublyLinkedNode, linkNodes } from "../../src/util/doubly-linked-list";
import { Handle } from "../../src/util/list";
import { unwrap } from "../../src/util/list-errors";
import { describeListBehaviour, expectFailure, values } from "./list-behaviour";

describeListBehaviour("DoublyLinkedList", <T>() => new DoublyLinkedList<T>());

class InspectableDoublyLinkedList<T> extends DoublyLinkedList<T> {
    public nodes(): DoublyLinkedNode<T>[] {
        const nodes: DoublyLinkedNode<T>[] = [];
        let current = this.head;
        while (current) {
            nodes.push(current);
            current = current.next;
        }
        return nodes;
    }
}

function inspectableListOf(...items: string[]): InspectableDoublyLinkedList<string> {
    const list = new InspectableDoublyLinkedList<string>();
    for (const item of items) {
        list.addRaw(item);
    }
    return list;
}

describe("DoublyLinkedList", function () {
    function node(value: string): DoublyLinkedNode<string> {
        return new DoublyLinkedNode(new Handle(value));
    }

    describe("linkNodes", function () {
        it("links both directions", function () {
            const a = node("a");
            const b = node("b");

            const [aOldNext, bOldPrev] = linkNodes(a, b);

            expect(a.next).to.equal(b);
            expect(b.prev).to.equal(a);
            expect(aOldNext).to.equal(null);
            expect(bOldPrev).to.equal(null);
        });

        it("detaches and returns the previous neighbours", function () {
            const a = node("a");
            const b = node("b");
            const c = node("c");
            const d = node("d");
            linkNodes(a, b);
            linkNodes(c, d);

            const [aOldNext, dOldPrev] = linkNodes(a, d);

            expect(aOldNext).to.equal(b);
            expect(dOldPrev).to.equal(c);
            expect(b.prev).to.equal(null);
            expect(c.next).to.equal(null);
            expect(a.next).to.equal(d);
            expect(d.prev).to.equal(a);
        });
    });

    describe("breakNext and breakPrev", function () {
        it("clear the mirrored link on the neighbour", function () {
            const a = node("a");
            const b = node("b");
            const c = node("c");
            linkNodes(a, b);
            linkNodes(b, c);

            expect(b.breakNext()).to.equal(c);
            expect(c.prev).to.equal(null);
            expect(b.next).to.equal(null);

            expect(b.breakPrev()).to.equal(a);
            expect(a.next).to.equal(null);
            expect(b.prev).to.equal(null);
        });

        it("return null without a neighbour", function () {
            const a = node("a");

            expect(a.breakNext()).to.equal(null);
            expect(a.breakPrev()).to.equal(null);
        });
    });

    it("reaches indices near the tail from the tail", function () {
        const list = new DoublyLinkedList<number>();
        for (let i = 0; i < 9; i++) {
            list.addRaw(i);
        }

        expect(unwrap(list.get(6)).value).to.equal(6);
        expect(unwrap(list.removeAt(7)).value).to.equal(7);
        unwrap(list.insertRawAt(70, 7));

        expect(values(list)).to.deep.equal([0, 1, 2, 3, 4, 5, 6, 70, 8]);
        unwrap(list.verify());
    });

    it("returns its own type from clone", function () {
        const list = new DoublyLinkedList<number>();
        list.addRaw(1);
        list.addRaw(2);

        const copy = list.clone();

        expect(copy).to.be.instanceOf(DoublyLinkedList);
        unwrap(copy.verify());
    });

    describe("with broken links", function () {
        it("reports a chain cut short by breakNext", function () {
            const list = inspectableListOf("a", "b", "c");
            const [, second] = list.nodes();

            second.breakNext();

            const result = list.verify();
            expectFailure(result, "UnexpectedError");
            if (!result.ok) {
                expect(result.error.message).to.equal("List invariant violated: 2 nodes reachable, size is 3");
            }
        });

        it("reports a backward link that disagrees with the forward link", function () {
            const list = inspectableListOf("a", "b", "c");
            const [first, , third] = list.nodes();

            third.prev = first;

            const result = list.verify();
            expectFailure(result, "UnexpectedError");
            if (!result.ok) {
                expect(result.error.message).to.equal(
                    "List invariant violated: backward link of node 2 does not match its forward link",
                );
            }
        });

        it("reports a head with a backward link", function () {
            const list = inspectableListOf("a", "b");
            const [first] = list.nodes();

            linkNodes(node("z"), first);

            expectFailure(list.verify(), "UnexpectedError");
        });

        it("returns UnexpectedError from removeAt when the chain is cut before the index", function () {
            const list = inspectableListOf("a", "b", "c", "d");
            const [first, second] = list.nodes();

            first.next = null;
            second.prev = null;

            expectFailure(list.removeAt(1), "UnexpectedError");
        });
    });
});
