import { describe, expect, it } from "vitest";
import { TraceError } from "../Utils";
import { MemoryStore } from "../vm/MemoryStore";
import { TagAllocator } from "../vm/TagAllocator";
import { Permission } from "../vm/Types";

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (err) {
        return err instanceof TraceError ? err.code : `not a TraceError: ${String(err)}`;
    }
    return undefined;
}

describe("TagAllocator", () => {
    it("hands out strictly increasing tags", () => {
        const tags = new TagAllocator();
        expect([tags.next(), tags.next(), tags.next()]).toEqual([1, 2, 3]);
    });

    it("peeks without issuing", () => {
        const tags = new TagAllocator();
        tags.next();
        expect(tags.peek()).toBe(2);
        expect(tags.peek()).toBe(2);
        expect(tags.next()).toBe(2);
    });
});

describe("MemoryStore", () => {
    it("creates each allocation with a root frame", () => {
        const store = new MemoryStore(new TagAllocator());
        const x = store.declare("x", 2, true, false);
        const c = store.declare("c", 5, false, true);

        expect([x, c]).toEqual([0, 1]);
        expect(store.get(x).stack).toEqual([{ tag: 1, permission: Permission.Unique, parent: null }]);
        expect(store.get(c).stack).toEqual([{ tag: 2, permission: Permission.SharedReadWrite, parent: null }]);
        expect(store.get(c).interiorMutable).toBe(true);
        expect(store.get(x).interiorMutable).toBe(false);
        expect([store.get(x).mutable, store.get(c).mutable]).toEqual([true, false]);
    });

    it("looks allocations up by name", () => {
        const store = new MemoryStore(new TagAllocator());
        store.declare("a", 0, false, false);
        const b = store.declare("b", 0, false, false);
        expect(store.lookup("b")).toBe(b);
    });

    it("fails with InvalidAllocation on unknown ids and names", () => {
        const store = new MemoryStore(new TagAllocator());
        expect(codeOf(() => store.get(3))).toBe("InvalidAllocation");
        expect(codeOf(() => store.readValue(0))).toBe("InvalidAllocation");
        expect(codeOf(() => store.pushFrame(0, 1, Permission.Unique, null))).toBe("InvalidAllocation");
        expect(codeOf(() => store.lookup("y"))).toBe("InvalidAllocation");
    });

    it("rejects a second declaration of the same name", () => {
        const store = new MemoryStore(new TagAllocator());
        store.declare("x", 1, true, false);
        expect(codeOf(() => store.declare("x", 2, true, false))).toBe("DuplicateAllocation");
    });

    it("pushes and removes frames without validating them", () => {
        const store = new MemoryStore(new TagAllocator());
        const x = store.declare("x", 1, false, false);
        store.pushFrame(x, 7, Permission.SharedReadOnly, 1);
        store.pushFrame(x, 8, Permission.Unique, 7);
        store.removeFrames(x, new Set([7]));
        expect(store.get(x).stack.map(f => f.tag)).toEqual([1, 8]);
    });

    it("reads and writes values", () => {
        const store = new MemoryStore(new TagAllocator());
        const x = store.declare("x", 1, true, false);
        store.writeValue(x, 42);
        expect(store.readValue(x)).toBe(42);
    });

    it("returns snapshots that do not alias the store", () => {
        const store = new MemoryStore(new TagAllocator());
        const x = store.declare("x", 1, true, false);
        const snapshot = store.snapshot();
        store.pushFrame(x, 9, Permission.Unique, 1);
        store.writeValue(x, 3);
        expect(snapshot).toEqual([
            { name: "x", value: 1, mutable: true, interiorMutable: false, stack: [{ tag: 1, permission: Permission.Unique, parent: null }] },
        ]);
    });
});
