import { describe, expect, it } from "vitest";
import { derive, descendantsAbove, findFrame, validateAccess } from "../vm/PermissionEngine";
import { Frame, Permission } from "../vm/Types";

const U = Permission.Unique;
const SRW = Permission.SharedReadWrite;
const SRO = Permission.SharedReadOnly;
const DIS = Permission.Disabled;

function frame(tag: number, permission: Permission, parent: number | null): Frame {
    return { tag, permission, parent };
}

describe("derive", () => {
    it("gives a unique borrow Unique permission", () => {
        expect(derive(U, "unique", false)).toBe(U);
    });

    it("gives a shared borrow SharedReadOnly permission", () => {
        expect(derive(U, "shared", false)).toBe(SRO);
    });

    it("gives a shared borrow of an interior-mutable allocation SharedReadWrite", () => {
        expect(derive(SRW, "shared", true)).toBe(SRW);
    });

    it("derives Unique from a SharedReadWrite parent", () => {
        expect(derive(SRW, "unique", true)).toBe(U);
    });

    it("never upgrades a SharedReadOnly parent", () => {
        expect(derive(SRO, "unique", false)).toBe(SRO);
        expect(derive(SRO, "shared", true)).toBe(SRO);
    });

    it("keeps Disabled parents disabled", () => {
        expect(derive(DIS, "shared", true)).toBe(DIS);
        expect(derive(DIS, "unique", false)).toBe(DIS);
    });
});

describe("findFrame / descendantsAbove", () => {
    const stack = [frame(1, U, null), frame(2, U, 1), frame(3, SRO, 1), frame(4, SRO, 2)];

    it("finds the index of a tag", () => {
        expect(findFrame(stack, 3)).toBe(2);
        expect(findFrame(stack, 9)).toBe(-1);
    });

    it("collects frames derived transitively from a frame", () => {
        expect([...descendantsAbove(stack, 0)]).toEqual([2, 3, 4]);
        expect([...descendantsAbove(stack, 1)]).toEqual([4]);
        expect([...descendantsAbove(stack, 3)]).toEqual([]);
    });
});

describe("validateAccess", () => {
    const readers = [frame(1, U, null), frame(2, SRO, 1), frame(3, SRO, 2)];

    it("rejects untagged pointers", () => {
        expect(validateAccess(readers, null, "read", false)).toEqual({
            ok: false,
            rule: "UntaggedAccess",
            reason: "no frame grants access to an untagged pointer",
        });
    });

    it("rejects tags that are not on the stack", () => {
        expect(validateAccess(readers, 9, "write", false)).toEqual({
            ok: false,
            rule: "TagNotFound",
            reason: "tag <9> does not exist in the borrow stack",
        });
    });

    it("pops the read-only frames above on a write", () => {
        const outcome = validateAccess(readers, 1, "write", false);
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.matched).toEqual(frame(1, U, null));
            expect([...outcome.removed]).toEqual([2, 3]);
        }
    });

    it("keeps shared readers on a read", () => {
        const outcome = validateAccess(readers, 1, "read", false);
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.removed.size).toBe(0);
        }
    });

    it("rejects a write through a SharedReadOnly frame", () => {
        expect(validateAccess(readers, 3, "write", false)).toEqual({
            ok: false,
            rule: "ReadOnlyViolation",
            reason: "tag <3> only grants SharedReadOnly permission",
        });
    });

    it("allows a write through a SharedReadOnly frame of an interior-mutable allocation", () => {
        expect(validateAccess(readers, 3, "write", true).ok).toBe(true);
    });

    it("does not modify the stack it inspects", () => {
        validateAccess(readers, 1, "write", false);
        expect(readers).toHaveLength(3);
    });

    describe("sibling unique borrows", () => {
        const siblings = [frame(1, U, null), frame(2, U, 1), frame(3, U, 1)];

        it("reports Disabled when reading under a live sibling", () => {
            expect(validateAccess(siblings, 2, "read", false)).toEqual({
                ok: false,
                rule: "Disabled",
                reason: "tag <2> conflicts with the live unique borrow <3>",
            });
        });

        it("reports Disabled when writing under a live sibling", () => {
            const outcome = validateAccess(siblings, 2, "write", false);
            expect(outcome.ok).toBe(false);
            if (!outcome.ok) {
                expect(outcome.rule).toBe("Disabled");
            }
        });

        it("lets the topmost sibling write", () => {
            const outcome = validateAccess(siblings, 3, "write", false);
            expect(outcome.ok).toBe(true);
            if (outcome.ok) {
                expect(outcome.removed.size).toBe(0);
            }
        });

        it("ends both siblings when their parent is read", () => {
            const outcome = validateAccess(siblings, 1, "read", false);
            expect(outcome.ok).toBe(true);
            if (outcome.ok) {
                expect([...outcome.removed]).toEqual([2, 3]);
            }
        });
    });

    it("ends the children of a unique frame ended by a read", () => {
        const stack = [frame(1, U, null), frame(2, U, 1), frame(3, SRO, 2)];
        const outcome = validateAccess(stack, 1, "read", false);
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect([...outcome.removed]).toEqual([2, 3]);
        }
    });

    it("keeps unrelated SharedReadWrite frames on a write", () => {
        const stack = [frame(1, SRW, null), frame(2, SRW, 1), frame(3, SRW, 1), frame(4, SRO, 1)];
        const outcome = validateAccess(stack, 2, "write", true);
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect([...outcome.removed]).toEqual([4]);
        }
    });

    it("rejects any access through a disabled frame", () => {
        const stack = [frame(1, U, null), frame(2, DIS, 1)];
        expect(validateAccess(stack, 2, "read", false)).toEqual({
            ok: false,
            rule: "Disabled",
            reason: "tag <2> has been disabled",
        });
    });

    it("removes a disabled child when its parent writes", () => {
        const stack = [frame(1, U, null), frame(2, DIS, 1)];
        const outcome = validateAccess(stack, 1, "write", false);
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect([...outcome.removed]).toEqual([2]);
        }
    });
});
