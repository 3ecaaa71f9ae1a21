import { AccessKind, BorrowKind, BorrowTag, Frame, Permission, ViolationRule } from "./Types";

export type AccessOutcome =
    | { ok: true; matched: Frame; removed: Set<BorrowTag> }
    | { ok: false; rule: ViolationRule; reason: string };

/**
 * Permission of a frame derived from a parent frame.
 *
 * Shared borrows of an interior-mutable allocation are the one place a
 * shared borrow may write. A read-only parent never hands out write access,
 * whatever kind of pointer it is cast to.
 */
export function derive(parent: Permission, kind: BorrowKind, interiorMutable: boolean): Permission {
    switch (parent) {
        case Permission.Disabled:
            return Permission.Disabled;
        case Permission.SharedReadOnly:
            return Permission.SharedReadOnly;
        case Permission.Unique:
        case Permission.SharedReadWrite:
            if (kind === "unique") {
                return Permission.Unique;
            }
            return interiorMutable ? Permission.SharedReadWrite : Permission.SharedReadOnly;
    }
}

export function findFrame(stack: readonly Frame[], tag: BorrowTag): number {
    for (let i = stack.length - 1; i >= 0; i--) {
        if (stack[i].tag === tag) {
            return i;
        }
    }
    return -1;
}

// Tags above `depth` that were derived, directly or transitively, from the frame at `depth`.
export function descendantsAbove(stack: readonly Frame[], depth: number): Set<BorrowTag> {
    const lineage = new Set<BorrowTag>([stack[depth].tag]);
    const descendants = new Set<BorrowTag>();
    for (let i = depth + 1; i < stack.length; i++) {
        const frame = stack[i];
        if (frame.parent !== null && lineage.has(frame.parent)) {
            lineage.add(frame.tag);
            descendants.add(frame.tag);
        }
    }
    return descendants;
}

function allowsWrite(permission: Permission, interiorMutable: boolean): boolean {
    switch (permission) {
        case Permission.Unique:
        case Permission.SharedReadWrite:
            return true;
        case Permission.SharedReadOnly:
            return interiorMutable;
        case Permission.Disabled:
            return false;
    }
}

/**
 * Checks an access through `tag` against a borrow stack without modifying it.
 * On success the caller must drop the frames listed in `removed`.
 */
export function validateAccess(
    stack: readonly Frame[],
    tag: BorrowTag | null,
    access: AccessKind,
    interiorMutable: boolean
): AccessOutcome {
    if (tag === null) {
        return {
            ok: false,
            rule: "UntaggedAccess",
            reason: "no frame grants access to an untagged pointer",
        };
    }

    const depth = findFrame(stack, tag);
    if (depth === -1) {
        return {
            ok: false,
            rule: "TagNotFound",
            reason: `tag <${tag}> does not exist in the borrow stack`,
        };
    }

    const matched = stack[depth];
    const descendants = descendantsAbove(stack, depth);
    const removed = new Set<BorrowTag>();

    for (let i = depth + 1; i < stack.length; i++) {
        const frame = stack[i];
        const derived = descendants.has(frame.tag);

        if (frame.permission === Permission.Unique && !derived) {
            return {
                ok: false,
                rule: "Disabled",
                reason: `tag <${tag}> conflicts with the live unique borrow <${frame.tag}>`,
            };
        }

        if (access === "write") {
            if (derived || frame.permission === Permission.SharedReadOnly) {
                removed.add(frame.tag);
            }
        } else if (derived && (frame.permission === Permission.Unique || (frame.parent !== null && removed.has(frame.parent)))) {
            removed.add(frame.tag);
        }
    }

    if (matched.permission === Permission.Disabled) {
        return {
            ok: false,
            rule: "Disabled",
            reason: `tag <${tag}> has been disabled`,
        };
    }

    if (access === "write" && !allowsWrite(matched.permission, interiorMutable)) {
        return {
            ok: false,
            rule: "ReadOnlyViolation",
            reason: `tag <${tag}> only grants SharedReadOnly permission`,
        };
    }

    return { ok: true, matched, removed };
}
