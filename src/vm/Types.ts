export type BorrowTag = number;
export type AllocationId = number;

export enum Permission {
    Unique = "Unique",
    SharedReadWrite = "SharedReadWrite",
    SharedReadOnly = "SharedReadOnly",
    Disabled = "Disabled",
}

export type BorrowKind = "unique" | "shared";

export type AccessKind = "read" | "write";

export interface Frame {
    tag: BorrowTag;
    permission: Permission;
    // null only for the root frame pushed at declaration
    parent: BorrowTag | null;
}

export interface Allocation {
    id: AllocationId;
    name: string;
    value: number;
    // declared `mut`: the variable itself may be written and uniquely borrowed
    readonly mutable: boolean;
    readonly interiorMutable: boolean;
    // index 0 is the bottom, the last element is the top
    stack: Frame[];
}

/**
 * A reference or raw pointer. A null tag is a pointer whose provenance was
 * erased by a round-trip through an integer.
 */
export interface PointerValue {
    target: AllocationId;
    tag: BorrowTag | null;
}

export type ViolationRule =
    | "UntaggedAccess"
    | "TagNotFound"
    | "Disabled"
    | "ReadOnlyViolation";
