import { error } from "../Utils";
import { TagAllocator } from "./TagAllocator";
import { Allocation, AllocationId, BorrowTag, Frame, Permission } from "./Types";

export interface AllocationSnapshot {
    name: string;
    value: number;
    mutable: boolean;
    interiorMutable: boolean;
    stack: Frame[];
}

/**
 * Arena of allocations, each owning its borrow stack. The store performs no
 * aliasing checks; that is the permission engine's job.
 */
export class MemoryStore {
    private arena: Allocation[] = [];
    private names: Map<string, AllocationId> = new Map();

    constructor(private tags: TagAllocator) { }

    // Creates the allocation together with its root frame.
    public declare(name: string, value: number, mutable: boolean, interiorMutable: boolean): AllocationId {
        if (this.names.has(name)) {
            error("DuplicateAllocation", `allocation '${name}' is already declared`);
        }
        const id = this.arena.length;
        const root: Frame = {
            tag: this.tags.next(),
            permission: interiorMutable ? Permission.SharedReadWrite : Permission.Unique,
            parent: null,
        };
        this.arena.push({ id, name, value, mutable, interiorMutable, stack: [root] });
        this.names.set(name, id);
        return id;
    }

    public get(id: AllocationId): Allocation {
        const allocation = this.arena[id];
        if (allocation === undefined) {
            error("InvalidAllocation", `unknown allocation id ${id}`);
        }
        return allocation;
    }

    public lookup(name: string): AllocationId {
        const id = this.names.get(name);
        if (id === undefined) {
            error("InvalidAllocation", `unknown allocation '${name}'`);
        }
        return id;
    }

    public pushFrame(id: AllocationId, tag: BorrowTag, permission: Permission, parent: BorrowTag | null): void {
        this.get(id).stack.push({ tag, permission, parent });
    }

    public removeFrames(id: AllocationId, tags: ReadonlySet<BorrowTag>): void {
        const allocation = this.get(id);
        allocation.stack = allocation.stack.filter(frame => !tags.has(frame.tag));
    }

    public readValue(id: AllocationId): number {
        return this.get(id).value;
    }

    public writeValue(id: AllocationId, value: number): void {
        this.get(id).value = value;
    }

    public allocations(): readonly Allocation[] {
        return this.arena;
    }

    public snapshot(): AllocationSnapshot[] {
        return this.arena.map(a => ({
            name: a.name,
            value: a.value,
            mutable: a.mutable,
            interiorMutable: a.interiorMutable,
            stack: a.stack.map(frame => ({ ...frame })),
        }));
    }
}
