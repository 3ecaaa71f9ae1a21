import { describeInstruction } from "../compiler/CompilerHelper";
import { Instruction } from "../compiler/Instruction";
import { Logger, silentLogger } from "../Logger";
import { error, formatTag } from "../Utils";
import { MemoryStore } from "./MemoryStore";
import { derive, findFrame, validateAccess } from "./PermissionEngine";
import { TagAllocator } from "./TagAllocator";
import { AccessKind, AllocationId, BorrowKind, BorrowTag, Permission, PointerValue, ViolationRule } from "./Types";

export interface Violation {
    instructionIndex: number;
    allocationName: string;
    rule: ViolationRule;
    tag: BorrowTag | null;
    access: AccessKind | "reborrow";
    reason: string;
    line?: number;
}

export interface ReadRecord {
    index: number;
    name: string;
    value: number;
}

export type InterpreterStatus =
    | { kind: "Running" }
    | { kind: "Halted"; outcome: "Ok" }
    | { kind: "Halted"; outcome: "UB"; violation: Violation };

export type StepResult = { ok: true } | { ok: false; violation: Violation };

export interface TraceState {
    status: InterpreterStatus;
    pc: number;
    program: readonly Instruction[];
    store: MemoryStore;
    reads: readonly ReadRecord[];
}

export interface InterpreterOptions {
    // share an allocator to keep tags unique across several runs
    tags?: TagAllocator;
    logger?: Logger;
}

/**
 * Executes a checked program one instruction at a time and halts at the
 * first aliasing violation.
 */
export class TraceInterpreter {
    private PC: number = 0;
    private status: InterpreterStatus = { kind: "Running" };
    private bindings: Map<string, PointerValue> = new Map();
    private reads: ReadRecord[] = [];

    private readonly tags: TagAllocator;
    private readonly store: MemoryStore;
    private readonly logger: Logger;

    constructor(private readonly program: readonly Instruction[], options: InterpreterOptions = {}) {
        this.tags = options.tags ?? new TagAllocator();
        this.store = new MemoryStore(this.tags);
        this.logger = options.logger ?? silentLogger;
    }

    public run(): TraceState {
        while (this.status.kind === "Running") {
            this.step();
        }
        return this.state();
    }

    public step(): StepResult {
        if (this.status.kind !== "Running") {
            return { ok: true };
        }
        if (this.PC >= this.program.length) {
            this.status = { kind: "Halted", outcome: "Ok" };
            this.logger.debug("halted", { outcome: "Ok", instructions: this.program.length });
            return { ok: true };
        }

        const index = this.PC;
        const instr = this.program[index];
        this.logger.debug(`${index}: ${describeInstruction(instr)}`);

        const result = this.microcode(instr, index);
        if (!result.ok) {
            this.status = { kind: "Halted", outcome: "UB", violation: result.violation };
            this.logger.debug("halted", { outcome: "UB", rule: result.violation.rule, index });
            return result;
        }
        this.PC++;
        return result;
    }

    public state(): TraceState {
        return {
            status: this.status,
            pc: this.PC,
            program: this.program,
            store: this.store,
            reads: this.reads,
        };
    }

    private microcode(instr: Instruction, index: number): StepResult {
        switch (instr.tag) {
            case "DECLARE": {
                const id = this.store.declare(instr.name, instr.value, instr.mutable, instr.interiorMutable);
                this.bindings.set(instr.name, { target: id, tag: this.store.get(id).stack[0].tag });
                return { ok: true };
            }
            case "BORROW": {
                const id = this.store.lookup(instr.name);
                const root = this.store.get(id).stack[0];
                this.bindings.set(instr.dest, this.pushDerived(id, root.tag, root.permission, instr.kind));
                return { ok: true };
            }
            case "REBORROW": {
                const src = this.binding(instr.src);
                if (src.tag === null) {
                    // integer -> pointer casts cannot recover provenance
                    this.bindings.set(instr.dest, { target: src.target, tag: null });
                    return { ok: true };
                }
                const allocation = this.store.get(src.target);
                const depth = findFrame(allocation.stack, src.tag);
                if (depth === -1) {
                    return this.violation(index, instr, src, "reborrow", "TagNotFound",
                        `cannot reborrow from ${formatTag(src.tag)}: it does not exist in the borrow stack`);
                }
                const parent = allocation.stack[depth];
                this.bindings.set(instr.dest, this.pushDerived(src.target, parent.tag, parent.permission, instr.kind));
                return { ok: true };
            }
            case "CAST_TO_INT": {
                const src = this.binding(instr.src);
                this.bindings.set(instr.dest, { target: src.target, tag: null });
                return { ok: true };
            }
            case "READ": {
                const src = this.binding(instr.src);
                const denied = this.access(index, instr, src, "read");
                if (denied) {
                    return denied;
                }
                const allocation = this.store.get(src.target);
                this.reads.push({ index, name: allocation.name, value: allocation.value });
                return { ok: true };
            }
            case "WRITE":
            case "EXTERNAL_CALL": {
                const src = this.binding(instr.src);
                const denied = this.access(index, instr, src, "write");
                if (denied) {
                    return denied;
                }
                this.store.writeValue(src.target, instr.value);
                return { ok: true };
            }
        }
    }

    private pushDerived(id: AllocationId, parentTag: BorrowTag, parentPermission: Permission, kind: BorrowKind): PointerValue {
        const allocation = this.store.get(id);
        const tag = this.tags.next();
        this.store.pushFrame(id, tag, derive(parentPermission, kind, allocation.interiorMutable), parentTag);
        return { target: id, tag };
    }

    // Returns the failing step, or null when the access was granted and the stack updated.
    private access(index: number, instr: Instruction, ptr: PointerValue, kind: AccessKind): StepResult | null {
        const allocation = this.store.get(ptr.target);
        const outcome = validateAccess(allocation.stack, ptr.tag, kind, allocation.interiorMutable);
        if (!outcome.ok) {
            return this.violation(index, instr, ptr, kind, outcome.rule, outcome.reason);
        }
        if (outcome.removed.size > 0) {
            this.logger.debug(`popped ${[...outcome.removed].map(formatTag).join(", ")} from '${allocation.name}'`);
            this.store.removeFrames(ptr.target, outcome.removed);
        }
        return null;
    }

    private violation(
        index: number,
        instr: Instruction,
        ptr: PointerValue,
        access: Violation["access"],
        rule: ViolationRule,
        reason: string
    ): StepResult {
        const violation: Violation = {
            instructionIndex: index,
            allocationName: this.store.get(ptr.target).name,
            rule,
            tag: ptr.tag,
            access,
            reason,
        };
        if (instr.line !== undefined) {
            violation.line = instr.line;
        }
        return { ok: false, violation };
    }

    private binding(name: string): PointerValue {
        const value = this.bindings.get(name);
        if (value === undefined) {
            error("UnknownBinding", `'${name}' is not bound`);
        }
        return value;
    }
}
