import { Instruction } from "../compiler/Instruction";
import { error } from "../Utils";
import { BindingEnvironment, BindingInfo } from "./BindingEnvironment";

/**
 * Construction-time validation of a program. Everything rejected here is a
 * malformed trace, not undefined behavior, so it is thrown as a TraceError
 * before any instruction executes.
 */
export class ProgramChecker {
    private env: BindingEnvironment = new BindingEnvironment();

    check(program: readonly Instruction[]): void {
        this.env = new BindingEnvironment();
        program.forEach(instr => this.checkInstruction(instr));
    }

    private checkInstruction(instr: Instruction): void {
        switch (instr.tag) {
            case "DECLARE": {
                if (!this.env.declare(instr.name, instr.mutable)) {
                    error("DuplicateAllocation", `allocation '${instr.name}' is already declared`, instr.line);
                }
                return;
            }
            case "BORROW": {
                const mutable = this.env.isMutable(instr.name);
                if (mutable === null) {
                    error("InvalidAllocation", `unknown allocation '${instr.name}'`, instr.line);
                }
                // interior mutability is reached through shared borrows, never through `&mut`
                if (instr.kind === "unique" && !mutable) {
                    error("ImmutableBorrow", `cannot borrow '${instr.name}' as mutable, as it is not declared as mutable`, instr.line);
                }
                this.env.define(instr.dest, { kind: "pointer", allocation: instr.name });
                return;
            }
            case "REBORROW": {
                const src = this.resolve(instr.src, instr.line);
                if (src.kind === "allocation") {
                    error("NotAPointer", `'${instr.src}' is a value, not a reference or pointer`, instr.line);
                }
                this.env.define(instr.dest, { kind: "pointer", allocation: src.allocation });
                return;
            }
            case "CAST_TO_INT": {
                const src = this.resolve(instr.src, instr.line);
                if (src.kind === "allocation") {
                    error("NotAPointer", `'${instr.src}' is a value, not a reference or pointer`, instr.line);
                }
                this.env.define(instr.dest, { kind: "integer", allocation: src.allocation });
                return;
            }
            case "READ": {
                this.expectDereferenceable(instr.src, instr.line);
                return;
            }
            case "WRITE": {
                const src = this.expectDereferenceable(instr.src, instr.line);
                if (src.kind === "allocation" && !src.mutable) {
                    error("AssignToImmutable", `cannot assign twice to immutable variable '${instr.src}'`, instr.line);
                }
                return;
            }
            case "EXTERNAL_CALL": {
                const src = this.expectDereferenceable(instr.src, instr.line);
                if (src.kind === "allocation") {
                    error("NotAPointer", `${instr.callee} expects a pointer, found the value '${instr.src}'`, instr.line);
                }
                return;
            }
        }
    }

    private resolve(name: string, line?: number): BindingInfo {
        const info = this.env.lookup(name);
        if (info === null) {
            error("UnknownBinding", `cannot find value '${name}' in this trace`, line);
        }
        return info;
    }

    private expectDereferenceable(name: string, line?: number): BindingInfo {
        const info = this.resolve(name, line);
        if (info.kind === "integer") {
            error("NotAPointer", `'${name}' is an integer; cast it back to a pointer before dereferencing`, line);
        }
        return info;
    }
}

export function checkProgram(program: readonly Instruction[]): void {
    new ProgramChecker().check(program);
}
