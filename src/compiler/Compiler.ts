import { DEFAULT_CONFIG } from "../Config";
import { Expr, Stmt, TraceAst } from "../parser/Ast";
import { error } from "../Utils";
import { BorrowKind } from "../vm/Types";
import { shadowName, temporaryName } from "./CompilerHelper";
import { Instruction } from "./Instruction";

export interface CompilerOptions {
    externalWriteValue?: number;
}

type BindingShape = "value" | "pointer";

/**
 * Lowers trace-language statements to the instruction list the interpreter
 * runs. Chained casts get one instruction per step, each bound to a fresh
 * temporary; `let q = p;` only records that `q` names the same pointer.
 * Every `let` that emits an instruction gets its own binding name, so a
 * shadowed name never changes what an earlier alias refers to.
 */
export class Compiler {
    private instructions: Instruction[] = [];
    private wc: number = 0;
    private temps: number = 0;
    // source name -> binding name used in the emitted instructions
    private scope: Map<string, string> = new Map();
    private shapes: Map<string, BindingShape> = new Map();
    private generations: Map<string, number> = new Map();
    private readonly externalWriteValue: number;

    constructor(options: CompilerOptions = {}) {
        this.externalWriteValue = options.externalWriteValue ?? DEFAULT_CONFIG.externalWriteValue;
    }

    public compileProgram(ast: TraceAst): Instruction[] {
        this.instructions = [];
        this.wc = 0;
        this.temps = 0;
        this.scope = new Map();
        this.shapes = new Map();
        this.generations = new Map();

        ast.statements.forEach(stmt => this.compile(stmt));
        return this.instructions;
    }

    private compile(stmt: Stmt): void {
        switch (stmt.tag) {
            case "Let": {
                const init = stmt.init;
                if (init.tag === "Literal" || init.tag === "CellNew") {
                    this.emit({
                        tag: "DECLARE",
                        name: this.bind(stmt.name),
                        value: init.value,
                        mutable: stmt.mutable,
                        interiorMutable: init.tag === "CellNew",
                        line: stmt.line,
                    });
                } else if (init.tag === "Path") {
                    const target = this.resolve(init.name);
                    if (this.shapes.get(target) === "value") {
                        error("UnsupportedExpression", `copying the value of '${init.name}' is not modelled; declare '${stmt.name}' with a literal`, stmt.line);
                    }
                    this.scope.set(stmt.name, target);
                } else {
                    const dest = this.bind(stmt.name);
                    this.compilePointer(init, dest, stmt.line);
                }
                break;
            }
            case "Assign": {
                const src = this.place(stmt.target, stmt.line);
                if (stmt.value.tag !== "Literal") {
                    error("UnsupportedExpression", "only integer literals can be stored", stmt.line);
                }
                this.emit({ tag: "WRITE", src, value: stmt.value.value, line: stmt.line });
                break;
            }
            case "ExprStmt": {
                const expr = stmt.expr;
                if (expr.tag === "Call") {
                    this.compileCall(expr.callee, expr.args, stmt.line);
                } else {
                    this.emit({ tag: "READ", src: this.place(expr, stmt.line), line: stmt.line });
                }
                break;
            }
        }
    }

    // Emits the instructions computing `expr` and binds the result to `dest`.
    private compilePointer(expr: Expr, dest: string, line: number): void {
        switch (expr.tag) {
            case "Borrow": {
                const kind: BorrowKind = expr.mutable ? "unique" : "shared";
                const operand = expr.operand;
                if (operand.tag === "Path") {
                    const name = this.resolve(operand.name);
                    if (this.shapes.get(name) === "pointer") {
                        error("UnsupportedExpression", `references to the pointer '${operand.name}' are not modelled`, line);
                    }
                    this.emit({ tag: "BORROW", dest, name, kind, line });
                } else if (operand.tag === "Deref") {
                    const src = this.operand(operand.operand, dest, line);
                    this.emit({ tag: "REBORROW", dest, src, kind, line });
                } else {
                    error("UnsupportedExpression", "only variables and dereferenced pointers can be borrowed", line);
                }
                return;
            }
            case "Cast": {
                const src = this.operand(expr.operand, dest, line);
                if (expr.target === "usize") {
                    this.emit({ tag: "CAST_TO_INT", dest, src, line });
                } else {
                    this.emit({ tag: "REBORROW", dest, src, kind: expr.target === "*mut" ? "unique" : "shared", line });
                }
                return;
            }
            default:
                error("UnsupportedExpression", `a ${describeExpr(expr)} does not produce a pointer`, line);
        }
    }

    private compileCall(callee: string, args: Expr[], line: number): void {
        const [pointer, stored] = args;
        if (pointer === undefined || args.length > 2) {
            error("UnsupportedExpression", `${callee} must be called with a pointer and an optional value`, line);
        }
        let value = this.externalWriteValue;
        if (stored !== undefined) {
            if (stored.tag !== "Literal") {
                error("UnsupportedExpression", `the value passed to ${callee} must be an integer literal`, line);
            }
            value = stored.value;
        }
        const src = this.operand(pointer, callee, line);
        this.emit({ tag: "EXTERNAL_CALL", src, callee, value, line });
    }

    // Binding name holding the value of `expr`, compiling into a temporary if needed.
    private operand(expr: Expr, base: string, line: number): string {
        if (expr.tag === "Path") {
            return this.resolve(expr.name);
        }
        const temp = temporaryName(base, ++this.temps);
        this.compilePointer(expr, temp, line);
        return temp;
    }

    // The binding that `*p` or `x` reads and writes through.
    private place(expr: Expr, line: number): string {
        if (expr.tag === "Path") {
            return this.resolve(expr.name);
        }
        if (expr.tag === "Deref") {
            return this.operand(expr.operand, "deref", line);
        }
        return error("UnsupportedExpression", `cannot access memory through a ${describeExpr(expr)}`, line);
    }

    // The first binding of a name keeps it; later ones are versioned.
    private bind(name: string): string {
        const generation = (this.generations.get(name) ?? 0) + 1;
        this.generations.set(name, generation);
        const binding = generation === 1 ? name : shadowName(name, generation);
        this.scope.set(name, binding);
        return binding;
    }

    private resolve(name: string): string {
        return this.scope.get(name) ?? name;
    }

    private emit(instr: Instruction): void {
        switch (instr.tag) {
            case "DECLARE":
                this.shapes.set(instr.name, "value");
                break;
            case "BORROW":
            case "REBORROW":
            case "CAST_TO_INT":
                this.shapes.set(instr.dest, "pointer");
                break;
            default:
                break;
        }
        this.instructions[this.wc++] = instr;
    }
}

function describeExpr(expr: Expr): string {
    switch (expr.tag) {
        case "Literal":
            return "literal";
        case "Path":
            return "variable";
        case "CellNew":
            return "Cell::new call";
        case "Borrow":
            return "borrow";
        case "Deref":
            return "dereference";
        case "Cast":
            return "cast";
        case "Call":
            return "call";
    }
}
