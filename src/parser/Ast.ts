export type CastTarget = "*const" | "*mut" | "usize";

export type Expr =
    | { tag: "Literal"; value: number }
    | { tag: "Path"; name: string }
    | { tag: "CellNew"; value: number } // Cell::new(<literal>)
    | { tag: "Borrow"; mutable: boolean; operand: Expr }
    | { tag: "Deref"; operand: Expr }
    | { tag: "Cast"; operand: Expr; target: CastTarget }
    | { tag: "Call"; callee: string; args: Expr[] };

export type Stmt =
    | { tag: "Let"; name: string; mutable: boolean; init: Expr; line: number }
    | { tag: "Assign"; target: Expr; value: Expr; line: number }
    | { tag: "ExprStmt"; expr: Expr; line: number };

export interface TraceAst {
    tag: "Trace";
    statements: Stmt[];
}
