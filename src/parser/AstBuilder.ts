import { AbstractParseTreeVisitor, ParserRuleContext, TerminalNode } from "antlr4ng";
import { error } from "../Utils";
import { CastTarget, Expr, Stmt, TraceAst } from "./Ast";
import {
    AssignStatementContext,
    BorrowExprContext,
    CallContext,
    CastTypeContext,
    DerefExprContext,
    ExpressionContext,
    ExpressionStatementContext,
    LetStatementContext,
    LiteralContext,
    ParenContext,
    PathCallContext,
    PathContext,
    PointerCastContext,
    PrimaryExprContext,
    TraceFileContext,
} from "./generated/TraceParser";
import { TraceVisitor } from "./generated/TraceVisitor";

const INTEGER_TYPES = new Set(["usize", "isize", "u64", "i64"]);

function lineOf(ctx: ParserRuleContext): number {
    return ctx.start?.line ?? 1;
}

function text(node: TerminalNode | null): string {
    return node === null ? "" : node.getText();
}

function integerLiteral(minus: TerminalNode | null, digits: TerminalNode | null, line: number): number {
    const literal = text(digits).replace(/_/g, "");
    const value = Number.parseInt(literal, 10);
    if (!Number.isSafeInteger(value)) {
        error("SyntaxError", `integer literal ${literal} is out of range`, line);
    }
    return minus === null ? value : -value;
}

function castTarget(ctx: CastTypeContext): CastTarget {
    if (ctx instanceof PointerCastContext) {
        // the pointee type is irrelevant to the model
        return ctx.MUT() === null ? "*const" : "*mut";
    }
    const type = ctx.getText();
    if (!INTEGER_TYPES.has(type)) {
        error("UnsupportedExpression", `cannot cast to '${type}'`, lineOf(ctx));
    }
    return "usize";
}

class ExpressionBuilder extends AbstractParseTreeVisitor<Expr> implements TraceVisitor<Expr> {
    build(ctx: ParserRuleContext | null): Expr {
        const expr = ctx === null ? null : this.visit(ctx);
        if (ctx === null || expr === null) {
            return error("SyntaxError", "expected an expression");
        }
        return expr;
    }

    visitExpression(ctx: ExpressionContext): Expr {
        let expr = this.build(ctx.unary());
        for (const cast of ctx.castType()) {
            expr = { tag: "Cast", operand: expr, target: castTarget(cast) };
        }
        return expr;
    }

    visitBorrowExpr(ctx: BorrowExprContext): Expr {
        return { tag: "Borrow", mutable: ctx.MUT() !== null, operand: this.build(ctx.unary()) };
    }

    visitDerefExpr(ctx: DerefExprContext): Expr {
        return { tag: "Deref", operand: this.build(ctx.unary()) };
    }

    visitPrimaryExpr(ctx: PrimaryExprContext): Expr {
        return this.build(ctx.primary());
    }

    visitLiteral(ctx: LiteralContext): Expr {
        return { tag: "Literal", value: integerLiteral(ctx.MINUS(), ctx.INT(), lineOf(ctx)) };
    }

    visitPathCall(ctx: PathCallContext): Expr {
        const [type, method] = ctx.IDENT().map(node => node.getText());
        if (type !== "Cell" || method !== "new") {
            error("UnsupportedExpression", `unsupported path '${type}::${method}'`, lineOf(ctx));
        }
        return { tag: "CellNew", value: integerLiteral(ctx.MINUS(), ctx.INT(), lineOf(ctx)) };
    }

    visitCall(ctx: CallContext): Expr {
        return { tag: "Call", callee: text(ctx.IDENT()), args: ctx.expression().map(arg => this.build(arg)) };
    }

    visitPath(ctx: PathContext): Expr {
        return { tag: "Path", name: text(ctx.IDENT()) };
    }

    visitParen(ctx: ParenContext): Expr {
        return this.build(ctx.expression());
    }
}

class StatementBuilder extends AbstractParseTreeVisitor<Stmt> implements TraceVisitor<Stmt> {
    constructor(private readonly expressions: ExpressionBuilder) {
        super();
    }

    build(ctx: ParserRuleContext): Stmt {
        const stmt = this.visit(ctx);
        if (stmt === null) {
            return error("SyntaxError", `unexpected '${ctx.getText()}'`, lineOf(ctx));
        }
        return stmt;
    }

    visitLetStatement(ctx: LetStatementContext): Stmt {
        return {
            tag: "Let",
            name: text(ctx.IDENT()),
            mutable: ctx.MUT() !== null,
            init: this.expressions.build(ctx.expression()),
            line: lineOf(ctx),
        };
    }

    visitAssignStatement(ctx: AssignStatementContext): Stmt {
        const [target, value] = ctx.expression();
        return {
            tag: "Assign",
            target: this.expressions.build(target),
            value: this.expressions.build(value),
            line: lineOf(ctx),
        };
    }

    visitExpressionStatement(ctx: ExpressionStatementContext): Stmt {
        return { tag: "ExprStmt", expr: this.expressions.build(ctx.expression()), line: lineOf(ctx) };
    }
}

/**
 * Converts a parse tree into the trace AST. Semantic restrictions the grammar
 * does not express (cast types, `Cell::new`, literal range) are checked here.
 */
export function buildAst(tree: TraceFileContext): TraceAst {
    const statements = new StatementBuilder(new ExpressionBuilder());
    return { tag: "Trace", statements: tree.statement().map(stmt => statements.build(stmt)) };
}
