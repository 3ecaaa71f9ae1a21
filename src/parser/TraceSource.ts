import { BaseErrorListener, CharStream, CommonTokenStream } from "antlr4ng";
import { error } from "../Utils";
import { TraceAst } from "./Ast";
import { buildAst } from "./AstBuilder";
import { TraceLexer } from "./generated/TraceLexer";
import { TraceParser } from "./generated/TraceParser";

/**
 * Turns lexer and parser errors into TraceErrors instead of printing them
 * and recovering.
 */
class ThrowingErrorListener extends BaseErrorListener {
    syntaxError(_recognizer: unknown, _offendingSymbol: unknown, line: number, column: number, msg: string): void {
        error("SyntaxError", `column ${column + 1}: ${msg}`, line);
    }
}

export function parseTrace(source: string): TraceAst {
    const listener = new ThrowingErrorListener();
    const lexer = new TraceLexer(CharStream.fromString(source));
    lexer.removeErrorListeners();
    lexer.addErrorListener(listener);

    const parser = new TraceParser(new CommonTokenStream(lexer));
    parser.removeErrorListeners();
    parser.addErrorListener(listener);

    return buildAst(parser.traceFile());
}
