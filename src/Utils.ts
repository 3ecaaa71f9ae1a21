export type TraceErrorCode =
    | "InvalidAllocation"
    | "DuplicateAllocation"
    | "UnknownBinding"
    | "NotAPointer"
    | "ImmutableBorrow"
    | "AssignToImmutable"
    | "SyntaxError"
    | "UnsupportedExpression"
    | "InvalidTrace"
    | "InvalidConfig";

/**
 * A malformed trace or input. These are construction errors and are never
 * reported as a violation of the aliasing model.
 */
export class TraceError extends Error {
    public readonly code: TraceErrorCode;
    public readonly line?: number;

    constructor(code: TraceErrorCode, message: string, line?: number) {
        super(line === undefined ? message : `line ${line}: ${message}`);
        this.name = "TraceError";
        this.code = code;
        this.line = line;
    }
}

export function error(code: TraceErrorCode, message: string, line?: number): never {
    throw new TraceError(code, message, line);
}

export function isTraceError(err: unknown): err is TraceError {
    return err instanceof TraceError;
}

export function formatTag(tag: number | null): string {
    return tag === null ? "<untagged>" : `<${tag}>`;
}
