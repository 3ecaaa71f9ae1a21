import { z } from "zod";
import { Instruction } from "../compiler/Instruction";
import { error } from "../Utils";

const NameZ = z.string().min(1);
const BorrowKindZ = z.enum(["unique", "shared"]);
const IntegerZ = z.number().int().safe();
const LineZ = z.number().int().positive().optional();

export const OperationZ = z.discriminatedUnion("op", [
    z.object({
        op: z.literal("declare"),
        name: NameZ,
        value: IntegerZ,
        mutable: z.boolean().optional(),
        interiorMutable: z.boolean().optional(),
        line: LineZ,
    }).strict(),
    z.object({ op: z.literal("borrow"), dest: NameZ, name: NameZ, kind: BorrowKindZ, line: LineZ }).strict(),
    z.object({ op: z.literal("reborrow"), dest: NameZ, src: NameZ, kind: BorrowKindZ, line: LineZ }).strict(),
    z.object({ op: z.literal("castToInteger"), dest: NameZ, src: NameZ, line: LineZ }).strict(),
    z.object({ op: z.literal("read"), src: NameZ, line: LineZ }).strict(),
    z.object({ op: z.literal("write"), src: NameZ, value: IntegerZ, line: LineZ }).strict(),
    z.object({ op: z.literal("externalCall"), src: NameZ, callee: NameZ.optional(), value: IntegerZ.optional(), line: LineZ }).strict(),
]);

export const TraceDocumentZ = z.union([
    z.array(OperationZ),
    z.object({ operations: z.array(OperationZ) }).strict(),
]);

export type Operation = z.infer<typeof OperationZ>;
export type TraceDocument = z.infer<typeof TraceDocumentZ>;

export function toInstruction(op: Operation, externalWriteValue: number): Instruction {
    const line = op.line === undefined ? {} : { line: op.line };
    switch (op.op) {
        case "declare":
            return {
                tag: "DECLARE",
                name: op.name,
                value: op.value,
                mutable: op.mutable ?? false,
                interiorMutable: op.interiorMutable ?? false,
                ...line,
            };
        case "borrow":
            return { tag: "BORROW", dest: op.dest, name: op.name, kind: op.kind, ...line };
        case "reborrow":
            return { tag: "REBORROW", dest: op.dest, src: op.src, kind: op.kind, ...line };
        case "castToInteger":
            return { tag: "CAST_TO_INT", dest: op.dest, src: op.src, ...line };
        case "read":
            return { tag: "READ", src: op.src, ...line };
        case "write":
            return { tag: "WRITE", src: op.src, value: op.value, ...line };
        case "externalCall":
            return {
                tag: "EXTERNAL_CALL",
                src: op.src,
                callee: op.callee ?? "external",
                value: op.value ?? externalWriteValue,
                ...line,
            };
    }
}

/**
 * Validates a list-of-records trace and converts it to instructions.
 */
export function parseTraceDocument(raw: unknown, externalWriteValue: number): Instruction[] {
    const parsed = TraceDocumentZ.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`);
        error("InvalidTrace", `invalid trace: ${issues.join("; ")}`);
    }
    const operations = Array.isArray(parsed.data) ? parsed.data : parsed.data.operations;
    return operations.map(op => toInstruction(op, externalWriteValue));
}
