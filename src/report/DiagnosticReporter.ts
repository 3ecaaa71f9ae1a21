import { palette } from "../Logger";
import { formatTag } from "../Utils";
import { AllocationSnapshot } from "../vm/MemoryStore";
import { TraceState, Violation } from "../vm/TraceInterpreter";
import { AccessKind, BorrowTag, ViolationRule } from "../vm/Types";

export interface SoundResult {
    kind: "Sound";
    // final value of every allocation, by name
    values: Record<string, number>;
    reads: { instructionIndex: number; allocationName: string; value: number }[];
}

export interface ViolationResult {
    kind: "Violation";
    instructionIndex: number;
    allocationName: string;
    rule: ViolationRule;
    tag: BorrowTag | null;
    access: AccessKind | "reborrow";
    message: string;
    line?: number;
}

export type CheckResult = SoundResult | ViolationResult;

function violationResult(violation: Violation): ViolationResult {
    const result: ViolationResult = {
        kind: "Violation",
        instructionIndex: violation.instructionIndex,
        allocationName: violation.allocationName,
        rule: violation.rule,
        tag: violation.tag,
        access: violation.access,
        message: violation.reason,
    };
    if (violation.line !== undefined) {
        result.line = violation.line;
    }
    return result;
}

/**
 * Converts a halted interpreter state into a result. A state that is still
 * running has not reached a verdict and is rejected.
 */
export function report(state: TraceState): CheckResult {
    const status = state.status;
    if (status.kind === "Running") {
        throw new Error(`cannot report on a trace that is still running (pc ${state.pc})`);
    }
    if (status.outcome === "UB") {
        return violationResult(status.violation);
    }

    const values: Record<string, number> = {};
    for (const allocation of state.store.allocations()) {
        values[allocation.name] = allocation.value;
    }
    return {
        kind: "Sound",
        values,
        reads: state.reads.map(r => ({ instructionIndex: r.index, allocationName: r.name, value: r.value })),
    };
}

export interface FormatOptions {
    color?: boolean;
}

export function formatResult(result: CheckResult, opts: FormatOptions = {}): string {
    const paint = palette(opts.color !== false);

    if (result.kind === "Sound") {
        const values = Object.entries(result.values).map(([name, value]) => `${name} = ${value}`);
        const summary = values.length > 0 ? ` (${values.join(", ")})` : "";
        return `${paint.green("sound")}: no aliasing violation${summary}`;
    }

    const where = result.line === undefined
        ? `instruction ${result.instructionIndex}`
        : `instruction ${result.instructionIndex} (line ${result.line})`;
    const what = result.access === "reborrow"
        ? `reborrow from ${formatTag(result.tag)}`
        : `${result.access} through ${formatTag(result.tag)}`;
    return `${paint.red.bold("error")}: undefined behavior at ${where}: ${what} on '${result.allocationName}': ` +
        `${result.message} ${paint.gray(`[${result.rule}]`)}`;
}

// One line per allocation: its final value and borrow stack, bottom first.
export function formatStacks(snapshot: readonly AllocationSnapshot[]): string[] {
    return snapshot.map(allocation => {
        const frames = allocation.stack.map(frame => `${formatTag(frame.tag)} ${frame.permission}`);
        return `${allocation.name} = ${allocation.value}: ${frames.join(", ")}`;
    });
}
