import { Instruction } from "./Instruction";

// One-line rendering used by debug logs and the CLI listing.
export function describeInstruction(instr: Instruction): string {
    switch (instr.tag) {
        case "DECLARE": {
            const qualifiers = [instr.mutable ? "mutable" : "immutable"];
            if (instr.interiorMutable) {
                qualifiers.push("interior-mutable");
            }
            return `DECLARE ${instr.name} = ${instr.value} (${qualifiers.join(", ")})`;
        }
        case "BORROW":
            return `BORROW ${instr.dest} = &${instr.kind === "unique" ? "mut " : ""}${instr.name}`;
        case "REBORROW":
            return `REBORROW ${instr.dest} = ${instr.src} as ${instr.kind}`;
        case "CAST_TO_INT":
            return `CAST_TO_INT ${instr.dest} = ${instr.src} as usize`;
        case "READ":
            return `READ *${instr.src}`;
        case "WRITE":
            return `WRITE *${instr.src} = ${instr.value}`;
        case "EXTERNAL_CALL":
            return `EXTERNAL_CALL ${instr.callee}(${instr.src}) writes ${instr.value}`;
    }
}

export function displayInstructions(instructions: readonly Instruction[]): string[] {
    const width = String(Math.max(instructions.length - 1, 0)).length;
    return instructions.map((instr, i) => {
        const line = instr.line === undefined ? "" : `  ; line ${instr.line}`;
        return `${String(i).padStart(width, " ")}: ${describeInstruction(instr)}${line}`;
    });
}

// Names for the intermediate pointers of a cast chain. `%` and `#` cannot
// appear in a trace-language identifier, so these never collide with user names.
export function temporaryName(base: string, n: number): string {
    return `${base}%${n}`;
}

export function shadowName(name: string, generation: number): string {
    return `${name}#${generation}`;
}
