import { BorrowKind } from "../vm/Types";

interface Located {
    // source line, when the instruction was compiled from trace-language text
    line?: number;
}

export type Instruction = Located & (
    | { tag: "DECLARE"; name: string; value: number; mutable: boolean; interiorMutable: boolean }
    | { tag: "BORROW"; dest: string; name: string; kind: BorrowKind } // &x, &mut x
    | { tag: "REBORROW"; dest: string; src: string; kind: BorrowKind } // casts and &*p, &mut *p
    | { tag: "CAST_TO_INT"; dest: string; src: string } // p as usize
    | { tag: "READ"; src: string }
    | { tag: "WRITE"; src: string; value: number }
    | { tag: "EXTERNAL_CALL"; src: string; callee: string; value: number } // opaque fn writing through its argument
);

export type InstructionTag = Instruction["tag"];
