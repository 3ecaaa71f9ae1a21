export { checkProgram, checkSource, checkTrace, compileSource, runProgram } from "./AliasChecker";
export type { CheckOptions } from "./AliasChecker";
export { ProgramChecker } from "./checker/ProgramChecker";
export { Compiler } from "./compiler/Compiler";
export { describeInstruction, displayInstructions } from "./compiler/CompilerHelper";
export type { Instruction, InstructionTag } from "./compiler/Instruction";
export { DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "./Config";
export type { CheckerConfig, CheckerConfigOverrides } from "./Config";
export { createLogger, palette, silentLogger } from "./Logger";
export type { LogFields, Logger, LoggerOptions, LogLevel } from "./Logger";
export { parseTrace } from "./parser/TraceSource";
export { formatResult, formatStacks, report } from "./report/DiagnosticReporter";
export type { CheckResult, SoundResult, ViolationResult } from "./report/DiagnosticReporter";
export { parseTraceDocument, TraceDocumentZ } from "./schema/TraceSchema";
export { TraceError } from "./Utils";
export type { TraceErrorCode } from "./Utils";
export { MemoryStore } from "./vm/MemoryStore";
export type { AllocationSnapshot } from "./vm/MemoryStore";
export { derive, validateAccess } from "./vm/PermissionEngine";
export type { AccessOutcome } from "./vm/PermissionEngine";
export { TagAllocator } from "./vm/TagAllocator";
export { TraceInterpreter } from "./vm/TraceInterpreter";
export type { InterpreterStatus, TraceState, Violation } from "./vm/TraceInterpreter";
export { Permission } from "./vm/Types";
export type { Allocation, BorrowKind, BorrowTag, Frame, PointerValue, ViolationRule } from "./vm/Types";
