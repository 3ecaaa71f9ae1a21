import { checkProgram as validateProgram } from "./checker/ProgramChecker";
import { Compiler } from "./compiler/Compiler";
import { displayInstructions } from "./compiler/CompilerHelper";
import { Instruction } from "./compiler/Instruction";
import { CheckerConfigOverrides, resolveConfig } from "./Config";
import { Logger, silentLogger } from "./Logger";
import { parseTrace } from "./parser/TraceSource";
import { CheckResult, report } from "./report/DiagnosticReporter";
import { parseTraceDocument } from "./schema/TraceSchema";
import { TagAllocator } from "./vm/TagAllocator";
import { TraceInterpreter, TraceState } from "./vm/TraceInterpreter";

export interface CheckOptions {
    config?: CheckerConfigOverrides;
    logger?: Logger;
    tags?: TagAllocator;
}

/**
 * Parses and lowers a trace-language program. The result is not validated
 * until it is run.
 */
export function compileSource(source: string, options: CheckOptions = {}): Instruction[] {
    const config = resolveConfig(options.config ?? {});
    const ast = parseTrace(source);
    return new Compiler({ externalWriteValue: config.externalWriteValue }).compileProgram(ast);
}

export function runProgram(program: readonly Instruction[], options: CheckOptions = {}): TraceState {
    const logger = options.logger ?? silentLogger;
    validateProgram(program);
    logger.debug(`running ${program.length} instructions`);
    displayInstructions(program).forEach(line => logger.debug(line));
    return new TraceInterpreter(program, { tags: options.tags, logger }).run();
}

/**
 * Checks an already-built instruction list. Throws a TraceError when the
 * program is malformed.
 */
export function checkProgram(program: readonly Instruction[], options: CheckOptions = {}): CheckResult {
    return report(runProgram(program, options));
}

/**
 * Checks a program written in the trace language.
 */
export function checkSource(source: string, options: CheckOptions = {}): CheckResult {
    return checkProgram(compileSource(source, options), options);
}

/**
 * Checks a structured trace: an array of operation records, or an object
 * with an `operations` array.
 */
export function checkTrace(document: unknown, options: CheckOptions = {}): CheckResult {
    const config = resolveConfig(options.config ?? {});
    return checkProgram(parseTraceDocument(document, config.externalWriteValue), options);
}
