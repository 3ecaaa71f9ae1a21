#!/usr/bin/env node
/**
 * borrowstack command-line interface
 *
 *   borrowstack check scenarios/04-unique-mut-pointer.trace
 *   borrowstack check trace.json --format json
 *   borrowstack check scenarios/06-cell-two-unique.trace --stacks
 *   borrowstack scenarios
 */

import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { compileSource, runProgram } from "./AliasChecker";
import { displayInstructions } from "./compiler/CompilerHelper";
import { Instruction } from "./compiler/Instruction";
import { CheckerConfigOverrides, loadConfigFile, resolveConfig } from "./Config";
import { createLogger, palette } from "./Logger";
import { formatResult, formatStacks, report } from "./report/DiagnosticReporter";
import { loadScenarios, runScenario } from "./Scenarios";
import { parseTraceDocument } from "./schema/TraceSchema";
import { error, isTraceError } from "./Utils";

const EXIT_VIOLATION = 1;
const EXIT_INVALID = 2;

interface CheckCommandOptions {
    format: "text" | "json";
    externalValue?: number;
    config?: string;
    color: boolean;
    list?: boolean;
    stacks?: boolean;
    verbose?: boolean;
    quiet?: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError("expected an integer");
    }
    return parsed;
}

function parseFormat(value: string): "text" | "json" {
    if (value !== "text" && value !== "json") {
        throw new InvalidArgumentError("expected 'text' or 'json'");
    }
    return value;
}

function readInput(file: string, json: boolean): unknown {
    try {
        const contents = readFileSync(file, "utf8");
        return json ? JSON.parse(contents) : contents;
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        return error("InvalidTrace", `cannot read ${file}: ${detail}`);
    }
}

function loadProgram(file: string, externalWriteValue: number): Instruction[] {
    if (file.endsWith(".json")) {
        return parseTraceDocument(readInput(file, true), externalWriteValue);
    }
    const source = readInput(file, false);
    if (typeof source !== "string") {
        return error("InvalidTrace", `cannot read ${file} as text`);
    }
    return compileSource(source, { config: { externalWriteValue } });
}

function runCheck(file: string, opts: CheckCommandOptions): void {
    const logger = createLogger({ verbose: opts.verbose, quiet: opts.quiet, color: opts.color });
    try {
        const overrides: CheckerConfigOverrides[] = [];
        if (opts.config) {
            overrides.push(loadConfigFile(opts.config));
            if (opts.format === "text") {
                logger.info(`using configuration ${opts.config}`);
            }
        }
        if (opts.externalValue !== undefined) {
            overrides.push({ externalWriteValue: opts.externalValue });
        }
        if (!opts.color) {
            overrides.push({ color: false });
        }
        const config = resolveConfig(...overrides);
        const paint = palette(config.color);

        const program = loadProgram(file, config.externalWriteValue);
        if (opts.list) {
            displayInstructions(program).forEach(line => console.log(paint.gray(line)));
        }
        const state = runProgram(program, { logger });
        const result = report(state);

        if (opts.format === "json") {
            const output = opts.stacks ? { ...result, stacks: state.store.snapshot() } : result;
            console.log(JSON.stringify(output, null, 2));
        } else {
            console.log(formatResult(result, { color: config.color }));
            if (opts.stacks) {
                formatStacks(state.store.snapshot()).forEach(line => console.log(paint.gray(`  ${line}`)));
            }
        }
        if (result.kind === "Violation") {
            process.exitCode = EXIT_VIOLATION;
        }
    } catch (err) {
        if (isTraceError(err)) {
            logger.error(`${file}: ${err.message}`, { code: err.code });
            process.exitCode = EXIT_INVALID;
            return;
        }
        throw err;
    }
}

function runScenarios(opts: { verbose?: boolean; color: boolean }): void {
    const logger = createLogger({ verbose: opts.verbose, color: opts.color });
    const paint = palette(opts.color);
    let failed = 0;
    for (const scenario of loadScenarios()) {
        const outcome = runScenario(scenario, undefined, { logger });
        if (outcome.mismatches.length === 0) {
            console.log(`${paint.green("pass")} ${scenario.name}`);
        } else {
            failed++;
            console.log(`${paint.red("FAIL")} ${scenario.name}`);
            outcome.mismatches.forEach(m => console.log(paint.gray(`     ${m}`)));
        }
        logger.debug(formatResult(outcome.result, { color: opts.color }));
    }
    if (failed > 0) {
        process.exitCode = EXIT_VIOLATION;
    }
}

const program = new Command();

program
    .name("borrowstack")
    .description("Check traces of borrows, raw pointers and opaque calls against a borrow-stack aliasing model");

program
    .command("check")
    .description("Check a trace-language file, or a JSON trace")
    .argument("<file>", "trace file (.json for the structured encoding)")
    .option("--format <format>", "output format: text or json", parseFormat, "text")
    .option("--external-value <n>", "value opaque calls write through their argument", parseInteger)
    .option("--config <file>", "JSON configuration file")
    .option("--no-color", "disable colored output")
    .option("--list", "print the compiled instructions before running them")
    .option("--stacks", "print the final borrow stack of every allocation")
    .option("-v, --verbose", "log every interpreter step")
    .option("-q, --quiet", "suppress informational output")
    .action((file: string, opts: CheckCommandOptions) => runCheck(file, opts));

program
    .command("scenarios")
    .description("Run the bundled reference scenarios")
    .option("--no-color", "disable colored output")
    .option("-v, --verbose", "print each diagnostic")
    .action((opts: { verbose?: boolean; color: boolean }) => runScenarios(opts));

program.parse();
