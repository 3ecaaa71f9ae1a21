import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CheckOptions, checkSource } from "./AliasChecker";
import { CheckResult } from "./report/DiagnosticReporter";
import { error } from "./Utils";

export const SCENARIO_DIR = path.resolve(__dirname, "..", "scenarios");

const ExpectationZ = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("Sound"),
        values: z.record(z.number()).optional(),
    }).strict(),
    z.object({
        kind: z.literal("Violation"),
        rule: z.enum(["UntaggedAccess", "TagNotFound", "Disabled", "ReadOnlyViolation"]),
        instructionIndex: z.number().int().nonnegative().optional(),
        allocationName: z.string().optional(),
    }).strict(),
]);

const ScenarioZ = z.object({
    name: z.string().min(1),
    file: z.string().min(1),
    expect: ExpectationZ,
}).strict();

export type Scenario = z.infer<typeof ScenarioZ>;
export type Expectation = z.infer<typeof ExpectationZ>;

export interface ScenarioOutcome {
    scenario: Scenario;
    result: CheckResult;
    // empty when the result matched the expectation
    mismatches: string[];
}

export function loadScenarios(dir: string = SCENARIO_DIR): Scenario[] {
    const parsed = z.array(ScenarioZ).safeParse(JSON.parse(readFileSync(path.join(dir, "scenarios.json"), "utf8")));
    if (!parsed.success) {
        error("InvalidTrace", `invalid scenarios.json: ${parsed.error.issues.map(i => i.message).join("; ")}`);
    }
    return parsed.data;
}

export function compareResult(expect: Expectation, result: CheckResult): string[] {
    const mismatches: string[] = [];
    if (expect.kind !== result.kind) {
        mismatches.push(`expected ${expect.kind}, got ${result.kind}`);
        return mismatches;
    }
    if (expect.kind === "Sound" && result.kind === "Sound") {
        for (const [name, value] of Object.entries(expect.values ?? {})) {
            if (result.values[name] !== value) {
                mismatches.push(`expected ${name} = ${value}, got ${result.values[name]}`);
            }
        }
    }
    if (expect.kind === "Violation" && result.kind === "Violation") {
        if (expect.rule !== result.rule) {
            mismatches.push(`expected rule ${expect.rule}, got ${result.rule}`);
        }
        if (expect.instructionIndex !== undefined && expect.instructionIndex !== result.instructionIndex) {
            mismatches.push(`expected instruction ${expect.instructionIndex}, got ${result.instructionIndex}`);
        }
        if (expect.allocationName !== undefined && expect.allocationName !== result.allocationName) {
            mismatches.push(`expected allocation '${expect.allocationName}', got '${result.allocationName}'`);
        }
    }
    return mismatches;
}

export function runScenario(scenario: Scenario, dir: string = SCENARIO_DIR, options: CheckOptions = {}): ScenarioOutcome {
    const source = readFileSync(path.join(dir, scenario.file), "utf8");
    const result = checkSource(source, options);
    return { scenario, result, mismatches: compareResult(scenario.expect, result) };
}
