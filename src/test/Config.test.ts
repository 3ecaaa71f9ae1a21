import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "../Config";
import { createLogger, Logger, LogLevel, palette, silentLogger } from "../Logger";
import { TraceError } from "../Utils";

function traceError(fn: () => unknown): TraceError {
    try {
        fn();
    } catch (err) {
        if (err instanceof TraceError) {
            return err;
        }
        throw err;
    }
    throw new Error("expected a TraceError");
}

describe("resolveConfig", () => {
    it("returns the defaults without overrides", () => {
        expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
        expect(DEFAULT_CONFIG).toEqual({ externalWriteValue: 1, color: true });
    });

    it("applies overrides left to right", () => {
        expect(resolveConfig({ externalWriteValue: 3 }, { color: false }, { externalWriteValue: 8 })).toEqual({
            externalWriteValue: 8,
            color: false,
        });
    });
});

describe("parseConfig", () => {
    it("accepts a partial configuration", () => {
        expect(parseConfig({ color: false })).toEqual({ color: false });
    });

    it("rejects values of the wrong type", () => {
        const err = traceError(() => parseConfig({ externalWriteValue: "2" }));
        expect(err.code).toBe("InvalidConfig");
        expect(err.message).toBe("invalid configuration: externalWriteValue: Expected number, received string");
    });

    it("rejects unknown keys", () => {
        const err = traceError(() => parseConfig({ colour: true }));
        expect(err.code).toBe("InvalidConfig");
        expect(err.message).toContain("'colour'");
    });
});

describe("loadConfigFile", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), "borrowstack-config-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("reads a JSON file", () => {
        const file = path.join(dir, "config.json");
        writeFileSync(file, JSON.stringify({ externalWriteValue: 42 }));
        expect(loadConfigFile(file)).toEqual({ externalWriteValue: 42 });
    });

    it("fails with InvalidConfig when the file is missing or not JSON", () => {
        const missing = path.join(dir, "missing.json");
        const err = traceError(() => loadConfigFile(missing));
        expect(err.code).toBe("InvalidConfig");
        expect(err.message.startsWith(`cannot read configuration ${missing}: `)).toBe(true);

        const broken = path.join(dir, "broken.json");
        writeFileSync(broken, "{ externalWriteValue: ");
        expect(traceError(() => loadConfigFile(broken)).code).toBe("InvalidConfig");
    });
});

describe("createLogger", () => {
    function capture(opts: { verbose?: boolean; quiet?: boolean }): { lines: string[]; logger: Logger } {
        const lines: string[] = [];
        return { lines, logger: createLogger({ ...opts, color: false, sink: line => lines.push(line) }) };
    }

    it("drops debug output unless verbose", () => {
        const { lines, logger } = capture({});
        logger.debug("hidden");
        logger.info("shown", { extra: 1 });
        expect(lines).toEqual(["[info] shown extra=1"]);
    });

    it("prints debug output with its fields when verbose", () => {
        const { lines, logger } = capture({ verbose: true });
        logger.debug("step", { index: 2 });
        expect(lines).toEqual(["[debug] step index=2"]);
    });

    it("keeps only errors when quiet", () => {
        const { lines, logger } = capture({ quiet: true, verbose: true });
        logger.debug("hidden");
        logger.info("hidden");
        logger.error("broken", { code: "InvalidTrace" });
        expect(lines).toEqual(["[error] broken code=InvalidTrace"]);
    });

    it("passes the level to the sink", () => {
        const levels: LogLevel[] = [];
        const logger = createLogger({ verbose: true, color: false, sink: (_line, level) => levels.push(level) });
        logger.debug("a");
        logger.info("b");
        logger.error("c");
        expect(levels).toEqual(["debug", "info", "error"]);
    });

    it("provides a logger that discards everything", () => {
        expect(() => silentLogger.error("nothing")).not.toThrow();
    });
});

describe("palette", () => {
    it("leaves text unstyled when color is off", () => {
        expect(palette(false).red("FAIL")).toBe("FAIL");
    });
});
