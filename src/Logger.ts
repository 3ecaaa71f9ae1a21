import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

export type LogFields = Record<string, string | number | boolean>;

/**
 * Interpreter steps go to `debug`, CLI progress to `info` and rejected
 * inputs to `error`.
 */
export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
    // enables debug lines
    verbose?: boolean;
    // keeps only errors
    quiet?: boolean;
    color?: boolean;
    // receives each formatted line; defaults to stdout, or stderr for errors
    sink?: (line: string, level: LogLevel) => void;
}

// A chalk instance that honours --no-color without touching the global one.
export function palette(color: boolean = true): chalk.Chalk {
    return new chalk.Instance({ level: color ? chalk.level : 0 });
}

function consoleSink(line: string, level: LogLevel): void {
    if (level === "error") {
        console.error(line);
    } else {
        console.log(line);
    }
}

function formatFields(fields?: LogFields): string {
    if (fields === undefined) {
        return "";
    }
    return Object.entries(fields).map(([key, value]) => ` ${key}=${value}`).join("");
}

export function createLogger(opts: LoggerOptions = {}): Logger {
    const paint = palette(opts.color ?? true);
    const sink = opts.sink ?? consoleSink;
    const styles: Record<LogLevel, chalk.Chalk> = {
        debug: paint.gray,
        info: paint.blue,
        error: paint.red,
    };

    const enabled = (level: LogLevel): boolean => {
        switch (level) {
            case "debug":
                return opts.verbose === true && opts.quiet !== true;
            case "info":
                return opts.quiet !== true;
            case "error":
                return true;
        }
    };

    const emit = (level: LogLevel) => (message: string, fields?: LogFields): void => {
        if (enabled(level)) {
            sink(styles[level](`[${level}] ${message}${formatFields(fields)}`), level);
        }
    };

    return { debug: emit("debug"), info: emit("info"), error: emit("error") };
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    error: () => {},
};
