import { readFileSync } from "node:fs";
import { z } from "zod";
import { error } from "./Utils";

export interface CheckerConfig {
    // value an opaque external call stores through its pointer argument
    externalWriteValue: number;
    color: boolean;
}

export const DEFAULT_CONFIG: CheckerConfig = {
    externalWriteValue: 1,
    color: true,
};

const CheckerConfigZ = z
    .object({
        externalWriteValue: z.number().int().safe(),
        color: z.boolean(),
    })
    .partial()
    .strict();

export type CheckerConfigOverrides = z.infer<typeof CheckerConfigZ>;

export function resolveConfig(...overrides: CheckerConfigOverrides[]): CheckerConfig {
    let config: CheckerConfig = { ...DEFAULT_CONFIG };
    for (const override of overrides) {
        config = {
            externalWriteValue: override.externalWriteValue ?? config.externalWriteValue,
            color: override.color ?? config.color,
        };
    }
    return config;
}

export function parseConfig(raw: unknown): CheckerConfigOverrides {
    const parsed = CheckerConfigZ.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`);
        error("InvalidConfig", `invalid configuration: ${issues.join("; ")}`);
    }
    return parsed.data;
}

/**
 * Reads a JSON configuration file. Missing keys fall back to the defaults.
 */
export function loadConfigFile(file: string): CheckerConfigOverrides {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(file, "utf8"));
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        error("InvalidConfig", `cannot read configuration ${file}: ${detail}`);
    }
    return parseConfig(raw);
}
