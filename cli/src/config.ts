import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const MAX_FRACTION_DIGITS = 15;

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(value => value === "true" || value === "1");

const envSchema = z.object({
    SAFECALC_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    SAFECALC_LOG_PRETTY: booleanFlag.default("false"),
    SAFECALC_FRACTION_DIGITS: z
        .string()
        .trim()
        .min(1)
        .pipe(z.coerce.number().int().min(0).max(MAX_FRACTION_DIGITS))
        .default("6"),
});

export interface CalculatorConfig {
    logLevel: LogLevel;
    logPretty: boolean;
    fractionDigits: number;
}

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalculatorConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
    }

    return {
        logLevel: parsed.data.SAFECALC_LOG_LEVEL,
        logPretty: parsed.data.SAFECALC_LOG_PRETTY,
        fractionDigits: parsed.data.SAFECALC_FRACTION_DIGITS,
    };
}
