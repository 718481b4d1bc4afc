import { z } from "zod";
import { ConfigError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface TermpickConfig {
    logLevel: LogLevel;
    /** JSON log lines go here; logging is silent when unset. */
    logFile?: string;
    /** Draw widgets on the alternate screen instead of inline. */
    altScreen: boolean;
}

const flag = z
    .enum(["0", "1", "true", "false"])
    .optional()
    .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
    TERMPICK_LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    TERMPICK_LOG_FILE: z.string().min(1).optional(),
    TERMPICK_ALT_SCREEN: flag,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TermpickConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
        );
        throw new ConfigError(`invalid environment: ${issues.join("; ")}`, issues);
    }

    const data = parsed.data;
    return {
        logLevel: data.TERMPICK_LOG_LEVEL,
        logFile: data.TERMPICK_LOG_FILE,
        altScreen: data.TERMPICK_ALT_SCREEN,
    };
}
