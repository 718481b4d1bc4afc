import winston from "winston";
import { loadConfig, type TermpickConfig } from "./config";

/**
 * stdout belongs to the widget frames, so log lines only ever go to a file.
 * Without TERMPICK_LOG_FILE the logger is silent.
 */
export function createLogger(config: TermpickConfig = loadConfig()): winston.Logger {
    const format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
    );

    if (!config.logFile) {
        return winston.createLogger({
            level: config.logLevel,
            silent: true,
            transports: [new winston.transports.Console()],
        });
    }

    return winston.createLogger({
        level: config.logLevel,
        format,
        defaultMeta: { pid: process.pid },
        transports: [new winston.transports.File({ filename: config.logFile })],
        exitOnError: false,
    });
}

let instance: winston.Logger | undefined;

/** The process logger, built from the environment on first use. */
export function getLogger(): winston.Logger {
    instance ??= createLogger();
    return instance;
}
