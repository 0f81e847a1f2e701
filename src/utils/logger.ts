import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig) {
    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport: config.pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                    }
                }
            : undefined,
    });
}

export function getLogger(): Logger {
    if(!loggerInstance) {
        loggerInstance = pino({
            level: process.env.RAG_LOGGING_LEVEL ?? "info",
            base: undefined
        });
    }
    return loggerInstance;
}

/** Logger that discards everything; used where a caller passes none. */
export function createSilentLogger(): Logger {
    return pino({ level: "silent" });
}
