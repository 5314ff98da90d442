import { pino, type Logger } from "pino";

import { loadConfig } from "./config.js";

/**
 * Default sink for every decorator: accepts entries and drops them.
 */
export const noopLogger: Logger = pino({ enabled: false });

export interface CreateLoggerOptions {
    name?: string;
    level?: string;
    env?: NodeJS.ProcessEnv;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
    return pino({
        name: opts.name,
        level: opts.level ?? loadConfig(opts.env).LOG_LEVEL,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

export type { Logger };
