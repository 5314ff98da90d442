import { z } from "zod";

import { parseOptions } from "./config.js";
import { noopLogger } from "./logger.js";
import { resolveName, tagWrapped } from "./wrapped.js";

const retryOptionsSchema = z.object({
    maxTries: z.number().int().positive().default(3),
    delaySeconds: z.number().finite().nonnegative().default(1),
});

/**
 * Async delay utility.
 */
function delay(ms: number) {
    return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Re-invokes the decorated function until it succeeds or `maxTries` attempts
 * have failed, pausing `delaySeconds` between attempts. Every error is
 * retryable; the last one is rethrown unchanged.
 */
export function retry(config: Decorators.RetryOptions = {}): Decorators.Decorator<"async"> {
    const { maxTries, delaySeconds } = parseOptions(
        retryOptionsSchema,
        { maxTries: config.maxTries, delaySeconds: config.delaySeconds },
        "retry"
    );
    const logger: Decorators.LogSink = config.logger ?? noopLogger;

    return <A extends unknown[], R>(fn: (...args: A) => R) => {
        const name = resolveName(fn, config.name);

        return tagWrapped(async (...args: A): Promise<Awaited<R>> => {
            let lastErr: unknown;

            for (let attempt = 1; attempt <= maxTries; attempt++) {
                try {
                    return await fn(...args);
                } catch (err) {
                    lastErr = err;
                    if (attempt === maxTries) break;

                    logger.warn(
                        {
                            fn: name,
                            attempt,
                            maxTries,
                            error: err instanceof Error ? err.message : String(err),
                            nextRetryIn: delaySeconds,
                        },
                        `Retrying ${name} after failed attempt ${attempt}/${maxTries}`
                    );
                    if (delaySeconds > 0) await delay(delaySeconds * 1000);
                }
            }

            throw lastErr;
        }, name);
    };
}
