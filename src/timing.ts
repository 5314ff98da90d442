import { noopLogger } from "./logger.js";
import { resolveName, tagWrapped } from "./wrapped.js";

/**
 * Times each call of the decorated function and reports the duration.
 * Coarse mode reports fractional seconds, `nanoSeconds` mode integer
 * nanoseconds. A call that throws reports nothing. For an async function
 * only the time to return the promise is measured.
 */
export function timeFunction(config: Decorators.TimingOptions = {}): Decorators.Decorator<"sync"> {
    const log = config.log ?? true;
    const nanoSeconds = config.nanoSeconds ?? false;
    const logger: Decorators.LogSink = config.logger ?? noopLogger;
    const unit = nanoSeconds ? "ns" : "s";

    return <A extends unknown[], R>(fn: (...args: A) => R) => {
        const name = resolveName(fn, config.name);

        return tagWrapped((...args: A): R => {
            let elapsed: number | bigint;
            let result: R;

            if (nanoSeconds) {
                const start = process.hrtime.bigint();
                result = fn(...args);
                elapsed = process.hrtime.bigint() - start;
            } else {
                const start = performance.now();
                result = fn(...args);
                elapsed = (performance.now() - start) / 1000;
            }

            const message = `Execution time for: ${name}: ${elapsed}${unit}.`;
            if (log) {
                logger.info({ fn: name, elapsed: String(elapsed), unit }, message);
            } else {
                console.log(message);
            }

            return result;
        }, name);
    };
}
