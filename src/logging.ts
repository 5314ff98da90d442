import { noopLogger } from "./logger.js";
import { formatSignature, renderValue } from "./render.js";
import { resolveName, tagWrapped } from "./wrapped.js";

/**
 * Brackets each call with "Executing" / "Finished executing" info entries.
 * A call that throws only gets the first one. For an async function the
 * second entry is written once the promise is returned, not when it settles.
 */
export function logExecution<A extends unknown[], R>(
    fn: (...args: A) => R,
    config: Decorators.LoggedOptions = {}
): Decorators.Wrapped<A, R> {
    const name = resolveName(fn, config.name);
    const logger: Decorators.LogSink = config.logger ?? noopLogger;

    return tagWrapped((...args: A): R => {
        logger.info({ fn: name }, `Executing ${name}`);
        const result = fn(...args);
        logger.info({ fn: name }, `Finished executing ${name}`);
        return result;
    }, name);
}

/**
 * Debug entries with the rendered arguments on entry and the return value on exit.
 * An async function's return value is logged as the pending promise.
 */
export function logSignature<A extends unknown[], R>(
    fn: (...args: A) => R,
    config: Decorators.LoggedOptions = {}
): Decorators.Wrapped<A, R> {
    const name = resolveName(fn, config.name);
    const logger: Decorators.LogSink = config.logger ?? noopLogger;

    return tagWrapped((...args: A): R => {
        const signature = formatSignature(args);
        logger.debug({ fn: name }, `Entering ${name}(${signature})`);
        const value = fn(...args);
        logger.debug({ fn: name }, `Leaving ${name}(${signature}) with return value \`${renderValue(value)}\`.`);
        return value;
    }, name);
}
