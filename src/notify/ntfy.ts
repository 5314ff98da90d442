import { z } from "zod";

import { parseOptions } from "../config.js";
import { resolveHttpClient } from "../http.js";
import { formatTraceback, renderText } from "../render.js";
import { resolveName, tagWrapped } from "../wrapped.js";

const topicSchema = z.object({
    ntfyLink: z.string().url(),
    topic: z.string().min(1),
});

export function topicUrl(ntfyLink: string, topic: string): string {
    return `${ntfyLink.replace(/\/+$/, "")}/${topic}`;
}

function parseTopic(ntfyLink: string, topic: string, decorator: string): string {
    const parsed = parseOptions(topicSchema, { ntfyLink, topic }, decorator);
    return topicUrl(parsed.ntfyLink, parsed.topic);
}

/**
 * Pushes a plain-text message to an ntfy topic when the decorated function
 * returns or throws. The send never changes what the caller sees: the result
 * is returned and the original error rethrown.
 */
export function ntfy(
    ntfyLink: string,
    topic: string,
    config: Decorators.NtfyOptions = {}
): Decorators.Decorator<"async"> {
    const url = parseTopic(ntfyLink, topic, "ntfy");
    const http = resolveHttpClient(config.http);
    const onCompletion = config.onCompletion === undefined ? "results" : config.onCompletion;
    const onError = config.onError === undefined ? "error" : config.onError;

    return <A extends unknown[], R>(fn: (...args: A) => R) => {
        const name = resolveName(fn, config.name);

        return tagWrapped(async (...args: A): Promise<Awaited<R>> => {
            let result: Awaited<R>;
            try {
                result = await fn(...args);
            } catch (err) {
                if (onError !== null) {
                    const data = onError === "error" ? formatTraceback(err) : onError;
                    await http.post(url, { data });
                }
                throw err;
            }

            if (onCompletion !== null) {
                const data = onCompletion === "results" ? renderText(result) : onCompletion;
                await http.post(url, { data });
            }
            return result;
        }, name);
    };
}

function elapsedSeconds(start: bigint): string {
    const micros = (process.hrtime.bigint() - start) / 1000n;
    return (Number(micros) / 1e6).toFixed(6);
}

/**
 * Pushes the call's duration to an ntfy topic after every call, successful
 * or not.
 */
export function ntfyTime(
    ntfyLink: string,
    topic: string,
    config: Decorators.NotifierOptions = {}
): Decorators.Decorator<"async"> {
    const url = parseTopic(ntfyLink, topic, "ntfyTime");
    const http = resolveHttpClient(config.http);

    return <A extends unknown[], R>(fn: (...args: A) => R) => {
        const name = resolveName(fn, config.name);

        return tagWrapped(async (...args: A): Promise<Awaited<R>> => {
            const start = process.hrtime.bigint();
            let succeeded = false;
            try {
                const result = await fn(...args);
                succeeded = true;
                return result;
            } finally {
                const seconds = elapsedSeconds(start);
                const data = succeeded
                    ? `Function: ${name} successfully run in: ${seconds} seconds.`
                    : `Function: ${name} had an error thrown after: ${seconds} seconds.`;
                await http.post(url, { data });
            }
        }, name);
    };
}
