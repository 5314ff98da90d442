import { MissingCapabilityError } from "./errors.js";

/**
 * HTTP client backed by `fetch`. Responses are not inspected: a notification
 * is one best-effort POST, and only transport errors reject.
 */
export function createFetchClient(fetchImpl: typeof fetch = globalThis.fetch): Decorators.HttpClient {
    return {
        async post(url, body) {
            const init: RequestInit = "json" in body
                ? {
                    method: "POST",
                    headers: { "content-type": "application/json" },
                    body: JSON.stringify(body.json),
                }
                : {
                    method: "POST",
                    headers: { "content-type": "text/plain; charset=utf-8" },
                    body: body.data,
                };
            await fetchImpl(url, init);
        },
    };
}

/**
 * Picks the client a notifier sends through, failing at decoration time
 * when none is available.
 */
export function resolveHttpClient(http?: Decorators.HttpClient): Decorators.HttpClient {
    if (http) return http;
    if (typeof globalThis.fetch !== "function") {
        throw new MissingCapabilityError(
            "http",
            "no global fetch is available; pass an `http` client to the notifier"
        );
    }
    return createFetchClient(globalThis.fetch);
}
