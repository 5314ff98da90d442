import { describe, it, expect, vi, afterEach } from "vitest";

import { MissingCapabilityError } from "./errors.js";
import { createFetchClient, resolveHttpClient } from "./http.js";

function fetchStub() {
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 204 }));
}

describe("createFetchClient", () => {
    it("should post JSON bodies with a JSON content type", async () => {
        const fetchImpl = fetchStub();
        const client = createFetchClient(fetchImpl);

        await client.post("https://hooks.test/a", { json: { content: null, attachments: [] } });

        expect(fetchImpl).toHaveBeenCalledWith("https://hooks.test/a", {
            method: "POST",
            headers: { "content-type": "application/json" },
            body: '{"content":null,"attachments":[]}',
        });
    });

    it("should post text bodies as plain text", async () => {
        const fetchImpl = fetchStub();
        const client = createFetchClient(fetchImpl);

        await client.post("https://ntfy.test/builds", { data: "done" });

        expect(fetchImpl).toHaveBeenCalledWith("https://ntfy.test/builds", {
            method: "POST",
            headers: { "content-type": "text/plain; charset=utf-8" },
            body: "done",
        });
    });

    it("should not reject on an error status", async () => {
        const fetchImpl = vi.fn(async () => new Response("nope", { status: 500 }));

        await expect(createFetchClient(fetchImpl).post("https://ntfy.test/x", { data: "hi" })).resolves.toBeUndefined();
    });

    it("should propagate transport errors", async () => {
        const fetchImpl = vi.fn(async () => {
            throw new TypeError("fetch failed");
        });

        await expect(createFetchClient(fetchImpl).post("https://ntfy.test/x", { data: "hi" })).rejects.toThrow(
            "fetch failed"
        );
    });
});

describe("resolveHttpClient", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("should prefer the injected client", () => {
        const http = { post: vi.fn(async () => undefined) };

        expect(resolveHttpClient(http)).toBe(http);
    });

    it("should fall back to the global fetch", async () => {
        const fetchImpl = fetchStub();
        vi.stubGlobal("fetch", fetchImpl);

        await resolveHttpClient().post("https://ntfy.test/x", { data: "hi" });

        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it("should name the missing capability when there is no fetch", () => {
        vi.stubGlobal("fetch", undefined);

        expect(() => resolveHttpClient()).toThrow(MissingCapabilityError);
        expect(() => resolveHttpClient()).toThrow('Missing capability "http"');
    });
});
