import { describe, it, expect, vi } from "vitest";

import { logExecution, logSignature } from "./logging.js";
import { memorize } from "./memorize.js";

function sink() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

function add(a: number, b: number): number {
    return a + b;
}

describe("logExecution", () => {
    it("should bracket a successful call with info entries", () => {
        const logger = sink();
        const wrapped = logExecution(add, { logger });

        expect(wrapped(1, 2)).toBe(3);
        expect(logger.info.mock.calls).toEqual([
            [{ fn: "add" }, "Executing add"],
            [{ fn: "add" }, "Finished executing add"],
        ]);
    });

    it("should emit only the Executing entry when the call throws", () => {
        const logger = sink();
        const failure = new Error("disk full");
        const wrapped = logExecution(
            function save(): void {
                throw failure;
            },
            { logger }
        );

        expect(() => wrapped()).toThrow(failure);
        expect(logger.info).toHaveBeenCalledTimes(1);
        expect(logger.info).toHaveBeenCalledWith({ fn: "save" }, "Executing save");
    });

    it("should log Finished once an async function returns its promise", async () => {
        const logger = sink();
        const wrapped = logExecution(
            async function upload(): Promise<void> {
                throw new Error("bucket missing");
            },
            { logger }
        );

        const pending = wrapped();

        expect(logger.info).toHaveBeenLastCalledWith({ fn: "upload" }, "Finished executing upload");
        await expect(pending).rejects.toThrow("bucket missing");
    });

    it("should report the innermost name when decorators are stacked", () => {
        const logger = sink();
        const wrapped = logExecution(memorize(add), { logger });

        wrapped(2, 2);

        expect(logger.info).toHaveBeenCalledWith({ fn: "add" }, "Executing add");
    });

    it("should stay silent without an injected logger", () => {
        expect(logExecution(add)(4, 5)).toBe(9);
    });
});

describe("logSignature", () => {
    it("should log rendered arguments and the return value at debug level", () => {
        const logger = sink();
        const greet = logSignature((name: string, options: { loud: boolean }) => `hi ${name}`, {
            logger,
            name: "greet",
        });

        expect(greet("ada", { loud: true })).toBe("hi ada");
        expect(logger.debug.mock.calls).toEqual([
            [{ fn: "greet" }, "Entering greet('ada', { loud: true })"],
            [{ fn: "greet" }, "Leaving greet('ada', { loud: true }) with return value `'hi ada'`."],
        ]);
        expect(logger.info).not.toHaveBeenCalled();
    });

    it("should not log Leaving when the call throws", () => {
        const logger = sink();
        const wrapped = logSignature(
            (n: number): number => {
                throw new Error(`bad ${n}`);
            },
            { logger, name: "parse" }
        );

        expect(() => wrapped(3)).toThrow("bad 3");
        expect(logger.debug).toHaveBeenCalledTimes(1);
        expect(logger.debug).toHaveBeenCalledWith({ fn: "parse" }, "Entering parse(3)");
    });
});
