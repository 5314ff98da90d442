import { inspect } from "node:util";

/**
 * Single-line developer rendering of a value: strings quoted, objects as
 * literals, nothing elided.
 */
export function renderValue(value: unknown): string {
    return inspect(value, {
        depth: Infinity,
        breakLength: Infinity,
        compact: true,
        maxArrayLength: Infinity,
        maxStringLength: Infinity,
    });
}

/**
 * Message-body rendering: strings pass through untouched.
 */
export function renderText(value: unknown): string {
    return typeof value === "string" ? value : renderValue(value);
}

/**
 * Renders an argument list the way it would be written at the call site.
 */
export function formatSignature(args: readonly unknown[]): string {
    return args.map(renderValue).join(", ");
}

export function errorName(error: unknown): string {
    if (error instanceof Error) return error.name;
    return error === null ? "null" : typeof error;
}

/**
 * Full textual trace of a thrown value, followed by its chain of causes.
 */
export function formatTraceback(error: unknown): string {
    const lines: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = error;
    let prefix = "";

    while (true) {
        if (seen.has(current)) {
            lines.push(`${prefix}<circular>`);
            break;
        }
        seen.add(current);

        if (!(current instanceof Error)) {
            lines.push(`${prefix}Uncaught ${renderValue(current)}`);
            break;
        }
        lines.push(prefix + (current.stack ?? `${current.name}: ${current.message}`));
        if (current.cause === undefined) break;

        prefix = "[cause]: ";
        current = current.cause;
    }

    return lines.join("\n");
}
