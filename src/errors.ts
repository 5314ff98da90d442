import type { ZodIssue } from "zod";

/**
 * Base class for errors raised by the decorators themselves. Errors thrown
 * by a wrapped function are never converted to this type.
 */
export class DecoratorError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Invalid decorator options or environment configuration.
 */
export class ConfigurationError extends DecoratorError {
    readonly issues: readonly ZodIssue[];

    constructor(message: string, issues: readonly ZodIssue[] = []) {
        const details = issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        super(details ? `${message}: ${details}` : message);
        this.issues = issues;
    }
}

/**
 * A capability a decorator depends on (e.g. an HTTP client) is not available.
 */
export class MissingCapabilityError extends DecoratorError {
    constructor(readonly capability: string, hint: string) {
        super(`Missing capability "${capability}": ${hint}`);
    }
}
