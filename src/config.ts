import { z } from "zod";

import { ConfigurationError } from "./errors.js";

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Reads the library's settings from the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigurationError("Invalid environment variables", result.error.issues);
    }
    return result.data;
}

/**
 * Validates decorator options at decoration time so misconfiguration fails
 * before the wrapped function is ever called.
 */
export function parseOptions<S extends z.ZodTypeAny>(
    schema: S,
    options: unknown,
    decorator: string
): z.output<S> {
    const result = schema.safeParse(options);
    if (!result.success) {
        throw new ConfigurationError(`Invalid options for ${decorator}`, result.error.issues);
    }
    return result.data;
}
