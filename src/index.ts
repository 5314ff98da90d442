/// <reference path="./global.d.ts" />

export { retry } from "./retry.js";
export { timeFunction } from "./timing.js";
export { memorize } from "./memorize.js";
export { logExecution, logSignature } from "./logging.js";
export {
    discordOnCompletion,
    discordOnFailure,
    completionPayload,
    failurePayload,
    EMBED_COLOR,
    type DiscordEmbed,
    type DiscordWebhookPayload,
} from "./notify/discord.js";
export { ntfy, ntfyTime, topicUrl } from "./notify/ntfy.js";

export { createFetchClient } from "./http.js";
export { createLogger, noopLogger, type CreateLoggerOptions, type Logger } from "./logger.js";
export { loadConfig, type Config } from "./config.js";
export { DecoratorError, ConfigurationError, MissingCapabilityError } from "./errors.js";
export { formatSignature, formatTraceback } from "./render.js";

export type Wrapped<A extends unknown[], R> = Decorators.Wrapped<A, R>;
export type Memoized<A extends unknown[], R> = Decorators.Memoized<A, R>;
export type LogSink = Decorators.LogSink;
export type HttpClient = Decorators.HttpClient;
export type HttpBody = Decorators.HttpBody;
export type RetryOptions = Decorators.RetryOptions;
export type TimingOptions = Decorators.TimingOptions;
export type MemorizeOptions = Decorators.MemorizeOptions;
export type NotifierOptions = Decorators.NotifierOptions;
export type NtfyOptions = Decorators.NtfyOptions;
