import { z } from "zod";

import { parseOptions } from "../config.js";
import { resolveHttpClient } from "../http.js";
import { errorName, formatTraceback, renderValue } from "../render.js";
import { resolveName, tagWrapped } from "../wrapped.js";

/** Discord blurple. */
export const EMBED_COLOR = 5814783;

const COMPLETION_USERNAME = "Completion Notification";
const TRACEBACK_USERNAME = "Traceback Error";

const webhookUrlSchema = z.string().url();

export interface DiscordEmbed {
    author: { name: string };
    title: string;
    description: string;
    color: number;
}

export interface DiscordWebhookPayload {
    content: null;
    embeds: [DiscordEmbed];
    username: string;
    attachments: [];
}

function buildPayload(username: string, title: string, description: string): DiscordWebhookPayload {
    return {
        content: null,
        embeds: [{ author: { name: username }, title, description, color: EMBED_COLOR }],
        username,
        attachments: [],
    };
}

/**
 * Success message. Arrays are reported as several returned values.
 */
export function completionPayload(name: string, value: unknown): DiscordWebhookPayload {
    const returned = Array.isArray(value)
        ? `the following values were returned: \`(${value.map(renderValue).join(", ")})\``
        : `the following value was returned: \`${renderValue(value)}\``;

    return buildPayload(
        COMPLETION_USERNAME,
        `\`${name}\` Successfully Executed:`,
        `Function \`${name}\` has completed running and ${returned}.`
    );
}

export function failurePayload(error: unknown): DiscordWebhookPayload {
    const cause = error instanceof Error ? error.cause : undefined;
    const title = cause === undefined
        ? errorName(error)
        : `${errorName(error)}: ${cause instanceof Error ? cause.message : renderValue(cause)}`;

    return buildPayload(TRACEBACK_USERNAME, title, `\`\`\`${formatTraceback(error)}\`\`\``);
}

function webhookDecorator(
    webhookUrl: string,
    config: Decorators.NotifierOptions,
    notifyOnCompletion: boolean,
    decorator: string
): Decorators.Decorator<"async"> {
    const url = parseOptions(webhookUrlSchema, webhookUrl, decorator);
    const http = resolveHttpClient(config.http);

    return <A extends unknown[], R>(fn: (...args: A) => R) => {
        const name = resolveName(fn, config.name);

        return tagWrapped(async (...args: A): Promise<Awaited<R>> => {
            let value: Awaited<R>;
            try {
                value = await fn(...args);
            } catch (err) {
                await http.post(url, { json: failurePayload(err) });
                throw err;
            }

            if (notifyOnCompletion) {
                await http.post(url, { json: completionPayload(name, value) });
            }
            return value;
        }, name);
    };
}

/**
 * Posts a Discord webhook message when the decorated function returns or throws.
 */
export function discordOnCompletion(
    webhookUrl: string,
    config: Decorators.NotifierOptions = {}
): Decorators.Decorator<"async"> {
    return webhookDecorator(webhookUrl, config, true, "discordOnCompletion");
}

/**
 * Posts a Discord webhook message only when the decorated function throws.
 */
export function discordOnFailure(
    webhookUrl: string,
    config: Decorators.NotifierOptions = {}
): Decorators.Decorator<"async"> {
    return webhookDecorator(webhookUrl, config, false, "discordOnFailure");
}
