import { z } from "zod";

import type { ConnectionDescriptor } from "./descriptor.js";
import type { LogLevel } from "./logger.js";
import { LOG_LEVELS } from "./logger.js";

/** Default exchange timeout, in seconds. */
export const DEFAULT_TIMEOUT_SECONDS = 30;
/** Default cap on the number of rows the server returns for one query. */
export const DEFAULT_MAX_RESULT_ROWS = 10000;
/** Longest exchange timeout a timer can hold, in milliseconds. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Options that a connection descriptor or the caller can set. */
export type ConnectionOptions = Record<string, string>;

/** Resolved configuration of one connection. */
export interface ClientConfig {
    user: string | undefined;
    password: string | undefined;
    /** Bound on each HTTP exchange, in milliseconds. */
    timeoutMs: number;
    /** Selects `https` instead of `http` for the base URL. */
    ssl: boolean;
    /** Sent to the server as `max_result_rows`. */
    maxResultRows: number;
    /** Level of the connection's logger. `undefined` keeps the process default. */
    logLevel: LogLevel | undefined;
}

/** Seconds, converted to whole milliseconds in the range of a timer. */
const timeoutMs = z.coerce.number().finite()
    .transform((seconds) => Math.round(seconds * 1000))
    .pipe(z.number().int().min(1).max(MAX_TIMEOUT_MS));
const positiveInteger = z.coerce.number().int().positive();

const optionsSchema = z.object({
    user: z.string().optional(),
    password: z.string().optional(),
    timeout: z.string().trim().pipe(timeoutMs).catch(DEFAULT_TIMEOUT_SECONDS * 1000),
    ssl: z.string().trim().toLowerCase().pipe(z.enum(["true", "false"])).transform((v) => v === "true").catch(false),
    maxResultRows: z.string().trim().pipe(positiveInteger).catch(DEFAULT_MAX_RESULT_ROWS),
    logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional().catch(undefined),
});

/** Merges the descriptor options with `overrides` (which win) and resolves them into a {@link ClientConfig}.
 *
 * Malformed `timeout`, `ssl`, `maxResultRows` and `logLevel` values fall back to their defaults. So does a
 * `timeout` that is shorter than a millisecond or longer than {@link MAX_TIMEOUT_MS}.
 */
export function resolveConfig(descriptor: ConnectionDescriptor, overrides: ConnectionOptions = {}): ClientConfig {
    const merged: ConnectionOptions = Object.fromEntries(descriptor.options);
    Object.assign(merged, overrides);

    const parsed = optionsSchema.parse(merged);
    return {
        user: parsed.user,
        password: parsed.password,
        timeoutMs: parsed.timeout,
        ssl: parsed.ssl,
        maxResultRows: parsed.maxResultRows,
        logLevel: parsed.logLevel,
    };
}

/** Description of one recognised connection option. */
export interface PropertyInfo {
    name: string;
    value: string | undefined;
    description: string;
    required: boolean;
    choices?: Array<string>;
}

/** Lists the options a connection understands, filled in with the values from `options`. */
export function getPropertyInfo(options: ConnectionOptions = {}): Array<PropertyInfo> {
    return [
        {
            name: "user",
            value: options["user"],
            description: "Username for authentication",
            required: false,
        },
        {
            name: "password",
            value: options["password"],
            description: "Password for authentication",
            required: false,
        },
        {
            name: "timeout",
            value: options["timeout"] ?? String(DEFAULT_TIMEOUT_SECONDS),
            description: "Connection timeout in seconds",
            required: false,
        },
        {
            name: "ssl",
            value: options["ssl"] ?? "false",
            description: "Use SSL connection",
            required: false,
            choices: ["true", "false"],
        },
    ];
}
