/**
 * Leveled logger writing one line per entry to stderr.
 *
 * Credentials never reach the output: context keys that look like secrets are replaced and `password=...`
 * fragments are stripped from messages.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    readonly level: LogLevel;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const SENSITIVE_KEYS = ["password", "secret", "token", "authorization"];

const SENSITIVE_PATTERNS = [
    /\bpassword=[^\s&,;]{1,100}/gi,
    /\bauthorization:\s*basic\s+\S{1,500}/gi,
];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function redactSensitive(input: string): string {
    let result = input;
    for (const pattern of SENSITIVE_PATTERNS) {
        result = result.replace(pattern, (match) => {
            const delimiter = match.search(/[=:]/);
            return match.substring(0, delimiter + 1) + "[REDACTED]";
        });
    }
    return result;
}

function sanitizeContext(context: LogContext): LogContext {
    const result: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        const lowerKey = key.toLowerCase();
        if (SENSITIVE_KEYS.some((k) => lowerKey.includes(k))) {
            result[key] = "[REDACTED]";
        } else if (typeof value === "string") {
            result[key] = redactSensitive(value);
        } else if (value instanceof Error) {
            result[key] = redactSensitive(value.message);
        } else if (typeof value === "bigint") {
            result[key] = value.toString();
        } else {
            result[key] = value;
        }
    }
    return result;
}

/** Renders a log line. Exposed for tests. */
export function formatEntry(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): string {
    let output = `[fqe-client] ${level.toUpperCase().padEnd(5)} ${redactSensitive(message)}`;
    if (context !== undefined && Object.keys(context).length > 0) {
        output += ` ${JSON.stringify(sanitizeContext(context))}`;
    }
    return output;
}

/** Creates a logger that drops entries below `level`. */
export function createLogger(level: LogLevel, sink: (line: string) => void = (line) => console.error(line)): Logger {
    const log = (entryLevel: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
        if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) {
            return;
        }
        sink(formatEntry(entryLevel, message, context));
    };
    return {
        debug: (message, context) => log("debug", message, context),
        info: (message, context) => log("info", message, context),
        warn: (message, context) => log("warn", message, context),
        error: (message, context) => log("error", message, context),
        level,
    };
}

/** Level used when a connection does not ask for one. Read from `FQE_LOG_LEVEL`. */
export function defaultLogLevel(): LogLevel {
    const envLevel = process.env["FQE_LOG_LEVEL"]?.toLowerCase();
    if (envLevel !== undefined && isLogLevel(envLevel)) {
        return envLevel;
    }
    return "warn";
}

/** Logger for code that runs outside of a connection. */
export const logger: Logger = createLogger(defaultLogLevel());
