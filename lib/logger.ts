export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
type EmittingLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

export interface LoggerOptions {
    /** Overrides the level read from SHELFCAST_LOG_LEVEL. */
    level?: LogLevel;
}

const SEVERITY = ["debug", "info", "warn", "error", "silent"] as const;

const isLogLevel = (value: string): value is LogLevel =>
    SEVERITY.some((level) => level === value);

/** Unset means info (warn in production); an unknown value silences output. */
export const resolveLogLevel = (
    env: NodeJS.ProcessEnv = process.env,
): LogLevel => {
    const configured = env.SHELFCAST_LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return env.NODE_ENV === "production" ? "warn" : "info";
    }
    return isLogLevel(configured) ? configured : "silent";
};

const serializeError = (value: unknown): unknown =>
    value instanceof Error
        ? { name: value.name, message: value.message, stack: value.stack }
        : value;

// Errors nested one level inside a context object are flattened too.
const serializeArg = (value: unknown): unknown => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return value;
    }
    if (value instanceof Error) {
        return serializeError(value);
    }
    return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [key, serializeError(entry)]),
    );
};

export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
    const label = scope?.trim() ?? "";
    const threshold = SEVERITY.indexOf(options.level ?? resolveLogLevel());

    const write =
        (level: EmittingLevel) =>
        (message: string, ...args: unknown[]): void => {
            if (SEVERITY.indexOf(level) < threshold) return;
            const tag = label ? `[${level.toUpperCase()}] [${label}]` : `[${level.toUpperCase()}]`;
            console[level](`${tag} ${message}`, ...args.map(serializeArg));
        };

    return {
        debug: write("debug"),
        info: write("info"),
        warn: write("warn"),
        error: write("error"),
        child: (childScope) =>
            createLogger(label ? `${label}.${childScope.trim()}` : childScope, {
                level: SEVERITY[threshold],
            }),
    };
}

export const logger = createLogger("shelfcast");
