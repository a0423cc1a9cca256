export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

/**
 * Resolves the active level from `LOG_LEVEL`, falling back to a per-NODE_ENV
 * default. Unknown values silence the logger.
 */
export function resolveLogLevel(
    configured: string | undefined = process.env.LOG_LEVEL,
    nodeEnv: string | undefined = process.env.NODE_ENV,
): LogLevel {
    const normalized = configured?.trim().toLowerCase();

    if (!normalized) {
        if (nodeEnv === "test") return "silent";
        return nodeEnv === "production" ? "info" : "debug";
    }

    return isLogLevel(normalized) ? normalized : "silent";
}

const currentLevel = resolveLogLevel();

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    return {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function splitArgs(args: unknown[]): {
    context: LogContext | null;
    passthrough: unknown[];
} {
    const [first, ...rest] = args;
    if (args.length === 0 || !isLogContextCandidate(first)) {
        return { context: null, passthrough: args.map(normalizeError) };
    }

    return {
        context: normalizeContext(first),
        passthrough: rest.map(normalizeError),
    };
}

const CONSOLE_METHODS: Record<
    Exclude<LogLevel, "silent">,
    (...data: unknown[]) => void
> = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
};

function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    args: unknown[],
): void {
    if (!shouldLog(level)) {
        return;
    }

    const { context, passthrough } = splitArgs(args);
    const tag = `[${level.toUpperCase()}]`;
    const prefix = scope ? `${tag} [${scope}] ${message}` : `${tag} ${message}`;
    const method = CONSOLE_METHODS[level];

    if (context) {
        method(prefix, context, ...passthrough);
        return;
    }

    method(prefix, ...passthrough);
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, ...args) => emit("debug", message, scoped, args),
        info: (message, ...args) => emit("info", message, scoped, args),
        warn: (message, ...args) => emit("warn", message, scoped, args),
        error: (message, ...args) => emit("error", message, scoped, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

export function logErrorWithContext(
    loggerInstance: Logger,
    message: string,
    error: unknown,
    context: LogContext = {},
): void {
    loggerInstance.error(message, {
        ...context,
        error,
    });
}

export const logger = createLogger();
