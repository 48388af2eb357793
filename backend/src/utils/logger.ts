export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

type WriteLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_RANK;
}

/**
 * LOG_LEVEL wins; otherwise production logs from "info", tests stay silent
 * and everything else logs from "debug". An unknown LOG_LEVEL silences output.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (configured) {
        return isLogLevel(configured) ? configured : "silent";
    }

    if (env.NODE_ENV === "production") return "info";
    if (env.NODE_ENV === "test") return "silent";
    return "debug";
}

const threshold = LEVEL_RANK[resolveLogLevel()];

function flattenError(error: Error) {
    return { name: error.name, message: error.message, stack: error.stack };
}

// Errors are flattened as arguments and one level down inside a context object
function serializeArg(arg: unknown): unknown {
    if (arg instanceof Error) {
        return flattenError(arg);
    }
    if (typeof arg === "object" && arg !== null && !Array.isArray(arg)) {
        return Object.fromEntries(
            Object.entries(arg).map(([key, value]) => [
                key,
                value instanceof Error ? flattenError(value) : value,
            ])
        );
    }
    return arg;
}

function write(level: WriteLevel, scope: string | null, message: string, args: unknown[]) {
    if (LEVEL_RANK[level] < threshold) {
        return;
    }

    const tag = `[${level.toUpperCase()}]`;
    const line = scope ? `${tag} [${scope}] ${message}` : `${tag} ${message}`;
    console[level](line, ...args.map(serializeArg));
}

export function createLogger(scope?: string): Logger {
    const name = scope?.trim() || null;

    return {
        debug: (message, ...args) => write("debug", name, message, args),
        info: (message, ...args) => write("info", name, message, args),
        warn: (message, ...args) => write("warn", name, message, args),
        error: (message, ...args) => write("error", name, message, args),
        child: (childScope) => createLogger(name ? `${name}.${childScope.trim()}` : childScope),
    };
}

/** Logs start, duration and failure of `run` at debug/error level. */
export async function withLogTiming<T>(
    log: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {},
): Promise<T> {
    const startedAt = Date.now();
    log.debug(`${operation} started`, context);

    try {
        const result = await run();
        log.debug(`${operation} completed`, { ...context, durationMs: Date.now() - startedAt });
        return result;
    } catch (error) {
        log.error(`${operation} failed`, { ...context, durationMs: Date.now() - startedAt, error });
        throw error;
    }
}

export const logger = createLogger();
