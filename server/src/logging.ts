/**
 * logging.ts
 *
 * Console logging for the CLI scripts (migrations, catalog import,
 * probability validation). The HTTP server logs through Fastify's logger
 * instead. `LOG_DEBUG=1` enables debug output.
 */

export function debug(...args: unknown[]) {
    if (process.env.LOG_DEBUG === '1' || process.env.LOG_DEBUG === 'true') {
        console.log(...args);
    }
}

export function info(...args: unknown[]) {
    console.log(...args);
}

export function warn(...args: unknown[]) {
    console.warn(...args);
}

export function error(...args: unknown[]) {
    console.error(...args);
}

/**
 * Minimal structured logger shape shared by Fastify's logger and the
 * script logger below, so infra helpers can take either.
 */
export interface InfraLogger {
    info(obj: object | string, msg?: string): void;
    warn(obj: object | string, msg?: string): void;
    error(obj: object | string, msg?: string): void;
}

export const scriptLogger: InfraLogger = {
    info: (obj, msg) => info(...(msg === undefined ? [obj] : [msg, obj])),
    warn: (obj, msg) => warn(...(msg === undefined ? [obj] : [msg, obj])),
    error: (obj, msg) => error(...(msg === undefined ? [obj] : [msg, obj])),
};
