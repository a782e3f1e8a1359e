/**
 * Logger — structured logging via pino.
 *
 * Components accept an optional logger and bind their own `component`
 * field onto a child. Without one they log through the shared root.
 */
import { pino, stdTimeFunctions, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const LEVELS = new Set<string>(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function isLevel(value: string): value is LevelWithSilent {
    return LEVELS.has(value);
}

export interface LoggerOptions {
    readonly level?: LevelWithSilent;
    readonly name?: string;
}

/**
 * Create a root logger. Level comes from the option, then `POLICY_LOG_LEVEL`,
 * then `warn`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const fromEnv = process.env.POLICY_LOG_LEVEL?.trim().toLowerCase();
    const level = options.level ?? (fromEnv && isLevel(fromEnv) ? fromEnv : 'warn');

    return pino({
        name: options.name ?? 'path-policy',
        level,
        timestamp: stdTimeFunctions.isoTime,
    });
}

let root: Logger | undefined;

/** Bind a component name onto the given logger, or onto the shared root. */
export function componentLogger(component: string, parent?: Logger): Logger {
    root ??= createLogger();
    return (parent ?? root).child({ component });
}
