/**
 * Logger
 *
 * Leveled console logger shared by the UI primitives.
 * Messages are tagged by the caller: logger.debug('[AnimatedCrossFade] ...')
 *
 * The threshold defaults to 'warn' so animation chatter stays out of the
 * console unless a host opts in with logger.setLevel('debug').
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogMethod = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let currentLevel: LogLevel = 'warn';

function write(level: LogMethod, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    console[level](`[${level.toUpperCase()}] ${message}`, ...args);
}

const logger = {
    debug: (message: string, ...args: unknown[]): void => write('debug', message, args),
    info: (message: string, ...args: unknown[]): void => write('info', message, args),
    warn: (message: string, ...args: unknown[]): void => write('warn', message, args),
    error: (message: string, ...args: unknown[]): void => write('error', message, args),

    setLevel(level: LogLevel): void {
        currentLevel = level;
    },

    getLevel(): LogLevel {
        return currentLevel;
    },
};

export default logger;
