import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export function parseLogLevel(value: string | undefined, fallback: LevelWithSilent = 'info'): LevelWithSilent {
    return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

/**
 * Create the root logger.
 *
 * Logs go to stderr: stdout carries the MCP stdio protocol.
 */
function createLogger(): Logger {
    const level = parseLogLevel(process.env.LOG_LEVEL);
    return pino(
        {
            level,
            base: { service: 'ontology-graph' },
            formatters: {
                level: (label) => {
                    return { level: label };
                },
            },
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.destination(2)
    );
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context.
 * Children copy the level at creation, so create them after setLogLevel.
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
    return logger.child(context);
}

export function setLogLevel(level: LevelWithSilent): void {
    logger.level = level;
}
