import pino from 'pino';

const LEVELS = ['warn', 'info', 'debug', 'trace'] as const;

/**
 * Root logger. Writes to stderr: stdout carries the MCP stdio transport.
 */
export const logger = pino({ name: 'atlaspack', level: 'warn' }, pino.destination(2));

export type Logger = pino.Logger;

/**
 * Maps a verbosity count (0..3, clamped) to warn, info, debug or trace.
 */
export function levelForVerbosity(verbose: number): (typeof LEVELS)[number] {
    const idx = Math.min(Math.max(Math.trunc(verbose), 0), LEVELS.length - 1);
    return LEVELS[idx];
}

export function setVerbosity(verbose: number): void {
    logger.level = levelForVerbosity(verbose);
}
