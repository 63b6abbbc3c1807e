/**
 * Leveled logging for generation runs.
 *
 * The library never writes to the console on its own: `generate` logs through
 * the logger it is given, {@link silentLogger} by default. The CLI picks a
 * console logger at the level its flags ask for.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};

/**
 * Sink the console logger writes to. Defaults to the global `console`.
 */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Creates a logger that forwards messages at or above `level` to `sink`.
 *
 * Messages are prefixed `[freeze]`.
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  sink: LogSink = console
): Logger {
  const threshold = LEVEL_RANK[level];
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>) =>
    LEVEL_RANK[messageLevel] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) sink.debug(`[freeze] ${message}`);
    },
    info(message) {
      if (enabled('info')) sink.info(`[freeze] ${message}`);
    },
    warn(message) {
      if (enabled('warn')) sink.warn(`[freeze] ${message}`);
    },
    error(message) {
      if (enabled('error')) sink.error(`[freeze] ${message}`);
    }
  };
}
