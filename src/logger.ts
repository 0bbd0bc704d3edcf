/**
 * Logger for channel lifecycle and recovery events.
 * Any object with these four methods can be passed in place of the console logger.
 */

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, err?: Error | Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Tag printed in brackets before every line. Default: AMQP. */
  prefix?: string;
  /** Print debug lines. Default: DEBUG environment variable mentions amqp. */
  debug?: boolean;
}

const serialize = (data?: Record<string, unknown>): string => (data ? JSON.stringify(data) : '');

/**
 * Creates a logger that uses console for output.
 *
 * @returns Logger instance
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const tag = `[${options.prefix ?? 'AMQP'}]`;
  const verbose = options.debug ?? Boolean(process.env.DEBUG?.includes('amqp'));

  return {
    info: (msg, data) => console.log(`${tag} ${msg}`, serialize(data)),
    warn: (msg, data) => console.warn(`${tag} ${msg}`, serialize(data)),
    error: (msg, err) => {
      if (err instanceof Error) {
        console.error(`${tag} ${msg}:`, err.message);
      } else {
        console.error(`${tag} ${msg}`, serialize(err));
      }
    },
    debug: (msg, data) => {
      if (verbose) {
        console.debug(`${tag} ${msg}`, serialize(data));
      }
    },
  };
};
