import debug from 'debug';
import { logging } from './config';

/**
 * A logger instance with debug, error, and warn methods.
 */
export type Logger = {
  /**
   * The namespace used for the debug logger.
   */
  namespace: string;

  /**
   * Log a debug message when debug logging is enabled.
   * @param message - The message to log.
   * @param args - The arguments to log.
   */
  debug: (message: string, ...args: unknown[]) => void;
  /**
   * Log an error message.
   * @param message - The message to log.
   * @param args - The arguments to log.
   */
  error: (message: string, ...args: unknown[]) => void;
  /**
   * Log a warning message.
   * @param message - The message to log.
   * @param args - The arguments to log.
   */
  warn: (message: string, ...args: unknown[]) => void;
  /**
   * Whether model inputs and outputs should be kept out of the logs.
   */
  readonly dontLogModelData: boolean;
  /**
   * Whether tool inputs and outputs should be kept out of the logs.
   */
  readonly dontLogToolData: boolean;
};

/**
 * Get a logger for a given package.
 *
 * @param namespace - the namespace to use for the logger.
 * @returns A logger object with `debug` and `error` methods.
 */
export function getLogger(namespace: string = 'agentloop'): Logger {
  return {
    namespace,
    debug: debug(namespace),
    error: console.error,
    warn: console.warn,
    get dontLogModelData() {
      return logging.dontLogModelData;
    },
    get dontLogToolData() {
      return logging.dontLogToolData;
    },
  };
}

export const logger = getLogger('agentloop:core');

export default logger;
