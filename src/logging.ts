import { ILogger, LogLevel, Logger } from "@vscode/debugadapter/lib/logger";

export { LogLevel };
export type { ILogger };

type LogCallback = Parameters<Logger["init"]>[0];

/**
 * Create a logger that is ready to write.
 *
 * The debug adapter logger holds every message in a pending queue until it has been
 * initialised and set up, which a LoggingDebugSession does on launch. Outside a session
 * the library logs through one of these instead. Warnings and errors also go to the console.
 *
 * @param level Minimum level passed to the callback
 * @param callback Receives log output events, e.g. a session's sendEvent
 */
export function createLogger(
  level: LogLevel = LogLevel.Warn,
  callback: LogCallback = () => {},
): Logger {
  const log = new Logger();
  log.init(callback, undefined, true);
  log.setup(level, false);
  return log;
}

/**
 * Used when no logger is passed in. A debug adapter passes its own `logger` once it has set it up.
 */
export const defaultLogger: ILogger = createLogger();
