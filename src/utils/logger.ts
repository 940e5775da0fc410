import pino from 'pino';

export type Logger = pino.Logger;

let loggerInstance: Logger | null = null;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Create a logger writing to stderr; stdout is reserved for command output
 * and, for the MCP server, for the stdio transport.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';
  if (options.pretty) {
    return pino({
      level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    });
  }
  return pino({ level }, pino.destination(2));
}

/** Process-wide default logger, created on first use. */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/** Replace the process-wide logger (entrypoints configure it from AppConfig). */
export function setLogger(logger: Logger): void {
  loggerInstance = logger;
}

export function __resetLoggerForTests(): void {
  loggerInstance = null;
}
