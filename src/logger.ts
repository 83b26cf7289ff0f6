import pino, { type DestinationStream, type LoggerOptions } from 'pino';

/** The slice of pino the project logs through; tests substitute their own. */
export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LoggerOptions['level'];
  destination?: DestinationStream;
}

const SERVICE_NAME = 'site-rag';

// Credentials travel through handler and session context objects.
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'credentials.apiKey'];

let activeLogger: LoggerLike = createPinoLogger({});

/**
 * Replaces the process-wide logger. Output goes to stderr unless a destination
 * is given, so CLI answers on stdout stay clean.
 */
export function configureLogger(config: LoggerConfiguration = {}): void {
  activeLogger = createPinoLogger(config);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/** Resolved per call so a logger swapped in later reaches modules already loaded. */
export function componentLogger(component: string): LoggerLike {
  return activeLogger.child({ component });
}

function createPinoLogger({ level = 'silent', destination }: LoggerConfiguration): LoggerLike {
  const options: LoggerOptions = {
    level,
    base: { service: SERVICE_NAME },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return pino(options, destination ?? pino.destination(2));
}
