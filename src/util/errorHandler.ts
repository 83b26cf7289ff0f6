import { ensureCrawlerError, type CrawlerError, type ErrorKind, type ErrorSeverity } from '../errors.js';
import { componentLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Normalises `error`, logs it with its kind, severity and context, and throws
 * it again when it is fatal unless `throwOnFatal` is false. Recoverable errors
 * are logged at warn level, fatal ones at error level.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const bindings = logBindings(crawlerError, context);
  const logger = componentLogger('errors');

  if (!crawlerError.isFatal) {
    logger.warn(bindings, crawlerError.message);
    return crawlerError;
  }

  logger.error(bindings, crawlerError.message);
  if (options.throwOnFatal ?? true) {
    throw crawlerError;
  }
  return crawlerError;
}

function logBindings(error: CrawlerError, context: ErrorContext): Record<string, unknown> {
  const bindings: Record<string, unknown> = { kind: error.kind, severity: error.severity };
  for (const [key, value] of Object.entries({ ...error.details, ...context })) {
    if (value !== undefined) {
      bindings[key] = value;
    }
  }
  if (error.cause instanceof Error) {
    bindings.cause = error.cause.message;
  }
  return bindings;
}
