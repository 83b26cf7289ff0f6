export type ErrorKind =
  | 'input'
  | 'config'
  | 'fetch'
  | 'parse'
  | 'extraction'
  | 'result'
  | 'session'
  | 'embedding'
  | 'model'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface ErrorFactoryOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

/**
 * Severity a kind gets when the caller does not choose one. Fetch and parse
 * problems are per-page and leave the rest of a crawl running.
 */
const DEFAULT_SEVERITY: Record<ErrorKind, ErrorSeverity> = {
  input: 'fatal',
  config: 'fatal',
  fetch: 'recoverable',
  parse: 'recoverable',
  extraction: 'fatal',
  result: 'fatal',
  session: 'fatal',
  embedding: 'fatal',
  model: 'fatal',
  internal: 'fatal',
};

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity, details, cause }: CrawlerErrorProps) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = errorName(kind);
    this.kind = kind;
    this.severity = severity ?? DEFAULT_SEVERITY[kind];
    this.details = details;
  }

  get isFatal(): boolean {
    return this.severity === 'fatal';
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

/**
 * Returns `error` when it already is a CrawlerError. Anything else is wrapped
 * as a fatal error of `fallback.kind`, its message prefixed with
 * `fallback.message` when one is given.
 */
export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message: fallback.message ? `${fallback.message}: ${reason}` : reason,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

function factory(kind: ErrorKind) {
  return (
    message: string,
    details: Record<string, unknown> = {},
    options: ErrorFactoryOptions = {},
  ): CrawlerError =>
    new CrawlerError({ message, kind, severity: options.severity, details, cause: options.cause });
}

export const createInputError = factory('input');
export const createConfigurationError = factory('config');
export const createFetchError = factory('fetch');
export const createParseError = factory('parse');
export const createExtractionError = factory('extraction');
export const createEmptyResultError = factory('result');
export const createSessionError = factory('session');
export const createInternalError = factory('internal');

function errorName(kind: ErrorKind): string {
  return `${kind.charAt(0).toUpperCase()}${kind.slice(1)}Error`;
}
