import { createFetchError } from '../../errors.js';

export interface FetchPageOptions {
  timeoutMs: number;
  accept?: string;
}

export interface FetchedDocument {
  url: string;
  status: number;
  ok: boolean;
  contentType?: string;
  body: string;
}

const USER_AGENT = 'site-rag/0.1';
const HTML_ACCEPT = 'text/html,application/xhtml+xml,*/*;q=0.9';

// undici reports socket failures through `cause.code`.
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET']);

/**
 * GETs `url` and reads the whole body. The timeout covers the body as well as
 * the headers. Network failures and timeouts are thrown as fetch errors
 * carrying the underlying error code, if any, in their details.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchedDocument> {
  const signal = AbortSignal.timeout(options.timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: 'follow',
      signal,
      headers: { 'user-agent': USER_AGENT, accept: options.accept ?? HTML_ACCEPT },
    });
    const body = await response.text();

    return {
      url: response.url || url,
      status: response.status,
      ok: response.ok,
      contentType: response.headers.get('content-type') ?? undefined,
      body,
    };
  } catch (error) {
    const code = errorCode(error);
    const message = signal.aborted
      ? `Request timed out after ${options.timeoutMs}ms`
      : describeFailure(error);

    throw createFetchError(
      message,
      { url, timeoutMs: options.timeoutMs, code, transient: code !== undefined && TRANSIENT_CODES.has(code) },
      { cause: error },
    );
  }
}

/** True for fetch errors worth one more attempt: dropped sockets and DNS hiccups, never timeouts. */
export function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof Error) || error.message.startsWith('Request timed out')) {
    return false;
  }
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

function errorCode(error: unknown): string | undefined {
  for (let current: unknown = error; current instanceof Error; current = current.cause) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
  }
  return undefined;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause instanceof Error ? error.cause.message : undefined;
  return cause && cause !== error.message ? `${error.message} (${cause})` : error.message || 'Request failed';
}
