import { getClientConfig } from '../config';
import { RequestError, ResponseFormatError } from '../utils/errors';
import { logger } from '../utils/logger';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  params?: QueryParams;
  /** Sent as an `application/x-www-form-urlencoded` body. */
  form?: QueryParams;
  accept?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Substring the response `content-type` must contain. */
  expectContentType?: string;
}

const toSearchParams = (params: QueryParams): URLSearchParams => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, String(value));
  }
  return search;
};

export const buildUrl = (base: string, params?: QueryParams): string => {
  if (!params) return base;
  const query = toSearchParams(params).toString();
  if (!query) return base;
  return `${base}${base.includes('?') ? '&' : '?'}${query}`;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface HttpResult {
  response: Response;
  /** Body text, read before the timeout is cleared. */
  text: string;
}

/**
 * Sends one request and reads its body under a single timeout. Timeouts,
 * transport failures and non-success statuses all become `RequestError`.
 */
export const fetchResponse = async (url: string, options: HttpRequestOptions = {}): Promise<HttpResult> => {
  const config = getClientConfig();
  const fullUrl = buildUrl(url, options.params);
  const headers: Record<string, string> = {
    'User-Agent': config.userAgent,
    ...(options.accept ? { Accept: options.accept } : {}),
    ...options.headers,
  };

  let body: string | undefined;
  if (options.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = toSearchParams(options.form).toString();
  }

  const method = options.method ?? (body === undefined ? 'GET' : 'POST');
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  logger.debug(`${method} ${fullUrl}`);

  let response: Response;
  let text: string;
  try {
    response = await fetch(fullUrl, { method, headers, body, signal: controller.signal });
    text = await response.text();
  } catch (error) {
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs} ms` : describeError(error);
    logger.error(`Request to ${fullUrl} failed: ${reason}`);
    throw new RequestError(`Request failed: ${reason}`, { url: fullUrl, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    logger.error(`HTTP ${response.status} from ${fullUrl}`);
    throw new RequestError(`HTTP ${response.status}: ${text.slice(0, 500)}`, {
      url: fullUrl,
      status: response.status,
      body: text,
    });
  }

  if (options.expectContentType) {
    const contentType = response.headers.get('content-type') || '';
    if (!contentType.includes(options.expectContentType)) {
      throw new ResponseFormatError(
        `Expected ${options.expectContentType} response but received content-type "${contentType || 'unknown'}"`,
        fullUrl,
      );
    }
  }

  return { response, text };
};

export const fetchText = async (url: string, options: HttpRequestOptions = {}): Promise<string> =>
  (await fetchResponse(url, options)).text;

export const parseJsonText = (text: string, url?: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ResponseFormatError(`Response is not valid JSON: ${describeError(error)}`, url);
  }
};

export const fetchJson = async (url: string, options: HttpRequestOptions = {}): Promise<unknown> => {
  const text = await fetchText(url, { accept: 'application/json', ...options });
  return parseJsonText(text, url);
};
