/**
 * HTTP fetcher for tracker pages and APIs
 *
 * Retries network errors and 5xx responses with a small linear backoff;
 * 4xx responses are final (the ticket does not exist or is private).
 */

import axios, { type AxiosRequestConfig } from 'axios';
import { FetchError, errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('fetcher');

const DEFAULT_TIMEOUT = 15_000;
const MAX_REDIRECTS = 5;
const USER_AGENT = 'ticketlink/0.1 (+irc ticket title bot)';

export interface FetchedPage {
  url: string;
  status: number;
  contentType?: string;
  body: string;
}

export interface FetchOptions {
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export type PageFetcher = (url: string, opts?: FetchOptions) => Promise<FetchedPage>;

/** The HTTP call underneath the fetcher; axios.get by default */
export type HttpGet = (url: string, config: AxiosRequestConfig) => Promise<{
  status: number;
  headers: unknown;
  data: ArrayBuffer | Uint8Array;
}>;

const axiosGet: HttpGet = (url, config) => axios.get<ArrayBuffer>(url, config);

function contentTypeOf(headers: unknown): string | undefined {
  if (typeof headers !== 'object' || headers === null || !('content-type' in headers)) return undefined;
  const value = headers['content-type'];
  return typeof value === 'string' ? value : undefined;
}

/** `text/html; charset=ISO-8859-1` → `iso-8859-1` */
export function charsetFromContentType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match ? match[1].toLowerCase() : undefined;
}

// Checked by code: the RangeError comes from Node's realm, not the caller's
function isUnsupportedEncoding(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ERR_ENCODING_NOT_SUPPORTED';
}

export function decodeBody(data: ArrayBuffer | Uint8Array, contentType?: string): string {
  const charset = charsetFromContentType(contentType) ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(data);
  } catch (err) {
    if (!isUnsupportedEncoding(err)) throw err;
    log.debug({ charset }, 'Unknown charset, decoding as utf-8');
    return new TextDecoder('utf-8').decode(data);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function createFetcher(get: HttpGet = axiosGet): PageFetcher {
  return async (url, opts = {}) => {
    const maxRetries = opts.maxRetries ?? 2;
    const retryDelay = opts.retryDelay ?? 500;
    let lastError: FetchError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) await sleep(retryDelay * attempt);

      try {
        const response = await get(url, {
          timeout: opts.timeout ?? DEFAULT_TIMEOUT,
          maxRedirects: MAX_REDIRECTS,
          responseType: 'arraybuffer',
          headers: { 'User-Agent': USER_AGENT, ...opts.headers },
          validateStatus: () => true,
        });

        const contentType = contentTypeOf(response.headers);

        if (response.status >= 400) {
          const error = new FetchError(`GET ${url} returned HTTP ${response.status}`, url, response.status);
          if (error.isClientError) throw error;
          lastError = error;
        } else {
          return {
            url,
            status: response.status,
            contentType,
            body: decodeBody(response.data, contentType),
          };
        }
      } catch (err) {
        if (err instanceof FetchError) throw err;
        lastError = new FetchError(`GET ${url} failed: ${errorMessage(err)}`, url, undefined, err);
      }

      if (attempt < maxRetries) {
        log.debug({ url, attempt, err: lastError?.message }, 'Fetch failed, retrying');
      }
    }

    throw lastError ?? new FetchError(`GET ${url} failed`, url);
  };
}

export const fetchPage: PageFetcher = createFetcher();
