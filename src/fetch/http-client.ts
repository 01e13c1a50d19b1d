/**
 * Shared httpcloak client with browser fingerprints.
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';

/** Session metadata for lifecycle management */
interface SessionMetadata {
  session: httpcloak.Session;
  created: number;
  requestCount: number;
}

/** Session cache keyed by composite key (preset|proxy) */
const sessionCache = new Map<string, SessionMetadata>();

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** Allowed proxy URL schemes */
const VALID_PROXY_SCHEMES = ['http:', 'https:', 'socks5:', 'socks5h:'];

/** Default TLS preset */
const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

/**
 * Validate a proxy URL: must parse and use an allowed scheme.
 */
export function validateProxyUrl(proxy: string): void {
  let parsed: URL;
  try {
    parsed = new URL(proxy);
  } catch {
    throw new Error(`Invalid proxy URL: ${redactProxyUrl(proxy)}`);
  }

  if (!VALID_PROXY_SCHEMES.includes(parsed.protocol)) {
    throw new Error(
      `Invalid proxy scheme "${parsed.protocol}" (must be one of: ${VALID_PROXY_SCHEMES.join(', ')})`
    );
  }
}

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

/**
 * Get or create the httpcloak session for a TLS preset, optional proxy and
 * request timeout. The native layer enforces its own timeout, so it must be
 * at least as long as the caller's.
 * A run issues at most two requests, so sessions are never recycled; they
 * live until closeAllSessions().
 */
export function getSession(
  preset?: string,
  proxy?: string,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): httpcloak.Session {
  const presetValue = preset ?? DEFAULT_PRESET;
  const timeoutSec = Math.ceil(timeoutMs / 1000);
  const cacheKey = `${presetValue}|${proxy || 'direct'}|${timeoutSec}`;

  const cached = sessionCache.get(cacheKey);
  if (cached) {
    cached.requestCount++;
    return cached.session;
  }

  logger.debug(
    { preset: presetValue, proxy: proxy ? redactProxyUrl(proxy) : undefined, timeoutSec },
    'Creating httpcloak session'
  );

  const session = new httpcloak.Session({
    preset: presetValue,
    timeout: timeoutSec,
    ...(proxy ? { proxy } : {}),
  });
  sessionCache.set(cacheKey, { session, created: Date.now(), requestCount: 1 });
  return session;
}

/**
 * Close all httpcloak sessions.
 * Call this when the run ends.
 */
export async function closeAllSessions(): Promise<void> {
  const metadataList = Array.from(sessionCache.values());
  sessionCache.clear();

  for (const metadata of metadataList) {
    logger.debug(
      { requests: metadata.requestCount, ageMs: Date.now() - metadata.created },
      'Closing httpcloak session'
    );
    try {
      metadata.session.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  html?: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  error?: string;
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

function lowerCaseHeaders(headers: Record<string, string> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    out[name.toLowerCase()] = value;
  }
  return out;
}

/**
 * Make a single HTTP GET request with a browser fingerprint.
 * Failures (timeouts, connection errors, oversized bodies) come back as
 * `success: false` with `statusCode: 0` when no response arrived.
 */
export async function httpRequest(
  url: string,
  headers: Record<string, string> = {},
  preset?: string,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  proxy?: string
): Promise<HttpResponse> {
  try {
    if (proxy) {
      validateProxyUrl(proxy);
    }

    const session = getSession(preset, proxy, timeoutMs);

    logger.debug(
      { url, headers, proxy: proxy ? redactProxyUrl(proxy) : undefined },
      'Making httpcloak request'
    );

    const timeout = createRequestTimeout(url, timeoutMs);

    try {
      const response = await Promise.race([session.get(url, { headers }), timeout.promise]);
      const responseHeaders = lowerCaseHeaders(response.headers);

      const contentLength = responseHeaders['content-length'];
      if (contentLength) {
        const size = parseInt(contentLength, 10);
        if (!isNaN(size) && size > MAX_RESPONSE_SIZE) {
          logger.warn(
            { url, contentLength: size, limit: MAX_RESPONSE_SIZE },
            'Content-Length exceeds size limit'
          );
          return {
            success: false,
            statusCode: response.statusCode,
            headers: responseHeaders,
            error: 'response_too_large',
          };
        }
      }

      // NOTE: httpcloak sometimes returns text as function, sometimes as property
      const textValue = response.text as string | (() => string);
      const html = typeof textValue === 'function' ? textValue() : textValue;

      const bodySize = html ? Buffer.byteLength(html, 'utf8') : 0;
      if (bodySize > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url, size: bodySize, limit: MAX_RESPONSE_SIZE },
          'Response exceeds size limit'
        );
        return {
          success: false,
          statusCode: response.statusCode,
          headers: responseHeaders,
          error: 'response_too_large',
        };
      }

      logger.debug(
        { url, statusCode: response.statusCode, bodyLength: html?.length || 0 },
        'httpcloak request complete'
      );

      return {
        success: response.ok,
        statusCode: response.statusCode,
        html,
        headers: responseHeaders,
      };
    } finally {
      timeout.cancel();
    }
  } catch (error) {
    logger.warn({ url, error: String(error) }, 'httpcloak request failed');
    return {
      success: false,
      statusCode: 0,
      headers: {},
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
