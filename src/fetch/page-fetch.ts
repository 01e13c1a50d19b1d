/**
 * Single-attempt page fetch that reports failures as data.
 */
import { httpRequest } from './http-client.js';
import { extractLinks } from '../crawl/link-extractor.js';
import { logger } from '../logger.js';
import type { FetchError, FetchResult, RequestOptions } from './types.js';

/**
 * Resolve proxy URL from explicit option or environment variables.
 * Priority: explicit > WORKSHOP_CRAWLER_PROXY > HTTPS_PROXY > HTTP_PROXY
 */
export function resolveProxy(explicit?: string): string | undefined {
  return (
    explicit ||
    process.env.WORKSHOP_CRAWLER_PROXY ||
    process.env.HTTPS_PROXY ||
    process.env.HTTP_PROXY
  );
}

/**
 * Whether a Content-Type is worth printing and scanning for links.
 * Stylesheets are text but never carry anchors.
 */
export function isCrawlableContentType(contentType: string): boolean {
  const ct = contentType.toLowerCase();
  if (ct.includes('text/css')) return false;
  return ct.includes('html') || ct.includes('xml') || ct.includes('text');
}

function failResult(
  url: string,
  startTime: number,
  error: FetchError,
  errorMessage: string,
  statusCode: number | null = null,
  contentType = ''
): FetchResult {
  return {
    success: false,
    url,
    latencyMs: Date.now() - startTime,
    statusCode,
    contentType,
    bytes: 0,
    body: '',
    links: [],
    error,
    errorMessage,
  };
}

/**
 * Fetch one URL exactly once. Never throws: network errors, non-2xx statuses
 * and unparseable URLs all come back as `success: false`.
 */
export async function fetchPage(url: string, options: RequestOptions = {}): Promise<FetchResult> {
  const startTime = Date.now();

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return failResult(url, startTime, 'invalid_url', `Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return failResult(url, startTime, 'invalid_url', `Unsupported protocol: ${parsed.protocol}`);
  }

  const headers: Record<string, string> = options.userAgent
    ? { 'User-Agent': options.userAgent }
    : {};
  const response = await httpRequest(
    parsed.href,
    headers,
    options.preset,
    options.timeout,
    resolveProxy(options.proxy)
  );
  const contentType = response.headers['content-type'] ?? '';

  if (response.error === 'response_too_large') {
    return failResult(
      url,
      startTime,
      'response_too_large',
      'Response exceeds size limit',
      response.statusCode,
      contentType
    );
  }

  if (response.statusCode === 0) {
    return failResult(
      url,
      startTime,
      'network_error',
      response.error ?? 'No response received'
    );
  }

  if (!response.success) {
    return failResult(
      url,
      startTime,
      'http_status_error',
      `HTTP ${response.statusCode}`,
      response.statusCode,
      contentType
    );
  }

  const body = response.html ?? '';
  const links = isCrawlableContentType(contentType) ? extractLinks(body, parsed.href) : [];

  logger.debug(
    { url, statusCode: response.statusCode, contentType, links: links.length },
    'Page fetched'
  );

  return {
    success: true,
    url,
    latencyMs: Date.now() - startTime,
    statusCode: response.statusCode,
    contentType,
    bytes: Buffer.byteLength(body, 'utf8'),
    body,
    links,
  };
}
