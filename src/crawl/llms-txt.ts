/**
 * llms.txt discovery at a site's root
 */
import { fetchPage } from '../fetch/page-fetch.js';
import { logger } from '../logger.js';
import type { RequestOptions } from '../fetch/types.js';
import type { LlmsTxtProbe } from './types.js';

/** `<origin>/llms.txt` for any URL on the site. Throws on an unparseable URL. */
export function llmsTxtUrl(target: string): string {
  return new URL('/llms.txt', new URL(target).origin).href;
}

/**
 * Fetch llms.txt once. A successful response only counts as found when it is
 * served as text and has a non-blank body. Never throws.
 */
export async function probeLlmsTxt(
  target: string,
  options: RequestOptions = {}
): Promise<LlmsTxtProbe> {
  let url: string;
  try {
    url = llmsTxtUrl(target);
  } catch {
    return {
      url: target,
      status: 'not_found',
      statusCode: null,
      contentType: '',
      bytes: 0,
      reason: `Invalid URL: ${target}`,
    };
  }

  const result = await fetchPage(url, options);
  const base = {
    url,
    statusCode: result.statusCode,
    contentType: result.contentType,
    bytes: result.bytes,
  };

  if (!result.success) {
    logger.debug({ url, error: result.errorMessage }, 'No llms.txt');
    return { ...base, status: 'not_found', reason: result.errorMessage };
  }

  if (!result.contentType.toLowerCase().includes('text') || !result.body.trim()) {
    logger.debug({ url, contentType: result.contentType }, 'llms.txt is not usable text');
    return { ...base, status: 'not_text' };
  }

  logger.info({ url, bytes: result.bytes }, 'Found llms.txt');
  return { ...base, status: 'found', content: result.body };
}
