/**
 * Crawl orchestrator: AsyncGenerator that yields one event per run step
 */
import { fetchPage, isCrawlableContentType } from '../fetch/page-fetch.js';
import { probeLlmsTxt } from './llms-txt.js';
import type { CrawlConfig, CrawlEvent } from './types.js';
import { logger } from '../logger.js';

/**
 * Run one crawl of `startUrl`.
 *
 * Sequence:
 * 1. If `config.probeLlmsTxt`, probe `<origin>/llms.txt` and yield the outcome
 * 2. Fetch the start URL once and yield it with the links found on it
 * 3. Yield a summary
 *
 * Links are reported, never followed, so a run issues at most two requests.
 * Fetch failures are yielded as data; this generator does not throw for them.
 */
export async function* crawl(startUrl: string, config: CrawlConfig): AsyncGenerator<CrawlEvent> {
  const crawlStartTime = Date.now();
  const { probeLlmsTxt: shouldProbe, ...requestOptions } = config;
  let llmsTxtFound = false;

  if (shouldProbe) {
    const probe = await probeLlmsTxt(startUrl, requestOptions);
    llmsTxtFound = probe.status === 'found';
    yield { type: 'llms_txt', probe };
  }

  const result = await fetchPage(startUrl, requestOptions);
  const crawlable = result.success && isCrawlableContentType(result.contentType);
  if (result.success) {
    logger.info(
      { url: startUrl, bytes: result.bytes, links: result.links.length },
      crawlable ? 'Fetched start URL' : 'Skipping non-markup start URL'
    );
  } else {
    logger.warn({ url: startUrl, error: result.error }, 'Start URL fetch failed');
  }
  yield { type: 'page', result, crawlable };

  yield {
    type: 'summary',
    startUrl,
    pagesFetched: result.success ? 1 : 0,
    llmsTxtFound,
    success: result.success,
    durationMs: Date.now() - crawlStartTime,
  };
}
