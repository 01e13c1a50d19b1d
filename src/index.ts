/**
 * workshop-crawler - single-target demo crawler with optional llms.txt discovery.
 *
 * @module workshop-crawler
 */
export {
  crawl,
  extractLinks,
  llmsTxtUrl,
  probeLlmsTxt,
  normalizeTarget,
  renderPageText,
} from './crawl/index.js';
export {
  fetchPage,
  resolveProxy,
  isCrawlableContentType,
  httpRequest,
  closeAllSessions,
} from './fetch/index.js';
export type {
  CrawlConfig,
  CrawlEvent,
  CrawlSummary,
  LlmsTxtEvent,
  LlmsTxtProbe,
  LlmsTxtStatus,
  PageEvent,
  TargetResult,
} from './crawl/index.js';
export type { FetchResult, FetchError, RequestOptions, HttpResponse } from './fetch/index.js';
