/**
 * Crawl module barrel exports
 */
export { crawl } from './crawler.js';
export { extractLinks } from './link-extractor.js';
export { llmsTxtUrl, probeLlmsTxt } from './llms-txt.js';
export { normalizeTarget } from './target.js';
export { renderPageText } from './page-text.js';
export type {
  CrawlConfig,
  CrawlEvent,
  CrawlSummary,
  LlmsTxtEvent,
  LlmsTxtProbe,
  LlmsTxtStatus,
  PageEvent,
} from './types.js';
export type { TargetResult } from './target.js';
