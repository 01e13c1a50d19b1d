/**
 * Types for the crawl module
 */
import type { FetchResult, RequestOptions } from '../fetch/types.js';

/** Settings for one run, collected once at startup. */
export interface CrawlConfig extends RequestOptions {
  probeLlmsTxt: boolean;
}

export type LlmsTxtStatus = 'found' | 'not_text' | 'not_found';

export interface LlmsTxtProbe {
  url: string;
  status: LlmsTxtStatus;
  statusCode: number | null;
  contentType: string;
  bytes: number;
  /** Present when status is 'found'. */
  content?: string;
  /** Failure cause when status is 'not_found'. */
  reason?: string;
}

export interface LlmsTxtEvent {
  type: 'llms_txt';
  probe: LlmsTxtProbe;
}

export interface PageEvent {
  type: 'page';
  result: FetchResult;
  /** false when the body is a non-markup type that was not scanned. */
  crawlable: boolean;
}

export interface CrawlSummary {
  type: 'summary';
  startUrl: string;
  pagesFetched: number;
  llmsTxtFound: boolean;
  success: boolean;
  durationMs: number;
}

export type CrawlEvent = LlmsTxtEvent | PageEvent | CrawlSummary;
