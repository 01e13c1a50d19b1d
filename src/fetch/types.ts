/**
 * Shared types for the fetch module
 */

export type FetchError = 'network_error' | 'http_status_error' | 'response_too_large' | 'invalid_url';

/** Request settings threaded from the CLI down to the HTTP client. */
export interface RequestOptions {
  preset?: string;
  timeout?: number;
  proxy?: string;
  userAgent?: string;
}

export interface FetchResult {
  success: boolean;
  /** The URL that was requested. */
  url: string;
  latencyMs: number;
  /** null when no response was received. */
  statusCode: number | null;
  /** Raw Content-Type header, '' when the server sent none. */
  contentType: string;
  /** Body size in bytes (UTF-8). */
  bytes: number;
  body: string;
  /** Outbound links in document order; empty for non-markup bodies and failures. */
  links: string[];

  // Error fields
  error?: FetchError;
  errorMessage?: string;
}
