/**
 * In-process stand-in for a website, served through a mocked httpRequest.
 */
import type { HttpResponse } from '../fetch/http-client.js';

export type FakeRoute =
  | { status?: number; contentType?: string; body: string }
  | { networkError: string };

export interface FakeSite {
  /** Every URL requested, in order. */
  requests: string[];
  handler: (url: string) => Promise<HttpResponse>;
}

export function fakeSite(routes: Record<string, FakeRoute>): FakeSite {
  const requests: string[] = [];

  const handler = async (url: string): Promise<HttpResponse> => {
    requests.push(url);
    const route = routes[url];

    if (!route) {
      return {
        success: false,
        statusCode: 404,
        html: 'Not Found',
        headers: { 'content-type': 'text/plain' },
      };
    }

    if ('networkError' in route) {
      return { success: false, statusCode: 0, headers: {}, error: route.networkError };
    }

    const status = route.status ?? 200;
    return {
      success: status >= 200 && status < 300,
      statusCode: status,
      html: route.body,
      headers: route.contentType === undefined ? {} : { 'content-type': route.contentType },
    };
  };

  return { requests, handler };
}

export const TWO_LINK_PAGE = [
  '<!DOCTYPE html>',
  '<html>',
  '<head>',
  '<title>Demo</title>',
  '<style>',
  'body { color: red; }',
  '</style>',
  '</head>',
  '<body>',
  '<h1>Welcome</h1>',
  '<a href="/first">First</a>',
  '<a href="https://other.example.org/second#top">Second</a>',
  '</body>',
  '</html>',
].join('\n');
