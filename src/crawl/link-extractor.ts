/**
 * Extract and normalize links from HTML
 */
import { parseHTML } from 'linkedom';

/** Catches href attributes the DOM parser drops in badly broken markup (tarpit output). */
const HREF_PATTERN = /href\s*=\s*["']([^"']+)["']/gi;

/**
 * Resolve an href against the base URL. Returns null for unparseable and
 * non-HTTP(S) targets. Fragments are stripped.
 */
function normalizeHref(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Extract absolute HTTP(S) URLs from HTML.
 *
 * `<a href>` anchors come first, in document order. A regex pass over the raw
 * markup then appends any other `href="..."` values it finds. Duplicates keep
 * their first position.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const links: string[] = [];
  const seen = new Set<string>();

  const add = (href: string | null | undefined): void => {
    const trimmed = href?.trim();
    if (!trimmed) return;
    const normalized = normalizeHref(trimmed, baseUrl);
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  };

  const { document } = parseHTML(html);
  for (const anchor of document.querySelectorAll('a[href]')) {
    add(anchor.getAttribute('href'));
  }

  for (const match of html.matchAll(HREF_PATTERN)) {
    add(match[1].replace(/&amp;/g, '&'));
  }

  return links;
}
