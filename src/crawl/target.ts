/**
 * Operator-supplied target URL handling
 */

export type TargetResult = { ok: true; url: string } | { ok: false; reason: string };

/**
 * Normalize a target typed by the operator. A bare host such as
 * `localhost:8893/` gets `http://` prepended.
 */
export function normalizeTarget(input: string): TargetResult {
  const trimmed = input.trim();
  if (!trimmed) return { ok: false, reason: 'No URL provided' };

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return { ok: false, reason: `Malformed URL: ${trimmed}` };
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { ok: false, reason: `URL must use http:// or https:// (got ${parsed.protocol})` };
  }
  if (!parsed.hostname) {
    return { ok: false, reason: `URL has no host: ${trimmed}` };
  }

  return { ok: true, url: parsed.href };
}
