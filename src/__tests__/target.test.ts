import { describe, it, expect } from 'vitest';
import { normalizeTarget } from '../crawl/target.js';

describe('normalizeTarget', () => {
  it('accepts http and https URLs unchanged apart from normalization', () => {
    expect(normalizeTarget('https://example.com/docs')).toEqual({
      ok: true,
      url: 'https://example.com/docs',
    });
    expect(normalizeTarget('  http://localhost:8893  ')).toEqual({
      ok: true,
      url: 'http://localhost:8893/',
    });
  });

  it('prepends http:// when no scheme is given', () => {
    expect(normalizeTarget('localhost:8893/maze')).toEqual({
      ok: true,
      url: 'http://localhost:8893/maze',
    });
  });

  it('rejects empty input', () => {
    expect(normalizeTarget('   ')).toEqual({ ok: false, reason: 'No URL provided' });
  });

  it('rejects non-HTTP schemes', () => {
    expect(normalizeTarget('ftp://example.com/file')).toEqual({
      ok: false,
      reason: 'URL must use http:// or https:// (got ftp:)',
    });
  });

  it('rejects malformed URLs', () => {
    expect(normalizeTarget('http://exa mple.com')).toEqual({
      ok: false,
      reason: 'Malformed URL: http://exa mple.com',
    });
  });
});
