/**
 * Console rendering of fetched page bodies
 */

const STYLE_OPEN = '<style';
const STYLE_CLOSE = '</style>';

/** Whatever follows the last `</style>` on a line, trimmed. */
function afterStyleClose(line: string, lower: string): string {
  return line.slice(lower.lastIndexOf(STYLE_CLOSE) + STYLE_CLOSE.length).trim();
}

/**
 * Split a body into printable lines: blank lines dropped, trailing whitespace
 * removed, and everything inside `<style>` blocks skipped. Text after a
 * closing `</style>` on the same line is kept. `maxLines` bounds the output
 * to an excerpt.
 */
export function renderPageText(body: string, maxLines?: number): string[] {
  const lines: string[] = [];
  let inStyle = false;

  for (const rawLine of body.split(/\r?\n/)) {
    if (maxLines !== undefined && lines.length >= maxLines) break;

    const line = rawLine.trimEnd();
    if (!line) continue;
    const lower = line.toLowerCase();

    if (lower.includes(STYLE_OPEN) || inStyle) {
      inStyle = true;
      if (lower.includes(STYLE_CLOSE)) {
        inStyle = false;
        const after = afterStyleClose(line, lower);
        if (after) lines.push(after);
      }
      continue;
    }

    lines.push(line);
  }

  return lines;
}
