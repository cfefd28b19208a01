/**
 * Plain-text context around a match
 */

export const DEFAULT_CONTEXT_SIZE = 45;

/**
 * Two lines: the text around the span (line breaks shown as spaces, `...`
 * where the text was cut) and a marker line with `^` under the span.
 */
export function buildPlainTextContext(
  fromPos: number,
  toPos: number,
  text: string,
  contextSize: number = DEFAULT_CONTEXT_SIZE
): string {
  const from = Math.min(Math.max(fromPos, 0), text.length);
  const to = Math.min(Math.max(toPos, from), text.length);
  const start = Math.max(0, from - contextSize);
  const end = Math.min(text.length, to + contextSize);

  const prefix = start > 0 ? '...' : '';
  const suffix = end < text.length ? '...' : '';
  const snippet = text.slice(start, end).replace(/[\r\n]/g, ' ');

  const marker = ' '.repeat(prefix.length + from - start) + '^'.repeat(Math.max(1, to - from));
  return `${prefix}${snippet}${suffix}\n${marker}`;
}
