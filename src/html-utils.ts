const ESCAPES: Record<string, string> = {
  '"': '&quot;',
  "'": '&apos;',
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

/**
 * Escape a string to be safely inserted into HTML text or attribute contexts.
 *
 * Encodes `"`, `'`, `&`, `<` and `>` as `&quot;`, `&apos;`, `&amp;`, `&lt;`
 * and `&gt;`. Every other character is passed through unchanged.
 *
 * @param str The string to escape.
 * @returns The escaped string.
 *
 * @example
 * ```ts
 * const safeString = escapeHtml('<a href="x">Tom & Jerry</a>');
 * // safeString will be '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&lt;/a&gt;'
 * ```
 */
export function escapeHtml (str: string): string {
  return str.replace(/["'&<>]/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * Unescape a string from HTML into plain text.
 *
 * Only the entities `escapeHtml` produces are decoded, plus the numeric `&#39;`.
 *
 * @param str The string to unescape.
 * @returns The unescaped string.
 */
export function unescapeHtml (str: string): string {
  return str.replace(/&(amp|lt|gt|quot|apos|#39);/gi, (m: string, ent: string) => {
    switch (ent.toLowerCase()) {
      case 'amp': return '&';
      case 'lt': return '<';
      case 'gt': return '>';
      case 'quot': return '"';
      case 'apos':
      case '#39': return "'";
      default: return m;
    }
  });
}
