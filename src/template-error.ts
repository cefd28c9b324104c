/**
 * Reasons a template can fail to parse.
 */
export type TemplateParseErrorReason =
  | 'unmatched-open-tag'
  | 'unmatched-close-tag'
  | 'empty-tag'
  | 'interleaved-close-tag'
  | 'unterminated-section';

/**
 * Thrown by the parser on the first syntax error. Parsing never recovers.
 *
 * @example
 * ```ts
 * try {
 *   parseTemplate('{{#a}}x{{/b}}');
 * } catch (err) {
 *   // err.message === 'line 1: interleaved closing tag: b (expected a)'
 * }
 * ```
 */
export class TemplateParseError extends Error {
  readonly line: number;
  readonly reason: TemplateParseErrorReason;
  readonly detail: string;

  constructor (line: number, reason: TemplateParseErrorReason, detail: string) {
    super(`line ${line}: ${detail}`);
    this.name = 'TemplateParseError';
    this.line = line;
    this.reason = reason;
    this.detail = detail;
  }
}
