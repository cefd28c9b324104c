/*!
 * whisker
 *
 * Logic-light, Mustache-style template parser and renderer.
 *
 * Variables, sections, inverted sections and comments. Output is HTML-escaped
 * unless explicitly requested raw. No code execution from templates.
 *
 * Licensed under the MIT License.
 */

import type {
  RenderOptions,
} from './types.js';

import {
  Template,
} from './template.js';

import {
  TemplateParseError,
} from './template-error.js';

// re-export some functions
export {
  Template,
} from './template.js';

export {
  TemplateParseError,
} from './template-error.js';

export type {
  TemplateParseErrorReason,
} from './template-error.js';

export {
  DEFAULT_CLOSE_TAG,
  DEFAULT_OPEN_TAG,
  tplParse,
  tplRenderNodes,
} from './template-parser.js';

export {
  tplIsEmpty,
  tplResolve,
} from './template-runtime.js';

export {
  tplChainFrom,
  tplChainPush,
} from './context-chain.js';

export {
  escapeHtml,
  unescapeHtml,
} from './html-utils.js';

export {
  setTemplateDiagnosticSink,
} from './refs.js';

export type {
  RenderOptions,
  TplContextChain,
  TplDiagnostic,
  TplDiagnosticSink,
  TplLookupResult,
  TplNode,
  TplSectionNode,
  TplTextNode,
  TplVariableNode,
} from './types.js';

/**
 * Parse a template into a reusable `Template`.
 *
 * @param source - Template string.
 * @returns Parsed template.
 * @throws TemplateParseError with the line of the first syntax error.
 */
export function parseTemplate (source: string): Template {
  return Template.parse(source);
}

/**
 * Render a parsed template.
 *
 * @param template - Parsed template.
 * @param contexts - Root contexts, nearest first.
 * @param options - Render options.
 * @returns Rendered string.
 */
export function renderParsedTemplate (template: Template, contexts: readonly unknown[], options?: RenderOptions): string {
  return template.renderWith(contexts, options);
}

/**
 * Parse and render in one call. Parse errors are thrown.
 *
 * @param source - Template string.
 * @param contexts - Root contexts, nearest first.
 * @returns Rendered string.
 * @throws TemplateParseError on invalid templates.
 */
export function parseAndRender (source: string, ...contexts: unknown[]): string {
  return Template.parse(source).render(...contexts);
}

/**
 * Render a template string against the given root contexts.
 * Contexts are searched in order, so earlier ones shadow later ones.
 *
 * Never throws for a malformed template: the parse error's message
 * (e.g. `line 3: unmatched open tag`) is returned in place of the output.
 *
 * @param tpl - Template string.
 * @param contexts - Root contexts. May be nested. May be repeated.
 * @returns Rendered string or the parse error text.
 */
export function renderTemplate (tpl: string, ...contexts: unknown[]): string {
  let template: Template;
  try {
    template = Template.parse(tpl);
  } catch (err) {
    if (err instanceof TemplateParseError) return err.message;
    throw err;
  }
  return template.render(...contexts);
}
