import type {
  RenderOptions,
  TplNode,
} from './types.js';

import {
  DEFAULT_CLOSE_TAG,
  DEFAULT_OPEN_TAG,
  tplParse,
  tplRenderNodes,
} from './template-parser.js';

import {
  tplChainFrom,
} from './context-chain.js';

import {
  resolveDiagnosticSink,
} from './refs.js';

/**
 * A parsed template. Immutable; render it as often as needed.
 */
export class Template {
  readonly nodes: readonly TplNode[];
  readonly openTag: string;
  readonly closeTag: string;

  private constructor (nodes: readonly TplNode[], openTag: string, closeTag: string) {
    this.nodes = nodes;
    this.openTag = openTag;
    this.closeTag = closeTag;
    Object.freeze(this);
  }

  /**
   * Parse template source with the default `{{` / `}}` delimiters.
   *
   * @throws TemplateParseError on the first syntax error.
   */
  static parse (source: string): Template {
    return new Template(tplParse(source, DEFAULT_OPEN_TAG, DEFAULT_CLOSE_TAG), DEFAULT_OPEN_TAG, DEFAULT_CLOSE_TAG);
  }

  /**
   * Render against zero or more root contexts. The first context is searched first.
   */
  render (...contexts: unknown[]): string {
    return this.renderWith(contexts);
  }

  /**
   * Render with per-call options.
   *
   * @param contexts - Root contexts, nearest first.
   * @param options - Render options.
   * @returns Rendered output.
   */
  renderWith (contexts: readonly unknown[], options?: RenderOptions): string {
    return tplRenderNodes(this.nodes, tplChainFrom(contexts), {
      report: resolveDiagnosticSink(options),
    });
  }
}
