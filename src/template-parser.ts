import type {
  SectionFrame,
  TplContextChain,
  TplNode,
  TplRenderEnv,
} from './types.js';

import {
  escapeHtml,
} from './html-utils.js';

import {
  TemplateParseError,
} from './template-error.js';

import {
  tplParseSectionClose,
  tplParseSectionOpen,
  tplRenderSectionNode,
} from './template-section.js';

import {
  tplErrorText,
  tplResolve,
  tplStringify,
} from './template-runtime.js';

export const DEFAULT_OPEN_TAG = '{{';
export const DEFAULT_CLOSE_TAG = '}}';

/**
 * Count line feeds in `s` between `from` (inclusive) and `to` (exclusive).
 */
const tplCountLines = (s: string, from: number, to: number): number => {
  let n = 0;
  for (let i = s.indexOf('\n', from); i !== -1 && i < to; i = s.indexOf('\n', i + 1)) n++;
  return n;
};

/**
 * Parse a template string to an AST.
 *
 * Recognized syntax (with the default delimiters):
 * - Variables: {{ key }} (escaped), {{{ key }}} and {{& key }} (raw)
 * - Sections: {{# key }}...{{/ key }}, inverted {{^ key }}...{{/ key }}
 * - Comments: {{! anything }}
 *
 * A `{` body without a closing `}` (e.g. `{{ {name }}`) produces no node.
 * Unlike a lenient parser, any syntax error aborts parsing: there is no partial tree.
 * A line break right after a section opening tag is dropped so standalone section
 * lines do not leave blank lines behind.
 *
 * @param tpl - Template source string.
 * @param openTag - Opening delimiter.
 * @param closeTag - Closing delimiter.
 * @returns Frozen AST node list representing the parsed template.
 * @throws TemplateParseError on the first syntax error, with its 1-based line.
 */
export const tplParse = (tpl: string, openTag: string = DEFAULT_OPEN_TAG, closeTag: string = DEFAULT_CLOSE_TAG): readonly TplNode[] => {
  if (openTag.length === 0 || closeTag.length === 0) {
    throw new TypeError('Invalid template delimiters');
  }

  const root: TplNode[] = [];
  const sectionStack: SectionFrame[] = [];
  const tplPush = (n: TplNode): void => {
    const top = sectionStack[sectionStack.length - 1];
    (top ? top.children : root).push(n);
  };

  let idx = 0;
  let line = 1;
  for (;;) {
    const start = tpl.indexOf(openTag, idx);
    if (start === -1) {
      const open = sectionStack[sectionStack.length - 1];
      if (open) {
        throw new TemplateParseError(open.node.startLine, 'unterminated-section', `section ${open.node.name} has no closing tag`);
      }
      if (idx < tpl.length) tplPush({ type: 'text', value: tpl.slice(idx) });
      break;
    }
    if (start > idx) tplPush({ type: 'text', value: tpl.slice(idx, start) });
    line += tplCountLines(tpl, idx, start);

    // {{{ ... }}} ends with an extra brace
    const bodyStart = start + openTag.length;
    const closeSeq = (tpl[bodyStart] === '{') ? '}' + closeTag : closeTag;
    const closeAt = tpl.indexOf(closeSeq, bodyStart);
    if (closeAt === -1) {
      throw new TemplateParseError(line, 'unmatched-open-tag', 'unmatched open tag');
    }
    const end = closeAt + closeSeq.length;
    line += tplCountLines(tpl, bodyStart, end);
    idx = end;

    const body = tpl.slice(bodyStart, end - closeTag.length).trim();
    if (body.length === 0) {
      throw new TemplateParseError(line, 'empty-tag', 'empty tag');
    }

    switch (body[0]) {
      case '!':
        // comment
        break;
      case '#':
      case '^': {
        const frame = tplParseSectionOpen(body.slice(1).trim(), body[0] === '^', line);
        if (tpl[idx] === '\n') {
          idx += 1;
          line++;
        } else if (tpl[idx] === '\r' && tpl[idx + 1] === '\n') {
          idx += 2;
          line++;
        }
        sectionStack.push(frame);
        break;
      }
      case '/': {
        const node = tplParseSectionClose(body.slice(1).trim(), line, sectionStack);
        tplPush(node);
        break;
      }
      case '&':
        tplPush({ type: 'variable', name: body.slice(1).trim(), mode: 'raw' });
        break;
      case '{':
        // a brace body without its closing brace renders nothing
        if (body.length > 1 && body.endsWith('}')) {
          tplPush({ type: 'variable', name: body.slice(1, -1).trim(), mode: 'raw' });
        }
        break;
      default:
        tplPush({ type: 'variable', name: body, mode: 'escape' });
    }
  }

  return Object.freeze(root);
};

/**
 * Render a list of nodes against a context chain.
 *
 * Variables:
 * 1) Resolve the name (not found renders nothing)
 * 2) Stringify the value
 * 3) Escape HTML unless mode === 'raw'
 *
 * Sections are rendered by tplRenderSectionNode(), which prepends one context
 * per pass and recurses into this function.
 *
 * @param nodes - AST node list to render.
 * @param chain - Context chain used for name resolution.
 * @param env - Render environment (diagnostic sink).
 * @returns Rendered string output.
 */
export const tplRenderNodes = (nodes: readonly TplNode[], chain: TplContextChain, env: TplRenderEnv): string => {
  let out = '';
  for (const n of nodes) {
    if (n.type === 'text') {
      out += n.value;
    } else if (n.type === 'variable') {
      const res = tplResolve(chain, n.name, env.report);
      if (res.kind !== 'found') continue;
      let str: string;
      try {
        str = tplStringify(res.value);
      } catch (error) {
        env.report({
          kind: 'unprintable-value',
          name: n.name,
          error,
          message: `Failed to print "${n.name}": ${tplErrorText(error)}`,
        });
        continue;
      }
      out += (n.mode === 'raw') ? str : escapeHtml(str);
    } else {
      out += tplRenderSectionNode(n, chain, env, tplRenderNodes);
    }
  }
  return out;
};
