import type {
  SectionFrame,
  TplContextChain,
  TplNode,
  TplRenderEnv,
  TplSectionNode,
} from './types.js';

import {
  TemplateParseError,
} from './template-error.js';

import {
  tplChainHead,
  tplChainPush,
} from './context-chain.js';

import {
  tplIsRecordOrMap,
  tplUnwrap,
} from './template-lookup.js';

import {
  tplErrorText,
  tplIsEmpty,
  tplResolve,
} from './template-runtime.js';

/**
 * Open a section frame during parsing and return it for the section stack.
 *
 * @param name - Section name.
 * @param inverted - True for `{{^ name }}`.
 * @param startLine - Line of the opening tag.
 * @returns New frame whose children list receives the section body.
 */
export const tplParseSectionOpen = (name: string, inverted: boolean, startLine: number): SectionFrame => {
  const children: TplNode[] = [];
  const node: TplSectionNode = {
    type: 'section',
    name,
    inverted,
    startLine,
    children,
  };
  return { node, children };
};

/**
 * Close the innermost section during parsing.
 *
 * @param name - Name given in the closing tag.
 * @param line - Current line, for errors.
 * @param sectionStack - Stack of open section frames.
 * @returns The closed section node, to be appended to the enclosing list.
 * @throws TemplateParseError when no section is open or the name does not match.
 */
export const tplParseSectionClose = (name: string, line: number, sectionStack: SectionFrame[]): TplSectionNode => {
  const top = sectionStack.pop();
  if (!top) {
    throw new TemplateParseError(line, 'unmatched-close-tag', `unmatched close tag: ${name}`);
  }
  if (top.node.name !== name) {
    throw new TemplateParseError(line, 'interleaved-close-tag', `interleaved closing tag: ${name} (expected ${top.node.name})`);
  }
  Object.freeze(top.children);
  return top.node;
};

/**
 * Compute the context of every rendering pass of a section.
 * - Inverted: one pass with the enclosing context, only if the value is empty.
 * - Arrays: one pass per element.
 * - Records and maps: one pass with the resolved value.
 * - Other truthy values: one pass with the enclosing context; the value only gates.
 *
 * @param n - Section node.
 * @param chain - Enclosing context chain.
 * @param env - Render environment.
 * @returns Contexts to prepend, one per pass (empty for no output).
 */
export const tplSectionContexts = (n: TplSectionNode, chain: TplContextChain, env: TplRenderEnv): unknown[] => {
  const res = tplResolve(chain, n.name, env.report);
  const empty = tplIsEmpty(res);
  if (empty !== n.inverted) return [];

  const enclosing = tplChainHead(chain);
  if (n.inverted || res.kind !== 'found') return [ enclosing ];

  const v = tplUnwrap(res.value);
  if (Array.isArray(v)) return [ ...v ];
  if (tplIsRecordOrMap(v)) return [ res.value ];
  return [ enclosing ];
};

/**
 * Render a section node.
 *
 * A value that cannot even be inspected (e.g. a revoked proxy) is reported and
 * the section renders nothing.
 *
 * @param n - The AST node to render.
 * @param chain - Context chain of the enclosing scope.
 * @param env - Render environment.
 * @param renderNodes - Recursive renderer for child node lists.
 * @returns Rendered string output for this section.
 */
export const tplRenderSectionNode = (
  n: TplSectionNode,
  chain: TplContextChain,
  env: TplRenderEnv,
  renderNodes: (nodes: readonly TplNode[], chain: TplContextChain, env: TplRenderEnv) => string,
): string => {
  let contexts: unknown[];
  try {
    contexts = tplSectionContexts(n, chain, env);
  } catch (error) {
    env.report({
      kind: 'malformed-lookup',
      name: n.name,
      error,
      message: `Failed to inspect section "${n.name}": ${tplErrorText(error)}`,
    });
    return '';
  }

  let out = '';
  for (const ctx of contexts) {
    out += renderNodes(n.children, tplChainPush(chain, ctx), env);
  }
  return out;
};
