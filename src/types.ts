/**
 * Plain text node: rendered verbatim.
 */
export interface TplTextNode {
  readonly type: 'text';
  readonly value: string;
}

/**
 * Variable node for inserting a value from the context chain.
 * - name: Identifier, dot-path (e.g. "user.name") or `.` for the current context.
 * - mode:
 *   - 'escape': HTML-escape the stringified value (`{{ name }}`)
 *   - 'raw': insert the stringified value as-is (`{{{ name }}}` or `{{& name }}`)
 */
export interface TplVariableNode {
  readonly type: 'variable';
  readonly name: string;
  readonly mode: 'escape' | 'raw';
}

/**
 * Section node (`{{# name }}...{{/ name }}` or inverted `{{^ name }}...{{/ name }}`).
 */
export interface TplSectionNode {
  readonly type: 'section';
  readonly name: string;
  readonly inverted: boolean;
  /** 1-based line of the opening tag. */
  readonly startLine: number;
  readonly children: readonly TplNode[];
}

/** Union of all AST node types. */
export type TplNode = TplTextNode | TplVariableNode | TplSectionNode;

/**
 * Internal parser frame for an open section.
 * `children` is the same array the section node exposes read-only.
 */
export interface SectionFrame {
  node: TplSectionNode;
  children: TplNode[];
}

/**
 * Persistent context chain, nearest entry first. `null` is the empty chain.
 */
export type TplContextChain = TplContextLink | null;

export interface TplContextLink {
  readonly value: unknown;
  readonly next: TplContextChain;
}

/**
 * Outcome of looking up a single name.
 * `malformed` means the lookup itself failed (e.g. a revoked proxy threw).
 */
export type TplLookupResult =
  | { kind: 'found', value: unknown }
  | { kind: 'not-found' }
  | { kind: 'malformed', error: unknown };

/**
 * Lookup capability of a single context value.
 */
export interface TplLookupCapability {
  kind: 'record' | 'mapping';
  lookup: (name: string) => TplLookupResult;
}

/**
 * Render-time problem reported through the diagnostic sink instead of being thrown.
 */
export interface TplDiagnostic {
  kind: 'malformed-lookup' | 'unprintable-value';
  /** Tag name that was being resolved or printed. */
  name: string;
  error: unknown;
  message: string;
}

export type TplDiagnosticSink = (diagnostic: TplDiagnostic) => void;

/**
 * Per-render environment passed down the tree walk.
 */
export interface TplRenderEnv {
  report: TplDiagnosticSink;
}

export interface RenderOptions {
  /** Receives render-time diagnostics for this call only. */
  onDiagnostic?: TplDiagnosticSink;
}
