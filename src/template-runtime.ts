/**
 * Internal runtime helpers shared by parser/render modules.
 */

import type {
  TplContextChain,
  TplDiagnosticSink,
  TplLookupResult,
} from './types.js';

import {
  tplChainEntries,
  tplChainPush,
} from './context-chain.js';

import {
  tplIsAbsent,
  tplLookupCapability,
  tplUnwrap,
} from './template-lookup.js';

const NOT_FOUND: TplLookupResult = { kind: 'not-found' };

/**
 * Describe a thrown value for diagnostics.
 */
export const tplErrorText = (error: unknown): string => (error instanceof Error) ? error.message : String(error);

/**
 * Look up a plain (dot-free) name across the chain, nearest entry first.
 * Entries without the name are skipped; a lookup that throws stops the scan.
 *
 * @param chain - Context chain.
 * @param name - Plain name or `.`.
 * @returns Lookup result.
 */
export const tplLookupName = (chain: TplContextChain, name: string): TplLookupResult => {
  for (const entry of tplChainEntries(chain)) {
    try {
      if (name === '.') {
        if (tplIsAbsent(entry)) continue;
        return { kind: 'found', value: entry };
      }
      const cap = tplLookupCapability(entry);
      if (!cap) continue;
      const res = cap.lookup(name);
      if (res.kind === 'not-found') continue;
      return res;
    } catch (error) {
      return { kind: 'malformed', error };
    }
  }
  return NOT_FOUND;
};

/**
 * Resolve a name (identifier, dot-path or `.`) against a context chain.
 *
 * Dot-paths resolve their first segment against the whole chain and the rest
 * against that result only; there is no backtracking to outer entries.
 * Malformed lookups are reported to `report` and degrade to not-found.
 *
 * @param chain - Context chain.
 * @param name - Tag name.
 * @param report - Diagnostic sink.
 * @returns Found value or not-found.
 */
export const tplResolve = (chain: TplContextChain, name: string, report: TplDiagnosticSink): TplLookupResult => {
  const dot = name.indexOf('.');
  if (name !== '.' && dot !== -1) {
    const head = tplResolve(chain, name.slice(0, dot), report);
    const scoped = tplChainPush(null, head.kind === 'found' ? head.value : undefined);
    return tplResolve(scoped, name.slice(dot + 1), report);
  }

  const res = tplLookupName(chain, name);
  if (res.kind === 'malformed') {
    report({
      kind: 'malformed-lookup',
      name,
      error: res.error,
      message: `Failed to look up "${name}": ${tplErrorText(res.error)}`,
    });
    return NOT_FOUND;
  }
  return res;
};

/**
 * Emptiness, the only truthiness rule used by sections:
 * not found, absent, `false` or a zero-length array.
 * Everything else, including 0, '' and empty records, is non-empty.
 *
 * @param res - Lookup result.
 * @returns Whether the value counts as empty.
 */
export const tplIsEmpty = (res: TplLookupResult): boolean => {
  if (res.kind !== 'found') return true;
  const v = tplUnwrap(res.value);
  if (v === undefined || v === null) return true;
  if (v === false) return true;
  if (Array.isArray(v)) return v.length === 0;
  return false;
};

/**
 * Stringify a resolved value for output.
 * Absent values (`null`, `undefined`, a collected `WeakRef`) become '' rather than
 * their default text, even when the key itself exists.
 * May throw if the value's own conversion throws.
 *
 * @param v - Resolved value.
 * @returns Output text.
 */
export const tplStringify = (v: unknown): string => {
  const u = tplUnwrap(v);
  if (typeof u === 'string') return u;
  if (u === undefined || u === null) return '';
  return String(u);
};
