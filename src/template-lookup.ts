import type {
  TplLookupCapability,
  TplLookupResult,
} from './types.js';

const NOT_FOUND: TplLookupResult = { kind: 'not-found' };

/**
 * Follow reference indirection (`WeakRef`) down to the underlying value.
 * A collected reference yields undefined.
 *
 * @param v - Value to unwrap.
 * @returns The referenced value.
 */
export const tplUnwrap = (v: unknown): unknown => {
  let cur = v;
  while (cur instanceof WeakRef) {
    cur = cur.deref();
  }
  return cur;
};

/**
 * Whether a value is absent after unwrapping (null, undefined or a collected reference).
 */
export const tplIsAbsent = (v: unknown): boolean => {
  const u = tplUnwrap(v);
  return u === undefined || u === null;
};

/**
 * Whether an unwrapped value can serve as a section context on its own
 * (a record or a map, but not an array).
 */
export const tplIsRecordOrMap = (v: unknown): v is object => typeof v === 'object' && v !== null && !Array.isArray(v);

/**
 * Record-like lookup: own data properties only.
 *
 * Security: accessors are never executed and the prototype chain is ignored,
 * so `{{ constructor }}` or a getter resolve as missing.
 *
 * @param obj - Record to read from.
 * @returns Lookup capability.
 */
export const tplRecordLookup = (obj: object): TplLookupCapability => ({
  kind: 'record',
  lookup: (name) => {
    try {
      const desc = Object.getOwnPropertyDescriptor(obj, name);
      if (!desc || !('value' in desc)) return NOT_FOUND;
      return { kind: 'found', value: desc.value };
    } catch (error) {
      return { kind: 'malformed', error };
    }
  },
});

/**
 * Mapping-like lookup: string keys of a `Map`.
 *
 * @param map - Map to read from.
 * @returns Lookup capability.
 */
export const tplMapLookup = (map: Map<unknown, unknown>): TplLookupCapability => ({
  kind: 'mapping',
  lookup: (name) => {
    try {
      if (!map.has(name)) return NOT_FOUND;
      return { kind: 'found', value: map.get(name) };
    } catch (error) {
      return { kind: 'malformed', error };
    }
  },
});

/**
 * Pick the lookup capability for a context entry, or null when the value
 * cannot hold named members (scalars, arrays, functions, absent values).
 * Throws if the value cannot be inspected at all (revoked proxies).
 *
 * @param v - Context entry.
 * @returns Capability or null.
 */
export const tplLookupCapability = (v: unknown): TplLookupCapability | null => {
  const u = tplUnwrap(v);
  if (u instanceof Map) return tplMapLookup(u);
  if (tplIsRecordOrMap(u)) return tplRecordLookup(u);
  return null;
};
