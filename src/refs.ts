import type {
  RenderOptions,
  TplDiagnostic,
  TplDiagnosticSink,
} from './types.js';

/**
 * Type definition for shared references.
 */
interface Refs {
  diagnosticSink: TplDiagnosticSink | null;
}

/**
 * Shared references used in multiple places.
 */
export const refs: Refs = {
  /**
   * Receiver for render-time diagnostics.
   * If `null`, diagnostics are written with `console.warn`.
   */
  diagnosticSink: null,
};

/**
 * Fallback sink used when neither the render call nor `refs` provide one.
 */
export const consoleDiagnosticSink: TplDiagnosticSink = (diagnostic: TplDiagnostic): void => {
  console.warn(`[whisker] ${diagnostic.message}`);
};

/**
 * Set or clear the shared diagnostic sink.
 * Process-wide: applies to every later render that passes no `onDiagnostic`
 * option, including templates parsed earlier. Use the per-call option to keep
 * renders isolated.
 * @param sink Callback receiving diagnostics, or `null` to restore console output.
 */
export function setTemplateDiagnosticSink (sink: TplDiagnosticSink | null): void {
  if (sink !== null && typeof sink !== 'function') {
    throw new TypeError('Invalid diagnostic sink');
  }

  refs.diagnosticSink = sink;
}

/**
 * Pick the sink for one render call: per-call option, shared sink, console.
 */
export function resolveDiagnosticSink (options?: RenderOptions): TplDiagnosticSink {
  return options?.onDiagnostic ?? refs.diagnosticSink ?? consoleDiagnosticSink;
}
