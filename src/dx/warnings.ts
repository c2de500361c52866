import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type BindingWarningCode =
  /** Fast path requested, but a gate failed; only the slow path is emitted. */
  | 'FAST_PATH_FALLBACK'
  /** A result could not be converted; the return sink was left unset. */
  | 'RETURN_VALUE_DROPPED';

export type BindingWarning = {
  code: BindingWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * This must never throw and must not print unless debug logging is enabled.
 */
export function warn(w: BindingWarning) {
  try {
    traceWarn('warning', { code: w.code, message: w.message });
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    logWarn(`warning(${w.code}): ${w.message}${hint}`);
  } catch {
    // Never throw from warnings.
  }
}
