/**
 * Validation utilities for keyboard configuration.
 *
 * Setters never reject a value: it is coerced to the nearest valid one, and
 * the coercion is reported only when debugging is switched on.
 */

import { clamp } from "./math";

export interface ClampSettingOptions {
  /** Human-readable setting name used in the warning */
  name: string;
  /** Value used when the input is not a finite number */
  fallback: number;
  /** Round to the nearest integer before clamping */
  integer?: boolean;
  /** Log coerced values with console.warn */
  debug?: boolean;
  /** Log prefix */
  tag?: string;
}

/**
 * Coerce a numeric setting into [min, max].
 */
export function clampSetting(
  value: number,
  min: number,
  max: number,
  options: ClampSettingOptions
): number {
  const { name, fallback, integer = false, debug = false, tag = "[MidiKeyboard]" } = options;

  let result = Number.isFinite(value) ? value : fallback;
  if (integer) {
    result = Math.round(result);
  }
  result = clamp(result, min, max);

  if (debug && result !== value) {
    console.warn(
      `${tag} ${name} must be between ${min} and ${max}, got ${value}; using ${result}`
    );
  }

  return result;
}
