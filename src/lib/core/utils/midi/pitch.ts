import { blackKeyFlags, noteNames } from "./tables";

/** Octave number conventionally given to middle C (MIDI note 60). */
export const DEFAULT_OCTAVE_FOR_MIDDLE_C = 4;

function assertMidiNote(midi: number): void {
  if (!Number.isInteger(midi) || midi < 0 || midi > 127) {
    throw new RangeError(`MIDI note number must be between 0 and 127, got ${midi}`);
  }
}

/**
 * Converts MIDI note number to scientific pitch notation
 * @param midi - MIDI note number (0-127)
 * @param octaveForMiddleC - Octave number written for note 60
 * @returns Note name with octave (e.g., "C4", "A#3")
 *
 * @example
 * ```typescript
 * midiToNoteName(60); // "C4"
 * midiToNoteName(60, 3); // "C3"
 * midiToNoteName(61); // "C#4"
 * ```
 */
export function midiToNoteName(
  midi: number,
  octaveForMiddleC: number = DEFAULT_OCTAVE_FOR_MIDDLE_C
): string {
  assertMidiNote(midi);

  const octave = Math.floor(midi / 12) + (octaveForMiddleC - 5);
  return `${noteNames[midi % 12]}${octave}`;
}

/**
 * Whether the note sits on a black key.
 *
 * @example
 * ```typescript
 * isBlackNote(61); // true  (C#4)
 * isBlackNote(64); // false (E4)
 * ```
 */
export function isBlackNote(midi: number): boolean {
  assertMidiNote(midi);

  return blackKeyFlags[midi % 12];
}

/** Whether the value is an integer MIDI note number. */
export function isValidMidiNote(midi: number): boolean {
  return Number.isInteger(midi) && midi >= 0 && midi <= 127;
}
