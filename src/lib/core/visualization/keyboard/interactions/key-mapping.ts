import { BASE_OCTAVE_MAX, BASE_OCTAVE_MIN } from "@/core/constants";
import { clampSetting } from "@/core/utils";
import { NoteBitset } from "@/core/utils/note-bitset";
import { isValidMidiNote } from "@/core/utils/midi/pitch";
import type { KeyBinding } from "../types";

const DEFAULT_BASE_OCTAVE = 6;

export interface KeyNoteSink {
  noteOn(note: number): void;
  noteOff(note: number): void;
}

/**
 * Single characters compare case-insensitively ("A" with shift held is
 * still "a"); named keys such as "Enter" are kept as they are.
 */
export function normalizeKey(key: string): string {
  return [...key].length === 1 ? key.toLowerCase() : key;
}

/**
 * Computer keyboard to note table, plus the set of notes currently held
 * through it.
 */
export class KeyMapping {
  private bindings: KeyBinding[] = [];
  private readonly pressed = new NoteBitset();
  private baseOctave = DEFAULT_BASE_OCTAVE;

  constructor(bindings: readonly KeyBinding[], baseOctave: number, private readonly debug = false) {
    this.baseOctave = this.clampOctave(baseOctave);
    for (const binding of bindings) {
      this.bindKey(binding.key, binding.offset);
    }
  }

  /** Bind a key to an offset from C, replacing whatever held that offset */
  bindKey(key: string, offset: number): void {
    this.unbindOffset(offset);
    this.bindings.push({ key: normalizeKey(key), offset });
  }

  unbindOffset(offset: number): void {
    this.bindings = this.bindings.filter((b) => b.offset !== offset);
  }

  /**
   * Drop every binding.
   * @returns Notes that were held, highest first
   */
  clear(): number[] {
    const held = this.releaseAll();
    this.bindings = [];
    return held;
  }

  getBindings(): KeyBinding[] {
    return this.bindings.map((b) => ({ ...b }));
  }

  setBaseOctave(octave: number): void {
    this.baseOctave = this.clampOctave(octave);
  }

  getBaseOctave(): number {
    return this.baseOctave;
  }

  isBound(key: string): boolean {
    const k = normalizeKey(key);
    return this.bindings.some((b) => b.key === k);
  }

  isPressed(note: number): boolean {
    return this.pressed.has(note);
  }

  /**
   * Reconcile held notes with the current key states, last binding first.
   * @returns Whether any note started or stopped
   */
  keyStateChanged(isKeyDown: (key: string) => boolean, sink: KeyNoteSink): boolean {
    let used = false;

    for (let i = this.bindings.length - 1; i >= 0; i--) {
      const binding = this.bindings[i];
      const note = 12 * this.baseOctave + binding.offset;
      if (!isValidMidiNote(note)) continue;

      if (isKeyDown(binding.key)) {
        if (!this.pressed.has(note)) {
          this.pressed.set(note);
          sink.noteOn(note);
          used = true;
        }
      } else if (this.pressed.has(note)) {
        this.pressed.clear(note);
        sink.noteOff(note);
        used = true;
      }
    }

    return used;
  }

  /**
   * Forget held notes without touching the bindings.
   * @returns Notes that were held, highest first
   */
  releaseAll(): number[] {
    const held = this.pressed.notesDescending();
    this.pressed.clear();
    return held;
  }

  private clampOctave(octave: number): number {
    return clampSetting(octave, BASE_OCTAVE_MIN, BASE_OCTAVE_MAX, {
      name: "Base octave",
      fallback: this.baseOctave,
      integer: true,
      debug: this.debug,
    });
  }
}
