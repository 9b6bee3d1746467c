import { MIDI_NOTE_COUNT } from "@/core/constants";

/**
 * Fixed 128-bit set of MIDI notes. Out-of-range notes read as clear and are
 * ignored on write.
 */
export class NoteBitset {
  private words = new Uint32Array(MIDI_NOTE_COUNT / 32);

  has(note: number): boolean {
    if (!inRange(note)) return false;
    return (this.words[note >>> 5] & (1 << (note & 31))) !== 0;
  }

  set(note: number, on = true): void {
    if (!inRange(note)) return;
    const bit = 1 << (note & 31);
    if (on) {
      this.words[note >>> 5] |= bit;
    } else {
      this.words[note >>> 5] &= ~bit;
    }
  }

  clear(note?: number): void {
    if (note === undefined) {
      this.words.fill(0);
      return;
    }
    this.set(note, false);
  }

  isEmpty(): boolean {
    return this.words.every((w) => w === 0);
  }

  /** Notes currently set, highest first. */
  notesDescending(): number[] {
    const out: number[] = [];
    for (let note = MIDI_NOTE_COUNT - 1; note >= 0; note--) {
      if (this.has(note)) out.push(note);
    }
    return out;
  }
}

function inRange(note: number): boolean {
  return Number.isInteger(note) && note >= 0 && note < MIDI_NOTE_COUNT;
}
