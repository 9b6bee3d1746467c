import type { NoteHit, Point, PointerSource } from "../types";

/**
 * What the tracker needs from its owner: hit-testing, note output and
 * repaint requests.
 */
export interface PointerTrackerDelegate {
  locateNote(position: Point): NoteHit;
  /** Velocity to send for a hit, already scaled and clamped */
  eventVelocity(hit: NoteHit): number;
  noteOn(note: number, velocity: number): void;
  noteOff(note: number, velocity: number): void;
  repaintNote(note: number): void;
}

export function pointerSourceKey(source: PointerSource): string {
  return `${source.type}:${source.index}`;
}

/**
 * Hover and press state per pointer source. A note pressed by several
 * sources sounds once and is released when its last holder lets go.
 */
export class PointerTracker {
  private readonly hover = new Map<string, number>();
  private readonly press = new Map<string, number>();

  constructor(private readonly delegate: PointerTrackerDelegate) {}

  update(source: PointerSource, position: Point, isDown: boolean): void {
    const id = pointerSourceKey(source);
    const hit = this.delegate.locateNote(position);
    const newNote = hit.note;
    const oldNote = this.hover.get(id) ?? null;
    const oldNoteDown = this.press.get(id) ?? null;
    const velocity = this.delegate.eventVelocity(hit);

    if (oldNote !== newNote) {
      if (oldNote !== null) this.delegate.repaintNote(oldNote);
      if (newNote !== null) this.delegate.repaintNote(newNote);

      if (newNote === null) {
        this.hover.delete(id);
      } else {
        this.hover.set(id, newNote);
      }
    }

    if (isDown) {
      if (newNote === oldNoteDown) return;

      if (oldNoteDown !== null) {
        this.press.delete(id);
        if (!this.isPressed(oldNoteDown)) {
          this.delegate.noteOff(oldNoteDown, velocity);
        }
      }

      if (newNote !== null) {
        const alreadyHeld = this.isPressed(newNote);
        this.press.set(id, newNote);
        if (!alreadyHeld) {
          this.delegate.noteOn(newNote, velocity);
        }
      }
      return;
    }

    if (oldNoteDown === null) return;

    this.press.delete(id);
    if (!this.isPressed(oldNoteDown)) {
      this.delegate.noteOff(oldNoteDown, velocity);
    }
  }

  isHovered(note: number): boolean {
    for (const n of this.hover.values()) {
      if (n === note) return true;
    }
    return false;
  }

  isPressed(note: number): boolean {
    for (const n of this.press.values()) {
      if (n === note) return true;
    }
    return false;
  }

  getHoverNote(source: PointerSource): number | null {
    return this.hover.get(pointerSourceKey(source)) ?? null;
  }

  getPressNote(source: PointerSource): number | null {
    return this.press.get(pointerSourceKey(source)) ?? null;
  }

  /** Number of sources holding a note down */
  get pressCount(): number {
    return this.press.size;
  }

  /**
   * Forget every hover and press entry.
   * @returns The distinct notes that were held, in press order
   */
  releaseAll(): number[] {
    const held = [...new Set(this.press.values())];
    this.press.clear();
    this.hover.clear();
    return held;
  }
}
