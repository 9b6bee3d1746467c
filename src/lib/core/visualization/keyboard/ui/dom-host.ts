import { normalizeKey } from "../interactions/key-mapping";
import { pointerSourceKey } from "../interactions/pointer-tracker";
import type { KeyboardHost, Point, PointerSnapshot, PointerSource, Rect } from "../types";

/**
 * KeyboardHost for the browser. Repaint requests are coalesced into one
 * animation frame and the whole canvas is redrawn, so regions are ignored.
 */
export class DomKeyboardHost implements KeyboardHost {
  private readonly pointers = new Map<string, PointerSnapshot>();
  /** Logical key each held physical key produced when it went down */
  private readonly keysDown = new Map<string, string>();
  private frameHandle: number | null = null;
  private destroyed = false;

  constructor(private readonly repaint: () => void) {}

  requestRepaint(_region?: Rect): void {
    if (this.destroyed || this.frameHandle !== null) return;
    this.frameHandle = requestAnimationFrame(() => {
      this.frameHandle = null;
      this.repaint();
    });
  }

  startTimer(hz: number, callback: () => void): () => void {
    const id = setInterval(callback, 1000 / hz);
    return () => clearInterval(id);
  }

  getPointerSources(): PointerSnapshot[] {
    return [...this.pointers.values()].map((p) => ({
      source: { ...p.source },
      position: { ...p.position },
      isDragging: p.isDragging,
    }));
  }

  isKeyDown(key: string): boolean {
    const k = normalizeKey(key);
    for (const held of this.keysDown.values()) {
      if (held === k) return true;
    }
    return false;
  }

  trackPointer(source: PointerSource, position: Point, isDragging: boolean): void {
    this.pointers.set(pointerSourceKey(source), { source, position, isDragging });
  }

  forgetPointer(source: PointerSource): void {
    this.pointers.delete(pointerSourceKey(source));
  }

  isDragging(source: PointerSource): boolean {
    return this.pointers.get(pointerSourceKey(source))?.isDragging ?? false;
  }

  /**
   * Track a key by its physical `code`. The release clears whatever that
   * code pressed, even when a modifier changed `key` in between.
   */
  setKeyDown(key: string, down: boolean, code = ""): void {
    const id = code || normalizeKey(key);
    if (down) {
      this.keysDown.set(id, normalizeKey(key));
    } else {
      this.keysDown.delete(id);
    }
  }

  releaseAllKeys(): void {
    this.keysDown.clear();
  }

  destroy(): void {
    this.destroyed = true;
    if (this.frameHandle !== null) {
      cancelAnimationFrame(this.frameHandle);
      this.frameHandle = null;
    }
    this.pointers.clear();
    this.keysDown.clear();
  }
}
