import { SCROLL_BUTTON_SIZE } from "@/core/constants";
import { ListenerManager } from "@/core/state/utils/listener-manager";
import { clamp, clampSetting } from "@/core/utils";
import { clampNoteRange } from "../config";
import { keySpan, keyRect, type KeyLayout } from "../geometry/key-geometry";
import { noteAtKeyPosition, pointToNote } from "../geometry/hit-testing";
import { containsPoint } from "../utils/rect";
import type {
  NoteHit,
  NoteRange,
  Orientation,
  Point,
  Rect,
  ResolvedKeyboardConfig,
  ScrollButtons,
  ScrollDirection,
  WheelDelta,
} from "../types";

export type ViewportConfig = Pick<
  ResolvedKeyboardConfig,
  | "orientation"
  | "keyWidth"
  | "noteRange"
  | "lowestVisibleNote"
  | "scrollButtons"
  | "blackNoteWidthRatio"
  | "blackNoteLengthRatio"
  | "debug"
>;

const EMPTY_RECT: Rect = { x: 0, y: 0, width: 0, height: 0 };

/**
 * Which slice of the note range is on screen, and where the scroll buttons
 * sit. Every setter relayouts only when its value actually changes.
 */
export class ViewportController {
  private orientation: Orientation;
  private keyWidth: number;
  private rangeStart: number;
  private rangeEnd: number;
  /** Fractional lowest visible note */
  private firstKey: number;
  private canScroll: boolean;
  private blackNoteWidthRatio: number;
  private blackNoteLengthRatio: number;
  private readonly debug: boolean;

  private width = 0;
  private height = 0;
  private xOffset = 0;

  private scrollButtons: ScrollButtons = {
    down: { visible: false, bounds: { ...EMPTY_RECT } },
    up: { visible: false, bounds: { ...EMPTY_RECT } },
  };

  private readonly viewportListeners = new ListenerManager<[number]>("[ViewportController]");
  private readonly layoutListeners = new ListenerManager("[ViewportController]");

  constructor(config: ViewportConfig) {
    this.orientation = config.orientation;
    this.keyWidth = config.keyWidth;
    this.rangeStart = config.noteRange.low;
    this.rangeEnd = config.noteRange.high;
    this.firstKey = clamp(config.lowestVisibleNote, this.rangeStart, this.rangeEnd);
    this.canScroll = config.scrollButtons;
    this.blackNoteWidthRatio = config.blackNoteWidthRatio;
    this.blackNoteLengthRatio = config.blackNoteLengthRatio;
    this.debug = config.debug;
  }

  // ------------------------------
  // Listeners
  // ------------------------------

  /**
   * Called with the new (integer) lowest visible note whenever it moves.
   * @returns Unsubscribe function
   */
  onViewportChange(listener: (lowestVisibleNote: number) => void): () => void {
    return this.viewportListeners.add(listener);
  }

  /** Called after every relayout */
  onLayout(listener: () => void): () => void {
    return this.layoutListeners.add(listener);
  }

  dispose(): void {
    this.viewportListeners.clear();
    this.layoutListeners.clear();
  }

  // ------------------------------
  // Setters
  // ------------------------------

  resize(width: number, height: number): void {
    this.width = Number.isFinite(width) ? width : 0;
    this.height = Number.isFinite(height) ? height : 0;
    this.relayout();
  }

  setKeyWidth(width: number): void {
    if (!Number.isFinite(width) || width <= 0) {
      if (this.debug) {
        console.warn(`[MidiKeyboard] Key width must be positive, got ${width}; keeping ${this.keyWidth}`);
      }
      return;
    }
    if (width === this.keyWidth) return;
    this.keyWidth = width;
    this.relayout();
  }

  setOrientation(orientation: Orientation): void {
    if (orientation === this.orientation) return;
    this.orientation = orientation;
    this.relayout();
  }

  setRange(low: number, high: number): void {
    const range = clampNoteRange(
      { low, high },
      { low: this.rangeStart, high: this.rangeEnd },
      this.debug
    );
    if (range.low === this.rangeStart && range.high === this.rangeEnd) return;

    this.rangeStart = range.low;
    this.rangeEnd = range.high;

    const previous = Math.floor(this.firstKey);
    this.firstKey = clamp(this.firstKey, this.rangeStart, this.rangeEnd);
    if (Math.floor(this.firstKey) !== previous) {
      this.viewportListeners.notify(Math.floor(this.firstKey));
    }
    this.relayout();
  }

  setLowestVisibleNote(note: number): void {
    if (!Number.isFinite(note)) return;

    const next = clamp(note, this.rangeStart, this.rangeEnd);
    if (next === this.firstKey) return;

    const moved = Math.floor(next) !== Math.floor(this.firstKey);
    this.firstKey = next;
    if (moved) {
      this.viewportListeners.notify(Math.floor(next));
    }
    this.relayout();
  }

  setScrollButtonsVisible(visible: boolean): void {
    if (visible === this.canScroll) return;
    this.canScroll = visible;
    this.relayout();
  }

  setBlackNoteLengthRatio(ratio: number): void {
    const next = clampSetting(ratio, 0, 1, {
      name: "Black note length ratio",
      fallback: this.blackNoteLengthRatio,
      debug: this.debug,
    });
    if (next === this.blackNoteLengthRatio) return;
    this.blackNoteLengthRatio = next;
    this.relayout();
  }

  setBlackNoteWidthRatio(ratio: number): void {
    const next = clampSetting(ratio, 0, 1, {
      name: "Black note width ratio",
      fallback: this.blackNoteWidthRatio,
      debug: this.debug,
    });
    if (next === this.blackNoteWidthRatio) return;
    this.blackNoteWidthRatio = next;
    this.relayout();
  }

  // ------------------------------
  // Getters
  // ------------------------------

  getOrientation(): Orientation {
    return this.orientation;
  }

  getKeyWidth(): number {
    return this.keyWidth;
  }

  getRange(): NoteRange {
    return { low: this.rangeStart, high: this.rangeEnd };
  }

  getLowestVisibleNote(): number {
    return Math.floor(this.firstKey);
  }

  getLowestVisibleNoteFloat(): number {
    return this.firstKey;
  }

  getScrollButtonsVisible(): boolean {
    return this.canScroll;
  }

  getBlackNoteLengthRatio(): number {
    return this.blackNoteLengthRatio;
  }

  getBlackNoteWidthRatio(): number {
    return this.blackNoteWidthRatio;
  }

  getPixelOffset(): number {
    return this.xOffset;
  }

  getLayout(): KeyLayout {
    return {
      orientation: this.orientation,
      width: this.width,
      height: this.height,
      keyWidth: this.keyWidth,
      blackNoteWidthRatio: this.blackNoteWidthRatio,
      blackNoteLengthRatio: this.blackNoteLengthRatio,
      rangeStart: this.rangeStart,
      rangeEnd: this.rangeEnd,
      xOffset: this.xOffset,
    };
  }

  getScrollButtons(): ScrollButtons {
    return {
      down: { visible: this.scrollButtons.down.visible, bounds: { ...this.scrollButtons.down.bounds } },
      up: { visible: this.scrollButtons.up.visible, bounds: { ...this.scrollButtons.up.bounds } },
    };
  }

  /** Visible scroll button containing the point, if any */
  scrollButtonAt(point: Point): ScrollDirection | null {
    for (const direction of ["down", "up"] as const) {
      const { visible, bounds } = this.scrollButtons[direction];
      if (visible && containsPoint(bounds, point.x, point.y)) {
        return direction;
      }
    }
    return null;
  }

  // ------------------------------
  // Geometry queries
  // ------------------------------

  /** Rectangle of a key in widget coordinates, or null outside the range */
  getRectangleForKey(note: number): Rect | null {
    if (!Number.isInteger(note) || note < this.rangeStart || note > this.rangeEnd) return null;
    return keyRect(this.getLayout(), note);
  }

  /** Start of a key along the long axis, relative to the visible origin */
  getKeyStartPosition(note: number): number {
    return keySpan(this.getLayout(), note).start;
  }

  /** Relative end of the last key in the range */
  getTotalKeyboardWidth(): number {
    return keySpan(this.getLayout(), this.rangeEnd).end;
  }

  noteAt(point: Point): NoteHit {
    return pointToNote(this.getLayout(), point);
  }

  // ------------------------------
  // Scrolling
  // ------------------------------

  scrollByOctave(direction: ScrollDirection): void {
    const first = Math.floor(this.firstKey);
    const target =
      direction === "down"
        ? Math.trunc((first - 1) / 12) * 12
        : (Math.trunc(first / 12) + 1) * 12;
    this.setLowestVisibleNote(target);
  }

  /**
   * Scroll by a normalized wheel movement, one white-key width per unit.
   */
  scrollByWheel(delta: WheelDelta): void {
    let amount: number;
    if (this.orientation === "horizontal" && delta.deltaX !== 0) {
      amount = delta.deltaX;
    } else if (this.orientation === "vertical-left") {
      amount = delta.deltaY;
    } else {
      amount = -delta.deltaY;
    }
    this.setLowestVisibleNote(this.firstKey - amount * this.keyWidth);
  }

  // ------------------------------
  // Layout
  // ------------------------------

  relayout(): void {
    if (this.width <= 0 || this.height <= 0) return;

    const horizontal = this.orientation === "horizontal";
    const size = horizontal ? this.width : this.height;

    if (Math.floor(this.firstKey) !== this.rangeStart) {
      const layout = this.getLayout();
      const total = keySpan(layout, this.rangeEnd).end - keySpan(layout, this.rangeStart).start;
      if (total <= size) {
        this.firstKey = this.rangeStart;
        this.viewportListeners.notify(this.rangeStart);
      }
    }

    this.scrollButtons.down.visible = this.canScroll && this.firstKey > this.rangeStart;
    this.xOffset = 0;

    if (this.canScroll) {
      this.placeScrollButtons(Math.min(SCROLL_BUTTON_SIZE, Math.floor(size / 2)));

      const layout = this.getLayout();
      const endOfLastKey = keySpan(layout, this.rangeEnd).end;
      const hit = noteAtKeyPosition(layout, { x: endOfLastKey - size, y: 0 });
      const lastStartKey = (hit.note ?? -1) + 1;

      if (Math.floor(this.firstKey) > lastStartKey) {
        const limited = clamp(lastStartKey, this.rangeStart, this.rangeEnd);
        if (limited !== this.firstKey) {
          const moved = Math.floor(limited) !== Math.floor(this.firstKey);
          this.firstKey = limited;
          if (moved) {
            this.viewportListeners.notify(Math.floor(limited));
          }
        }
      }

      this.xOffset = keySpan(layout, Math.floor(this.firstKey)).start;
    } else {
      this.firstKey = this.rangeStart;
    }

    this.scrollButtons.up.visible =
      this.canScroll && keySpan(this.getLayout(), this.rangeEnd).start > size;

    this.layoutListeners.notify();
  }

  private placeScrollButtons(band: number): void {
    const { width, height } = this;
    const start: Rect = this.orientation === "horizontal"
      ? { x: 0, y: 0, width: band, height }
      : { x: 0, y: 0, width, height: band };
    const end: Rect = this.orientation === "horizontal"
      ? { x: width - band, y: 0, width: band, height }
      : { x: 0, y: height - band, width, height: band };

    if (this.orientation === "vertical-right") {
      this.scrollButtons.down.bounds = end;
      this.scrollButtons.up.bounds = start;
    } else {
      this.scrollButtons.down.bounds = start;
      this.scrollButtons.up.bounds = end;
    }
  }
}
