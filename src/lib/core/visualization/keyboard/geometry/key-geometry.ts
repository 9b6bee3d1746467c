import { blackKeyFlags } from "@/core/utils/midi/tables";
import type { Orientation, Rect } from "../types";

/**
 * Everything needed to place a key on screen. `width` and `height` are the
 * widget's own bounds, before any rotation for vertical orientations.
 */
export interface KeyLayout {
  orientation: Orientation;
  width: number;
  height: number;
  keyWidth: number;
  blackNoteWidthRatio: number;
  blackNoteLengthRatio: number;
  rangeStart: number;
  rangeEnd: number;
  /** Pixels scrolled past the start of the range */
  xOffset: number;
}

/** Half-open pixel interval [start, end) along the keyboard's long axis */
export interface KeySpan {
  start: number;
  end: number;
}

/**
 * Where each pitch class begins inside its octave, in white-key widths.
 * Black keys sit over the gap between neighbours, nudged by their ratio.
 */
function pitchClassOffset(pitchClass: number, blackRatio: number): number {
  switch (pitchClass) {
    case 1:
      return 1 - blackRatio * 0.6;
    case 3:
      return 2 - blackRatio * 0.4;
    case 6:
      return 4 - blackRatio * 0.7;
    case 8:
      return 5 - blackRatio * 0.5;
    case 10:
      return 6 - blackRatio * 0.3;
    case 0:
      return 0;
    case 2:
      return 1;
    case 4:
      return 2;
    case 5:
      return 3;
    case 7:
      return 4;
    case 9:
      return 5;
    default:
      return 6;
  }
}

/**
 * Span of a note measured from note 0, ignoring range and scrolling.
 */
export function keyPixelSpan(note: number, keyWidth: number, blackRatio: number): KeySpan {
  const octave = Math.floor(note / 12);
  const pitchClass = note - octave * 12;
  const start = octave * 7 * keyWidth + pitchClassOffset(pitchClass, blackRatio) * keyWidth;
  const width = blackKeyFlags[pitchClass] ? blackRatio * keyWidth : keyWidth;
  return { start, end: start + width };
}

/**
 * Span of a note relative to the visible origin: shifted so that the range
 * start begins at 0, then by the scroll offset.
 */
export function keySpan(layout: KeyLayout, note: number): KeySpan {
  const { keyWidth, blackNoteWidthRatio: ratio } = layout;
  const origin = keyPixelSpan(layout.rangeStart, keyWidth, ratio).start + layout.xOffset;
  const abs = keyPixelSpan(note, keyWidth, ratio);
  return { start: abs.start - origin, end: abs.end - origin };
}

/** Length of a white key across the keyboard's short axis */
export function whiteNoteLength(layout: KeyLayout): number {
  return layout.orientation === "horizontal" ? layout.height : layout.width;
}

export function blackNoteLength(layout: KeyLayout): number {
  return whiteNoteLength(layout) * layout.blackNoteLengthRatio;
}

/**
 * Screen rectangle of a key in widget coordinates.
 */
export function keyRect(layout: KeyLayout, note: number): Rect {
  const span = keySpan(layout, note);
  const x = span.start;
  const w = span.end - span.start;
  const { width, height } = layout;

  if (blackKeyFlags[((note % 12) + 12) % 12]) {
    const len = blackNoteLength(layout);
    switch (layout.orientation) {
      case "horizontal":
        return { x, y: 0, width: w, height: len };
      case "vertical-left":
        return { x: width - len, y: x, width: len, height: w };
      case "vertical-right":
        return { x: 0, y: height - x - w, width: len, height: w };
    }
  }

  switch (layout.orientation) {
    case "horizontal":
      return { x, y: 0, width: w, height };
    case "vertical-left":
      return { x: 0, y: x, width, height: w };
    case "vertical-right":
      return { x: 0, y: height - x - w, width, height: w };
  }
}
