import { scaleLinear } from "d3-scale";
import { BLACK_NOTE_PITCH_CLASSES, WHITE_NOTE_PITCH_CLASSES } from "@/core/constants";
import type { NoteHit, Point } from "../types";
import { blackNoteLength, keySpan, whiteNoteLength, type KeyLayout } from "./key-geometry";

const NO_NOTE: NoteHit = { note: null, velocity: 0 };

/**
 * Rotate a widget-space point into keyboard space, where x runs along the
 * keys from the low end and y runs from the struck edge towards the tips.
 */
export function normalizePoint(layout: KeyLayout, point: Point): Point {
  switch (layout.orientation) {
    case "horizontal":
      return { x: point.x, y: point.y };
    case "vertical-left":
      return { x: point.y, y: layout.width - point.x };
    case "vertical-right":
      return { x: layout.height - point.y, y: point.x };
  }
}

function findInRow(
  layout: KeyLayout,
  pitchClasses: readonly number[],
  x: number
): number | null {
  const { rangeStart, rangeEnd } = layout;
  for (let octave = 12 * Math.floor(rangeStart / 12); octave <= rangeEnd; octave += 12) {
    for (const pc of pitchClasses) {
      const note = octave + pc;
      if (note < rangeStart || note > rangeEnd) continue;
      const span = keySpan(layout, note);
      if (span.start <= x && x < span.end) return note;
    }
  }
  return null;
}

/**
 * Hit-test a point already in keyboard space. Black keys win where they
 * overlap white keys.
 */
export function noteAtKeyPosition(layout: KeyLayout, pos: Point): NoteHit {
  const blackLen = blackNoteLength(layout);
  if (pos.y < blackLen) {
    const note = findInRow(layout, BLACK_NOTE_PITCH_CLASSES, pos.x);
    if (note !== null) {
      const velocity = scaleLinear().domain([0, blackLen]).range([0, 1]).clamp(true);
      return { note, velocity: velocity(pos.y) };
    }
  }

  const note = findInRow(layout, WHITE_NOTE_PITCH_CLASSES, pos.x);
  if (note === null) return NO_NOTE;

  const whiteLen = whiteNoteLength(layout);
  const velocity = scaleLinear().domain([0, whiteLen]).range([0, 1]).clamp(true);
  return { note, velocity: velocity(pos.y) };
}

/**
 * Note and strike velocity under a widget-space point. Points outside the
 * widget bounds hit nothing.
 */
export function pointToNote(layout: KeyLayout, point: Point): NoteHit {
  if (point.x < 0 || point.y < 0 || point.x >= layout.width || point.y >= layout.height) {
    return NO_NOTE;
  }
  return noteAtKeyPosition(layout, normalizePoint(layout, point));
}
