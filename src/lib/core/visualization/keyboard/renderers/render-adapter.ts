import {
  BLACK_NOTE_PITCH_CLASSES,
  KEY_SHADOW_DEPTH,
  LABEL_MAX_FONT_HEIGHT,
  MIDI_NOTE_COUNT,
  WHITE_NOTE_PITCH_CLASSES,
} from "@/core/constants";
import {
  TRANSPARENT,
  brighterColor,
  isTransparent,
  overlayColor,
  withAlpha,
} from "@/core/utils/color/blend";
import { midiToNoteName } from "@/core/utils/midi/pitch";
import { keyRect, keySpan, type KeyLayout } from "../geometry/key-geometry";
import type {
  AlphaColor,
  KeyboardColors,
  Orientation,
  Point,
  Rect,
  ScrollButtons,
  ScrollDirection,
} from "../types";
import { reduceRect, trimRect } from "../utils/rect";
import type { KeyboardSurface, TextJustification } from "./surface";

export interface ScrollButtonInteraction {
  hovered: boolean;
  pressed: boolean;
}

/**
 * Snapshot of everything a paint pass reads.
 */
export interface KeyboardPaintModel {
  layout: KeyLayout;
  colors: KeyboardColors;
  octaveForMiddleC: number;
  scrollButtons: ScrollButtons;
  isNoteDown(note: number): boolean;
  isNoteHovered(note: number): boolean;
  scrollButtonInteraction(direction: ScrollDirection): ScrollButtonInteraction;
}

/**
 * Key color after layering the key-down and hover overlays on `base`.
 */
export function keyFillColor(
  base: AlphaColor,
  isDown: boolean,
  isOver: boolean,
  colors: Pick<KeyboardColors, "keyDownOverlay" | "mouseOverKeyOverlay">
): AlphaColor {
  let c = base;
  if (isDown) c = overlayColor(c, colors.keyDownOverlay);
  if (isOver) c = overlayColor(c, colors.mouseOverKeyOverlay);
  return c;
}

/** Octave label for C notes, null for every other note */
export function whiteNoteLabel(note: number, octaveForMiddleC: number): string | null {
  return note % 12 === 0 ? midiToNoteName(note, octaveForMiddleC) : null;
}

export function labelFontHeight(keyWidth: number): number {
  return Math.min(LABEL_MAX_FONT_HEIGHT, keyWidth * 0.9);
}

function forEachNoteInRange(
  pitchClasses: readonly number[],
  layout: KeyLayout,
  fn: (note: number) => void
): void {
  for (let octave = 0; octave < MIDI_NOTE_COUNT; octave += 12) {
    for (const pc of pitchClasses) {
      const note = octave + pc;
      if (note >= layout.rangeStart && note <= layout.rangeEnd) fn(note);
    }
  }
}

/**
 * Paint the whole keyboard: background, white keys, shadow, edge line,
 * black keys, then any visible scroll buttons.
 */
export function paintKeyboard(surface: KeyboardSurface, model: KeyboardPaintModel): void {
  const { layout, colors } = model;
  const { orientation, width, height } = layout;

  surface.fillRect({ x: 0, y: 0, width, height }, colors.whiteNote);

  forEachNoteInRange(WHITE_NOTE_PITCH_CLASSES, layout, (note) =>
    paintWhiteNote(surface, model, note, keyRect(layout, note))
  );

  const x = keySpan(layout, layout.rangeEnd).end;

  if (!isTransparent(colors.shadow)) {
    const d = KEY_SHADOW_DEPTH;
    const from = { x: 0, y: 0, color: colors.shadow };
    const to = { x: 0, y: 0, color: withAlpha(colors.shadow, 0) };
    let rect: Rect;
    switch (orientation) {
      case "horizontal":
        rect = { x: 0, y: 0, width: x, height: d };
        to.y = d;
        break;
      case "vertical-left":
        rect = { x: width - d, y: 0, width: d, height: x };
        from.x = width - 1;
        to.x = width - d;
        break;
      case "vertical-right":
        rect = { x: 0, y: 0, width: d, height: x };
        to.x = d;
        break;
    }
    surface.fillGradient(rect, from, to);
  }

  if (!isTransparent(colors.keySeparatorLine)) {
    surface.fillRect(edgeLine(orientation, width, height, x), colors.keySeparatorLine);
  }

  forEachNoteInRange(BLACK_NOTE_PITCH_CLASSES, layout, (note) =>
    paintBlackNote(surface, model, note, keyRect(layout, note))
  );

  for (const direction of ["down", "up"] as const) {
    const button = model.scrollButtons[direction];
    if (button.visible) {
      paintScrollButton(surface, model, direction, button.bounds);
    }
  }
}

/** Separator along the keys' far edge, running the full keyboard length */
function edgeLine(orientation: Orientation, width: number, height: number, length: number): Rect {
  switch (orientation) {
    case "horizontal":
      return { x: 0, y: height - 1, width: length, height: 1 };
    case "vertical-left":
      return { x: 0, y: 0, width: 1, height: length };
    case "vertical-right":
      return { x: width - 1, y: 0, width: 1, height: length };
  }
}

export function paintWhiteNote(
  surface: KeyboardSurface,
  model: KeyboardPaintModel,
  note: number,
  area: Rect
): void {
  const { colors, layout } = model;
  const fill = keyFillColor(TRANSPARENT, model.isNoteDown(note), model.isNoteHovered(note), colors);
  if (!isTransparent(fill)) {
    surface.fillRect(area, fill);
  }

  const text = whiteNoteLabel(note, model.octaveForMiddleC);
  if (text !== null) {
    const fontHeight = labelFontHeight(layout.keyWidth);
    let textArea: Rect;
    let justification: TextJustification;
    switch (layout.orientation) {
      case "horizontal":
        textArea = trimRect(area, { left: 1, bottom: 2 });
        justification = "centred-bottom";
        break;
      case "vertical-left":
        textArea = reduceRect(area, 2);
        justification = "centred-left";
        break;
      case "vertical-right":
        textArea = reduceRect(area, 2);
        justification = "centred-right";
        break;
    }
    surface.drawText(text, textArea, justification, colors.textLabel, fontHeight);
  }

  if (isTransparent(colors.keySeparatorLine)) return;

  const { x, y, width: w, height: h } = area;
  switch (layout.orientation) {
    case "horizontal":
      surface.fillRect({ x, y, width: 1, height: h }, colors.keySeparatorLine);
      break;
    case "vertical-left":
      surface.fillRect({ x, y, width: w, height: 1 }, colors.keySeparatorLine);
      break;
    case "vertical-right":
      surface.fillRect({ x, y: y + h - 1, width: w, height: 1 }, colors.keySeparatorLine);
      break;
  }

  if (note === layout.rangeEnd) {
    switch (layout.orientation) {
      case "horizontal":
        surface.fillRect({ x: x + w, y, width: 1, height: h }, colors.keySeparatorLine);
        break;
      case "vertical-left":
        surface.fillRect({ x, y: y + h, width: w, height: 1 }, colors.keySeparatorLine);
        break;
      case "vertical-right":
        surface.fillRect({ x, y: y - 1, width: w, height: 1 }, colors.keySeparatorLine);
        break;
    }
  }
}

export function paintBlackNote(
  surface: KeyboardSurface,
  model: KeyboardPaintModel,
  note: number,
  area: Rect
): void {
  const { colors, layout } = model;
  const isDown = model.isNoteDown(note);
  const fill = keyFillColor(colors.blackNote, isDown, model.isNoteHovered(note), colors);
  surface.fillRect(area, fill);

  if (isDown) {
    surface.drawRect(area, colors.blackNote);
    return;
  }

  const { x, y, width: w, height: h } = area;
  let highlight: Rect;
  switch (layout.orientation) {
    case "horizontal":
      highlight = { x: x + w / 8, y, width: (w * 3) / 4, height: (h * 7) / 8 };
      break;
    case "vertical-left":
      highlight = { x: x + w / 8, y: y + h / 8, width: (w * 7) / 8, height: (h * 3) / 4 };
      break;
    case "vertical-right":
      highlight = { x, y: y + h / 8, width: (w * 7) / 8, height: (h * 3) / 4 };
      break;
  }
  surface.fillRect(highlight, brighterColor(fill));
}

/** Arrow rotation in turns for each orientation and direction */
function arrowTurns(orientation: Orientation, direction: ScrollDirection): number {
  const up = direction === "up";
  switch (orientation) {
    case "horizontal":
      return up ? 0 : 0.5;
    case "vertical-left":
      return up ? 0.25 : 0.75;
    case "vertical-right":
      return up ? 0.75 : 0.25;
  }
}

/**
 * Unit triangle pointing along +x, turned about (0.5, 0.5) by whole
 * quarter turns.
 */
export function arrowTriangle(turns: number): [Point, Point, Point] {
  const quarters = ((Math.round(turns * 4) % 4) + 4) % 4;
  const rotate = (p: Point): Point => {
    let dx = p.x - 0.5;
    let dy = p.y - 0.5;
    for (let i = 0; i < quarters; i++) {
      [dx, dy] = [-dy, dx];
    }
    return { x: dx + 0.5, y: dy + 0.5 };
  };
  return [rotate({ x: 0, y: 0 }), rotate({ x: 0, y: 1 }), rotate({ x: 1, y: 0.5 })];
}

export function paintScrollButton(
  surface: KeyboardSurface,
  model: KeyboardPaintModel,
  direction: ScrollDirection,
  bounds: Rect
): void {
  const { colors, layout } = model;
  surface.fillRect(bounds, colors.upDownButtonBackground);

  const { hovered, pressed } = model.scrollButtonInteraction(direction);
  const alpha = pressed ? 1 : hovered ? 0.6 : 0.4;

  // fit the unit square into the button, inset by a pixel, keeping it square
  const side = Math.max(0, Math.min(bounds.width - 2, bounds.height - 2));
  const left = bounds.x + 1 + (bounds.width - 2 - side) / 2;
  const top = bounds.y + 1 + (bounds.height - 2 - side) / 2;

  const [a, b, c] = arrowTriangle(arrowTurns(layout.orientation, direction));
  const place = (p: Point): Point => ({ x: left + p.x * side, y: top + p.y * side });

  surface.fillTriangle([place(a), place(b), place(c)], withAlpha(colors.upDownButtonArrow, alpha));
}
