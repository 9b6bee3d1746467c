import type { AlphaColor } from "@/core/utils/color/blend";
export type { AlphaColor } from "@/core/utils/color/blend";

/**
 * Which way the keys run.
 * - `horizontal`: low notes on the left, keys hang down from the top edge
 * - `vertical-left`: low notes at the top, black keys on the right edge
 * - `vertical-right`: low notes at the bottom, black keys on the left edge
 */
export type Orientation = "horizontal" | "vertical-left" | "vertical-right";

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Inclusive MIDI note interval */
export interface NoteRange {
  low: number;
  high: number;
}

/** Result of hit-testing a point against the keys */
export interface NoteHit {
  /** Note under the point, or null when no key contains it */
  note: number | null;
  /** 0 at the struck end of the key, 1 at the far end */
  velocity: number;
}

export interface KeyboardColors {
  whiteNote: AlphaColor;
  blackNote: AlphaColor;
  keySeparatorLine: AlphaColor;
  mouseOverKeyOverlay: AlphaColor;
  keyDownOverlay: AlphaColor;
  textLabel: AlphaColor;
  upDownButtonBackground: AlphaColor;
  upDownButtonArrow: AlphaColor;
  shadow: AlphaColor;
}

/** A logical key bound to a note offset from C of the base octave */
export interface KeyBinding {
  key: string;
  offset: number;
}

/**
 * Configuration options for the keyboard
 */
export interface MidiKeyboardConfig {
  /** Key layout direction (default: horizontal) */
  orientation?: Orientation;
  /** Width of a white key in pixels (default: 16) */
  keyWidth?: number;
  /** Notes the keyboard can show (default: 0-127) */
  noteRange?: NoteRange;
  /** Initially leftmost (or topmost) note; may be fractional (default: 48) */
  lowestVisibleNote?: number;
  /** Whether octave scroll buttons appear when the keys overflow (default: true) */
  scrollButtons?: boolean;
  /** Channel that pointer and key presses play on, 1-16 (default: 1) */
  midiChannel?: number;
  /** Channels whose notes are drawn as held, bit 0 = channel 1 (default: all) */
  midiChannelMask?: number;
  /** Note velocity in [0,1] (default: 1) */
  velocity?: number;
  /** Scale velocity by where on the key the pointer strikes (default: true) */
  useMousePositionForVelocity?: boolean;
  /** Black key length relative to white keys, in [0,1] (default: 0.7) */
  blackNoteLengthRatio?: number;
  /** Black key width relative to white keys, in [0,1] (default: 0.7) */
  blackNoteWidthRatio?: number;
  /** Octave whose C the key bindings start from, 0-10 (default: 6) */
  keyMappingBaseOctave?: number;
  /** Replaces the default QWERTY bindings */
  keyMappings?: KeyBinding[];
  /** Octave number written on the label of note 60 (default: 3) */
  octaveForMiddleC?: number;
  /** Color overrides */
  colors?: Partial<KeyboardColors>;
  /** Log coerced configuration values (default: false) */
  debug?: boolean;
}

export interface ResolvedKeyboardConfig {
  orientation: Orientation;
  keyWidth: number;
  noteRange: NoteRange;
  lowestVisibleNote: number;
  scrollButtons: boolean;
  midiChannel: number;
  midiChannelMask: number;
  velocity: number;
  useMousePositionForVelocity: boolean;
  blackNoteLengthRatio: number;
  blackNoteWidthRatio: number;
  keyMappingBaseOctave: number;
  keyMappings: KeyBinding[];
  octaveForMiddleC: number;
  colors: KeyboardColors;
  debug: boolean;
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export type PointerSourceType = "mouse" | "touch" | "pen";

/**
 * One independent pointer stream. Two sources are the same only when both
 * type and index match.
 */
export interface PointerSource {
  type: PointerSourceType;
  index: number;
}

export interface KeyboardPointerEvent {
  source: PointerSource;
  /** Position relative to the keyboard's top-left corner */
  position: Point;
}

/** Wheel movement in normalized units; positive deltaY is away from the user */
export interface WheelDelta {
  deltaX: number;
  deltaY: number;
}

export interface PointerSnapshot {
  source: PointerSource;
  position: Point;
  isDragging: boolean;
}

/**
 * Capability hooks consulted on pointer presses. A hook may veto a press
 * (chord locks, disabled keys) or react to it.
 */
export interface KeyPressHooks {
  /** Return false to ignore a pointer-down on this note */
  mouseDownOnKey?(note: number, event: KeyboardPointerEvent): boolean;
  mouseDraggedToKey?(note: number, event: KeyboardPointerEvent): void;
  mouseUpOnKey?(note: number, event: KeyboardPointerEvent): void;
}

/**
 * Services the keyboard needs from whatever hosts it on screen.
 */
export interface KeyboardHost {
  /** Ask for a repaint of a region, or of everything when omitted */
  requestRepaint(region?: Rect): void;
  /** Start a fixed-rate timer; the returned function stops it */
  startTimer(hz: number, callback: () => void): () => void;
  /** Pointer sources currently over (or captured by) the keyboard */
  getPointerSources(): PointerSnapshot[];
  /** Whether the logical key is held down right now */
  isKeyDown(key: string): boolean;
}

// ---------------------------------------------------------------------------
// Scrolling
// ---------------------------------------------------------------------------

export type ScrollDirection = "down" | "up";

export interface ScrollButtonState {
  visible: boolean;
  bounds: Rect;
}

export type ScrollButtons = Record<ScrollDirection, ScrollButtonState>;
