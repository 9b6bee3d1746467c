// 1) Browser factory: canvas + PixiJS + DOM events
export { createMidiKeyboard } from "./lib/core/visualization/keyboard";
export type { MidiKeyboardInstance } from "./lib/core/visualization/keyboard";

// 2) Widget core and its collaborators
export { MidiKeyboard } from "./lib/core/visualization/keyboard/keyboard";
export { ViewportController } from "./lib/core/visualization/keyboard/state/viewport-controller";
export { PointerTracker } from "./lib/core/visualization/keyboard/interactions/pointer-tracker";
export { KeyMapping, normalizeKey } from "./lib/core/visualization/keyboard/interactions/key-mapping";
export { DomKeyboardHost } from "./lib/core/visualization/keyboard/ui/dom-host";
export { PixiKeyboardSurface } from "./lib/core/visualization/keyboard/renderers/pixi-surface";
export {
  DEFAULT_KEYBOARD_COLORS,
  DEFAULT_KEYBOARD_CONFIG,
  resolveKeyboardConfig,
} from "./lib/core/visualization/keyboard/config";

// 3) Geometry and painting, usable without a widget
export {
  keyPixelSpan,
  keySpan,
  keyRect,
  blackNoteLength,
  whiteNoteLength,
} from "./lib/core/visualization/keyboard/geometry/key-geometry";
export type { KeyLayout, KeySpan } from "./lib/core/visualization/keyboard/geometry/key-geometry";
export { normalizePoint, pointToNote } from "./lib/core/visualization/keyboard/geometry/hit-testing";
export { paintKeyboard } from "./lib/core/visualization/keyboard/renderers/render-adapter";
export type { KeyboardPaintModel } from "./lib/core/visualization/keyboard/renderers/render-adapter";
export type {
  KeyboardSurface,
  GradientStop,
  TextJustification,
} from "./lib/core/visualization/keyboard/renderers/surface";

// 4) Shared note state
export { KeyboardNoteState } from "./lib/core/state/keyboard-state";
export type { NoteStateListener, NoteStateModel } from "./lib/core/state/keyboard-state";

// 5) Types
export type {
  AlphaColor,
  KeyBinding,
  KeyboardColors,
  KeyboardHost,
  KeyboardPointerEvent,
  KeyPressHooks,
  MidiKeyboardConfig,
  NoteHit,
  NoteRange,
  Orientation,
  Point,
  PointerSnapshot,
  PointerSource,
  PointerSourceType,
  Rect,
  ResolvedKeyboardConfig,
  ScrollButtons,
  ScrollButtonState,
  ScrollDirection,
  WheelDelta,
} from "./lib/core/visualization/keyboard/types";

export { midiToNoteName, isBlackNote } from "./lib/core/utils/midi/pitch";
