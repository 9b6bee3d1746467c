import {
  ALL_MIDI_CHANNELS_MASK,
  BASE_OCTAVE_MAX,
  BASE_OCTAVE_MIN,
  COLOR_BLACK_NOTE,
  COLOR_HOVER_OVERLAY,
  COLOR_KEY_DOWN_OVERLAY,
  COLOR_KEY_SEPARATOR,
  COLOR_KEY_SHADOW,
  COLOR_SCROLL_BUTTON_ARROW,
  COLOR_SCROLL_BUTTON_BACKGROUND,
  COLOR_TEXT_LABEL,
  COLOR_WHITE_NOTE,
  DEFAULT_KEY_MAPPING_CHARS,
  MIDI_CHANNEL_MAX,
  MIDI_CHANNEL_MIN,
  MIDI_NOTE_MAX,
  MIDI_NOTE_MIN,
} from "@/core/constants";
import { clampSetting } from "@/core/utils";
import type {
  KeyBinding,
  KeyboardColors,
  MidiKeyboardConfig,
  NoteRange,
  Orientation,
  ResolvedKeyboardConfig,
} from "./types";

export const DEFAULT_KEYBOARD_COLORS: KeyboardColors = {
  whiteNote: COLOR_WHITE_NOTE,
  blackNote: COLOR_BLACK_NOTE,
  keySeparatorLine: COLOR_KEY_SEPARATOR,
  mouseOverKeyOverlay: COLOR_HOVER_OVERLAY,
  keyDownOverlay: COLOR_KEY_DOWN_OVERLAY,
  textLabel: COLOR_TEXT_LABEL,
  upDownButtonBackground: COLOR_SCROLL_BUTTON_BACKGROUND,
  upDownButtonArrow: COLOR_SCROLL_BUTTON_ARROW,
  shadow: COLOR_KEY_SHADOW,
};

/** QWERTY bindings for offsets 0..16 */
export function defaultKeyMappings(): KeyBinding[] {
  return Array.from(DEFAULT_KEY_MAPPING_CHARS, (key, offset) => ({ key, offset }));
}

export const DEFAULT_KEYBOARD_CONFIG: ResolvedKeyboardConfig = {
  orientation: "horizontal",
  keyWidth: 16,
  noteRange: { low: MIDI_NOTE_MIN, high: MIDI_NOTE_MAX },
  lowestVisibleNote: 12 * 4,
  scrollButtons: true,
  midiChannel: 1,
  midiChannelMask: ALL_MIDI_CHANNELS_MASK,
  velocity: 1,
  useMousePositionForVelocity: true,
  blackNoteLengthRatio: 0.7,
  blackNoteWidthRatio: 0.7,
  keyMappingBaseOctave: 6,
  keyMappings: defaultKeyMappings(),
  octaveForMiddleC: 3,
  colors: DEFAULT_KEYBOARD_COLORS,
  debug: false,
};

const ORIENTATIONS: readonly Orientation[] = ["horizontal", "vertical-left", "vertical-right"];

export function isOrientation(value: unknown): value is Orientation {
  return typeof value === "string" && ORIENTATIONS.some((o) => o === value);
}

/**
 * Clamp a note range into [0,127] with low <= high. A reversed range
 * collapses onto its low note.
 */
export function clampNoteRange(range: NoteRange, fallback: NoteRange, debug = false): NoteRange {
  const low = clampSetting(range.low, MIDI_NOTE_MIN, MIDI_NOTE_MAX, {
    name: "Range start",
    fallback: fallback.low,
    integer: true,
    debug,
  });
  const high = clampSetting(range.high, low, MIDI_NOTE_MAX, {
    name: "Range end",
    fallback: Math.max(low, fallback.high),
    integer: true,
    debug,
  });
  return { low, high };
}

/**
 * Merge user options over the defaults and coerce every value into its valid
 * range.
 */
export function resolveKeyboardConfig(options: MidiKeyboardConfig = {}): ResolvedKeyboardConfig {
  const d = DEFAULT_KEYBOARD_CONFIG;
  const debug = options.debug ?? d.debug;

  let orientation = d.orientation;
  if (options.orientation !== undefined) {
    if (isOrientation(options.orientation)) {
      orientation = options.orientation;
    } else if (debug) {
      console.warn(`[MidiKeyboard] Unknown orientation "${String(options.orientation)}"; using ${orientation}`);
    }
  }

  const keyWidth =
    options.keyWidth !== undefined && Number.isFinite(options.keyWidth) && options.keyWidth > 0
      ? options.keyWidth
      : d.keyWidth;
  if (debug && options.keyWidth !== undefined && keyWidth !== options.keyWidth) {
    console.warn(`[MidiKeyboard] Key width must be positive, got ${options.keyWidth}; using ${keyWidth}`);
  }

  const noteRange = clampNoteRange(options.noteRange ?? d.noteRange, d.noteRange, debug);

  return {
    orientation,
    keyWidth,
    noteRange,
    lowestVisibleNote: clampSetting(
      options.lowestVisibleNote ?? d.lowestVisibleNote,
      noteRange.low,
      noteRange.high,
      { name: "Lowest visible note", fallback: d.lowestVisibleNote, debug }
    ),
    scrollButtons: options.scrollButtons ?? d.scrollButtons,
    midiChannel: clampSetting(options.midiChannel ?? d.midiChannel, MIDI_CHANNEL_MIN, MIDI_CHANNEL_MAX, {
      name: "MIDI channel",
      fallback: d.midiChannel,
      integer: true,
      debug,
    }),
    midiChannelMask: Number.isFinite(options.midiChannelMask)
      ? (options.midiChannelMask ?? d.midiChannelMask) & ALL_MIDI_CHANNELS_MASK
      : d.midiChannelMask,
    velocity: clampSetting(options.velocity ?? d.velocity, 0, 1, {
      name: "Velocity",
      fallback: d.velocity,
      debug,
    }),
    useMousePositionForVelocity: options.useMousePositionForVelocity ?? d.useMousePositionForVelocity,
    blackNoteLengthRatio: clampSetting(options.blackNoteLengthRatio ?? d.blackNoteLengthRatio, 0, 1, {
      name: "Black note length ratio",
      fallback: d.blackNoteLengthRatio,
      debug,
    }),
    blackNoteWidthRatio: clampSetting(options.blackNoteWidthRatio ?? d.blackNoteWidthRatio, 0, 1, {
      name: "Black note width ratio",
      fallback: d.blackNoteWidthRatio,
      debug,
    }),
    keyMappingBaseOctave: clampSetting(
      options.keyMappingBaseOctave ?? d.keyMappingBaseOctave,
      BASE_OCTAVE_MIN,
      BASE_OCTAVE_MAX,
      { name: "Base octave", fallback: d.keyMappingBaseOctave, integer: true, debug }
    ),
    keyMappings: (options.keyMappings ?? defaultKeyMappings()).map((b) => ({ ...b })),
    octaveForMiddleC: Number.isFinite(options.octaveForMiddleC)
      ? Math.round(options.octaveForMiddleC ?? d.octaveForMiddleC)
      : d.octaveForMiddleC,
    colors: { ...d.colors, ...options.colors },
    debug,
  };
}
