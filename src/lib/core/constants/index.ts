// ---------------------------------------------------------------------------
// MIDI bounds
// ---------------------------------------------------------------------------
export const MIDI_NOTE_MIN = 0;
export const MIDI_NOTE_MAX = 127;
export const MIDI_NOTE_COUNT = 128;

export const MIDI_CHANNEL_MIN = 1;
export const MIDI_CHANNEL_MAX = 16;
/** Bit mask selecting all 16 MIDI channels (bit 0 = channel 1). */
export const ALL_MIDI_CHANNELS_MASK = 0xffff;

/** Pitch classes of the white and black keys inside one octave. */
export const WHITE_NOTE_PITCH_CLASSES = [0, 2, 4, 5, 7, 9, 11] as const;
export const BLACK_NOTE_PITCH_CLASSES = [1, 3, 6, 8, 10] as const;

// ---------------------------------------------------------------------------
// Keyboard layout
// ---------------------------------------------------------------------------
/** Rate of the note-state rescan and pointer re-check timer. */
export const KEYBOARD_TIMER_HZ = 20;

/** Upper bound of the band reserved for each scroll button. */
export const SCROLL_BUTTON_SIZE = 12;

/** Depth of the drop shadow drawn along the keys' fixed edge. */
export const KEY_SHADOW_DEPTH = 5;

/** Largest octave label font, regardless of key width. */
export const LABEL_MAX_FONT_HEIGHT = 12;

/**
 * DOM wheel deltas are in pixels (about 100 per notch); the keyboard scrolls in
 * units where one notch is 0.125.
 */
export const WHEEL_PIXELS_PER_UNIT = 800;
export const WHEEL_PIXELS_PER_LINE = 16;

export const BASE_OCTAVE_MIN = 0;
export const BASE_OCTAVE_MAX = 10;

/**
 * Default QWERTY layout: the home row plays the white keys and the row above
 * the black keys, starting at C of the base octave.
 */
export const DEFAULT_KEY_MAPPING_CHARS = "awsedftgyhujkolp;";

// ---------------------------------------------------------------------------
// Colors (0xRRGGBB + alpha, the shape PixiJS fill styles take)
// ---------------------------------------------------------------------------
export const COLOR_WHITE_NOTE = { color: 0xffffff, alpha: 1 };
export const COLOR_BLACK_NOTE = { color: 0x000000, alpha: 1 };
export const COLOR_KEY_SEPARATOR = { color: 0x000000, alpha: 0.4 };
export const COLOR_HOVER_OVERLAY = { color: 0xffff00, alpha: 0.5 };
export const COLOR_KEY_DOWN_OVERLAY = { color: 0xb6b600, alpha: 1 };
export const COLOR_TEXT_LABEL = { color: 0x000000, alpha: 1 };
export const COLOR_SCROLL_BUTTON_BACKGROUND = { color: 0xd3d3d3, alpha: 1 };
export const COLOR_SCROLL_BUTTON_ARROW = { color: 0x000000, alpha: 1 };
export const COLOR_KEY_SHADOW = { color: 0x000000, alpha: 0.3 };
