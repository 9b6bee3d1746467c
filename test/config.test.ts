import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_KEYBOARD_CONFIG,
  clampNoteRange,
  defaultKeyMappings,
  isOrientation,
  resolveKeyboardConfig,
} from '../src/lib/core/visualization/keyboard/config';

describe('resolveKeyboardConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults when nothing is given', () => {
    expect(resolveKeyboardConfig()).toEqual(DEFAULT_KEYBOARD_CONFIG);
  });

  it('starts the view at C3 with middle C labelled C3', () => {
    const config = resolveKeyboardConfig();
    expect(config.lowestVisibleNote).toBe(48);
    expect(config.octaveForMiddleC).toBe(3);
    expect(config.keyMappingBaseOctave).toBe(6);
  });

  it('binds the home row to the first seventeen semitones', () => {
    const mappings = defaultKeyMappings();
    expect(mappings).toHaveLength(17);
    expect(mappings[0]).toEqual({ key: 'a', offset: 0 });
    expect(mappings[16]).toEqual({ key: ';', offset: 16 });
  });

  it('clamps the lowest visible note into the range', () => {
    const config = resolveKeyboardConfig({ noteRange: { low: 60, high: 72 } });
    expect(config.lowestVisibleNote).toBe(60);
  });

  it('keeps the default key width for non-positive widths', () => {
    expect(resolveKeyboardConfig({ keyWidth: -5 }).keyWidth).toBe(16);
    expect(resolveKeyboardConfig({ keyWidth: Number.NaN }).keyWidth).toBe(16);
    expect(resolveKeyboardConfig({ keyWidth: 24 }).keyWidth).toBe(24);
  });

  it('masks display channels to sixteen bits', () => {
    expect(resolveKeyboardConfig({ midiChannelMask: 0x1ffff }).midiChannelMask).toBe(0xffff);
    expect(resolveKeyboardConfig({ midiChannelMask: 0b101 }).midiChannelMask).toBe(0b101);
  });

  it('rounds the middle C octave', () => {
    expect(resolveKeyboardConfig({ octaveForMiddleC: 4.6 }).octaveForMiddleC).toBe(5);
  });

  it('merges partial colors over the defaults', () => {
    const shadow = { color: 0x112233, alpha: 0.5 };
    const config = resolveKeyboardConfig({ colors: { shadow } });
    expect(config.colors.shadow).toEqual(shadow);
    expect(config.colors.whiteNote).toEqual(DEFAULT_KEYBOARD_CONFIG.colors.whiteNote);
  });

  it('copies key mappings so callers cannot change the defaults', () => {
    const config = resolveKeyboardConfig();
    config.keyMappings[0].key = 'q';
    expect(DEFAULT_KEYBOARD_CONFIG.keyMappings[0].key).toBe('a');
  });

  it('warns about coerced values only when debugging', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(resolveKeyboardConfig({ midiChannel: 20 }).midiChannel).toBe(16);
    expect(warn).not.toHaveBeenCalled();

    resolveKeyboardConfig({ midiChannel: 20, debug: true });
    expect(warn).toHaveBeenCalledWith('[MidiKeyboard] MIDI channel must be between 1 and 16, got 20; using 16');
  });
});

describe('clampNoteRange', () => {
  const fallback = { low: 0, high: 127 };

  it('clamps into the MIDI note range', () => {
    expect(clampNoteRange({ low: -10, high: 200 }, fallback)).toEqual({ low: 0, high: 127 });
  });

  it('collapses a reversed range onto its low note', () => {
    expect(clampNoteRange({ low: 80, high: 70 }, fallback)).toEqual({ low: 80, high: 80 });
  });

  it('rounds fractional notes', () => {
    expect(clampNoteRange({ low: 59.6, high: 71.2 }, fallback)).toEqual({ low: 60, high: 71 });
  });
});

describe('isOrientation', () => {
  it('accepts the three orientations only', () => {
    expect(isOrientation('horizontal')).toBe(true);
    expect(isOrientation('vertical-left')).toBe(true);
    expect(isOrientation('vertical-right')).toBe(true);
    expect(isOrientation('Horizontal')).toBe(false);
    expect(isOrientation(3)).toBe(false);
  });
});
