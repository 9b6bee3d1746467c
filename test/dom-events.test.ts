import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { attachKeyboardEvents } from '../src/lib/core/visualization/keyboard/interactions/dom-events';
import { DomKeyboardHost } from '../src/lib/core/visualization/keyboard/ui/dom-host';
import { MidiKeyboard } from '../src/lib/core/visualization/keyboard/keyboard';
import { KeyboardNoteState } from '../src/lib/core/state/keyboard-state';
import { FakeCanvas, keyEvent, pointerEvent } from './utils/fakes';

describe('attachKeyboardEvents', () => {
  let canvas: FakeCanvas;
  let state: KeyboardNoteState;
  let keyboard: MidiKeyboard;
  let detach: () => void;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.stubGlobal('requestAnimationFrame', () => 1);
    vi.stubGlobal('cancelAnimationFrame', vi.fn());

    canvas = new FakeCanvas();
    state = new KeyboardNoteState();
    const host = new DomKeyboardHost(() => {});
    keyboard = new MidiKeyboard(state, host, { noteRange: { low: 60, high: 72 }, keyWidth: 20 });
    keyboard.resize(400, 100);
    detach = attachKeyboardEvents(canvas, keyboard, host);
  });

  afterEach(() => {
    detach();
    keyboard.dispose();
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('makes the canvas focusable and focuses it on press', () => {
    expect(canvas.tabIndex).toBe(0);
    canvas.dispatchEvent(pointerEvent('pointerdown', 1, 'mouse', 5, 90));
    expect(canvas.focused).toBe(true);
    expect(canvas.hasPointerCapture(1)).toBe(true);
  });

  it('leaves no key hovered or held after touches lift', () => {
    const touches: Array<[id: number, x: number, note: number]> = [
      [1, 5, 60],
      [2, 25, 62],
      [3, 45, 64],
    ];

    for (const [id, x, note] of touches) {
      canvas.dispatchEvent(pointerEvent('pointerdown', id, 'touch', x, 90));
      expect(state.isNoteOn(1, note)).toBe(true);
      canvas.dispatchEvent(pointerEvent('pointerup', id, 'touch', x, 90));
      canvas.dispatchEvent(pointerEvent('pointerleave', id, 'touch', x, 90));
    }

    expect(touches.map(([, , note]) => keyboard.isNoteHovered(note))).toEqual([false, false, false]);
    expect(touches.map(([, , note]) => state.isNoteOn(1, note))).toEqual([false, false, false]);
  });

  it('keeps the mouse hover after a release over a key', () => {
    canvas.dispatchEvent(pointerEvent('pointerdown', 1, 'mouse', 5, 90));
    canvas.dispatchEvent(pointerEvent('pointerup', 1, 'mouse', 5, 90));

    expect(state.isNoteOn(1, 60)).toBe(false);
    expect(keyboard.isNoteHovered(60)).toBe(true);

    canvas.dispatchEvent(pointerEvent('pointerleave', 1, 'mouse', 5, 90));
    expect(keyboard.isNoteHovered(60)).toBe(false);
  });

  it('releases a bound key when shift changes its name before key up', () => {
    canvas.dispatchEvent(keyEvent('keydown', ';', 'Semicolon'));
    expect(state.isNoteOn(1, 88)).toBe(true);

    canvas.dispatchEvent(keyEvent('keyup', ':', 'Semicolon', true));
    expect(state.isNoteOn(1, 88)).toBe(false);
  });

  it('releases held keys on blur', () => {
    canvas.dispatchEvent(keyEvent('keydown', 'a', 'KeyA'));
    canvas.dispatchEvent(new Event('blur'));

    expect(state.isNoteOn(1, 72)).toBe(false);
  });

  it('stops routing events once detached', () => {
    detach();
    canvas.dispatchEvent(pointerEvent('pointerdown', 1, 'mouse', 5, 90));
    expect(state.isNoteOn(1, 60)).toBe(false);
  });
});
