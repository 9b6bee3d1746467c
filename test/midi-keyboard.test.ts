import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MidiKeyboard } from '../src/lib/core/visualization/keyboard/keyboard';
import { KeyboardNoteState } from '../src/lib/core/state/keyboard-state';
import type {
  KeyboardPointerEvent,
  KeyPressHooks,
  Point,
  PointerSource,
} from '../src/lib/core/visualization/keyboard/types';
import { FakeHost, RecordingSurface } from './utils/fakes';

const mouse: PointerSource = { type: 'mouse', index: 0 };
const at = (x: number, y: number, source: PointerSource = mouse): KeyboardPointerEvent => ({
  source,
  position: { x, y },
});

type NoteEvent = [kind: 'on' | 'off', channel: number, note: number, velocity: number];

describe('MidiKeyboard', () => {
  let state: KeyboardNoteState;
  let host: FakeHost;
  let events: NoteEvent[];

  beforeEach(() => {
    state = new KeyboardNoteState();
    host = new FakeHost();
    events = [];
    state.subscribe({
      onNoteOn: (channel, note, velocity) => events.push(['on', channel, note, velocity]),
      onNoteOff: (channel, note, velocity) => events.push(['off', channel, note, velocity]),
    });
  });

  // One octave and a C, 20px white keys, nothing to scroll
  const createSmall = (hooks: KeyPressHooks = {}) => {
    const keyboard = new MidiKeyboard(state, host, { noteRange: { low: 60, high: 72 }, keyWidth: 20 }, hooks);
    keyboard.resize(400, 100);
    return keyboard;
  };

  // Full range, 16px keys in a 400px strip starting at note 48
  const createScrolling = () => {
    const keyboard = new MidiKeyboard(state, host, { keyWidth: 16 });
    keyboard.resize(400, 80);
    return keyboard;
  };

  describe('lifecycle', () => {
    it('subscribes to the note state and starts a 20 Hz timer', () => {
      createSmall();
      expect(host.timerHz).toBe(20);
      expect(state.listenerCount).toBe(2);
    });

    it('unsubscribes, stops the timer and releases held notes on dispose', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));

      keyboard.dispose();

      expect(state.listenerCount).toBe(1);
      expect(host.timerStopped).toBe(true);
      expect(state.isNoteOn(1, 60)).toBe(false);
    });
  });

  describe('pointer input', () => {
    it('plays the key under the pointer with a position-scaled velocity', () => {
      const keyboard = createSmall();

      keyboard.pointerDown(at(5, 90));

      expect(events).toHaveLength(1);
      expect(events[0].slice(0, 3)).toEqual(['on', 1, 60]);
      expect(events[0][3]).toBeCloseTo(0.9);
      expect(keyboard.isNoteDown(60)).toBe(true);
      expect(keyboard.isNoteHovered(60)).toBe(true);
    });

    it('releases the key on pointer up', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));
      keyboard.pointerUp(at(5, 90));

      expect(events.map((e) => e[0])).toEqual(['on', 'off']);
      expect(state.isNoteOn(1, 60)).toBe(false);
    });

    it('scales by the configured velocity, or sends full velocity when position is ignored', () => {
      const keyboard = createSmall();

      keyboard.setVelocity(0.5, true);
      keyboard.pointerDown(at(5, 90));
      keyboard.pointerUp(at(5, 90));
      expect(events[0][3]).toBeCloseTo(0.45);

      keyboard.setVelocity(0.5, false);
      keyboard.pointerDown(at(5, 90));
      expect(events[2]).toEqual(['on', 1, 60, 1]);
    });

    it('follows a drag from key to key', () => {
      const draggedTo = vi.fn();
      const keyboard = createSmall({ mouseDraggedToKey: draggedTo });

      keyboard.pointerDown(at(5, 90));
      keyboard.pointerDrag(at(25, 90));

      expect(draggedTo).toHaveBeenCalledWith(62, at(25, 90));
      expect(events.map((e) => `${e[0]}:${e[2]}`)).toEqual(['on:60', 'off:60', 'on:62']);
    });

    it('lets a hook refuse a press', () => {
      const downOnKey = vi.fn(() => false);
      const keyboard = createSmall({ mouseDownOnKey: downOnKey });

      keyboard.pointerDown(at(5, 90));

      expect(downOnKey).toHaveBeenCalledWith(60, at(5, 90));
      expect(events).toEqual([]);
    });

    it('reports the released key to the up hook', () => {
      const upOnKey = vi.fn();
      const keyboard = createSmall({ mouseUpOnKey: upOnKey });

      keyboard.pointerDown(at(5, 90));
      keyboard.pointerUp(at(5, 90));

      expect(upOnKey).toHaveBeenCalledWith(60, at(5, 90));
    });

    it('forgets the source entirely when it leaves the widget', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));

      keyboard.pointerExit(at(5, 90));

      expect(keyboard.isNoteHovered(60)).toBe(false);
      expect(state.isNoteOn(1, 60)).toBe(false);
    });

    it('clears every lifted touch even when each leaves over its key', () => {
      const keyboard = createSmall();
      const fingers = [
        { source: { type: 'touch' as const, index: 1 }, x: 5 },
        { source: { type: 'touch' as const, index: 2 }, x: 25 },
        { source: { type: 'touch' as const, index: 3 }, x: 45 },
      ];

      for (const { source, x } of fingers) {
        keyboard.pointerDown(at(x, 90, source));
        keyboard.pointerUp(at(x, 90, source));
        keyboard.pointerExit(at(x, 90, source));
      }

      expect([60, 62, 64].map((note) => keyboard.isNoteHovered(note))).toEqual([false, false, false]);
      expect(events.map((e) => `${e[0]}:${e[2]}`)).toEqual(['on:60', 'off:60', 'on:62', 'off:62', 'on:64', 'off:64']);
    });

    it('ignores presses that miss every key', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(300, 90));
      expect(events).toEqual([]);
    });

    it('draws locally held notes as down even on hidden channels', () => {
      const keyboard = createSmall();
      keyboard.setMidiChannelsToDisplay(0b10);

      keyboard.pointerDown(at(5, 90));
      expect(state.isNoteOnForChannels(0b10, 60)).toBe(false);
      expect(keyboard.isNoteDown(60)).toBe(true);

      keyboard.pointerUp(at(5, 90));
      expect(keyboard.isNoteDown(60)).toBe(false);
    });

    it('re-checks held pointers on every tick until released', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));
      host.pointers = [{ source: mouse, position: { x: 25, y: 90 }, isDragging: true }];

      keyboard.tick();

      expect(state.isNoteOn(1, 60)).toBe(false);
      expect(state.isNoteOn(1, 62)).toBe(true);
    });

    it('stops re-checking pointers after pointer up', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));
      keyboard.pointerUp(at(5, 90));
      host.pointers = [{ source: mouse, position: { x: 25, y: 90 }, isDragging: true }];

      keyboard.tick();

      expect(state.isNoteOn(1, 62)).toBe(false);
    });
  });

  describe('computer keyboard', () => {
    it('plays bound keys at the widget velocity', () => {
      const keyboard = createSmall();
      keyboard.setVelocity(0.75, true);
      host.keysDown.add('a');

      expect(keyboard.keyStateChanged(true)).toBe(true);
      expect(events).toEqual([['on', 1, 72, 0.75]]);

      host.keysDown.delete('a');
      expect(keyboard.keyStateChanged(false)).toBe(true);
      expect(events[1]).toEqual(['off', 1, 72, 0]);
    });

    it('knows which keys are bound', () => {
      const keyboard = createSmall();
      expect(keyboard.keyPressed('A')).toBe(true);
      expect(keyboard.keyPressed('1')).toBe(false);

      keyboard.setKeyPressForNote('1', 0);
      expect(keyboard.keyPressed('1')).toBe(true);
      expect(keyboard.keyPressed('a')).toBe(false);
    });

    it('releases held keys when focus is lost', () => {
      const keyboard = createSmall();
      host.keysDown.add('a');
      keyboard.keyStateChanged(true);

      keyboard.focusLost();

      expect(state.isNoteOn(1, 72)).toBe(false);
    });

    it('releases held keys before dropping the mappings', () => {
      const keyboard = createSmall();
      host.keysDown.add('a');
      keyboard.keyStateChanged(true);

      keyboard.clearKeyMappings();

      expect(state.isNoteOn(1, 72)).toBe(false);
      expect(keyboard.getKeyMappings()).toEqual([]);
      expect(keyboard.keyStateChanged(true)).toBe(false);
    });
  });

  describe('MIDI channel', () => {
    it('releases every held note on the old channel when switching', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));
      host.keysDown.add('a');
      keyboard.keyStateChanged(true);
      events = [];

      keyboard.setMidiChannel(2);

      expect(events).toEqual([
        ['off', 1, 72, 0],
        ['off', 1, 60, 0],
      ]);
      expect(keyboard.getMidiChannel()).toBe(2);

      keyboard.keyStateChanged(true);
      expect(state.isNoteOn(2, 72)).toBe(true);
    });

    it('clamps the channel and does nothing when unchanged', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));

      keyboard.setMidiChannel(0);
      expect(keyboard.getMidiChannel()).toBe(1);
      expect(state.isNoteOn(1, 60)).toBe(true);

      keyboard.setMidiChannel(16.4);
      expect(keyboard.getMidiChannel()).toBe(16);
    });
  });

  describe('timer', () => {
    it('repaints only notes whose shared state changed', () => {
      const keyboard = createSmall();
      keyboard.tick();
      host.repaints = [];

      state.noteOn(3, 64, 1);
      keyboard.tick();

      expect(host.repaints).toEqual([{ x: 40, y: 0, width: 20, height: 100 }]);

      host.repaints = [];
      keyboard.tick();
      expect(host.repaints).toEqual([]);
    });

    it('rescans when the displayed channels change', () => {
      const keyboard = createSmall();
      state.noteOn(3, 64, 1);
      keyboard.tick();
      host.repaints = [];

      keyboard.setMidiChannelsToDisplay(0b1);
      keyboard.tick();

      expect(host.repaints).toEqual([{ x: 40, y: 0, width: 20, height: 100 }]);
      expect(keyboard.isNoteDown(64)).toBe(false);
    });
  });

  describe('scrolling', () => {
    it('scrolls an octave from a scroll button without playing', () => {
      const keyboard = createScrolling();

      keyboard.pointerDown(at(5, 40));

      expect(keyboard.getLowestVisibleKey()).toBe(36);
      expect(events).toEqual([]);
      expect(keyboard.getPaintModel().scrollButtonInteraction('down')).toEqual({
        hovered: true,
        pressed: true,
      });
    });

    it('keeps a press that started on a button away from the keys', () => {
      const keyboard = createScrolling();

      keyboard.pointerDown(at(5, 40));
      keyboard.pointerDrag(at(100, 40));
      keyboard.pointerUp(at(100, 40));

      expect(events).toEqual([]);
      expect(keyboard.getPaintModel().scrollButtonInteraction('down')).toEqual({
        hovered: false,
        pressed: false,
      });
    });

    it('finds no note under a visible scroll button', () => {
      const keyboard = createScrolling();
      expect(keyboard.getNoteAtPosition({ x: 5, y: 40 })).toBeNull();
      expect(keyboard.getNoteAtPosition({ x: 15, y: 70 })).toBe(48);
    });

    it('scrolls with the wheel', () => {
      const keyboard = createScrolling();
      keyboard.wheel({ deltaX: 0, deltaY: -0.125 });
      expect(keyboard.getLowestVisibleKey()).toBe(46);
    });

    it('notifies lowest visible key listeners', () => {
      const keyboard = createScrolling();
      const onChange = vi.fn();
      keyboard.onLowestVisibleKeyChange(onChange);

      keyboard.scrollByOctave('up');

      expect(onChange).toHaveBeenCalledWith(60);
    });
  });

  describe('geometry', () => {
    it('exposes key rectangles and positions', () => {
      const keyboard = createSmall();
      expect(keyboard.getRectangleForKey(60)).toEqual({ x: 0, y: 0, width: 20, height: 100 });
      expect(keyboard.getRectangleForKey(59)).toBeNull();
      expect(keyboard.getKeyStartPosition(64)).toBe(40);
      expect(keyboard.getTotalKeyboardWidth()).toBe(160);
    });

    it('reports note and velocity at a position', () => {
      const keyboard = createSmall();
      const point: Point = { x: 15, y: 35 };
      const hit = keyboard.getNoteAndVelocityAtPosition(point);
      expect(hit.note).toBe(61);
      expect(hit.velocity).toBeCloseTo(0.5);
    });
  });

  describe('paint', () => {
    it('paints a held and hovered white key with both overlays', () => {
      const keyboard = createSmall();
      keyboard.pointerDown(at(5, 90));
      const surface = new RecordingSurface();

      keyboard.paint(surface);

      expect(surface.calls[0]).toEqual({
        op: 'fillRect',
        rect: { x: 0, y: 0, width: 400, height: 100 },
        color: { color: 0xffffff, alpha: 1 },
      });
      expect(surface.calls).toContainEqual({
        op: 'fillRect',
        rect: { x: 0, y: 0, width: 20, height: 100 },
        color: { color: 0xdbdb00, alpha: 1 },
      });
    });
  });
});
