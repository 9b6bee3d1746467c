import { describe, it, expect, beforeEach } from 'vitest';
import { KeyMapping, normalizeKey } from '../src/lib/core/visualization/keyboard/interactions/key-mapping';
import { defaultKeyMappings } from '../src/lib/core/visualization/keyboard/config';

describe('normalizeKey', () => {
  it('lowercases single characters only', () => {
    expect(normalizeKey('Q')).toBe('q');
    expect(normalizeKey(';')).toBe(';');
    expect(normalizeKey('Enter')).toBe('Enter');
  });
});

describe('KeyMapping', () => {
  let mapping: KeyMapping;
  let down: Set<string>;
  let events: string[];

  const sink = {
    noteOn: (note: number) => events.push(`on:${note}`),
    noteOff: (note: number) => events.push(`off:${note}`),
  };
  const sync = (): boolean => mapping.keyStateChanged((key) => down.has(key), sink);

  beforeEach(() => {
    mapping = new KeyMapping(defaultKeyMappings(), 6);
    down = new Set();
    events = [];
  });

  it('binds the home row from C of the base octave', () => {
    const bindings = mapping.getBindings();
    expect(bindings).toHaveLength(17);
    expect(bindings[0]).toEqual({ key: 'a', offset: 0 });
    expect(bindings[16]).toEqual({ key: ';', offset: 16 });
  });

  it('plays on key down and releases on key up', () => {
    down.add('a');
    expect(sync()).toBe(true);
    expect(events).toEqual(['on:72']);
    expect(mapping.isPressed(72)).toBe(true);

    expect(sync()).toBe(false);

    down.delete('a');
    expect(sync()).toBe(true);
    expect(events).toEqual(['on:72', 'off:72']);
  });

  it('visits bindings last first', () => {
    down.add('a');
    down.add('s');
    sync();
    expect(events).toEqual(['on:74', 'on:72']);
  });

  it('moves a rebound offset to the new key', () => {
    mapping.bindKey('Z', 0);

    expect(mapping.isBound('a')).toBe(false);
    expect(mapping.isBound('z')).toBe(true);
    expect(mapping.getBindings().at(-1)).toEqual({ key: 'z', offset: 0 });

    down.add('z');
    sync();
    expect(events).toEqual(['on:72']);
  });

  it('unbinds every entry for an offset', () => {
    mapping.bindKey('x', 2);
    mapping.unbindOffset(2);

    expect(mapping.isBound('s')).toBe(false);
    expect(mapping.isBound('x')).toBe(false);
    expect(mapping.getBindings()).toHaveLength(16);
  });

  it('clamps the base octave', () => {
    mapping.setBaseOctave(11);
    expect(mapping.getBaseOctave()).toBe(10);
    mapping.setBaseOctave(-3);
    expect(mapping.getBaseOctave()).toBe(0);
    mapping.setBaseOctave(4.6);
    expect(mapping.getBaseOctave()).toBe(5);
  });

  it('ignores bindings that land above note 127', () => {
    mapping.setBaseOctave(10);
    down.add('p'); // offset 15 -> 135
    expect(sync()).toBe(false);
    expect(events).toEqual([]);

    down.add('a'); // 120
    expect(sync()).toBe(true);
    expect(events).toEqual(['on:120']);
  });

  it('returns held notes highest first on releaseAll', () => {
    down.add('a');
    down.add('d');
    sync();

    expect(mapping.releaseAll()).toEqual([76, 72]);
    expect(mapping.isPressed(72)).toBe(false);
  });

  it('drops every binding on clear', () => {
    down.add('a');
    sync();

    expect(mapping.clear()).toEqual([72]);
    expect(mapping.getBindings()).toEqual([]);
    expect(sync()).toBe(false);
  });
});
