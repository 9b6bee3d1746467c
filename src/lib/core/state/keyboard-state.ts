/**
 * KeyboardNoteState - which notes are held on which MIDI channels.
 *
 * One instance is typically shared by several keyboards and by whatever feeds
 * notes in from outside (a sequencer, a Web MIDI input). Keyboards observe it
 * through `subscribe` and write to it through `noteOn` / `noteOff`.
 */

import {
  ALL_MIDI_CHANNELS_MASK,
  MIDI_CHANNEL_MAX,
  MIDI_CHANNEL_MIN,
  MIDI_NOTE_COUNT,
} from "@/core/constants";
import { clamp01 } from "@/core/utils";
import { isValidMidiNote } from "@/core/utils/midi/pitch";
import { ListenerManager } from "./utils/listener-manager";

export interface NoteStateListener {
  onNoteOn(channel: number, note: number, velocity: number): void;
  onNoteOff(channel: number, note: number, velocity: number): void;
}

/**
 * The part of a note-state model a keyboard relies on.
 */
export interface NoteStateModel {
  noteOn(channel: number, note: number, velocity: number): void;
  noteOff(channel: number, note: number, velocity: number): void;
  isNoteOnForChannels(channelMask: number, note: number): boolean;
  /** @returns Unsubscribe function */
  subscribe(listener: NoteStateListener): () => void;
}

type NoteStateChange = {
  kind: "on" | "off";
  channel: number;
  note: number;
  velocity: number;
};

export class KeyboardNoteState implements NoteStateModel {
  /** Per note, bit (channel - 1) is set while the note is held on that channel */
  private noteStates = new Uint16Array(MIDI_NOTE_COUNT);
  private listeners = new ListenerManager<[NoteStateChange]>("[KeyboardNoteState]");

  noteOn(channel: number, note: number, velocity: number): void {
    if (!isValidMidiNote(note)) return;

    const ch = toChannel(channel);
    this.noteStates[note] |= 1 << (ch - 1);
    this.listeners.notify({ kind: "on", channel: ch, note, velocity: clamp01(velocity) });
  }

  /** Releases the note; a note that is not held on the channel is ignored. */
  noteOff(channel: number, note: number, velocity: number): void {
    if (!this.isNoteOn(channel, note)) return;

    const ch = toChannel(channel);
    this.noteStates[note] &= ~(1 << (ch - 1));
    this.listeners.notify({ kind: "off", channel: ch, note, velocity: clamp01(velocity) });
  }

  /**
   * Release every held note on a channel, or on all channels when `channel`
   * is 0 or less.
   */
  allNotesOff(channel: number): void {
    if (channel <= 0) {
      for (let ch = MIDI_CHANNEL_MIN; ch <= MIDI_CHANNEL_MAX; ch++) {
        this.allNotesOff(ch);
      }
      return;
    }

    for (let note = 0; note < MIDI_NOTE_COUNT; note++) {
      this.noteOff(channel, note, 0);
    }
  }

  isNoteOn(channel: number, note: number): boolean {
    if (!isValidMidiNote(note)) return false;
    return (this.noteStates[note] & (1 << (toChannel(channel) - 1))) !== 0;
  }

  isNoteOnForChannels(channelMask: number, note: number): boolean {
    if (!isValidMidiNote(note)) return false;
    return (this.noteStates[note] & channelMask & ALL_MIDI_CHANNELS_MASK) !== 0;
  }

  /** Forget every held note without notifying listeners. */
  reset(): void {
    this.noteStates.fill(0);
  }

  subscribe(listener: NoteStateListener): () => void {
    return this.listeners.add((change) => {
      if (change.kind === "on") {
        listener.onNoteOn(change.channel, change.note, change.velocity);
      } else {
        listener.onNoteOff(change.channel, change.note, change.velocity);
      }
    });
  }

  get listenerCount(): number {
    return this.listeners.count;
  }
}

function toChannel(channel: number): number {
  if (!Number.isFinite(channel)) return MIDI_CHANNEL_MIN;
  return Math.min(MIDI_CHANNEL_MAX, Math.max(MIDI_CHANNEL_MIN, Math.round(channel)));
}
