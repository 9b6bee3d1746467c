import { ALL_MIDI_CHANNELS_MASK, KEYBOARD_TIMER_HZ, MIDI_CHANNEL_MAX, MIDI_CHANNEL_MIN } from "@/core/constants";
import type { NoteStateModel } from "@/core/state/keyboard-state";
import { clampSetting } from "@/core/utils";
import { NoteBitset } from "@/core/utils/note-bitset";
import { resolveKeyboardConfig } from "./config";
import { KeyMapping, normalizeKey } from "./interactions/key-mapping";
import { PointerTracker, pointerSourceKey } from "./interactions/pointer-tracker";
import { paintKeyboard, type KeyboardPaintModel } from "./renderers/render-adapter";
import type { KeyboardSurface } from "./renderers/surface";
import { ViewportController } from "./state/viewport-controller";
import type {
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
  PointerSource,
  Rect,
  ScrollButtons,
  ScrollDirection,
  WheelDelta,
} from "./types";
import { integerContainer } from "./utils/rect";

const NO_NOTE: NoteHit = { note: null, velocity: 0 };
/** Outside every key and button */
const OFF_WIDGET: Point = { x: -1, y: -1 };

/**
 * Interactive piano keyboard.
 *
 * Plays notes into a shared {@link NoteStateModel} from pointer and computer
 * keyboard input, and redraws keys when that model changes. The host supplies
 * repaints, a timer and pointer/key queries; painting goes through a
 * {@link KeyboardSurface}.
 *
 * @example
 * ```typescript
 * const state = new KeyboardNoteState();
 * const keyboard = new MidiKeyboard(state, host, { orientation: "horizontal" });
 * keyboard.resize(800, 80);
 * keyboard.pointerDown({ source: { type: "mouse", index: 0 }, position: { x: 10, y: 70 } });
 * ```
 */
export class MidiKeyboard {
  private readonly viewport: ViewportController;
  private readonly tracker: PointerTracker;
  private readonly keyMapping: KeyMapping;

  private midiChannel: number;
  private midiChannelMask: number;
  private velocity: number;
  private useMousePositionForVelocity: boolean;
  private octaveForMiddleC: number;
  private colors: KeyboardColors;
  private readonly debug: boolean;

  /** On/off state as last drawn, per note */
  private readonly keysCurrentlyDrawnDown = new NoteBitset();
  private shouldCheckState = true;
  private shouldCheckPointerPositions = false;

  /** Sources whose press started on a scroll button, until they release */
  private readonly buttonCaptures = new Map<string, ScrollDirection>();
  private readonly buttonHovers = new Map<string, ScrollDirection>();

  private readonly unsubscribeState: () => void;
  private readonly stopTimer: () => void;
  private disposed = false;

  constructor(
    private readonly state: NoteStateModel,
    private readonly host: KeyboardHost,
    options: MidiKeyboardConfig = {},
    private readonly hooks: KeyPressHooks = {}
  ) {
    const config = resolveKeyboardConfig(options);

    this.midiChannel = config.midiChannel;
    this.midiChannelMask = config.midiChannelMask;
    this.velocity = config.velocity;
    this.useMousePositionForVelocity = config.useMousePositionForVelocity;
    this.octaveForMiddleC = config.octaveForMiddleC;
    this.colors = config.colors;
    this.debug = config.debug;

    this.viewport = new ViewportController(config);
    this.viewport.onLayout(() => this.host.requestRepaint());

    this.keyMapping = new KeyMapping(config.keyMappings, config.keyMappingBaseOctave, config.debug);

    this.tracker = new PointerTracker({
      locateNote: (position) => this.locateNote(position),
      eventVelocity: (hit) =>
        Math.max(0, this.useMousePositionForVelocity ? hit.velocity * this.velocity : 1),
      noteOn: (note, velocity) => this.state.noteOn(this.midiChannel, note, velocity),
      noteOff: (note, velocity) => this.state.noteOff(this.midiChannel, note, velocity),
      repaintNote: (note) => this.repaintNote(note),
    });

    this.unsubscribeState = this.state.subscribe({
      onNoteOn: () => {
        this.shouldCheckState = true;
      },
      onNoteOff: () => {
        this.shouldCheckState = true;
      },
    });

    this.stopTimer = this.host.startTimer(KEYBOARD_TIMER_HZ, () => this.tick());
  }

  // ------------------------------
  // Layout and scrolling
  // ------------------------------

  resize(width: number, height: number): void {
    this.viewport.resize(width, height);
  }

  setKeyWidth(width: number): void {
    this.viewport.setKeyWidth(width);
  }

  getKeyWidth(): number {
    return this.viewport.getKeyWidth();
  }

  setOrientation(orientation: Orientation): void {
    this.viewport.setOrientation(orientation);
  }

  getOrientation(): Orientation {
    return this.viewport.getOrientation();
  }

  setAvailableRange(lowestNote: number, highestNote: number): void {
    this.viewport.setRange(lowestNote, highestNote);
  }

  getRange(): NoteRange {
    return this.viewport.getRange();
  }

  getRangeStart(): number {
    return this.viewport.getRange().low;
  }

  getRangeEnd(): number {
    return this.viewport.getRange().high;
  }

  /** Accepts fractional notes for smooth scrolling */
  setLowestVisibleKey(note: number): void {
    this.viewport.setLowestVisibleNote(note);
  }

  getLowestVisibleKey(): number {
    return this.viewport.getLowestVisibleNote();
  }

  getLowestVisibleKeyFloat(): number {
    return this.viewport.getLowestVisibleNoteFloat();
  }

  setScrollButtonsVisible(visible: boolean): void {
    this.viewport.setScrollButtonsVisible(visible);
  }

  getScrollButtonsVisible(): boolean {
    return this.viewport.getScrollButtonsVisible();
  }

  getScrollButtons(): ScrollButtons {
    return this.viewport.getScrollButtons();
  }

  scrollByOctave(direction: ScrollDirection): void {
    this.viewport.scrollByOctave(direction);
  }

  /**
   * Listen for changes of the integer lowest visible note.
   * @returns Unsubscribe function
   */
  onLowestVisibleKeyChange(listener: (lowestVisibleKey: number) => void): () => void {
    return this.viewport.onViewportChange(listener);
  }

  setBlackNoteLengthProportion(ratio: number): void {
    this.viewport.setBlackNoteLengthRatio(ratio);
  }

  getBlackNoteLengthProportion(): number {
    return this.viewport.getBlackNoteLengthRatio();
  }

  setBlackNoteWidthProportion(ratio: number): void {
    this.viewport.setBlackNoteWidthRatio(ratio);
  }

  getBlackNoteWidthProportion(): number {
    return this.viewport.getBlackNoteWidthRatio();
  }

  // ------------------------------
  // Geometry
  // ------------------------------

  getKeyStartPosition(note: number): number {
    return this.viewport.getKeyStartPosition(note);
  }

  getTotalKeyboardWidth(): number {
    return this.viewport.getTotalKeyboardWidth();
  }

  getRectangleForKey(note: number): Rect | null {
    return this.viewport.getRectangleForKey(note);
  }

  /** Note under a point, or null over scroll buttons and outside the keys */
  getNoteAtPosition(position: Point): number | null {
    return this.locateNote(position).note;
  }

  getNoteAndVelocityAtPosition(position: Point): NoteHit {
    return this.locateNote(position);
  }

  // ------------------------------
  // Output settings
  // ------------------------------

  /**
   * Switch the channel played on. Every note held through this keyboard is
   * released on the old channel first.
   */
  setMidiChannel(channel: number): void {
    const next = clampSetting(channel, MIDI_CHANNEL_MIN, MIDI_CHANNEL_MAX, {
      name: "MIDI channel",
      fallback: this.midiChannel,
      integer: true,
      debug: this.debug,
    });
    if (next === this.midiChannel) return;
    this.resetAnyKeysInUse();
    this.midiChannel = next;
  }

  getMidiChannel(): number {
    return this.midiChannel;
  }

  setMidiChannelsToDisplay(mask: number): void {
    this.midiChannelMask = Number.isFinite(mask) ? mask & ALL_MIDI_CHANNELS_MASK : this.midiChannelMask;
    this.shouldCheckState = true;
  }

  getMidiChannelsToDisplay(): number {
    return this.midiChannelMask;
  }

  setVelocity(velocity: number, useMousePositionForVelocity: boolean): void {
    this.velocity = clampSetting(velocity, 0, 1, {
      name: "Velocity",
      fallback: this.velocity,
      debug: this.debug,
    });
    this.useMousePositionForVelocity = useMousePositionForVelocity;
  }

  getVelocity(): number {
    return this.velocity;
  }

  getUseMousePositionForVelocity(): boolean {
    return this.useMousePositionForVelocity;
  }

  setOctaveForMiddleC(octave: number): void {
    if (!Number.isFinite(octave)) return;
    const next = Math.round(octave);
    if (next === this.octaveForMiddleC) return;
    this.octaveForMiddleC = next;
    this.host.requestRepaint();
  }

  getOctaveForMiddleC(): number {
    return this.octaveForMiddleC;
  }

  setColors(colors: Partial<KeyboardColors>): void {
    this.colors = { ...this.colors, ...colors };
    this.host.requestRepaint();
  }

  getColors(): KeyboardColors {
    return { ...this.colors };
  }

  // ------------------------------
  // Computer keyboard
  // ------------------------------

  setKeyPressForNote(key: string, offsetFromC: number): void {
    this.keyMapping.bindKey(key, offsetFromC);
  }

  removeKeyPressForNote(offsetFromC: number): void {
    this.keyMapping.unbindOffset(offsetFromC);
  }

  /** Releases held notes, then drops every binding */
  clearKeyMappings(): void {
    this.resetAnyKeysInUse();
    this.keyMapping.clear();
  }

  getKeyMappings(): KeyBinding[] {
    return this.keyMapping.getBindings();
  }

  setKeyPressBaseOctave(octave: number): void {
    this.keyMapping.setBaseOctave(octave);
  }

  getKeyPressBaseOctave(): number {
    return this.keyMapping.getBaseOctave();
  }

  /**
   * Re-read bound key states from the host.
   * @returns Whether any note started or stopped
   */
  keyStateChanged(_isKeyDown: boolean): boolean {
    const used = this.keyMapping.keyStateChanged((key) => this.host.isKeyDown(key), {
      noteOn: (note) => {
        this.state.noteOn(this.midiChannel, note, this.velocity);
        this.repaintNote(note);
      },
      noteOff: (note) => {
        this.state.noteOff(this.midiChannel, note, 0);
        this.repaintNote(note);
      },
    });
    return used;
  }

  /** Whether the key is bound to a note */
  keyPressed(key: string): boolean {
    return this.keyMapping.isBound(normalizeKey(key));
  }

  focusLost(): void {
    this.resetAnyKeysInUse();
  }

  // ------------------------------
  // Pointer input
  // ------------------------------

  pointerMove(event: KeyboardPointerEvent): void {
    this.updateNoteUnderPointer(event.source, event.position, false);
    this.shouldCheckPointerPositions = false;
  }

  pointerDrag(event: KeyboardPointerEvent): void {
    if (!this.buttonCaptures.has(pointerSourceKey(event.source))) {
      const note = this.locateNote(event.position).note;
      if (note !== null) {
        this.hooks.mouseDraggedToKey?.(note, event);
      }
    }
    this.updateNoteUnderPointer(event.source, event.position, true);
  }

  pointerDown(event: KeyboardPointerEvent): void {
    const button = this.viewport.scrollButtonAt(event.position);
    if (button !== null) {
      this.buttonCaptures.set(pointerSourceKey(event.source), button);
      this.updateButtonHover(event.source, event.position);
      this.repaintScrollButton(button);
      this.viewport.scrollByOctave(button);
      return;
    }

    const note = this.locateNote(event.position).note;
    if (note === null) return;
    if (this.hooks.mouseDownOnKey && !this.hooks.mouseDownOnKey(note, event)) return;

    this.updateNoteUnderPointer(event.source, event.position, true);
    this.shouldCheckPointerPositions = true;
  }

  pointerUp(event: KeyboardPointerEvent): void {
    const id = pointerSourceKey(event.source);
    const captured = this.buttonCaptures.get(id);
    if (captured !== undefined) {
      this.buttonCaptures.delete(id);
      this.repaintScrollButton(captured);
      this.updateNoteUnderPointer(event.source, event.position, false);
      return;
    }

    this.updateNoteUnderPointer(event.source, event.position, false);
    this.shouldCheckPointerPositions = false;

    const note = this.locateNote(event.position).note;
    if (note !== null) {
      this.hooks.mouseUpOnKey?.(note, event);
    }
  }

  pointerEnter(event: KeyboardPointerEvent): void {
    this.updateNoteUnderPointer(event.source, event.position, false);
  }

  /** The source no longer hovers or presses anything, wherever it left from */
  pointerExit(event: KeyboardPointerEvent): void {
    this.updateNoteUnderPointer(event.source, OFF_WIDGET, false);
  }

  wheel(delta: WheelDelta): void {
    this.viewport.scrollByWheel(delta);
  }

  // ------------------------------
  // State queries
  // ------------------------------

  /** Down in the shared state for the displayed channels, or held here */
  isNoteDown(note: number): boolean {
    return (
      this.state.isNoteOnForChannels(this.midiChannelMask, note) ||
      this.tracker.isPressed(note) ||
      this.keyMapping.isPressed(note)
    );
  }

  isNoteHovered(note: number): boolean {
    return this.tracker.isHovered(note);
  }

  // ------------------------------
  // Painting and timer
  // ------------------------------

  paint(surface: KeyboardSurface): void {
    paintKeyboard(surface, this.getPaintModel());
  }

  getPaintModel(): KeyboardPaintModel {
    return {
      layout: this.viewport.getLayout(),
      colors: this.colors,
      octaveForMiddleC: this.octaveForMiddleC,
      scrollButtons: this.viewport.getScrollButtons(),
      isNoteDown: (note) => this.isNoteDown(note),
      isNoteHovered: (note) => this.isNoteHovered(note),
      scrollButtonInteraction: (direction) => ({
        hovered: [...this.buttonHovers.values()].includes(direction),
        pressed: [...this.buttonCaptures.values()].includes(direction),
      }),
    };
  }

  /**
   * Timer callback: redraw notes whose shared state changed, and let held
   * pointers follow the keys when the keyboard scrolls under them.
   */
  tick(): void {
    if (this.shouldCheckState) {
      this.shouldCheckState = false;
      const { low, high } = this.viewport.getRange();
      for (let note = low; note <= high; note++) {
        const isOn = this.state.isNoteOnForChannels(this.midiChannelMask, note);
        if (this.keysCurrentlyDrawnDown.has(note) !== isOn) {
          this.keysCurrentlyDrawnDown.set(note, isOn);
          this.repaintNote(note);
        }
      }
    }

    if (!this.shouldCheckPointerPositions) return;

    for (const pointer of this.host.getPointerSources()) {
      this.updateNoteUnderPointer(pointer.source, pointer.position, pointer.isDragging);
    }
  }

  /**
   * Stop the timer and the note-state subscription, releasing anything held.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.resetAnyKeysInUse();
    this.stopTimer();
    this.unsubscribeState();
    this.viewport.dispose();
  }

  // ------------------------------
  // Internals
  // ------------------------------

  private locateNote(position: Point): NoteHit {
    if (this.viewport.scrollButtonAt(position) !== null) return NO_NOTE;
    return this.viewport.noteAt(position);
  }

  private updateNoteUnderPointer(source: PointerSource, position: Point, isDown: boolean): void {
    this.updateButtonHover(source, position);
    if (this.buttonCaptures.has(pointerSourceKey(source))) return;
    this.tracker.update(source, position, isDown);
  }

  private updateButtonHover(source: PointerSource, position: Point): void {
    const id = pointerSourceKey(source);
    const previous = this.buttonHovers.get(id) ?? null;
    const current = this.viewport.scrollButtonAt(position);
    if (previous === current) return;

    if (current === null) {
      this.buttonHovers.delete(id);
    } else {
      this.buttonHovers.set(id, current);
    }
    if (previous !== null) this.repaintScrollButton(previous);
    if (current !== null) this.repaintScrollButton(current);
  }

  private repaintNote(note: number): void {
    const rect = this.viewport.getRectangleForKey(note);
    if (rect !== null) {
      this.host.requestRepaint(integerContainer(rect));
    }
  }

  private repaintScrollButton(direction: ScrollDirection): void {
    this.host.requestRepaint(integerContainer(this.viewport.getScrollButtons()[direction].bounds));
  }

  /**
   * Send note-off on the current channel for everything held through this
   * keyboard, and forget all hover and press state.
   */
  private resetAnyKeysInUse(): void {
    for (const note of this.keyMapping.releaseAll()) {
      this.state.noteOff(this.midiChannel, note, 0);
    }
    for (const note of this.tracker.releaseAll()) {
      this.state.noteOff(this.midiChannel, note, 0);
    }
    this.buttonCaptures.clear();
    this.buttonHovers.clear();
    this.host.requestRepaint();
  }
}
