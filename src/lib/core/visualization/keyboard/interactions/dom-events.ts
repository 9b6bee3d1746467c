import { WHEEL_PIXELS_PER_LINE, WHEEL_PIXELS_PER_UNIT } from "@/core/constants";
import type { MidiKeyboard } from "../keyboard";
import type { KeyboardPointerEvent, Point, PointerSourceType, WheelDelta } from "../types";
import type { DomKeyboardHost } from "../ui/dom-host";

export function toPointerSourceType(pointerType: string): PointerSourceType {
  switch (pointerType) {
    case "touch":
      return "touch";
    case "pen":
      return "pen";
    default:
      return "mouse";
  }
}

/** What the event wiring needs from the canvas */
export type KeyboardEventTarget = Pick<
  HTMLElement,
  | "addEventListener"
  | "removeEventListener"
  | "focus"
  | "tabIndex"
  | "setPointerCapture"
  | "hasPointerCapture"
  | "releasePointerCapture"
  | "getBoundingClientRect"
>;

export function getPointerPosition(
  event: Pick<MouseEvent, "clientX" | "clientY">,
  canvas: Pick<Element, "getBoundingClientRect">
): Point {
  const rect = canvas.getBoundingClientRect();
  return {
    x: event.clientX - rect.left,
    y: event.clientY - rect.top,
  };
}

/**
 * DOM wheel deltas to keyboard units: one 100px notch is 0.125, positive
 * away from the user.
 */
export function normalizeWheel(event: Pick<WheelEvent, "deltaX" | "deltaY" | "deltaMode">): WheelDelta {
  const scale = event.deltaMode === 1 ? WHEEL_PIXELS_PER_LINE : 1;
  return {
    deltaX: (-event.deltaX * scale) / WHEEL_PIXELS_PER_UNIT,
    deltaY: (-event.deltaY * scale) / WHEEL_PIXELS_PER_UNIT,
  };
}

/**
 * Route canvas pointer, wheel, key and focus events to the keyboard.
 * @returns Function that removes every listener again
 */
export function attachKeyboardEvents(
  canvas: KeyboardEventTarget,
  keyboard: MidiKeyboard,
  host: DomKeyboardHost
): () => void {
  // Key events need focus
  if (canvas.tabIndex < 0) {
    canvas.tabIndex = 0;
  }

  const toEvent = (event: PointerEvent): KeyboardPointerEvent => ({
    source: { type: toPointerSourceType(event.pointerType), index: event.pointerId },
    position: getPointerPosition(event, canvas),
  });

  const onPointerDown = (event: PointerEvent): void => {
    event.preventDefault();
    canvas.focus();
    canvas.setPointerCapture(event.pointerId);
    const e = toEvent(event);
    host.trackPointer(e.source, e.position, true);
    keyboard.pointerDown(e);
  };

  const onPointerMove = (event: PointerEvent): void => {
    const e = toEvent(event);
    const dragging = host.isDragging(e.source);
    host.trackPointer(e.source, e.position, dragging);
    if (dragging) {
      keyboard.pointerDrag(e);
    } else {
      keyboard.pointerMove(e);
    }
  };

  const onPointerUp = (event: PointerEvent): void => {
    const e = toEvent(event);
    if (canvas.hasPointerCapture(event.pointerId)) {
      canvas.releasePointerCapture(event.pointerId);
    }
    if (e.source.type === "mouse") {
      host.trackPointer(e.source, e.position, false);
      keyboard.pointerUp(e);
      return;
    }
    // a lifted finger or pen hovers nothing
    host.forgetPointer(e.source);
    keyboard.pointerUp(e);
    keyboard.pointerExit(e);
  };

  const onPointerEnter = (event: PointerEvent): void => {
    const e = toEvent(event);
    host.trackPointer(e.source, e.position, host.isDragging(e.source));
    keyboard.pointerEnter(e);
  };

  const onPointerLeave = (event: PointerEvent): void => {
    const e = toEvent(event);
    // a captured drag keeps its pointer
    if (host.isDragging(e.source)) return;
    host.forgetPointer(e.source);
    keyboard.pointerExit(e);
  };

  const onWheel = (event: WheelEvent): void => {
    event.preventDefault();
    keyboard.wheel(normalizeWheel(event));
  };

  const onKeyDown = (event: KeyboardEvent): void => {
    if (event.ctrlKey || event.metaKey || event.altKey) return;
    host.setKeyDown(event.key, true, event.code);
    const used = keyboard.keyStateChanged(true);
    if (used || keyboard.keyPressed(event.key)) {
      event.preventDefault();
    }
  };

  const onKeyUp = (event: KeyboardEvent): void => {
    host.setKeyDown(event.key, false, event.code);
    if (keyboard.keyStateChanged(false)) {
      event.preventDefault();
    }
  };

  const onBlur = (): void => {
    host.releaseAllKeys();
    keyboard.focusLost();
  };

  canvas.addEventListener("pointerdown", onPointerDown);
  canvas.addEventListener("pointermove", onPointerMove);
  canvas.addEventListener("pointerup", onPointerUp);
  canvas.addEventListener("pointercancel", onPointerUp);
  canvas.addEventListener("pointerenter", onPointerEnter);
  canvas.addEventListener("pointerleave", onPointerLeave);
  canvas.addEventListener("wheel", onWheel, { passive: false });
  canvas.addEventListener("keydown", onKeyDown);
  canvas.addEventListener("keyup", onKeyUp);
  canvas.addEventListener("blur", onBlur);

  return () => {
    canvas.removeEventListener("pointerdown", onPointerDown);
    canvas.removeEventListener("pointermove", onPointerMove);
    canvas.removeEventListener("pointerup", onPointerUp);
    canvas.removeEventListener("pointercancel", onPointerUp);
    canvas.removeEventListener("pointerenter", onPointerEnter);
    canvas.removeEventListener("pointerleave", onPointerLeave);
    canvas.removeEventListener("wheel", onWheel);
    canvas.removeEventListener("keydown", onKeyDown);
    canvas.removeEventListener("keyup", onKeyUp);
    canvas.removeEventListener("blur", onBlur);
  };
}
