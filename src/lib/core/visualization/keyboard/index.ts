import * as PIXI from "pixi.js";
import type { NoteStateModel } from "@/core/state/keyboard-state";
import { attachKeyboardEvents } from "./interactions/dom-events";
import { MidiKeyboard } from "./keyboard";
import { PixiKeyboardSurface } from "./renderers/pixi-surface";
import type { KeyPressHooks, MidiKeyboardConfig } from "./types";
import { DomKeyboardHost } from "./ui/dom-host";

export interface MidiKeyboardInstance {
  keyboard: MidiKeyboard;
  canvas: HTMLCanvasElement;
  /** Redraw immediately instead of on the next animation frame */
  render(): void;
  destroy(): void;
}

/**
 * Factory function to create a keyboard inside a DOM element
 * @param container - Element the canvas is appended to; the keyboard fills it
 * @param state - Note state shared with whatever else plays or listens
 * @param options - Configuration options
 * @param hooks - Optional press hooks
 */
export async function createMidiKeyboard(
  container: HTMLElement,
  state: NoteStateModel,
  options: MidiKeyboardConfig = {},
  hooks: KeyPressHooks = {}
): Promise<MidiKeyboardInstance> {
  const canvas = document.createElement("canvas");
  canvas.style.display = "block";
  canvas.style.width = "100%";
  canvas.style.height = "100%";
  canvas.style.touchAction = "none";
  container.appendChild(canvas);

  const width = Math.max(1, Math.floor(container.clientWidth));
  const height = Math.max(1, Math.floor(container.clientHeight));

  const app = new PIXI.Application();
  await app.init({
    canvas,
    width,
    height,
    antialias: true,
    autoStart: false,
    resolution: window.devicePixelRatio || 1,
    autoDensity: true,
  });

  const surface = new PixiKeyboardSurface();
  app.stage.addChild(surface.container);

  const render = (): void => {
    surface.begin();
    keyboard.paint(surface);
    app.render();
  };

  const host = new DomKeyboardHost(render);
  const keyboard = new MidiKeyboard(state, host, options, hooks);
  const detachEvents = attachKeyboardEvents(canvas, keyboard, host);

  keyboard.resize(width, height);
  render();

  const resizeObserver = new ResizeObserver((entries) => {
    for (const entry of entries) {
      const w = Math.floor(entry.contentRect.width);
      const h = Math.floor(entry.contentRect.height);
      if (w > 0 && h > 0) {
        app.renderer.resize(w, h);
        keyboard.resize(w, h);
      }
    }
  });
  resizeObserver.observe(container);

  return {
    keyboard,
    canvas,
    render,
    destroy: () => {
      resizeObserver.disconnect();
      detachEvents();
      keyboard.dispose();
      host.destroy();
      surface.destroy();
      app.destroy(true);
    },
  };
}

export { MidiKeyboard };
export { PixiKeyboardSurface };
export { DomKeyboardHost };
