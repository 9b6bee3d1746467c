import * as PIXI from "pixi.js";
import type { AlphaColor, Point, Rect } from "../types";
import type { GradientStop, KeyboardSurface, TextJustification } from "./surface";

/** Horizontal condensing applied to key labels */
const LABEL_HORIZONTAL_SCALE = 0.8;

/**
 * KeyboardSurface backed by a PixiJS Graphics layer and a container of text
 * labels. Call `begin()` before each paint pass.
 */
export class PixiKeyboardSurface implements KeyboardSurface {
  public readonly container: PIXI.Container;
  private readonly graphics: PIXI.Graphics;
  private readonly labels: PIXI.Container;
  /** Gradients referenced by the current frame */
  private gradients: PIXI.FillGradient[] = [];

  constructor() {
    this.container = new PIXI.Container();
    this.container.sortableChildren = true;

    this.graphics = new PIXI.Graphics();
    this.graphics.zIndex = 0;
    this.container.addChild(this.graphics);

    // Labels above the key fills
    this.labels = new PIXI.Container();
    this.labels.zIndex = 1;
    this.container.addChild(this.labels);
  }

  begin(): void {
    this.graphics.clear();
    for (const child of this.labels.removeChildren()) {
      child.destroy();
    }
    this.releaseGradients();
  }

  fillRect(rect: Rect, color: AlphaColor): void {
    if (rect.width <= 0 || rect.height <= 0) return;
    this.graphics.rect(rect.x, rect.y, rect.width, rect.height);
    this.graphics.fill({ color: color.color, alpha: color.alpha });
  }

  drawRect(rect: Rect, color: AlphaColor, thickness = 1): void {
    const t = Math.min(thickness, rect.width / 2, rect.height / 2);
    const { x, y, width, height } = rect;
    this.fillRect({ x, y, width, height: t }, color);
    this.fillRect({ x, y: y + height - t, width, height: t }, color);
    this.fillRect({ x, y: y + t, width: t, height: height - 2 * t }, color);
    this.fillRect({ x: x + width - t, y: y + t, width: t, height: height - 2 * t }, color);
  }

  drawText(
    text: string,
    rect: Rect,
    justification: TextJustification,
    color: AlphaColor,
    fontHeight: number
  ): void {
    const label = new PIXI.Text({
      text,
      style: {
        fontSize: fontHeight,
        fill: color.color,
        align: "center",
      },
    });
    label.alpha = color.alpha;
    label.scale.x = LABEL_HORIZONTAL_SCALE;

    switch (justification) {
      case "centred-bottom":
        label.x = rect.x + (rect.width - label.width) / 2;
        label.y = rect.y + rect.height - label.height;
        break;
      case "centred-left":
        label.x = rect.x;
        label.y = rect.y + (rect.height - label.height) / 2;
        break;
      case "centred-right":
        label.x = rect.x + rect.width - label.width;
        label.y = rect.y + (rect.height - label.height) / 2;
        break;
    }

    this.labels.addChild(label);
  }

  /**
   * Linear gradient between two stops given in widget coordinates.
   */
  fillGradient(rect: Rect, from: GradientStop, to: GradientStop): void {
    if (rect.width <= 0 || rect.height <= 0) return;

    // stops relative to the filled rectangle
    const local = (p: Point): Point => ({
      x: (p.x - rect.x) / rect.width,
      y: (p.y - rect.y) / rect.height,
    });
    const gradient = new PIXI.FillGradient({
      type: "linear",
      start: local(from),
      end: local(to),
      textureSpace: "local",
      colorStops: [
        { offset: 0, color: toPixiColor(from.color) },
        { offset: 1, color: toPixiColor(to.color) },
      ],
    });
    this.gradients.push(gradient);

    this.graphics.rect(rect.x, rect.y, rect.width, rect.height);
    this.graphics.fill(gradient);
  }

  fillTriangle(points: readonly [Point, Point, Point], color: AlphaColor): void {
    this.graphics.poly(points.flatMap((p) => [p.x, p.y]));
    this.graphics.fill({ color: color.color, alpha: color.alpha });
  }

  destroy(): void {
    this.container.destroy({ children: true });
    this.releaseGradients();
  }

  private releaseGradients(): void {
    for (const gradient of this.gradients) {
      gradient.destroy();
    }
    this.gradients = [];
  }
}

function toPixiColor(value: AlphaColor): PIXI.Color {
  return new PIXI.Color(value.color).setAlpha(value.alpha);
}
