import type { AlphaColor, Point, Rect } from "../types";

export type TextJustification = "centred-bottom" | "centred-left" | "centred-right";

export interface GradientStop extends Point {
  color: AlphaColor;
}

/**
 * Drawing operations the keyboard paints with. Coordinates are widget pixels.
 */
export interface KeyboardSurface {
  fillRect(rect: Rect, color: AlphaColor): void;
  /** Outline drawn inside the rectangle */
  drawRect(rect: Rect, color: AlphaColor, thickness?: number): void;
  /** Single line of text, horizontally condensed, placed inside `rect` */
  drawText(
    text: string,
    rect: Rect,
    justification: TextJustification,
    color: AlphaColor,
    fontHeight: number
  ): void;
  /** Linear gradient between two points, filling `rect` */
  fillGradient(rect: Rect, from: GradientStop, to: GradientStop): void;
  fillTriangle(points: readonly [Point, Point, Point], color: AlphaColor): void;
}
