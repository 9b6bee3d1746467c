import type { Rect } from "../types";

export function trimRect(
  rect: Rect,
  trim: { left?: number; top?: number; right?: number; bottom?: number }
): Rect {
  const left = trim.left ?? 0;
  const top = trim.top ?? 0;
  return {
    x: rect.x + left,
    y: rect.y + top,
    width: rect.width - left - (trim.right ?? 0),
    height: rect.height - top - (trim.bottom ?? 0),
  };
}

/** Shrink by `amount` on every side */
export function reduceRect(rect: Rect, amount: number): Rect {
  return trimRect(rect, { left: amount, top: amount, right: amount, bottom: amount });
}

/** Smallest integer-aligned rectangle that covers `rect` */
export function integerContainer(rect: Rect): Rect {
  const x = Math.floor(rect.x);
  const y = Math.floor(rect.y);
  return {
    x,
    y,
    width: Math.ceil(rect.x + rect.width) - x,
    height: Math.ceil(rect.y + rect.height) - y,
  };
}

export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}
