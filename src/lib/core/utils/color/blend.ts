import { clamp01 } from "@/core/utils";

/**
 * A 24-bit color paired with an opacity in [0,1].
 * Same shape as a PixiJS fill style, so it can be passed straight through.
 */
export interface AlphaColor {
  color: number;
  alpha: number;
}

export const TRANSPARENT: AlphaColor = { color: 0xffffff, alpha: 0 };

/**
 * Composite `overlay` on top of `base` ("source over").
 *
 * @example
 * ```typescript
 * overlayColor({ color: 0xffffff, alpha: 1 }, { color: 0xffff00, alpha: 0.5 });
 * // { color: 0xffff80, alpha: 1 }
 * ```
 */
export function overlayColor(base: AlphaColor, overlay: AlphaColor): AlphaColor {
  const overA = clamp01(overlay.alpha);
  const baseA = clamp01(base.alpha);

  if (baseA <= 0) {
    return { color: overlay.color, alpha: overA };
  }

  const outA = overA + baseA * (1 - overA);
  if (outA <= 0) {
    return { ...base };
  }

  const [br, bg, bb] = intToRgb(base.color);
  const [or, og, ob] = intToRgb(overlay.color);
  const baseWeight = baseA * (1 - overA);

  return {
    color: rgbToInt(
      (or * overA + br * baseWeight) / outA,
      (og * overA + bg * baseWeight) / outA,
      (ob * overA + bb * baseWeight) / outA
    ),
    alpha: outA,
  };
}

/**
 * Lighten a color towards white. `amount` 0 leaves it unchanged; larger
 * values get closer to white without reaching it.
 */
export function brighterColor(value: AlphaColor, amount = 0.4): AlphaColor {
  const keep = 1 / (1 + Math.max(0, amount));
  const [r, g, b] = intToRgb(value.color);
  return {
    color: rgbToInt(255 - keep * (255 - r), 255 - keep * (255 - g), 255 - keep * (255 - b)),
    alpha: value.alpha,
  };
}

/** Replace the opacity of a color. */
export function withAlpha(value: AlphaColor, alpha: number): AlphaColor {
  return { color: value.color, alpha: clamp01(alpha) };
}

export function isTransparent(value: AlphaColor): boolean {
  return value.alpha <= 0;
}

// ------------------------------
// Helpers (private)
// ------------------------------

function intToRgb(value: number): [number, number, number] {
  const r = (value >> 16) & 0xff;
  const g = (value >> 8) & 0xff;
  const b = value & 0xff;
  return [r, g, b];
}

function rgbToInt(r: number, g: number, b: number): number {
  const rr = Math.max(0, Math.min(255, Math.round(r)));
  const gg = Math.max(0, Math.min(255, Math.round(g)));
  const bb = Math.max(0, Math.min(255, Math.round(b)));
  return (rr << 16) | (gg << 8) | bb;
}
