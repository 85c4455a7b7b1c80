/**
 * RGBA color in 0-1 range
 */

export type Color = readonly [number, number, number, number];

/** RGB (opaque) or RGBA tuple */
export type ColorLike = Color | readonly [number, number, number];

export const WHITE: Color = [1, 1, 1, 1];
export const BLACK: Color = [0, 0, 0, 1];
export const RED: Color = [1, 0, 0, 1];
export const GREEN: Color = [0, 1, 0, 1];
export const BLUE: Color = [0, 0, 1, 1];
export const TRANSPARENT: Color = [0, 0, 0, 0];

/** Normalize to RGBA, defaulting alpha to 1 */
export function toColor(color: ColorLike): Color {
  if (color.length === 3) {
    return [color[0], color[1], color[2], 1];
  }
  return [color[0], color[1], color[2], color[3]];
}
