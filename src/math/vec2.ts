/**
 * 2D vector utilities for shape transforms
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = readonly [number, number];

/** Anything a caller may hand in as a point or vector */
export type VecLike = readonly [number, number] | { readonly x: number; readonly y: number };

/**
 * Convert a caller-supplied pair to the internal tuple form.
 * Returns a new tuple (does not alias the input).
 */
export function toVec2(v: VecLike): Vec2 {
  if ("x" in v) {
    return [v.x, v.y];
  }
  return [v[0], v[1]];
}

/** Component-wise sum */
export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/** Component-wise product */
export function multiply(a: Vec2, b: Vec2): Vec2 {
  return [a[0] * b[0], a[1] * b[1]];
}

/**
 * Rotate a point about the origin.
 * @param cos - Cosine of the angle
 * @param sin - Sine of the angle
 */
export function rotate(p: Vec2, cos: number, sin: number): Vec2 {
  return [p[0] * cos - p[1] * sin, p[0] * sin + p[1] * cos];
}
