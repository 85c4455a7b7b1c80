/**
 * 3x3 Matrix utilities for the renderer's view transform
 * Matrices are stored in column-major order (WebGL convention)
 */

import type { Vec2 } from "./vec2";

export type Mat3 = Float32Array;

/** Create an identity matrix */
export function create(): Mat3 {
  const m = new Float32Array(9);
  m[0] = 1;
  m[4] = 1;
  m[8] = 1;
  return m;
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat3, b: Mat3): Mat3 {
  const out = new Float32Array(9);

  for (let col = 0; col < 3; col++) {
    for (let row = 0; row < 3; row++) {
      out[col * 3 + row] =
        a[row]! * b[col * 3]! + a[3 + row]! * b[col * 3 + 1]! + a[6 + row]! * b[col * 3 + 2]!;
    }
  }

  return out;
}

/** Create a translation matrix */
export function translate(x: number, y: number): Mat3 {
  const m = create();
  m[6] = x;
  m[7] = y;
  return m;
}

/** Create a scale matrix */
export function scale(sx: number, sy: number): Mat3 {
  const m = new Float32Array(9);
  m[0] = sx;
  m[4] = sy;
  m[8] = 1;
  return m;
}

/** Create a counter-clockwise rotation matrix (radians) */
export function rotate(angle: number): Mat3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const m = create();
  m[0] = c;
  m[1] = s;
  m[3] = -s;
  m[4] = c;
  return m;
}

/**
 * Scale x so one unit covers the same number of pixels on both axes
 * of a width x height viewport (clip space stays [-1, 1] vertically).
 */
export function fitAspect(width: number, height: number): Mat3 {
  return scale(height / width, 1);
}

/** Transform a point (w = 1) */
export function transformPoint(m: Mat3, p: Vec2): Vec2 {
  return [m[0]! * p[0] + m[3]! * p[1] + m[6]!, m[1]! * p[0] + m[4]! * p[1] + m[7]!];
}
