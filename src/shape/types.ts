/**
 * Shape data model
 */

import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";

/** Three points in caller-determined winding order */
export type Positions = readonly [Vec2, Vec2, Vec2];

/**
 * Opaque handle to a loaded image.
 *
 * Shared, never owned: any number of triangles may point at the same handle,
 * and the shape algebra only ever reads it.
 */
export interface Texture {
  /** Native width in pixels */
  readonly width: number;
  /** Native height in pixels */
  readonly height: number;
}

/** A single triangle, the only primitive that reaches the shader */
export interface Tri {
  /** The three space vertices */
  readonly positions: Positions;
  /** Texture coordinates of the vertices above */
  readonly texcoords: Positions;
  readonly color: Color;
}

/** Renderable triangle: a triangle plus the texture it samples, if any */
export interface RendTri {
  readonly tri: Tri;
  readonly texture?: Texture;
}
