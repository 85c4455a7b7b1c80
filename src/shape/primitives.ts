/**
 * Primitive shapes
 *
 * Rectangles split along a fixed diagonal. Every rectangle-based primitive
 * lists its corners in the same order, so winding is consistent across them:
 *   first triangle:  (x0, y0) (x1, y0) (x0, y1)
 *   second triangle: (x1, y1) (x0, y1) (x1, y0)
 */

import earcut from "earcut";
import { toVec2, type Vec2, type VecLike } from "../math/vec2";
import { WHITE, toColor, type Color, type ColorLike } from "../types/color";
import { Shape } from "./Shape";
import { createFlatTri, createTri, rendTri } from "./tri";
import type { RendTri, Texture } from "./types";

/** Two opposite corners make a rectangle. */
export class Rect extends Shape {
  readonly first: Vec2;
  readonly second: Vec2;
  readonly color: Color;

  constructor(first: VecLike, second: VecLike, color: ColorLike = WHITE) {
    super();
    this.first = toVec2(first);
    this.second = toVec2(second);
    this.color = toColor(color);
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    const [x0, y0] = this.first;
    const [x1, y1] = this.second;
    yield rendTri(createFlatTri([[x0, y0], [x1, y0], [x0, y1]], this.color));
    yield rendTri(createFlatTri([[x1, y1], [x0, y1], [x1, y0]], this.color));
  }
}

/** Create a rectangle from two opposite corners */
export function rect(first: VecLike, second: VecLike, color?: ColorLike): Rect {
  return new Rect(first, second, color);
}

/**
 * Rectangle textured with an image over the unit square.
 * Both triangles share the same texture handle.
 */
export class ImageRect extends Shape {
  readonly first: Vec2;
  readonly second: Vec2;

  constructor(readonly texture: Texture, first: VecLike, second: VecLike) {
    super();
    this.first = toVec2(first);
    this.second = toVec2(second);
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    const [x0, y0] = this.first;
    const [x1, y1] = this.second;
    yield rendTri(
      createTri([[x0, y0], [x1, y0], [x0, y1]], [[0, 0], [1, 0], [0, 1]], WHITE),
      this.texture
    );
    yield rendTri(
      createTri([[x1, y1], [x0, y1], [x1, y0]], [[1, 1], [0, 1], [1, 0]], WHITE),
      this.texture
    );
  }
}

/**
 * Image rectangle centred on the origin with the given width.
 * Height follows the texture's native aspect ratio.
 */
export function imageW(texture: Texture, width: number): ImageRect {
  const height = (width * texture.height) / texture.width;
  return new ImageRect(texture, [-width / 2, -height / 2], [width / 2, height / 2]);
}

/**
 * Image rectangle centred on the origin with the given height.
 * Width follows the texture's native aspect ratio.
 */
export function imageH(texture: Texture, height: number): ImageRect {
  const width = (height * texture.width) / texture.height;
  return new ImageRect(texture, [-width / 2, -height / 2], [width / 2, height / 2]);
}

export interface PolygonOptions {
  /** Hole rings cut out of the outer ring */
  holes?: readonly (readonly VecLike[])[];
  /** Fill color (default: white) */
  color?: ColorLike;
}

/**
 * Simple polygon (possibly concave, optionally with holes) tessellated with earcut.
 * Tessellation happens once, at construction.
 */
export class Polygon extends Shape {
  private readonly list: readonly RendTri[];

  constructor(outer: readonly VecLike[], options: PolygonOptions = {}) {
    super();
    const color = toColor(options.color ?? WHITE);

    // Flatten coordinates for earcut
    const coords: number[] = [];
    const holeIndices: number[] = [];
    for (const p of outer) {
      const [x, y] = toVec2(p);
      coords.push(x, y);
    }
    for (const hole of options.holes ?? []) {
      holeIndices.push(coords.length / 2);
      for (const p of hole) {
        const [x, y] = toVec2(p);
        coords.push(x, y);
      }
    }

    const indices = earcut(coords, holeIndices.length > 0 ? holeIndices : undefined, 2);
    const point = (i: number): Vec2 => [coords[i * 2] ?? 0, coords[i * 2 + 1] ?? 0];

    const list: RendTri[] = [];
    for (let i = 0; i + 2 < indices.length; i += 3) {
      list.push(
        rendTri(
          createFlatTri(
            [point(indices[i] ?? 0), point(indices[i + 1] ?? 0), point(indices[i + 2] ?? 0)],
            color
          )
        )
      );
    }
    this.list = list;
  }

  [Symbol.iterator](): Iterator<RendTri> {
    return this.list[Symbol.iterator]();
  }
}

/** Create a polygon from its outer ring */
export function polygon(outer: readonly VecLike[], options?: PolygonOptions): Polygon {
  return new Polygon(outer, options);
}

/**
 * Regular polygon centred on the origin, as a triangle fan.
 * The first outer vertex lies on the positive x axis; vertices run counter-clockwise.
 */
export function regularPolygon(sides: number, radius: number, color: ColorLike = WHITE): Shape {
  if (!Number.isInteger(sides) || sides < 3) {
    throw new Error(`Regular polygon needs an integer number of sides >= 3, got ${sides}`);
  }

  const outer: Vec2[] = [];
  for (let i = 0; i <= sides; i++) {
    const angle = (i / sides) * Math.PI * 2;
    outer.push([Math.cos(angle) * radius, Math.sin(angle) * radius]);
  }

  const list: RendTri[] = [];
  for (let i = 0; i < sides; i++) {
    const a = outer[i] ?? [0, 0];
    const b = outer[i + 1] ?? [0, 0];
    list.push(rendTri(createFlatTri([[0, 0], a, b], color)));
  }
  return Shape.of(list);
}
