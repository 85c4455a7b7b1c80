/**
 * Shape capability and structural combinators
 *
 * A shape is anything that yields a finite sequence of renderable triangles.
 * Every call to [Symbol.iterator]() starts a fresh pass, so the same shape
 * expression can be drawn once per frame indefinitely. Combinators wrap the
 * shape they decorate by reference; shapes are immutable, so wrapping never
 * copies triangles and decorating one shape twice yields two independent
 * expressions.
 */

import { add, multiply, rotate, toVec2, type Vec2, type VecLike } from "../math/vec2";
import { toColor, type Color, type ColorLike } from "../types/color";
import { mapPositions, withColor } from "./tri";
import type { RendTri } from "./types";

export abstract class Shape implements Iterable<RendTri> {
  abstract [Symbol.iterator](): Iterator<RendTri>;

  /** Combine with another shape: this shape's triangles first, then `other`'s. */
  combine(other: Shape): Combine {
    return new Combine(this, other);
  }

  /**
   * Translate by `vector`.
   *
   * @example
   * rect([-0.5, -0.5], [0.5, 0.5]).translate([0.1, 0.1]);
   */
  translate(vector: VecLike): Translate {
    return new Translate(this, toVec2(vector));
  }

  /**
   * Rotate about the origin (0, 0) by `angle` radians, counter-clockwise.
   * To rotate about another pivot, translate it to the origin first and back after.
   *
   * @example
   * rect([-0.5, -0.5], [0.5, 0.5]).rotate(Math.PI);
   */
  rotate(angle: number): Rotate {
    return new Rotate(this, angle);
  }

  /** Scale about the origin, uniformly or per axis */
  scale(factor: number | VecLike): Scale {
    return new Scale(this, typeof factor === "number" ? [factor, factor] : toVec2(factor));
  }

  /** Replace the color of every triangle */
  recolor(color: ColorLike): Recolor {
    return new Recolor(this, toColor(color));
  }

  /** Drain one full pass into a new array */
  triangles(): RendTri[] {
    return Array.from(this);
  }

  /** Number of triangles in one pass */
  count(): number {
    let n = 0;
    for (const _ of this) n++;
    return n;
  }

  /** Wrap an already materialized list of triangles. The list is copied. */
  static of(triangles: Iterable<RendTri>): Shape {
    return new TriangleList(Array.from(triangles));
  }

  /**
   * Combine any number of shapes, in iteration order.
   *
   * @example
   * const flower = Shape.union(
   *   [0, 1, 2, 3, 4, 5].map((i) => petal.rotate((i / 6) * 2 * Math.PI))
   * );
   */
  static union(shapes: Iterable<Shape>): Shape {
    let result: Shape | undefined;
    for (const shape of shapes) {
      result = result ? result.combine(shape) : shape;
    }
    return result ?? new TriangleList([]);
  }
}

/** Fixed list of triangles */
export class TriangleList extends Shape {
  constructor(private readonly list: readonly RendTri[]) {
    super();
  }

  [Symbol.iterator](): Iterator<RendTri> {
    return this.list[Symbol.iterator]();
  }
}

export class Translate extends Shape {
  constructor(readonly shape: Shape, readonly vector: Vec2) {
    super();
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    const v = this.vector;
    for (const rt of this.shape) {
      yield mapPositions(rt, (p) => add(p, v));
    }
  }
}

export class Rotate extends Shape {
  constructor(readonly shape: Shape, readonly angle: number) {
    super();
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    const cos = Math.cos(this.angle);
    const sin = Math.sin(this.angle);
    for (const rt of this.shape) {
      yield mapPositions(rt, (p) => rotate(p, cos, sin));
    }
  }
}

export class Scale extends Shape {
  constructor(readonly shape: Shape, readonly factor: Vec2) {
    super();
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    const f = this.factor;
    for (const rt of this.shape) {
      yield mapPositions(rt, (p) => multiply(p, f));
    }
  }
}

export class Recolor extends Shape {
  constructor(readonly shape: Shape, readonly color: Color) {
    super();
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    for (const rt of this.shape) {
      yield withColor(rt, this.color);
    }
  }
}

export class Combine extends Shape {
  constructor(readonly first: Shape, readonly second: Shape) {
    super();
  }

  *[Symbol.iterator](): Iterator<RendTri> {
    yield* this.first;
    yield* this.second;
  }
}
