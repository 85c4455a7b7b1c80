/**
 * Triangle constructors and per-triangle mapping
 */

import { toVec2, type Vec2, type VecLike } from "../math/vec2";
import { WHITE, toColor, type Color, type ColorLike } from "../types/color";
import type { Positions, RendTri, Texture, Tri } from "./types";

type Triple<T> = readonly [T, T, T];

const ZERO_TEXCOORDS: Positions = [[0, 0], [0, 0], [0, 0]];

function toPositions(points: Triple<VecLike>): Positions {
  return [toVec2(points[0]), toVec2(points[1]), toVec2(points[2])];
}

/** Create a triangle with explicit texture coordinates and color */
export function createTri(
  positions: Triple<VecLike>,
  texcoords: Triple<VecLike>,
  color: ColorLike
): Tri {
  return {
    positions: toPositions(positions),
    texcoords: toPositions(texcoords),
    color: toColor(color),
  };
}

/** Create a flat triangle: zero texture coordinates, white unless a color is given */
export function createFlatTri(positions: Triple<VecLike>, color: ColorLike = WHITE): Tri {
  return {
    positions: toPositions(positions),
    texcoords: ZERO_TEXCOORDS,
    color: toColor(color),
  };
}

/** Wrap a triangle for rendering, optionally attaching a shared texture */
export function rendTri(tri: Tri, texture?: Texture): RendTri {
  return texture ? { tri, texture } : { tri };
}

/** Map every point of a triple */
function mapPoints(points: Positions, f: (p: Vec2) => Vec2): Positions {
  return [f(points[0]), f(points[1]), f(points[2])];
}

/** New RendTri with every position point mapped; everything else is shared */
export function mapPositions(rt: RendTri, f: (p: Vec2) => Vec2): RendTri {
  return rendTri({ ...rt.tri, positions: mapPoints(rt.tri.positions, f) }, rt.texture);
}

/** New RendTri with its color replaced */
export function withColor(rt: RendTri, color: Color): RendTri {
  return rendTri({ ...rt.tri, color }, rt.texture);
}
