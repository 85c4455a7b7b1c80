/**
 * Shape composition
 */

export * from "./types";
export { Shape, TriangleList, Translate, Rotate, Scale, Recolor, Combine } from "./Shape";
export {
  Rect,
  rect,
  ImageRect,
  imageW,
  imageH,
  Polygon,
  polygon,
  regularPolygon,
  type PolygonOptions,
} from "./primitives";
export { createTri, createFlatTri, rendTri, mapPositions, withColor } from "./tri";
