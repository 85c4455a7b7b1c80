/**
 * Motif - composable 2D shapes that stream triangles to WebGL2
 */

export const VERSION = "0.1.0";

export * from "./shape";
export * from "./texture";
export * from "./render";
export * as color from "./types/color";
export type { Color, ColorLike } from "./types/color";
export * as mat3 from "./math/mat3";
export * as vec2 from "./math/vec2";
export type { Vec2, VecLike } from "./math/vec2";
