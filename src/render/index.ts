/**
 * Rendering of shapes with WebGL2
 */

export { ShapeRenderer, type ShapeRendererOptions, type RenderStats } from "./ShapeRenderer";
export { collectBatches, FLOATS_PER_VERTEX, VERTEX_STRIDE, type Batch, type DrawRun } from "./batch";
export { VertexBuffer } from "./VertexBuffer";
