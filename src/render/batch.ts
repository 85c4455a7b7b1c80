/**
 * Batching - flattens a triangle stream into interleaved vertex data
 * grouped into runs that share a texture.
 */

import type { RendTri, Texture } from "../shape/types";

/** Floats per vertex: x, y, u, v, r, g, b, a */
export const FLOATS_PER_VERTEX = 8;

/** Bytes between consecutive vertices */
export const VERTEX_STRIDE = FLOATS_PER_VERTEX * 4;

/** A maximal run of consecutive triangles sampling the same texture (or none) */
export interface DrawRun {
  texture?: Texture;
  /** Index of the run's first vertex */
  first: number;
  /** Number of vertices (3 per triangle) */
  count: number;
}

export interface Batch {
  vertices: Float32Array;
  runs: DrawRun[];
  triangleCount: number;
}

/**
 * Drain one pass of `triangles` into a batch.
 *
 * Emission order is kept exactly; a new run starts whenever the texture
 * reference changes, so a renderer drawing runs in order reproduces
 * painter's-algorithm layering.
 */
export function collectBatches(triangles: Iterable<RendTri>): Batch {
  const data: number[] = [];
  const runs: DrawRun[] = [];
  let current: DrawRun | undefined;
  let triangleCount = 0;

  for (const { tri, texture } of triangles) {
    if (!current || current.texture !== texture) {
      current = texture
        ? { texture, first: triangleCount * 3, count: 0 }
        : { first: triangleCount * 3, count: 0 };
      runs.push(current);
    }

    const [r, g, b, a] = tri.color;
    for (let i = 0; i < 3; i++) {
      const [x, y] = tri.positions[i] ?? [0, 0];
      const [u, v] = tri.texcoords[i] ?? [0, 0];
      data.push(x, y, u, v, r, g, b, a);
    }

    current.count += 3;
    triangleCount++;
  }

  return { vertices: new Float32Array(data), runs, triangleCount };
}
