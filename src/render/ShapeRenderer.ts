/**
 * Shape renderer - drains a shape once per draw call and renders it
 * with a single program, one drawArrays per texture run.
 */

import { create as identity, type Mat3 } from "../math/mat3";
import { createShapeProgramInfo } from "../shaders/programs";
import type { RendTri } from "../shape/types";
import { GLTexture } from "../texture/TextureLoader";
import type { Color } from "../types/color";
import { collectBatches, FLOATS_PER_VERTEX, VERTEX_STRIDE } from "./batch";
import { VertexBuffer } from "./VertexBuffer";

// WebGL constants
const GL_FLOAT = 0x1406;
const GL_TRIANGLES = 0x0004;
const GL_TEXTURE0 = 0x84c0;
const GL_BLEND = 0x0be2;
const GL_SRC_ALPHA = 0x0302;
const GL_ONE_MINUS_SRC_ALPHA = 0x0303;
const GL_COLOR_BUFFER_BIT = 0x4000;

export interface ShapeRendererOptions {
  /** Floats of vertex storage to allocate up front (default: 4096) */
  initialCapacity?: number;
  /** Color used by clear() (default: opaque black) */
  clearColor?: Color;
  /** Log frame statistics once per second (default: false) */
  debug?: boolean;
}

const DEFAULT_OPTIONS: Required<ShapeRendererOptions> = {
  initialCapacity: 4096,
  clearColor: [0, 0, 0, 1],
  debug: false,
};

export interface RenderStats {
  triangles: number;
  runs: number;
}

export class ShapeRenderer {
  private gl: WebGL2RenderingContext;
  private options: Required<ShapeRendererOptions>;
  private program: WebGLProgram;
  private vao: WebGLVertexArrayObject;
  private vertices: VertexBuffer;

  private attribs: { position: number; texcoord: number; color: number };
  private matrixUniform: WebGLUniformLocation;
  private textureUniform: WebGLUniformLocation;
  private useTextureUniform: WebGLUniformLocation;

  private stats: RenderStats = { triangles: 0, runs: 0 };
  private frameCount = 0;
  private lastDebugTime = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, options: ShapeRendererOptions = {}) {
    this.gl = gl;
    this.options = { ...DEFAULT_OPTIONS, ...options };

    const programInfo = createShapeProgramInfo(gl);
    this.program = programInfo.program;
    this.attribs = programInfo.attribs;
    this.matrixUniform = programInfo.uniforms.matrix;
    this.textureUniform = programInfo.uniforms.texture;
    this.useTextureUniform = programInfo.uniforms.useTexture;

    this.vertices = new VertexBuffer(gl, this.options.initialCapacity);
    this.vao = this.createVao();
  }

  private createVao(): WebGLVertexArrayObject {
    const gl = this.gl;
    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create VAO");
    }
    gl.bindVertexArray(vao);
    this.vertices.bind();

    const layout: [location: number, size: number, offset: number][] = [
      [this.attribs.position, 2, 0],
      [this.attribs.texcoord, 2, 8],
      [this.attribs.color, 4, 16],
    ];
    for (const [location, size, offset] of layout) {
      if (location < 0) continue;
      gl.enableVertexAttribArray(location);
      gl.vertexAttribPointer(location, size, GL_FLOAT, false, VERTEX_STRIDE, offset);
    }

    gl.bindVertexArray(null);
    return vao;
  }

  /** Clear the color buffer with the configured clear color */
  clear(): void {
    const [r, g, b, a] = this.options.clearColor;
    this.gl.clearColor(r, g, b, a);
    this.gl.clear(GL_COLOR_BUFFER_BIT);
  }

  /**
   * Draw one pass of a shape.
   * @param matrix - View transform applied in the vertex shader (default: identity)
   */
  draw(shape: Iterable<RendTri>, matrix: Mat3 = identity()): void {
    if (this._destroyed) {
      throw new Error("Cannot draw with destroyed renderer");
    }

    const batch = collectBatches(shape);
    this.stats = { triangles: batch.triangleCount, runs: batch.runs.length };
    this.logStats();
    if (batch.triangleCount === 0) return;

    const gl = this.gl;
    this.vertices.upload(batch.vertices);

    gl.enable(GL_BLEND);
    gl.blendFunc(GL_SRC_ALPHA, GL_ONE_MINUS_SRC_ALPHA);

    gl.useProgram(this.program);
    gl.uniformMatrix3fv(this.matrixUniform, false, matrix);
    gl.activeTexture(GL_TEXTURE0);
    gl.uniform1i(this.textureUniform, 0);
    gl.bindVertexArray(this.vao);

    for (const run of batch.runs) {
      if (run.texture) {
        if (!(run.texture instanceof GLTexture)) {
          throw new Error("Texture was not created by a TextureLoader");
        }
        run.texture.bind();
        gl.uniform1i(this.useTextureUniform, 1);
      } else {
        gl.uniform1i(this.useTextureUniform, 0);
      }
      gl.drawArrays(GL_TRIANGLES, run.first, run.count);
    }

    gl.bindVertexArray(null);
  }

  /** Statistics of the last draw call */
  getStats(): RenderStats {
    return { ...this.stats };
  }

  private logStats(): void {
    if (!this.options.debug) return;

    this.frameCount++;
    const now = Date.now();
    if (now - this.lastDebugTime > 1000) {
      console.log(
        `[ShapeRenderer] frame=${this.frameCount}, triangles=${this.stats.triangles}, ` +
          `runs=${this.stats.runs}, floats=${this.stats.triangles * 3 * FLOATS_PER_VERTEX}`
      );
      this.lastDebugTime = now;
    }
  }

  /** Clean up GPU resources. Textures belong to their loader and are left alone. */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteProgram(this.program);
    this.gl.deleteVertexArray(this.vao);
    this.vertices.destroy();
    this._destroyed = true;
  }
}
