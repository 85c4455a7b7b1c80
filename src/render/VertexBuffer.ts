/**
 * Streaming vertex buffer, re-uploaded every frame.
 *
 * Reallocates GPU storage only when a frame needs more than any frame before it;
 * otherwise overwrites the existing allocation in place.
 */

const GL_ARRAY_BUFFER = 0x8892;
const GL_DYNAMIC_DRAW = 0x88e8;

export class VertexBuffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;

  private gpuCapacity: number;
  private _length = 0;
  private _destroyed = false;

  /**
   * @param initialCapacity - Floats to allocate up front (0 defers allocation to the first upload)
   */
  constructor(gl: WebGL2RenderingContext, initialCapacity: number = 0) {
    this.gl = gl;

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;

    this.gpuCapacity = Math.max(0, initialCapacity);
    if (this.gpuCapacity > 0) {
      this.bind();
      gl.bufferData(GL_ARRAY_BUFFER, this.gpuCapacity * 4, GL_DYNAMIC_DRAW);
    }
  }

  /** Floats uploaded by the last upload() */
  get length(): number {
    return this._length;
  }

  /** Floats the GPU allocation can hold */
  get capacity(): number {
    return this.gpuCapacity;
  }

  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed buffer");
    }
    this.gl.bindBuffer(GL_ARRAY_BUFFER, this.handle);
  }

  /** Replace the buffer contents with `data` */
  upload(data: Float32Array): void {
    if (this._destroyed) {
      throw new Error("Cannot upload to destroyed buffer");
    }
    this._length = data.length;
    if (data.length === 0) return;

    this.bind();
    if (data.length > this.gpuCapacity) {
      this.gl.bufferData(GL_ARRAY_BUFFER, data, GL_DYNAMIC_DRAW);
      this.gpuCapacity = data.length;
    } else {
      this.gl.bufferSubData(GL_ARRAY_BUFFER, 0, data);
    }
  }

  /** Delete the buffer and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
