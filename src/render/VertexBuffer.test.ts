import { describe, it, expect, vi } from "vitest";
import { VertexBuffer } from "./VertexBuffer";

function createMockGL(): WebGL2RenderingContext {
  return {
    createBuffer: vi.fn(() => ({})),
    deleteBuffer: vi.fn(),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    ARRAY_BUFFER: 0x8892,
    DYNAMIC_DRAW: 0x88e8,
  } as unknown as WebGL2RenderingContext;
}

describe("VertexBuffer", () => {
  describe("constructor", () => {
    it("allocates the initial capacity in bytes", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl, 16);

      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, 64, gl.DYNAMIC_DRAW);
      expect(buffer.capacity).toBe(16);
    });

    it("defers allocation when capacity is 0", () => {
      const gl = createMockGL();
      new VertexBuffer(gl);

      expect(gl.bufferData).not.toHaveBeenCalled();
    });

    it("throws if buffer creation fails", () => {
      const gl = createMockGL();
      (gl.createBuffer as ReturnType<typeof vi.fn>).mockReturnValue(null);

      expect(() => new VertexBuffer(gl)).toThrow("Failed to create WebGL buffer");
    });
  });

  describe("upload", () => {
    it("reallocates when data outgrows the GPU allocation", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl, 4);
      const data = new Float32Array(8);

      buffer.upload(data);

      expect(gl.bufferData).toHaveBeenLastCalledWith(gl.ARRAY_BUFFER, data, gl.DYNAMIC_DRAW);
      expect(buffer.capacity).toBe(8);
      expect(buffer.length).toBe(8);
    });

    it("overwrites in place when data fits", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl, 16);
      const data = new Float32Array([1, 2, 3]);

      buffer.upload(data);

      expect(gl.bufferSubData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, 0, data);
      expect(gl.bufferData).toHaveBeenCalledTimes(1); // initial allocation only
    });

    it("skips the GPU for empty data", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl);

      buffer.upload(new Float32Array(0));

      expect(gl.bindBuffer).not.toHaveBeenCalled();
      expect(buffer.length).toBe(0);
    });

    it("throws after destroy", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl);
      buffer.destroy();

      expect(() => buffer.upload(new Float32Array([1]))).toThrow("Cannot upload to destroyed buffer");
      expect(() => buffer.bind()).toThrow("Cannot bind destroyed buffer");
    });
  });

  describe("destroy", () => {
    it("is idempotent", () => {
      const gl = createMockGL();
      const buffer = new VertexBuffer(gl);

      buffer.destroy();
      buffer.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledTimes(1);
      expect(buffer.destroyed).toBe(true);
    });
  });
});
