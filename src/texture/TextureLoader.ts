/**
 * Image loading and texture management
 */

import type { Texture } from "../shape/types";
import { ResourceLoadError } from "./ResourceLoadError";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_TEXTURE_2D = 0x0de1;
const GL_RGBA = 0x1908;
const GL_UNSIGNED_BYTE = 0x1401;
const GL_TEXTURE_WRAP_S = 0x2802;
const GL_TEXTURE_WRAP_T = 0x2803;
const GL_TEXTURE_MIN_FILTER = 0x2801;
const GL_TEXTURE_MAG_FILTER = 0x2800;
const GL_CLAMP_TO_EDGE = 0x812f;
const GL_LINEAR = 0x2601;
const GL_NEAREST = 0x2600;
const GL_UNPACK_FLIP_Y_WEBGL = 0x9240;

export type TextureFilter = "linear" | "nearest";

export interface TextureLoaderOptions {
  /** CORS mode for image requests (default: "anonymous") */
  crossOrigin?: string;
  /** Min/mag filter (default: linear) */
  filter?: TextureFilter;
  /** Flip rows on upload so texcoord (0, 0) is the image's bottom-left (default: true) */
  flipY?: boolean;
}

const DEFAULT_OPTIONS: Required<TextureLoaderOptions> = {
  crossOrigin: "anonymous",
  filter: "linear",
  flipY: true,
};

/** A GPU texture created from a loaded image */
export class GLTexture implements Texture {
  private _destroyed = false;

  constructor(
    readonly gl: WebGL2RenderingContext,
    readonly handle: WebGLTexture,
    readonly width: number,
    readonly height: number
  ) {}

  /** Bind to TEXTURE_2D on the active unit */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed texture");
    }
    this.gl.bindTexture(GL_TEXTURE_2D, this.handle);
  }

  /** Delete the texture and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteTexture(this.handle);
    this._destroyed = true;
  }

  /** Check if texture has been destroyed */
  get destroyed(): boolean {
    return this._destroyed;
  }
}

export class TextureLoader {
  private gl: WebGL2RenderingContext;
  private options: Required<TextureLoaderOptions>;
  private cache = new Map<string, Promise<GLTexture>>();
  private loaded = new Set<GLTexture>();
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, options: TextureLoaderOptions = {}) {
    this.gl = gl;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Load an image into a texture.
   *
   * Concurrent and repeated loads of the same source share one texture.
   * A failed load rejects with ResourceLoadError and is forgotten, so a later
   * call starts a fresh attempt. Images that decode to zero size and loads
   * still pending when the loader is destroyed also reject.
   */
  load(src: string): Promise<GLTexture> {
    const cached = this.cache.get(src);
    if (cached) return cached;

    const pending = this.loadTexture(src);
    this.cache.set(src, pending);
    return pending;
  }

  private async loadTexture(src: string): Promise<GLTexture> {
    try {
      const img = await this.loadImage(src).catch((error: unknown) => {
        throw new ResourceLoadError(src, { cause: error });
      });
      if (this._destroyed) {
        throw new ResourceLoadError(src, { cause: new Error("TextureLoader was destroyed") });
      }
      if ((img.naturalWidth || img.width) === 0 || (img.naturalHeight || img.height) === 0) {
        throw new ResourceLoadError(src, { cause: new Error("Image has no intrinsic size") });
      }
      const texture = this.createTexture(img);
      this.loaded.add(texture);
      return texture;
    } catch (error) {
      this.cache.delete(src);
      console.warn(`[TextureLoader] Failed to load ${src}:`, error);
      throw error;
    }
  }

  private loadImage(src: string): Promise<HTMLImageElement> {
    const img = new Image();
    img.crossOrigin = this.options.crossOrigin;

    return new Promise<HTMLImageElement>((resolve, reject) => {
      img.onload = () => resolve(img);
      img.onerror = () => reject(new Error(`Image request failed: ${src}`));
      img.src = src;
    });
  }

  private createTexture(img: HTMLImageElement): GLTexture {
    const gl = this.gl;
    const handle = gl.createTexture();
    if (!handle) {
      throw new Error("Failed to create texture");
    }

    const filter = this.options.filter === "nearest" ? GL_NEAREST : GL_LINEAR;

    gl.bindTexture(GL_TEXTURE_2D, handle);
    gl.pixelStorei(GL_UNPACK_FLIP_Y_WEBGL, this.options.flipY);
    gl.texImage2D(GL_TEXTURE_2D, 0, GL_RGBA, GL_RGBA, GL_UNSIGNED_BYTE, img);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_S, GL_CLAMP_TO_EDGE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_T, GL_CLAMP_TO_EDGE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MIN_FILTER, filter);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MAG_FILTER, filter);
    gl.bindTexture(GL_TEXTURE_2D, null);

    return new GLTexture(gl, handle, img.naturalWidth || img.width, img.naturalHeight || img.height);
  }

  /** Delete every texture this loader created */
  destroy(): void {
    this._destroyed = true;
    for (const texture of this.loaded) {
      texture.destroy();
    }
    this.loaded.clear();
    this.cache.clear();
  }
}
