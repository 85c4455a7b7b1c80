/** Raised when an image cannot be fetched or decoded */
export class ResourceLoadError extends Error {
  readonly source: string;

  constructor(source: string, options?: { cause?: unknown }) {
    super(`Failed to load image: ${source}`, options);
    this.name = "ResourceLoadError";
    this.source = source;
  }
}
