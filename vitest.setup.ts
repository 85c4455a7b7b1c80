if (typeof globalThis.Image === "undefined") {
  // Every image decodes to 256x128; sources containing "missing" fail.
  class MockImage {
    onload: (() => void) | null = null;
    onerror: (() => void) | null = null;
    crossOrigin: string | null = null;
    width = 0;
    height = 0;
    naturalWidth = 0;
    naturalHeight = 0;

    set src(value: string) {
      if (value.includes("missing")) {
        this.onerror?.();
        return;
      }
      this.width = this.naturalWidth = 256;
      this.height = this.naturalHeight = 128;
      this.onload?.();
    }
  }

  Object.defineProperty(globalThis, "Image", {
    value: MockImage,
    configurable: true,
    writable: true,
  });
}
