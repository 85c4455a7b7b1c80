export { TextureLoader, GLTexture, type TextureLoaderOptions, type TextureFilter } from "./TextureLoader";
export { ResourceLoadError } from "./ResourceLoadError";
