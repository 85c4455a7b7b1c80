import {
  VERSION,
  ResourceLoadError,
  Shape,
  ShapeRenderer,
  TextureLoader,
  imageW,
  mat3,
  rect,
} from "../src/index";

console.log(`Motif v${VERSION}`);

const canvas = document.getElementById("canvas") as HTMLCanvasElement;
const gl = canvas.getContext("webgl2", { antialias: true });
if (!gl) {
  throw new Error("WebGL2 not supported");
}

const renderer = new ShapeRenderer(gl, { clearColor: [0.1, 0.1, 0.1, 1], debug: true });
const textures = new TextureLoader(gl);

/** A petal: the image when it loads, a flat pink rectangle otherwise */
async function loadPetal(): Promise<Shape> {
  try {
    const texture = await textures.load("petal.svg");
    return imageW(texture, 0.4);
  } catch (error) {
    if (!(error instanceof ResourceLoadError)) throw error;
    return rect([-0.2, -0.05], [0.2, 0.05], [1, 0.6, 0.8]);
  }
}

function resize(): void {
  const dpr = window.devicePixelRatio || 1;
  const width = Math.floor(canvas.clientWidth * dpr);
  const height = Math.floor(canvas.clientHeight * dpr);
  if (canvas.width !== width || canvas.height !== height) {
    canvas.width = width;
    canvas.height = height;
    gl?.viewport(0, 0, width, height);
  }
}

async function main(): Promise<void> {
  const petal = (await loadPetal()).translate([0.3, 0]);

  // Six petals rotated around the centre
  const flower = Shape.union(
    [0, 1, 2, 3, 4, 5].map((i) => petal.rotate((i / 6) * 2 * Math.PI))
  );

  const start = performance.now();
  let animationId: number | null = null;

  const frame = (): void => {
    resize();
    renderer.clear();
    // Spin at 1 rad/sec
    const seconds = (performance.now() - start) / 1000;
    renderer.draw(flower.rotate(seconds), mat3.fitAspect(canvas.width, canvas.height));
    animationId = requestAnimationFrame(frame);
  };

  window.addEventListener("keydown", (e) => {
    if (e.key === "Escape" && animationId !== null) {
      cancelAnimationFrame(animationId);
      animationId = null;
      renderer.destroy();
      textures.destroy();
    } else if (e.key === " ") {
      console.log("Space!");
    }
  });

  frame();
}

main().catch((err) => {
  console.error("Failed to start demo:", err);
});
