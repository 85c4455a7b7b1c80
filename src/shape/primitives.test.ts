import { describe, it, expect } from "vitest";
import { Rect, rect, imageW, imageH, polygon, regularPolygon } from "./primitives";
import type { RendTri, Texture } from "./types";

/** Sum of absolute triangle areas */
function totalArea(triangles: RendTri[]): number {
  let area = 0;
  for (const { tri } of triangles) {
    const [[ax, ay], [bx, by], [cx, cy]] = tri.positions;
    area += Math.abs((bx - ax) * (cy - ay) - (cx - ax) * (by - ay)) / 2;
  }
  return area;
}

describe("Rect", () => {
  it("splits into two triangles along the fixed diagonal", () => {
    const triangles = new Rect([-0.5, -0.5], [0.5, 0.5]).triangles();

    expect(triangles).toHaveLength(2);
    expect(triangles[0]!.tri.positions).toEqual([[-0.5, -0.5], [0.5, -0.5], [-0.5, 0.5]]);
    expect(triangles[1]!.tri.positions).toEqual([[0.5, 0.5], [-0.5, 0.5], [0.5, -0.5]]);
  });

  it("is flat white with zero texcoords and no texture", () => {
    for (const rt of rect([-0.5, -0.5], [0.5, 0.5])) {
      expect(rt.texture).toBeUndefined();
      expect(rt.tri.color).toEqual([1, 1, 1, 1]);
      expect(rt.tri.texcoords).toEqual([[0, 0], [0, 0], [0, 0]]);
    }
  });

  it("covers the whole rectangle whichever corners are given", () => {
    expect(totalArea(rect([0, 0], [2, 3]).triangles())).toBe(6);
    expect(totalArea(rect([2, 3], [0, 0]).triangles())).toBe(6);
    expect(totalArea(rect([0, 3], [2, 0]).triangles())).toBe(6);
  });

  it("takes an optional color", () => {
    const [first] = rect([0, 0], [1, 1], [0.2, 0.4, 0.6]).triangles();
    expect(first!.tri.color).toEqual([0.2, 0.4, 0.6, 1]);
  });

  it("accepts named-field corners", () => {
    const r = rect({ x: 1, y: 2 }, { x: 3, y: 4 });
    expect(r.first).toEqual([1, 2]);
    expect(r.second).toEqual([3, 4]);
  });
});

describe("image rectangles", () => {
  const texture: Texture = { width: 200, height: 100 };

  it("derives height from the texture's aspect ratio", () => {
    const triangles = imageW(texture, 0.4).triangles();
    const ys = triangles.flatMap((rt) => rt.tri.positions.map((p) => p[1]));
    const xs = triangles.flatMap((rt) => rt.tri.positions.map((p) => p[0]));

    expect(Math.max(...xs) - Math.min(...xs)).toBeCloseTo(0.4, 10);
    expect(Math.max(...ys) - Math.min(...ys)).toBeCloseTo(0.2, 10);
  });

  it("is centred on the origin", () => {
    const r = imageW(texture, 0.4);
    expect(r.first[0]).toBeCloseTo(-0.2, 10);
    expect(r.first[1]).toBeCloseTo(-0.1, 10);
    expect(r.second[0]).toBeCloseTo(0.2, 10);
    expect(r.second[1]).toBeCloseTo(0.1, 10);
  });

  it("derives width from a requested height", () => {
    const r = imageH(texture, 0.5);
    expect(r.second[0] - r.first[0]).toBeCloseTo(1, 10);
  });

  it("shares one texture handle between both triangles", () => {
    const [a, b] = imageW(texture, 0.4).triangles();
    expect(a!.texture).toBe(texture);
    expect(b!.texture).toBe(texture);
  });

  it("maps the unit square onto the corners", () => {
    const [a, b] = imageW(texture, 0.4).triangles();
    expect(a!.tri.texcoords).toEqual([[0, 0], [1, 0], [0, 1]]);
    expect(b!.tri.texcoords).toEqual([[1, 1], [0, 1], [1, 0]]);
    expect(a!.tri.color).toEqual([1, 1, 1, 1]);
  });
});

describe("polygon", () => {
  it("tessellates a square into 2 triangles", () => {
    const triangles = polygon([[0, 0], [1, 0], [1, 1], [0, 1]]).triangles();

    expect(triangles).toHaveLength(2);
    expect(totalArea(triangles)).toBeCloseTo(1, 10);
  });

  it("tessellates a concave polygon", () => {
    const lShape = polygon([[0, 0], [2, 0], [2, 1], [1, 1], [1, 2], [0, 2]]);
    const triangles = lShape.triangles();

    expect(triangles).toHaveLength(4);
    expect(totalArea(triangles)).toBeCloseTo(3, 10);
  });

  it("cuts out holes", () => {
    const outer = [[0, 0], [10, 0], [10, 10], [0, 10]] as const;
    const hole = [[2, 2], [8, 2], [8, 8], [2, 8]] as const;
    const triangles = polygon(outer, { holes: [hole] }).triangles();

    expect(triangles.length).toBeGreaterThan(2);
    expect(totalArea(triangles)).toBeCloseTo(64, 10);
  });

  it("applies the color and leaves texture empty", () => {
    for (const rt of polygon([[0, 0], [1, 0], [0, 1]], { color: [0, 1, 0, 0.5] })) {
      expect(rt.tri.color).toEqual([0, 1, 0, 0.5]);
      expect(rt.texture).toBeUndefined();
    }
  });

  it("yields nothing for a degenerate ring", () => {
    expect(polygon([[0, 0], [1, 1]]).count()).toBe(0);
  });
});

describe("regularPolygon", () => {
  it("builds a fan of one triangle per side", () => {
    const triangles = regularPolygon(4, 1).triangles();
    const [p0, p1, p2] = triangles[0]!.tri.positions;

    expect(triangles).toHaveLength(4);
    expect(p0).toEqual([0, 0]);
    expect(p1).toEqual([1, 0]);
    expect(p2[0]).toBeCloseTo(0, 10);
    expect(p2[1]).toBeCloseTo(1, 10);
    expect(totalArea(triangles)).toBeCloseTo(2, 10);
  });

  it("rejects fewer than 3 sides", () => {
    expect(() => regularPolygon(2, 1)).toThrow("Regular polygon needs an integer number of sides >= 3, got 2");
    expect(() => regularPolygon(3.5, 1)).toThrow("got 3.5");
  });
});
