import { describe, expect, it } from "vitest";
import { geoDistance } from "d3-geo";
import { createRuler, UNIT_FACTORS } from "../src/geometry/ruler.js";
import type { Position } from "../src/types.js";

const EARTH_RADIUS_M = 6371008.8;
const ONE_DEGREE_M = 111195.0802335329; // one degree of latitude on the mean sphere

describe("local distance ruler", () => {
  it("measures zero between a point and itself", () => {
    const ruler = createRuler(45);
    expect(ruler.distance([12.5, 45], [12.5, 45])).toBe(0);
  });

  it("matches the great-circle distance for one degree north of the equator", () => {
    const ruler = createRuler(0, "Meters");
    const d = ruler.distance([0, 0], [0, 1]);
    expect(d).toBeCloseTo(ONE_DEGREE_M, 3);

    const greatCircle = geoDistance([0, 0], [0, 1]) * EARTH_RADIUS_M;
    expect(Math.abs(d - greatCircle) / greatCircle).toBeLessThan(0.005);
  });

  it("shrinks longitude spans by the cosine of the anchor latitude", () => {
    const ruler = createRuler(60, "Meters");
    expect(ruler.kx).toBeCloseTo(ruler.ky / 2, 6);
    expect(ruler.distance([10, 60], [11, 60])).toBeCloseTo(ONE_DEGREE_M / 2, 3);
  });

  it("stays close to the great-circle distance near the anchor", () => {
    const a: Position = [13.4, 52.5];
    const b: Position = [13.45, 52.52];
    const flat = createRuler(52.5).distance(a, b);
    const greatCircle = geoDistance(a, b) * EARTH_RADIUS_M;
    expect(Math.abs(flat - greatCircle) / greatCircle).toBeLessThan(0.001);
  });

  it("wraps longitude differences across the antimeridian", () => {
    const ruler = createRuler(0);
    expect(ruler.distance([179.5, 0], [-179.5, 0])).toBeCloseTo(ONE_DEGREE_M, 3);
  });

  it("scales proportionally between units", () => {
    const a: Position = [2.35, 48.85];
    const b: Position = [2.5, 48.9];
    const meters = createRuler(48.85, "Meters").distance(a, b);
    expect(createRuler(48.85, "Kilometers").distance(a, b)).toBeCloseTo(meters / 1000, 9);
    expect(createRuler(48.85, "Miles").distance(a, b)).toBeCloseTo(meters / 1609.344, 9);
    expect(createRuler(48.85, "Inches").distance(a, b)).toBeCloseTo(meters / 0.0254, 3);
    expect(UNIT_FACTORS.Meters).toBe(1000);
  });
});

describe("nearest point on a line", () => {
  const ruler = createRuler(0);

  it("projects onto the interior of a segment", () => {
    const hit = ruler.pointOnLine(
      [
        [0, 0],
        [2, 0],
      ],
      [1, 1]
    );
    expect(hit).toEqual({ point: [1, 0], index: 0, t: 0.5 });
  });

  it("clamps to the segment end beyond its extent", () => {
    const hit = ruler.pointOnLine(
      [
        [0, 0],
        [2, 0],
      ],
      [3, 1]
    );
    expect(hit).toEqual({ point: [2, 0], index: 0, t: 1 });
  });

  it("reports the segment holding the nearest point", () => {
    const hit = ruler.pointOnLine(
      [
        [0, 0],
        [2, 0],
        [2, 2],
      ],
      [3, 1]
    );
    expect(hit?.index).toBe(1);
    expect(hit?.point[0]).toBeCloseTo(2, 9);
    expect(hit?.point[1]).toBeCloseTo(1, 9);
  });

  it("handles degenerate lines", () => {
    expect(ruler.pointOnLine([], [1, 1])).toBeNull();
    expect(ruler.pointOnLine([[5, 5]], [1, 1])).toEqual({ point: [5, 5], index: 0, t: 0 });
  });

  it("finds the nearest point on a single segment", () => {
    expect(ruler.nearestPointOnSegment([1, 1], [0, 0], [2, 0])).toEqual([1, 0]);
  });
});
