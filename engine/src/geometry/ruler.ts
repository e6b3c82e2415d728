import type { DistanceUnit, Position } from "../types.js";

const EARTH_RADIUS_KM = 6371.0088; // mean radius
const RAD = Math.PI / 180;

export const UNIT_FACTORS: Record<DistanceUnit, number> = {
  Kilometers: 1,
  Meters: 1000,
  Miles: 1000 / 1609.344,
  Inches: 1000 / 0.0254,
};

export interface PointOnLine {
  point: Position;
  index: number; // segment start vertex
  t: number; // 0..1 along that segment
}

/**
 * Flat-earth distance metric linearised around one latitude.
 *
 * Longitude and latitude deltas are scaled by `kx`/`ky` and measured as plane
 * distances, which is accurate close to the anchor latitude and drifts away from it.
 */
export interface Ruler {
  readonly kx: number;
  readonly ky: number;
  distance(a: Position, b: Position): number;
  pointOnLine(line: readonly Position[], p: Position): PointOnLine | null;
  nearestPointOnSegment(p: Position, a: Position, b: Position): Position;
}

function wrapLongitude(deg: number): number {
  while (deg < -180) deg += 360;
  while (deg > 180) deg -= 360;
  return deg;
}

export function createRuler(latitude: number, unit: DistanceUnit = "Meters"): Ruler {
  const ky = RAD * EARTH_RADIUS_KM * UNIT_FACTORS[unit];
  const kx = ky * Math.cos(latitude * RAD);

  const distance = (a: Position, b: Position): number => {
    const dx = wrapLongitude(a[0] - b[0]) * kx;
    const dy = (a[1] - b[1]) * ky;
    return Math.sqrt(dx * dx + dy * dy);
  };

  const pointOnLine = (line: readonly Position[], p: Position): PointOnLine | null => {
    if (line.length === 0) return null;
    if (line.length === 1) return { point: [line[0][0], line[0][1]], index: 0, t: 0 };

    let minDist = Infinity;
    let best: PointOnLine = { point: [line[0][0], line[0][1]], index: 0, t: 0 };

    for (let i = 0; i < line.length - 1; i++) {
      let x = line[i][0];
      let y = line[i][1];
      let dx = wrapLongitude(line[i + 1][0] - x) * kx;
      let dy = (line[i + 1][1] - y) * ky;
      let t = 0;

      if (dx !== 0 || dy !== 0) {
        t = (wrapLongitude(p[0] - x) * kx * dx + (p[1] - y) * ky * dy) / (dx * dx + dy * dy);
        if (t > 1) {
          x = line[i + 1][0];
          y = line[i + 1][1];
        } else if (t > 0) {
          x += (dx / kx) * t;
          y += (dy / ky) * t;
        }
      }

      dx = wrapLongitude(p[0] - x) * kx;
      dy = (p[1] - y) * ky;
      const sqDist = dx * dx + dy * dy;
      if (sqDist < minDist) {
        minDist = sqDist;
        best = { point: [x, y], index: i, t: Math.max(0, Math.min(1, t)) };
      }
    }
    return best;
  };

  const nearestPointOnSegment = (p: Position, a: Position, b: Position): Position => {
    const hit = pointOnLine([a, b], p);
    return hit ? hit.point : a;
  };

  return { kx, ky, distance, pointOnLine, nearestPointOnSegment };
}
