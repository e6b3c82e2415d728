import type { Position } from "../types.js";

function cross(ax: number, ay: number, bx: number, by: number): number {
  return ax * by - ay * bx;
}

// true when p1 and p2 lie strictly on opposite sides of the line through q1->q2
function twoSided(p1: Position, p2: Position, q1: Position, q2: Position): boolean {
  const qx = q2[0] - q1[0];
  const qy = q2[1] - q1[1];
  const side1 = cross(p1[0] - q1[0], p1[1] - q1[1], qx, qy);
  const side2 = cross(p2[0] - q1[0], p2[1] - q1[1], qx, qy);
  return (side1 > 0 && side2 < 0) || (side1 < 0 && side2 > 0);
}

/**
 * Whether segment a->b crosses segment c->d.
 *
 * Parallel and collinear segments never cross, and neither does an endpoint that
 * only touches the other segment: both pairs of endpoints must be strictly on
 * opposite sides. Touching contacts are left to the point-to-segment distances,
 * which measure them as zero.
 */
export function segmentsIntersect(a: Position, b: Position, c: Position, d: Position): boolean {
  if (cross(d[0] - c[0], d[1] - c[1], b[0] - a[0], b[1] - a[1]) === 0) return false;
  return twoSided(a, b, c, d) && twoSided(c, d, a, b);
}
