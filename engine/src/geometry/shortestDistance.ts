import type { DistanceUnit, FeatureGeometry, LinearGeometry, Position } from "../types.js";
import { convertGeometry, type TileFeature, type TileGeometryConverter, type TileKey } from "../view/tiles.js";
import { segmentsIntersect } from "./intersect.js";
import { createRuler, type Ruler } from "./ruler.js";

export const NOT_COMPUTABLE = -1;

// Every search below stops at the first zero: no later candidate can be closer.

export function pointToLine(point: Position, line: readonly Position[], ruler: Ruler): number {
  const nearest = ruler.pointOnLine(line, point);
  return nearest ? ruler.distance(point, nearest.point) : Infinity;
}

export function pointToMultiLine(point: Position, lines: readonly Position[][], ruler: Ruler): number {
  let dist = Infinity;
  for (const line of lines) {
    const d = pointToLine(point, line, ruler);
    if (d === 0) return 0;
    dist = Math.min(dist, d);
  }
  return dist;
}

export function pointToMultiPoint(point: Position, points: readonly Position[], ruler: Ruler): number {
  let dist = Infinity;
  for (const other of points) {
    const d = ruler.distance(point, other);
    if (d === 0) return 0;
    dist = Math.min(dist, d);
  }
  return dist;
}

export function lineToLine(line1: readonly Position[], line2: readonly Position[], ruler: Ruler): number {
  let dist = Infinity;
  for (let i = 0; i < line1.length - 1; i++) {
    const p1 = line1[i];
    const p2 = line1[i + 1];
    for (let j = 0; j < line2.length - 1; j++) {
      const q1 = line2[j];
      const q2 = line2[j + 1];
      if (segmentsIntersect(p1, p2, q1, q2)) return 0;
      dist = Math.min(
        dist,
        pointToLine(p1, [q1, q2], ruler),
        pointToLine(p2, [q1, q2], ruler),
        pointToLine(q1, [p1, p2], ruler),
        pointToLine(q2, [p1, p2], ruler)
      );
    }
  }
  return dist;
}

function lineToMultiLine(line: readonly Position[], lines: readonly Position[][], ruler: Ruler): number {
  let dist = Infinity;
  for (const other of lines) {
    const d = lineToLine(line, other, ruler);
    if (d === 0) return 0;
    dist = Math.min(dist, d);
  }
  return dist;
}

function lineToMultiPoint(line: readonly Position[], points: readonly Position[], ruler: Ruler): number {
  let dist = Infinity;
  for (const point of points) {
    const d = pointToLine(point, line, ruler);
    if (d === 0) return 0;
    dist = Math.min(dist, d);
  }
  return dist;
}

function unreachable(value: never): never {
  throw new Error(`Unhandled geometry: ${JSON.stringify(value)}`);
}

export function pointDistanceToGeometry(point: Position, reference: LinearGeometry, unit: DistanceUnit): number {
  const ruler = createRuler(point[1], unit);
  switch (reference.type) {
    case "Point":
      return ruler.distance(point, reference.coordinates);
    case "MultiPoint":
      return pointToMultiPoint(point, reference.coordinates, ruler);
    case "LineString":
      return pointToLine(point, reference.coordinates, ruler);
    case "MultiLineString":
      return pointToMultiLine(point, reference.coordinates, ruler);
    default:
      return unreachable(reference);
  }
}

export function lineDistanceToGeometry(
  line: readonly Position[],
  reference: LinearGeometry,
  unit: DistanceUnit
): number {
  if (line.length === 0) return Infinity;
  const ruler = createRuler(line[0][1], unit);
  switch (reference.type) {
    case "Point":
      return pointToLine(reference.coordinates, line, ruler);
    case "MultiPoint":
      return lineToMultiPoint(line, reference.coordinates, ruler);
    case "LineString":
      return lineToLine(line, reference.coordinates, ruler);
    case "MultiLineString":
      return lineToMultiLine(line, reference.coordinates, ruler);
    default:
      return unreachable(reference);
  }
}

export function geometryDistance(
  geometry: FeatureGeometry | null,
  reference: LinearGeometry,
  unit: DistanceUnit
): number {
  if (!geometry) return NOT_COMPUTABLE;
  switch (geometry.type) {
    case "Point":
      return pointDistanceToGeometry(geometry.coordinates, reference, unit);
    case "MultiPoint": {
      let dist = Infinity;
      for (const point of geometry.coordinates) {
        const d = pointDistanceToGeometry(point, reference, unit);
        if (d === 0) return 0;
        dist = Math.min(dist, d);
      }
      return dist;
    }
    case "LineString":
      return lineDistanceToGeometry(geometry.coordinates, reference, unit);
    case "MultiLineString": {
      let dist = Infinity;
      for (const line of geometry.coordinates) {
        const d = lineDistanceToGeometry(line, reference, unit);
        if (d === 0) return 0;
        dist = Math.min(dist, d);
      }
      return dist;
    }
    case "Polygon":
    case "MultiPolygon":
      return NOT_COMPUTABLE;
    default:
      return unreachable(geometry);
  }
}

export function calculateDistance(
  feature: TileFeature,
  key: TileKey,
  reference: LinearGeometry,
  unit: DistanceUnit,
  convert: TileGeometryConverter = convertGeometry
): number {
  return geometryDistance(convert(feature, key), reference, unit);
}
