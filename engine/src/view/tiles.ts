import { geoMercator, type GeoProjection } from "d3-geo";
import { DEFAULT_TILE_EXTENT } from "../config.js";
import type { FeatureGeometry, Position } from "../types.js";

export interface TileKey {
  x: number;
  y: number;
  z: number;
}

// extent units, y grows downwards
export interface TilePoint {
  x: number;
  y: number;
}

export type TileFeatureType = "Point" | "LineString" | "Polygon" | "Unknown";

export interface TileFeature {
  type: TileFeatureType;
  geometry: TilePoint[][]; // one entry per point, line or ring
}

export type TileGeometryConverter = (feature: TileFeature, key: TileKey) => FeatureGeometry | null;

export function tileId(key: TileKey): string {
  return `${key.z}/${key.x}/${key.y}`;
}

function worldProjection(z: number, extent: number): GeoProjection {
  const worldSize = extent * 2 ** z;
  return geoMercator()
    .scale(worldSize / (2 * Math.PI))
    .translate([worldSize / 2, worldSize / 2]);
}

function invertOrThrow(projection: GeoProjection, world: [number, number]): Position {
  if (!projection.invert) {
    throw new Error("Projection invert not available for tile coordinates");
  }
  const geo = projection.invert(world);
  if (!geo) throw new Error(`Cannot invert world coordinate ${world[0]},${world[1]}`);
  return [geo[0], geo[1]];
}

export function tilePointToLonLat(point: TilePoint, key: TileKey, extent = DEFAULT_TILE_EXTENT): Position {
  const projection = worldProjection(key.z, extent);
  return invertOrThrow(projection, [key.x * extent + point.x, key.y * extent + point.y]);
}

export function lonLatToTilePoint(position: Position, key: TileKey, extent = DEFAULT_TILE_EXTENT): TilePoint {
  const [wx, wy] = worldProjection(key.z, extent)(position) ?? [NaN, NaN];
  return { x: wx - key.x * extent, y: wy - key.y * extent };
}

export function tileBBox(key: TileKey, extent = DEFAULT_TILE_EXTENT): [number, number, number, number] {
  const [minLon, maxLat] = tilePointToLonLat({ x: 0, y: 0 }, key, extent);
  const [maxLon, minLat] = tilePointToLonLat({ x: extent, y: extent }, key, extent);
  return [minLon, minLat, maxLon, maxLat];
}

function signedArea(ring: TilePoint[]): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const p1 = ring[i];
    const p2 = ring[j];
    sum += (p2.x - p1.x) * (p1.y + p2.y);
  }
  return sum;
}

// Outer rings share the winding of the first non-degenerate ring; the rest are holes.
function classifyRings(rings: TilePoint[][]): TilePoint[][][] {
  const polygons: TilePoint[][][] = [];
  let current: TilePoint[][] | undefined;
  let outerIsNegative: boolean | undefined;

  for (const ring of rings) {
    const area = signedArea(ring);
    if (area === 0) continue;
    if (outerIsNegative === undefined) outerIsNegative = area < 0;
    if (outerIsNegative === area < 0 || !current) {
      current = [ring];
      polygons.push(current);
    } else {
      current.push(ring);
    }
  }
  return polygons;
}

// null for features without coordinates or of unknown type
export function createTileGeometryConverter(extent = DEFAULT_TILE_EXTENT): TileGeometryConverter {
  return (feature, key) => {
    const projection = worldProjection(key.z, extent);
    const toLonLat = (p: TilePoint) =>
      invertOrThrow(projection, [key.x * extent + p.x, key.y * extent + p.y]);
    const parts = feature.geometry.filter((part) => part.length > 0);

    switch (feature.type) {
      case "Point": {
        const points = parts.flat().map(toLonLat);
        if (points.length === 0) return null;
        return points.length === 1
          ? { type: "Point", coordinates: points[0] }
          : { type: "MultiPoint", coordinates: points };
      }
      case "LineString": {
        const lines = parts.map((line) => line.map(toLonLat));
        if (lines.length === 0) return null;
        return lines.length === 1
          ? { type: "LineString", coordinates: lines[0] }
          : { type: "MultiLineString", coordinates: lines };
      }
      case "Polygon": {
        const polygons = classifyRings(parts).map((rings) => rings.map((ring) => ring.map(toLonLat)));
        if (polygons.length === 0) return null;
        return polygons.length === 1
          ? { type: "Polygon", coordinates: polygons[0] }
          : { type: "MultiPolygon", coordinates: polygons };
      }
      case "Unknown":
        return null;
    }
  };
}

export const convertGeometry: TileGeometryConverter = createTileGeometryConverter();
