import type {
  Feature,
  FeatureCollection,
  GeoJsonProperties,
  Geometry,
  Position as GeoJSONPosition,
} from "geojson";
import { feature as topojsonFeature } from "topojson-client";
import type { Topology } from "topojson-specification";
import type { Position, ReferenceGeometry } from "./types.js";

export type GeoJSONFeature = Feature<Geometry | null>;
export type GeoJSONFeatureCollection = FeatureCollection<Geometry | null>;
export type GeoJSONDocument = Geometry | GeoJSONFeature | GeoJSONFeatureCollection;

export type GeoJSONDecodeResult = { ok: true; document: GeoJSONDocument } | { ok: false; error: string };

class GeoJSONDecodeError extends Error {}

function fail(message: string): never {
  throw new GeoJSONDecodeError(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function decodePosition(value: unknown): GeoJSONPosition {
  if (!isArray(value) || value.length < 2) {
    fail("Invalid position: expected an array of at least two numbers.");
  }
  const position: number[] = [];
  for (const n of value) {
    if (typeof n !== "number" || !Number.isFinite(n)) {
      fail("Invalid position: coordinates must be finite numbers.");
    }
    position.push(n);
  }
  return position;
}

function decodePositions(value: unknown, type: string, min: number): GeoJSONPosition[] {
  if (!isArray(value)) fail(`Invalid ${type}: coordinates must be an array.`);
  if (value.length < min) fail(`Invalid ${type}: expected at least ${min} positions.`);
  return value.map(decodePosition);
}

function decodeNested<T>(value: unknown, type: string, member: (item: unknown) => T): T[] {
  if (!isArray(value)) fail(`Invalid ${type}: coordinates must be an array.`);
  return value.map(member);
}

function coordinatesOf(value: Record<string, unknown>, type: string): unknown {
  if (!("coordinates" in value)) fail(`Invalid ${type}: missing coordinates.`);
  return value.coordinates;
}

function decodeGeometry(value: unknown): Geometry {
  if (!isRecord(value)) fail("Invalid geometry: expected an object.");
  const type = typeof value.type === "string" ? value.type : undefined;
  switch (type) {
    case "Point":
      return { type: "Point", coordinates: decodePosition(coordinatesOf(value, type)) };
    case "MultiPoint":
      return { type: "MultiPoint", coordinates: decodePositions(coordinatesOf(value, type), type, 0) };
    case "LineString":
      return { type: "LineString", coordinates: decodePositions(coordinatesOf(value, type), type, 2) };
    case "MultiLineString":
      return {
        type: "MultiLineString",
        coordinates: decodeNested(coordinatesOf(value, type), type, (line) => decodePositions(line, "LineString", 2)),
      };
    case "Polygon":
      return {
        type: "Polygon",
        coordinates: decodeNested(coordinatesOf(value, type), type, (ring) => decodePositions(ring, "linear ring", 4)),
      };
    case "MultiPolygon":
      return {
        type: "MultiPolygon",
        coordinates: decodeNested(coordinatesOf(value, type), type, (polygon) =>
          decodeNested(polygon, "Polygon", (ring) => decodePositions(ring, "linear ring", 4))
        ),
      };
    case "GeometryCollection": {
      const { geometries } = value;
      if (!isArray(geometries)) fail("Invalid GeometryCollection: geometries must be an array.");
      return { type: "GeometryCollection", geometries: geometries.map(decodeGeometry) };
    }
    default:
      return fail(type === undefined ? "GeoJSON object is missing a type." : `Unknown GeoJSON geometry type "${type}".`);
  }
}

function decodeFeature(value: unknown): GeoJSONFeature {
  if (!isRecord(value) || value.type !== "Feature") fail("Invalid Feature: expected a Feature object.");
  const geometry = value.geometry === null || value.geometry === undefined ? null : decodeGeometry(value.geometry);

  let properties: GeoJsonProperties = null;
  if (isRecord(value.properties)) properties = { ...value.properties };
  else if (value.properties !== null && value.properties !== undefined) {
    fail("Invalid Feature: properties must be an object or null.");
  }

  const decoded: GeoJSONFeature = { type: "Feature", geometry, properties };
  if (typeof value.id === "string" || typeof value.id === "number") decoded.id = value.id;
  return decoded;
}

function decodeFeatureCollection(value: Record<string, unknown>): GeoJSONFeatureCollection {
  const { features } = value;
  if (!isArray(features)) fail("Invalid FeatureCollection: features must be an array.");
  return { type: "FeatureCollection", features: features.map(decodeFeature) };
}

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === "Topology" && isRecord(value.objects) && isArray(value.arcs);
}

function decodeTopology(value: Record<string, unknown>): GeoJSONFeatureCollection {
  if (!isTopology(value)) fail("Invalid Topology: expected objects and arcs.");
  const features: GeoJSONFeature[] = [];
  for (const object of Object.values(value.objects)) {
    let converted: unknown;
    try {
      converted = topojsonFeature(value, object);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      fail(`Invalid Topology: ${message}`);
    }
    if (isRecord(converted) && converted.type === "FeatureCollection") {
      features.push(...decodeFeatureCollection(converted).features);
    } else {
      features.push(decodeFeature(converted));
    }
  }
  return { type: "FeatureCollection", features };
}

/**
 * Decode a GeoJSON (or TopoJSON) value into a typed document.
 *
 * The input is validated structurally; the first problem found is reported as
 * the error message.
 */
export function decodeGeoJSON(value: unknown): GeoJSONDecodeResult {
  try {
    if (!isRecord(value)) fail("GeoJSON must be an object.");
    switch (value.type) {
      case "Feature":
        return { ok: true, document: decodeFeature(value) };
      case "FeatureCollection":
        return { ok: true, document: decodeFeatureCollection(value) };
      case "Topology":
        return { ok: true, document: decodeTopology(value) };
      default:
        return { ok: true, document: decodeGeometry(value) };
    }
  } catch (err) {
    if (err instanceof GeoJSONDecodeError) return { ok: false, error: err.message };
    throw err;
  }
}

function toPosition(position: GeoJSONPosition): Position {
  return [position[0], position[1]];
}

function toReferenceGeometry(geometry: Geometry | null): ReferenceGeometry | null {
  if (geometry?.type === "Point") {
    return { type: "Point", coordinates: toPosition(geometry.coordinates) };
  }
  if (geometry?.type === "LineString") {
    return { type: "LineString", coordinates: geometry.coordinates.map(toPosition) };
  }
  return null;
}

export function findReferenceGeometry(document: GeoJSONDocument): ReferenceGeometry | null {
  switch (document.type) {
    case "Feature":
      return toReferenceGeometry(document.geometry);
    case "FeatureCollection":
      for (const member of document.features) {
        const geometry = toReferenceGeometry(member.geometry);
        if (geometry) return geometry;
      }
      return null;
    default:
      return toReferenceGeometry(document);
  }
}

export function describeGeometryTypes(document: GeoJSONDocument): string {
  const typeOf = (geometry: Geometry | null) => geometry?.type ?? "null geometry";
  switch (document.type) {
    case "Feature":
      return typeOf(document.geometry);
    case "FeatureCollection": {
      if (document.features.length === 0) return "an empty FeatureCollection";
      const types = new Set(document.features.map((member) => typeOf(member.geometry)));
      return Array.from(types).join(", ");
    }
    default:
      return document.type;
  }
}
