import { resolveEngineConfig } from "../config.js";
import { decodeGeoJSON, describeGeometryTypes, findReferenceGeometry, type GeoJSONDocument } from "../geojson.js";
import { calculateDistance } from "../geometry/shortestDistance.js";
import { createLogger } from "../log.js";
import type { DistanceUnit, Position, ReferenceGeometry } from "../types.js";
import { createTileGeometryConverter } from "../view/tiles.js";
import type { ParsingContext } from "./context.js";
import {
  describeValue,
  EvaluationError,
  isValueObject,
  type EvaluationContext,
  type EvaluationResult,
  type Expression,
  type Value,
  type ValueObject,
} from "./types.js";

const log = createLogger("distance");

export const DEFAULT_DISTANCE_UNIT: DistanceUnit = "Meters";

// Case-sensitive; "Metres" is accepted as a spelling of "Meters".
const UNIT_NAMES = new Map<string, DistanceUnit>([
  ["Meters", "Meters"],
  ["Metres", "Meters"],
  ["Kilometers", "Kilometers"],
  ["Miles", "Miles"],
  ["Inches", "Inches"],
]);

export function parseDistanceUnit(input: unknown): DistanceUnit {
  return (typeof input === "string" ? UNIT_NAMES.get(input) : undefined) ?? DEFAULT_DISTANCE_UNIT;
}

export interface DistanceArguments {
  source: object; // the argument exactly as written
  document: GeoJSONDocument;
  unit: DistanceUnit;
}

export function parseDistanceArguments(args: readonly unknown[], ctx: ParsingContext): DistanceArguments | null {
  if (args.length !== 2 && args.length !== 3) {
    ctx.error(`'distance' expression requires exactly one argument, but found ${args.length - 1} instead.`);
    return null;
  }

  const source = args[1];
  if (typeof source !== "object" || source === null || Array.isArray(source)) {
    ctx.error(
      `'distance' expression requires a GeoJSON object argument, but found ${describeValue(source)} instead.`,
      1
    );
    return null;
  }

  const decoded = decodeGeoJSON(source);
  if (!decoded.ok) {
    ctx.error(decoded.error, 1);
    return null;
  }

  const unit = args.length === 3 ? parseDistanceUnit(args[2]) : DEFAULT_DISTANCE_UNIT;
  return { source, document: decoded.document, unit };
}

// Numbers, strings, arrays and objects carry over; anything else becomes null.
function toExpressionValue(value: unknown): Value {
  if (typeof value === "number" || typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(toExpressionValue);
  if (typeof value === "object" && value !== null) {
    const result: ValueObject = {};
    for (const [key, member] of Object.entries(value)) {
      result[key] = toExpressionValue(member);
    }
    return result;
  }
  return null;
}

// Deep copy of a JSON-like document with every array and object frozen.
function freezeDocument(value: unknown): unknown {
  if (Array.isArray(value)) {
    const copy = value.map(freezeDocument);
    Object.freeze(copy);
    return copy;
  }
  if (typeof value === "object" && value !== null) {
    const copy: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      copy[key] = freezeDocument(member);
    }
    Object.freeze(copy);
    return copy;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Structural equality; numbers compare with ===, so 0 and -0 match.
function sameDocument(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!sameDocument(a[i], b[i])) return false;
    }
    return true;
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!Object.prototype.hasOwnProperty.call(b, key) || !sameDocument(a[key], b[key])) return false;
    }
    return true;
  }
  return false;
}

// Deep copy so freezing never touches the caller's arrays.
function freezeGeometry(geometry: ReferenceGeometry): ReferenceGeometry {
  const copy = (position: Position): Position => {
    const next: Position = [position[0], position[1]];
    Object.freeze(next);
    return next;
  };
  const frozen: ReferenceGeometry =
    geometry.type === "Point"
      ? { type: "Point", coordinates: copy(geometry.coordinates) }
      : { type: "LineString", coordinates: geometry.coordinates.map(copy) };
  if (frozen.type === "LineString") Object.freeze(frozen.coordinates);
  Object.freeze(frozen);
  return frozen;
}

/**
 * `["distance", geojson, unit?]`: shortest distance from the evaluated feature to
 * a Point or LineString taken from a GeoJSON document.
 *
 * The node keeps a frozen copy of the document as written, which is what
 * `serialize` emits, and the geometry extracted from it, which is what `evaluate`
 * measures against. Without a converter on the context, tile geometry is read with
 * the tile extent from `resolveEngineConfig`.
 */
export class DistanceExpression implements Expression {
  readonly kind = "distance";
  readonly type = "number";
  readonly source: unknown;
  readonly geometry: ReferenceGeometry;
  readonly unit: DistanceUnit;

  constructor(source: unknown, geometry: ReferenceGeometry, unit: DistanceUnit = DEFAULT_DISTANCE_UNIT) {
    this.source = freezeDocument(source);
    this.geometry = freezeGeometry(geometry);
    this.unit = unit;
  }

  static parse(args: readonly unknown[], ctx: ParsingContext): DistanceExpression | null {
    const parsed = parseDistanceArguments(args, ctx);
    if (!parsed) return null;

    const geometry = findReferenceGeometry(parsed.document);
    if (!geometry) {
      ctx.error(
        "'distance' expression requires valid geojson source that contains Point/LineString geometry type, " +
          `but found ${describeGeometryTypes(parsed.document)}.`,
        1
      );
      return null;
    }
    return new DistanceExpression(parsed.source, geometry, parsed.unit);
  }

  evaluate(ctx: EvaluationContext): EvaluationResult<number> {
    const { feature, canonical } = ctx;
    if (!feature || !canonical) {
      return {
        ok: false,
        error: new EvaluationError("distance expression requires valid feature and canonical information."),
      };
    }
    if (feature.type !== "Point" && feature.type !== "LineString") {
      return {
        ok: false,
        error: new EvaluationError(
          `distance expression currently only supports feature with Point or LineString geometry, but found ${feature.type}.`
        ),
      };
    }

    const convert = ctx.convertGeometry ?? createTileGeometryConverter(resolveEngineConfig().tileExtent);
    try {
      const value = calculateDistance(feature, canonical, this.geometry, this.unit, convert);
      return { ok: true, value };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        error: new EvaluationError(`distance expression could not read feature geometry: ${message}`),
      };
    }
  }

  serialize(): Value {
    let encoded = toExpressionValue(this.source);
    if (!isValueObject(encoded)) {
      log.warn("Failed to serialize 'distance' expression, reference document is not an object", {
        found: describeValue(this.source),
      });
      encoded = {};
    }
    const serialized: Value[] = [this.getOperator(), encoded];
    if (this.unit !== DEFAULT_DISTANCE_UNIT) serialized.push(this.unit);
    return serialized;
  }

  equals(other: Expression): boolean {
    return (
      other instanceof DistanceExpression &&
      sameDocument(this.source, other.source) &&
      sameDocument(this.geometry, other.geometry) &&
      this.unit === other.unit
    );
  }

  possibleOutputs(): (Value | undefined)[] {
    return [undefined];
  }

  getOperator(): string {
    return "distance";
  }
}
