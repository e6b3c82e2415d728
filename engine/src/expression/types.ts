import type { TileFeature, TileGeometryConverter, TileKey } from "../view/tiles.js";

export type Value = null | boolean | number | string | Value[] | ValueObject;
export interface ValueObject {
  [key: string]: Value;
}

export type ExpressionKind = "distance";
export type ExpressionType = "number" | "string" | "boolean" | "value";

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

export type EvaluationResult<T extends Value = Value> = { ok: true; value: T } | { ok: false; error: EvaluationError };

export interface EvaluationContext {
  feature?: TileFeature;
  canonical?: TileKey;
  // tile-local -> geographic conversion; Web Mercator at the configured tile extent when absent
  convertGeometry?: TileGeometryConverter;
}

// Nodes are immutable once parsed.
export interface Expression {
  readonly kind: ExpressionKind;
  readonly type: ExpressionType;
  evaluate(ctx: EvaluationContext): EvaluationResult;
  serialize(): Value;
  equals(other: Expression): boolean;
  // `undefined` marks an output that cannot be known before evaluation
  possibleOutputs(): (Value | undefined)[];
  getOperator(): string;
}

export function isValueObject(value: Value | undefined): value is ValueObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
