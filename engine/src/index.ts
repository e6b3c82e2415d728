/**
 * Map Style Engine
 * ----------------
 * Style expressions evaluated per tile feature. Ships the `distance` expression
 * and the flat-earth geometry kernel behind it.
 */
export * from "./types.js";

export { resolveEngineConfig, DEFAULT_TILE_EXTENT, DEFAULT_LOG_LEVEL } from "./config.js";
export type { EngineConfig, LogLevel, EnvSource } from "./config.js";

export { createLogger } from "./log.js";
export type { Logger } from "./log.js";

export { decodeGeoJSON, findReferenceGeometry, describeGeometryTypes } from "./geojson.js";
export type { GeoJSONDocument, GeoJSONDecodeResult, GeoJSONFeature, GeoJSONFeatureCollection } from "./geojson.js";

export { createRuler, UNIT_FACTORS } from "./geometry/ruler.js";
export type { Ruler, PointOnLine } from "./geometry/ruler.js";
export { segmentsIntersect } from "./geometry/intersect.js";
export {
  NOT_COMPUTABLE,
  pointToLine,
  pointToMultiLine,
  pointToMultiPoint,
  lineToLine,
  pointDistanceToGeometry,
  lineDistanceToGeometry,
  geometryDistance,
  calculateDistance,
} from "./geometry/shortestDistance.js";

export {
  tileId,
  tileBBox,
  tilePointToLonLat,
  lonLatToTilePoint,
  createTileGeometryConverter,
  convertGeometry,
} from "./view/tiles.js";
export type { TileKey, TilePoint, TileFeature, TileFeatureType, TileGeometryConverter } from "./view/tiles.js";

export { EvaluationError, isValueObject, describeValue } from "./expression/types.js";
export type {
  Value,
  ValueObject,
  Expression,
  ExpressionKind,
  ExpressionType,
  EvaluationContext,
  EvaluationResult,
} from "./expression/types.js";
export { ParsingContext, createEvaluationContext } from "./expression/context.js";
export type { ParsingError } from "./expression/context.js";
export {
  DistanceExpression,
  DEFAULT_DISTANCE_UNIT,
  parseDistanceArguments,
  parseDistanceUnit,
} from "./expression/distance.js";
export type { DistanceArguments } from "./expression/distance.js";
export {
  registerExpression,
  unregisterExpression,
  getExpressionParser,
  getRegisteredOperators,
  parseExpression,
} from "./expression/registry.js";
export type { ExpressionParser } from "./expression/registry.js";
