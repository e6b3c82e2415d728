export type Position = [number, number]; // [lon, lat]

export interface PointGeometry {
  type: "Point";
  coordinates: Position;
}

export interface MultiPointGeometry {
  type: "MultiPoint";
  coordinates: Position[];
}

export interface LineStringGeometry {
  type: "LineString";
  coordinates: Position[];
}

export interface MultiLineStringGeometry {
  type: "MultiLineString";
  coordinates: Position[][];
}

export interface PolygonGeometry {
  type: "Polygon";
  coordinates: Position[][]; // rings, outer first
}

export interface MultiPolygonGeometry {
  type: "MultiPolygon";
  coordinates: Position[][][];
}

export type FeatureGeometry =
  | PointGeometry
  | MultiPointGeometry
  | LineStringGeometry
  | MultiLineStringGeometry
  | PolygonGeometry
  | MultiPolygonGeometry;

export type LinearGeometry = PointGeometry | MultiPointGeometry | LineStringGeometry | MultiLineStringGeometry;

export type ReferenceGeometry = PointGeometry | LineStringGeometry;

export type DistanceUnit = "Meters" | "Kilometers" | "Miles" | "Inches";
