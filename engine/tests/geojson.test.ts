import { describe, expect, it } from "vitest";
import { decodeGeoJSON, describeGeometryTypes, findReferenceGeometry, type GeoJSONDocument } from "../src/geojson.js";

function decodeOk(value: unknown): GeoJSONDocument {
  const result = decodeGeoJSON(value);
  if (!result.ok) throw new Error(`expected a document, got: ${result.error}`);
  return result.document;
}

function decodeError(value: unknown): string {
  const result = decodeGeoJSON(value);
  if (result.ok) throw new Error("expected a decode error");
  return result.error;
}

const polygon = {
  type: "Polygon",
  coordinates: [
    [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ],
  ],
};

describe("GeoJSON decoding", () => {
  it("decodes geometries", () => {
    expect(decodeOk({ type: "Point", coordinates: [1, 2] })).toEqual({ type: "Point", coordinates: [1, 2] });
    expect(decodeOk(polygon)).toEqual(polygon);
  });

  it("keeps feature ids and properties", () => {
    const decoded = decodeOk({
      type: "Feature",
      id: "road-7",
      properties: { name: "Ring road" },
      geometry: { type: "Point", coordinates: [3, 4] },
    });
    expect(decoded).toEqual({
      type: "Feature",
      id: "road-7",
      properties: { name: "Ring road" },
      geometry: { type: "Point", coordinates: [3, 4] },
    });
  });

  it("accepts features without geometry", () => {
    const decoded = decodeOk({ type: "Feature", geometry: null, properties: null });
    expect(decoded).toEqual({ type: "Feature", geometry: null, properties: null });
  });

  it("reports structural problems", () => {
    expect(decodeError("nope")).toBe("GeoJSON must be an object.");
    expect(decodeError({ coordinates: [0, 0] })).toBe("GeoJSON object is missing a type.");
    expect(decodeError({ type: "Circle", coordinates: [0, 0] })).toBe('Unknown GeoJSON geometry type "Circle".');
    expect(decodeError({ type: "Point" })).toBe("Invalid Point: missing coordinates.");
    expect(decodeError({ type: "Point", coordinates: [0, "north"] })).toBe(
      "Invalid position: coordinates must be finite numbers."
    );
    expect(decodeError({ type: "LineString", coordinates: [[0, 0]] })).toBe(
      "Invalid LineString: expected at least 2 positions."
    );
    expect(decodeError({ type: "FeatureCollection", features: {} })).toBe(
      "Invalid FeatureCollection: features must be an array."
    );
    expect(decodeError({ type: "Feature", geometry: null, properties: 5 })).toBe(
      "Invalid Feature: properties must be an object or null."
    );
  });

  it("flattens TopoJSON objects into a feature collection", () => {
    const topology = {
      type: "Topology",
      objects: {
        network: {
          type: "GeometryCollection",
          geometries: [
            { type: "Polygon", arcs: [[0]] },
            { type: "LineString", arcs: [1], properties: { name: "canal" } },
          ],
        },
      },
      arcs: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 0],
        ],
        [
          [2, 2],
          [3, 3],
        ],
      ],
    };
    const decoded = decodeOk(topology);
    expect(decoded.type).toBe("FeatureCollection");
    if (decoded.type !== "FeatureCollection") return;
    expect(decoded.features.map((f) => f.geometry?.type)).toEqual(["Polygon", "LineString"]);
    expect(decoded.features[1].properties).toEqual({ name: "canal" });
    expect(findReferenceGeometry(decoded)).toEqual({
      type: "LineString",
      coordinates: [
        [2, 2],
        [3, 3],
      ],
    });
  });

  it("rejects topologies without arcs", () => {
    expect(decodeError({ type: "Topology", objects: {} })).toBe("Invalid Topology: expected objects and arcs.");
  });
});

describe("reference geometry lookup", () => {
  it("uses a Point or LineString geometry directly", () => {
    expect(findReferenceGeometry(decodeOk({ type: "Point", coordinates: [5, 6, 100] }))).toEqual({
      type: "Point",
      coordinates: [5, 6],
    });
  });

  it("uses the first qualifying feature of a collection", () => {
    const collection = decodeOk({
      type: "FeatureCollection",
      features: [
        { type: "Feature", properties: {}, geometry: polygon },
        { type: "Feature", properties: {}, geometry: { type: "Point", coordinates: [7, 8] } },
        {
          type: "Feature",
          properties: {},
          geometry: {
            type: "LineString",
            coordinates: [
              [0, 0],
              [1, 1],
            ],
          },
        },
      ],
    });
    expect(findReferenceGeometry(collection)).toEqual({ type: "Point", coordinates: [7, 8] });
  });

  it("finds nothing in other shapes", () => {
    expect(findReferenceGeometry(decodeOk(polygon))).toBeNull();
    expect(
      findReferenceGeometry(
        decodeOk({
          type: "MultiPoint",
          coordinates: [
            [0, 0],
            [1, 1],
          ],
        })
      )
    ).toBeNull();
    expect(findReferenceGeometry(decodeOk({ type: "Feature", properties: null, geometry: null }))).toBeNull();
  });

  it("describes the geometry types a document carries", () => {
    expect(describeGeometryTypes(decodeOk(polygon))).toBe("Polygon");
    expect(describeGeometryTypes(decodeOk({ type: "FeatureCollection", features: [] }))).toBe(
      "an empty FeatureCollection"
    );
    expect(
      describeGeometryTypes(
        decodeOk({
          type: "FeatureCollection",
          features: [
            { type: "Feature", properties: null, geometry: polygon },
            { type: "Feature", properties: null, geometry: null },
            { type: "Feature", properties: null, geometry: polygon },
          ],
        })
      )
    ).toBe("Polygon, null geometry");
  });
});
