import { resolveEngineConfig, type EngineConfig } from "../config.js";
import { createTileGeometryConverter, type TileFeature, type TileKey } from "../view/tiles.js";
import type { EvaluationContext } from "./types.js";

export interface ParsingError {
  key: string; // e.g. "[1]" for the first argument
  message: string;
}

export class ParsingContext {
  readonly key: string;
  readonly errors: ParsingError[];

  constructor(key = "", errors: ParsingError[] = []) {
    this.key = key;
    this.errors = errors;
  }

  concat(index: number): ParsingContext {
    return new ParsingContext(`${this.key}[${index}]`, this.errors);
  }

  error(message: string, ...keys: number[]): void {
    const suffix = keys.map((k) => `[${k}]`).join("");
    this.errors.push({ key: `${this.key}${suffix}`, message });
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }
}

export function createEvaluationContext(
  feature?: TileFeature,
  canonical?: TileKey,
  config: EngineConfig = resolveEngineConfig()
): EvaluationContext {
  return { feature, canonical, convertGeometry: createTileGeometryConverter(config.tileExtent) };
}
