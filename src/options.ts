import path from "node:path";
import { EDGE_MODES } from "./boundary.js";
import {
  DIFF_AXES,
  type DiffAxis,
  type DifferentialConfig,
} from "./differential.js";
import { DISTANCE_METRIC_KINDS } from "./distance.js";
import { ConfigurationError } from "./errors.js";
import { bandedBackend, type RenderBackend, serialBackend } from "./render.js";
import { RESPONSE_MODES } from "./response.js";
import { RENDER_MODES, type VoronoiConfig } from "./voronoi.js";

/**
 * Raw option values as commander hands them over
 */
export interface VoronoiOptions {
  output: string;
  width: string;
  height: string;
  cellSize: string;
  scaleX: string;
  scaleY: string;
  scaleW: string;
  seed: string;
  randomness: string;
  metric: string;
  exponent: string;
  smoothness: string;
  w: string;
  offsetX: string;
  offsetY: string;
  mode: string;
  clamp: boolean;
  alphaFrom?: string;
  depth: string;
  bandRows?: string;
  verbose: boolean;
}

export interface DifferentialOptions {
  output: string;
  axis: string;
  edge: string;
  response: string;
  offset: string;
  scale: string;
  keepAlpha: boolean;
  depth: string;
  bandRows?: string;
  verbose: boolean;
}

export const MAX_DIMENSION = 16_384;

const FILE_EXTENSION_REGEX = /\.[^.]+$/;

export function parseNumber(value: string, name: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number (got "${value}")`);
  }
  return parsed;
}

export function parseInteger(value: string, name: string): number {
  const parsed = value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer (got "${value}")`);
  }
  return parsed;
}

export function parsePositive(value: string, name: string): number {
  const parsed = parseNumber(value, name);
  if (parsed <= 0) {
    throw new ConfigurationError(`${name} must be positive (got ${parsed})`);
  }
  return parsed;
}

export function parseChoice<T extends string>(
  value: string,
  choices: readonly T[],
  name: string
): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigurationError(
      `${name} must be one of ${choices.join(", ")} (got "${value}")`
    );
  }
  return match;
}

function parseDimension(value: string, name: string): number {
  const parsed = parseInteger(value, name);
  if (parsed < 1 || parsed > MAX_DIMENSION) {
    throw new ConfigurationError(
      `${name} must be between 1 and ${MAX_DIMENSION}`
    );
  }
  return parsed;
}

function parseBackend(bandRows: string | undefined): RenderBackend {
  if (bandRows === undefined) {
    return serialBackend;
  }
  const rows = parseInteger(bandRows, "Band rows");
  if (rows < 1) {
    throw new ConfigurationError("Band rows must be at least 1");
  }
  return bandedBackend(rows);
}

/**
 * Translate `voronoi` command options into a generator configuration.
 *
 * The cell extent on each axis is the cell size divided by that axis' scale.
 */
export function buildVoronoiConfig(options: VoronoiOptions): VoronoiConfig {
  const cellSize = parsePositive(options.cellSize, "Cell size");
  const scaleX = parsePositive(options.scaleX, "Scale X");
  const scaleY = parsePositive(options.scaleY, "Scale Y");
  const scaleW = parsePositive(options.scaleW, "Scale W");

  return {
    width: parseDimension(options.width, "Width"),
    height: parseDimension(options.height, "Height"),
    seed: parseInteger(options.seed, "Seed"),
    metric: parseChoice(options.metric, DISTANCE_METRIC_KINDS, "Metric"),
    minkowskiExponent: parseNumber(options.exponent, "Exponent"),
    randomness: parseNumber(options.randomness, "Randomness"),
    smoothness: parseNumber(options.smoothness, "Smoothness"),
    w: parseNumber(options.w, "W"),
    cellSize: {
      x: cellSize / scaleX,
      y: cellSize / scaleY,
      w: cellSize / scaleW,
    },
    offset: {
      x: parseNumber(options.offsetX, "Offset X"),
      y: parseNumber(options.offsetY, "Offset Y"),
    },
    renderMode: parseChoice(options.mode, RENDER_MODES, "Mode"),
    clampOutput: options.clamp,
    backend: parseBackend(options.bandRows),
    verbose: options.verbose,
  };
}

/**
 * File name for the differential map of `input` along `axis`
 */
export function differentialOutputName(
  input: string,
  axis: DiffAxis
): string {
  const base = path.basename(input);
  const suffix = `-${axis}.png`;
  return FILE_EXTENSION_REGEX.test(base)
    ? base.replace(FILE_EXTENSION_REGEX, suffix)
    : `${base}${suffix}`;
}

/**
 * Translate `differential` command options into an extractor configuration
 */
export function buildDifferentialConfig(
  options: DifferentialOptions
): DifferentialConfig & { axis: DiffAxis } {
  return {
    axis: parseChoice(options.axis, DIFF_AXES, "Axis"),
    edgeMode: parseChoice(options.edge, EDGE_MODES, "Edge mode"),
    responseMode: parseChoice(options.response, RESPONSE_MODES, "Response"),
    offset: parseNumber(options.offset, "Offset"),
    scale: parseNumber(options.scale, "Scale"),
    alphaPassthrough: options.keepAlpha,
    backend: parseBackend(options.bandRows),
    verbose: options.verbose,
  };
}
