/**
 * Edge handling for neighbour samples that fall outside the raster
 */

export type EdgeMode = "none" | "repeat" | "tile" | "mirror";

export const EDGE_MODES: readonly EdgeMode[] = [
  "none",
  "repeat",
  "tile",
  "mirror",
];

/**
 * Euclidean modulo: result always in [0, m) for m > 0
 */
export function euclideanMod(value: number, m: number): number {
  const r = value % m;
  return r < 0 ? r + m : r;
}

/**
 * Reflect a coordinate into [0, len) without repeating the end samples.
 *
 * The reflection period is 2 * len - 2, so index -1 maps to 1 and index len
 * maps to len - 2.
 */
export function mirrorIndex(coord: number, len: number): number {
  if (len <= 1) {
    return 0;
  }
  const period = 2 * len - 2;
  const t = euclideanMod(coord, period);
  return t < len ? t : period - t;
}

/**
 * Resolve a 1-D sample coordinate under an edge mode.
 *
 * @returns The index to read, or null when the sample is outside the raster
 * and the mode is "none" (or the axis is empty)
 */
export function resolveCoord(
  coord: number,
  len: number,
  mode: EdgeMode
): number | null {
  if (len <= 0) {
    return null;
  }
  switch (mode) {
    case "none":
      return coord < 0 || coord >= len ? null : coord;
    case "repeat":
      return Math.min(Math.max(coord, 0), len - 1);
    case "tile":
      return euclideanMod(coord, len);
    case "mirror":
      return mirrorIndex(coord, len);
  }
}
