/**
 * Distance metrics over a 3-D offset
 */

export type DistanceMetricKind =
  | "euclidean"
  | "manhattan"
  | "chebyshev"
  | "minkowski";

export type DistanceMetric =
  | { kind: "euclidean" }
  | { kind: "manhattan" }
  | { kind: "chebyshev" }
  | { kind: "minkowski"; exponent: number };

export const DISTANCE_METRIC_KINDS: readonly DistanceMetricKind[] = [
  "euclidean",
  "manhattan",
  "chebyshev",
  "minkowski",
];

/** Smallest Minkowski exponent; lower values are raised to this */
export const MIN_MINKOWSKI_EXPONENT = 0.1;

/**
 * Resolve a metric kind and exponent into a metric, once per render
 */
export function resolveMetric(
  kind: DistanceMetricKind,
  exponent = 2
): DistanceMetric {
  if (kind === "minkowski") {
    const p = Number.isFinite(exponent)
      ? Math.max(exponent, MIN_MINKOWSKI_EXPONENT)
      : MIN_MINKOWSKI_EXPONENT;
    return { kind, exponent: p };
  }
  return { kind };
}

export function distance(
  dx: number,
  dy: number,
  dw: number,
  metric: DistanceMetric
): number {
  switch (metric.kind) {
    case "euclidean":
      return Math.sqrt(dx * dx + dy * dy + dw * dw);
    case "manhattan":
      return Math.abs(dx) + Math.abs(dy) + Math.abs(dw);
    case "chebyshev":
      return Math.max(Math.abs(dx), Math.abs(dy), Math.abs(dw));
    case "minkowski": {
      const p = Math.max(metric.exponent, MIN_MINKOWSKI_EXPONENT);
      const sum =
        Math.abs(dx) ** p + Math.abs(dy) ** p + Math.abs(dw) ** p;
      return sum ** (1 / p);
    }
  }
}
