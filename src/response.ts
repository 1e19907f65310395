import { euclideanMod } from "./boundary.js";
import { finiteFloat32 } from "./pixel-buffer.js";

/**
 * How an unbounded value is brought into the output range
 */
export type ResponseMode =
  | "clamp"
  | "soft-clamp"
  | "mirror"
  | "wrap"
  | "identity";

export const RESPONSE_MODES: readonly ResponseMode[] = [
  "clamp",
  "soft-clamp",
  "mirror",
  "wrap",
  "identity",
];

export function clamp01(v: number): number {
  return Math.min(Math.max(v, 0), 1);
}

// Closest float32 values to 0 and 1 that the soft clamp may produce
const SOFT_CLAMP_MIN = 2 ** -24;
const SOFT_CLAMP_MAX = 1 - 2 ** -24;

/**
 * Asymptotic squash around 0.5; never reaches 0 or 1.
 *
 * Far from the centre the curve is held at the float32 neighbours of 0 and
 * 1, so the result stays inside (0, 1) after it is stored.
 */
export function softClamp01(v: number): number {
  const centered = v - 0.5;
  const squashed = 0.5 + 0.5 * (centered / (1 + Math.abs(centered)));
  return Math.min(Math.max(squashed, SOFT_CLAMP_MIN), SOFT_CLAMP_MAX);
}

/**
 * Triangle wave with period 2, folded into [0, 1]
 */
export function mirror01(v: number): number {
  const t = euclideanMod(v, 2);
  return t <= 1 ? t : 2 - t;
}

/**
 * Sawtooth into [0, 1)
 */
export function wrap01(v: number): number {
  const t = euclideanMod(v, 1);
  // -1e-20 % 1 + 1 rounds up to exactly 1
  return t >= 1 ? 0 : t;
}

const CURVES: Record<ResponseMode, (v: number) => number> = {
  clamp: clamp01,
  "soft-clamp": softClamp01,
  mirror: mirror01,
  wrap: wrap01,
  identity: (v) => v,
};

export function applyResponse(v: number, mode: ResponseMode): number {
  return CURVES[mode](v);
}

/**
 * Offset, scale and curve a raw derivative value.
 *
 * In raw mode the offset is treated as a signed value centred on 0.5, so an
 * offset of 0.5 leaves the derivative unshifted. Intermediate values that
 * are not finite as float32 become 0 before the curve is applied.
 */
export function remapValue(
  diff: number,
  offset: number,
  scale: number,
  mode: ResponseMode,
  raw: boolean
): number {
  return createRemap(offset, scale, mode, raw)(diff);
}

/**
 * Resolve the remap settings once into a per-value function
 */
export function createRemap(
  offset: number,
  scale: number,
  mode: ResponseMode,
  raw: boolean
): (diff: number) => number {
  const base = raw ? offset - 0.5 : offset;
  const curve = CURVES[mode];
  return (diff) => {
    const v = base + diff * scale;
    return curve(finiteFloat32(v));
  };
}
