/**
 * Deterministic integer hashing shared by the texture kernels.
 *
 * All values are unsigned 32-bit integers carried in JS numbers. Wrapping
 * multiplication goes through Math.imul and every result is normalised with
 * `>>> 0`, so the output is identical on every platform.
 */

const U32_MAX = 0xff_ff_ff_ff;

/** Salts XORed into a cell's base hash to derive independent values. */
export const HashSalt = {
  jitterX: 0xa5_11_e9_b3,
  jitterY: 0x63_d8_35_95,
  jitterW: 0x1f_1d_8e_33,
  red: 0xb5_29_7a_4d,
  green: 0x68_e3_1d_a4,
  blue: 0x1b_56_c4_e9,
} as const;

/**
 * Avalanche mix of a 32-bit integer
 */
export function hashU32(value: number): number {
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  let x = value >>> 0;
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  x ^= x >>> 16;
  x = Math.imul(x, 0x7f_eb_35_2d);
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  x ^= x >>> 15;
  x = Math.imul(x, 0x84_6c_a6_8b);
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  x ^= x >>> 16;
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  return x >>> 0;
}

/**
 * Hash an integer lattice coordinate together with a seed.
 *
 * Negative coordinates are folded in as their two's-complement bit pattern.
 */
export function hash3(x: number, y: number, w: number, seed: number): number {
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  let h = (seed ^ 0x9e_37_79_b9) >>> 0;
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  h = (h + (Math.imul(x, 0x85_eb_ca_6b) >>> 0)) >>> 0;
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  h = (h + (Math.imul(y, 0xc2_b2_ae_35) >>> 0)) >>> 0;
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operations are intentional for the integer hash
  h = (h + (Math.imul(w, 0x27_d4_eb_2d) >>> 0)) >>> 0;
  return hashU32(h);
}

/**
 * Map a hash to [0, 1]
 */
export function rand01(hash: number): number {
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operation is intentional for u32 normalisation
  return (hash >>> 0) / U32_MAX;
}

/**
 * Derive a value in [0, 1] from a base hash and one of the {@link HashSalt} salts
 */
export function saltedRand01(hash: number, salt: number): number {
  // biome-ignore lint/suspicious/noBitwiseOperators: Bitwise operation is intentional for salting
  return rand01(hashU32(hash ^ salt));
}
