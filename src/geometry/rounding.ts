// src/geometry/rounding.ts

/**
 * Round half to even, so that x.5 ties do not all drift upwards.
 */
export function roundHalfEven(v: number): number {
  const floor = Math.floor(v);
  const diff = v - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Round half away from zero: 0.5 -> 1, -0.5 -> -1.
 */
export function roundHalfAwayFromZero(v: number): number {
  return Math.sign(v) * Math.floor(Math.abs(v) + 0.5);
}

/**
 * Fixed-point text with ties rounded to even, e.g. toFixedHalfEven(0.125, 2) === "0.12".
 */
export function toFixedHalfEven(v: number, decimals: number): string {
  const factor = Math.pow(10, decimals);
  return (roundHalfEven(v * factor) / factor).toFixed(decimals);
}

/**
 * Round up to the next multiple of 0.1. Float noise below 1e-9 is ignored,
 * so 0.3 stays 0.3 instead of becoming 0.4.
 */
export function ceilToTenth(v: number): number {
  return Math.ceil(Number((v * 10).toFixed(9))) / 10;
}
