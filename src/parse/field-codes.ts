// src/parse/field-codes.ts

import { ParseError } from "../core/errors";
import { roundHalfAwayFromZero } from "../geometry/rounding";

type QuantizedField = "x" | "y" | "z" | "diameter" | "width" | "bulge";

/**
 * How the value line following a group code is decoded, and which
 * entity field it lands in.
 */
export type FieldDecoder =
  | { field: QuantizedField; decode: "quantized" }
  | { field: "flags"; decode: "integer" }
  | { field: "layer"; decode: "string" };

/**
 * Group codes the reader understands. Anything else is read and dropped.
 */
export const GROUP_CODES: ReadonlyMap<number, FieldDecoder> = new Map<number, FieldDecoder>([
  [8, { field: "layer", decode: "string" }],
  [10, { field: "x", decode: "quantized" }],
  [20, { field: "y", decode: "quantized" }],
  [30, { field: "z", decode: "quantized" }],
  [40, { field: "diameter", decode: "quantized" }],
  [41, { field: "width", decode: "quantized" }],
  [42, { field: "bulge", decode: "quantized" }],
  [70, { field: "flags", decode: "integer" }],
]);

/** Input units are quantised to multiples of 1 / DEFAULT_SUBDIVISIONS. */
export const DEFAULT_SUBDIVISIONS = 8;

const DECIMAL_INT = /^[+-]?\d+$/;
const HEX_INT = /^[+-]?(0[xX])?[0-9a-fA-F]+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Interpret a line as a group code: decimal first, then hexadecimal.
 * Returns null when neither applies.
 */
export function parseGroupCode(line: string): number | null {
  if (DECIMAL_INT.test(line)) return parseInt(line, 10);
  if (HEX_INT.test(line)) return parseInt(line, 16);
  return null;
}

/**
 * Snap v to the nearest multiple of 1 / subdivisions, ties away from zero.
 */
export function quantize(v: number, subdivisions: number): number {
  return roundHalfAwayFromZero(v * subdivisions) / subdivisions;
}

export function decodeQuantized(raw: string, subdivisions: number, lineNumber: number): number {
  if (!FLOAT.test(raw)) {
    throw new ParseError(`Expected a number on line ${lineNumber}, got "${raw}"`, "BAD_NUMBER", undefined, {
      lineNumber,
      value: raw,
    });
  }
  return quantize(parseFloat(raw), subdivisions);
}

export function decodeInteger(raw: string, lineNumber: number): number {
  if (!DECIMAL_INT.test(raw)) {
    throw new ParseError(`Expected an integer on line ${lineNumber}, got "${raw}"`, "BAD_INTEGER", undefined, {
      lineNumber,
      value: raw,
    });
  }
  return parseInt(raw, 10);
}
