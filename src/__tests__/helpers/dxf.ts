// src/__tests__/helpers/dxf.ts

/**
 * Small builders for DXF group-code text used across the test suites.
 */

export interface CircleSpec {
  layer: string;
  x: number;
  y: number;
  radius?: number;
}

export interface PolylineSpec {
  layer: string;
  flags?: number;
  width?: number;
  vertices: Array<[number, number]>;
}

export function circle(spec: CircleSpec): string[] {
  const lines = ["0", "CIRCLE", "8", spec.layer, "10", String(spec.x), "20", String(spec.y)];
  if (spec.radius !== undefined) lines.push("40", String(spec.radius));
  return lines;
}

export function polyline(spec: PolylineSpec): string[] {
  const lines = ["0", "POLYLINE", "8", spec.layer];
  if (spec.flags !== undefined) lines.push("70", String(spec.flags));
  if (spec.width !== undefined) lines.push("41", String(spec.width));
  for (const [x, y] of spec.vertices) {
    lines.push("0", "VERTEX", "8", spec.layer, "10", String(x), "20", String(y));
  }
  lines.push("0", "SEQEND");
  return lines;
}

/**
 * Wrap entity chunks in an ENTITIES section and terminate with EOF.
 */
export function dxf(...entities: string[][]): string {
  return [
    "0",
    "SECTION",
    "2",
    "ENTITIES",
    ...entities.flat(),
    "0",
    "ENDSEC",
    "0",
    "EOF",
  ].join("\n") + "\n";
}
