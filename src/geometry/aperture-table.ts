// src/geometry/aperture-table.ts

import type { Drawing } from "./drawing";
import { LookupError } from "../core/errors";
import { FIRST_APERTURE_CODE, FIRST_DRILL_CODE } from "./constants";

/**
 * Every distinct circle diameter and polyline stroke width in the drawing,
 * ascending. A missing value counts as the 0 sentinel ("undefined width").
 *
 * The whole drawing is scanned, not just one layer, so every output file
 * built from the same drawing sees the same set.
 */
export function measureDrawing(drawing: Drawing): number[] {
  const diameters = new Set<number>();

  for (const c of drawing.circles) {
    diameters.add(c.diameter ?? 0);
  }
  for (const p of drawing.polylines) {
    diameters.add(p.width ?? 0);
  }

  return [...diameters].sort((a, b) => a - b);
}

export interface ApertureEntry {
  code: number;
  diameter: number;
}

/**
 * Bidirectional diameter <-> code map for one output file.
 * Codes follow the order of the diameters handed in.
 */
export class ApertureTable {
  private readonly codesByDiameter = new Map<number, number>();
  private readonly diametersByCode = new Map<number, number>();

  private constructor(diameters: readonly number[], firstCode: number, includeZero: boolean) {
    let code = firstCode;
    for (const d of diameters) {
      if (d === 0 && !includeZero) continue;
      if (this.codesByDiameter.has(d)) continue;
      this.codesByDiameter.set(d, code);
      this.diametersByCode.set(code, d);
      code++;
    }
  }

  /** Gerber apertures: D10 upwards, the 0 sentinel included. */
  static forArtwork(diameters: readonly number[]): ApertureTable {
    return new ApertureTable(diameters, FIRST_APERTURE_CODE, true);
  }

  /** Excellon tools: T01 upwards, no tool for the 0 sentinel. */
  static forDrill(diameters: readonly number[]): ApertureTable {
    return new ApertureTable(diameters, FIRST_DRILL_CODE, false);
  }

  codeFor(diameter: number): number {
    const code = this.codesByDiameter.get(diameter);
    if (code === undefined) {
      throw new LookupError(`No aperture defined for diameter ${diameter}`, "UNKNOWN_DIAMETER", undefined, {
        diameter,
      });
    }
    return code;
  }

  diameterFor(code: number): number | undefined {
    return this.diametersByCode.get(code);
  }

  /** Entries in code order. */
  entries(): ApertureEntry[] {
    return [...this.codesByDiameter].map(([diameter, code]) => ({ code, diameter }));
  }

  /** Diameters in code order. */
  diameters(): number[] {
    return [...this.codesByDiameter.keys()];
  }

  get size(): number {
    return this.codesByDiameter.size;
  }
}
