// src/parse/dxf-reader.ts

import type { Circle, EntityFields, Polyline, Vertex } from "../types/drawing";
import { Drawing } from "../geometry/drawing";
import { ParseError } from "../core/errors";
import { getLogger } from "../core/logger";
import { splitDxfLines } from "../io/file-normalizer";
import {
  DEFAULT_SUBDIVISIONS,
  GROUP_CODES,
  decodeInteger,
  decodeQuantized,
  parseGroupCode,
} from "./field-codes";

const log = getLogger("DxfReader");

export interface ParseOptions {
  /**
   * Coordinates and sizes are rounded to multiples of 1 / subdivisions
   * of the drawing unit. Defaults to 8.
   */
  subdivisions?: number;
}

/**
 * Internal reader state: the line cursor plus everything collected so far.
 */
interface ReaderState {
  lines: string[];
  pos: number; // index of the next line to read
  subdivisions: number;
  circles: Circle[];
  polylines: Polyline[];
}

/**
 * Parse DXF text into a Drawing.
 *
 * This is a targeted reader, not a full DXF implementation:
 * - Only CIRCLE and POLYLINE (with VERTEX / SEQEND) entities are kept
 * - Only the group codes listed in GROUP_CODES are stored
 * - Sections, tables and blocks are skipped by simply not matching
 *
 * Any malformed numeric field aborts the whole load with a ParseError.
 */
export function parseDxf(content: string, options: ParseOptions = {}): Drawing {
  const state: ReaderState = {
    lines: splitDxfLines(content),
    pos: 0,
    subdivisions: options.subdivisions ?? DEFAULT_SUBDIVISIONS,
    circles: [],
    polylines: [],
  };

  readDrawing(state);

  const bulged = countBulgedVertices(state.polylines);
  if (bulged > 0) {
    log.warn(`${bulged} polyline vertices carry a bulge; arcs are plotted as straight segments`);
  }

  log.debug(`Parsed ${state.circles.length} circles and ${state.polylines.length} polylines`);

  return new Drawing(state.circles, state.polylines);
}

/**
 * Next line, trimmed, or null at end of input.
 */
function nextLine(state: ReaderState): string | null {
  if (state.pos >= state.lines.length) return null;
  const line = state.lines[state.pos];
  state.pos++;
  return line.trim();
}

/**
 * Top-level scan: dispatch on entity markers, stop at EOF.
 */
function readDrawing(state: ReaderState): void {
  for (;;) {
    const line = nextLine(state);
    if (line === null || line === "EOF") return;

    if (line === "CIRCLE") {
      readCircle(state);
    } else if (line === "POLYLINE") {
      readPolyline(state);
    }
  }
}

/**
 * Read group-code/value pairs until a code 0 or end of input.
 * The value following the terminating 0 is left for the caller.
 */
function readEntity(state: ReaderState): EntityFields {
  const entity: EntityFields = {};

  for (;;) {
    const codeLine = nextLine(state);
    if (codeLine === null) break;

    const code = parseGroupCode(codeLine);
    if (code === null) {
      // Not a code: drop it together with its would-be value and resync.
      nextLine(state);
      continue;
    }

    if (code === 0) break;

    const value = nextLine(state);
    if (value === null) {
      throw new ParseError(
        `Unexpected end of input after group code ${code} on line ${state.pos}`,
        "UNEXPECTED_EOF",
        undefined,
        { lineNumber: state.pos, code }
      );
    }

    const decoder = GROUP_CODES.get(code);
    if (!decoder) continue;

    const lineNumber = state.pos;
    switch (decoder.decode) {
      case "quantized":
        entity[decoder.field] = decodeQuantized(value, state.subdivisions, lineNumber);
        break;
      case "integer":
        entity[decoder.field] = decodeInteger(value, lineNumber);
        break;
      case "string":
        entity[decoder.field] = value;
        break;
    }
  }

  return entity;
}

function readCircle(state: ReaderState): void {
  const fields = readEntity(state);
  const circle: Circle = { ...fields, kind: "circle" };
  // Group code 40 holds the radius; store the diameter.
  if (circle.diameter !== undefined) {
    circle.diameter = circle.diameter * 2.0;
  }
  state.circles.push(circle);
}

function readPolyline(state: ReaderState): void {
  const startLine = state.pos;
  const fields = readEntity(state);
  const vertices: Vertex[] = [];

  for (;;) {
    const line = nextLine(state);
    if (line === null) {
      throw new ParseError(
        `POLYLINE starting on line ${startLine} has no SEQEND`,
        "UNTERMINATED_POLYLINE",
        undefined,
        { lineNumber: startLine }
      );
    }

    if (line === "SEQEND") break;

    if (line === "VERTEX") {
      vertices.push(readEntity(state));
    }
  }

  state.polylines.push({ ...fields, kind: "polyline", vertices });
}

function countBulgedVertices(polylines: Polyline[]): number {
  let count = 0;
  for (const p of polylines) {
    for (const v of p.vertices) {
      if (v.bulge !== undefined && v.bulge !== 0) count++;
    }
  }
  return count;
}
