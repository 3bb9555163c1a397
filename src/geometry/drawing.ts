// src/geometry/drawing.ts

import { POLYLINE_FLAG_CLOSED, type Circle, type DrawingEntity, type Polyline } from "../types/drawing";
import { layerMatches } from "../io/layer-roles";

/**
 * Parsed DXF content. Built once by the reader and never mutated;
 * every output file reads from the same instance.
 */
export class Drawing {
  readonly circles: readonly Circle[];
  readonly polylines: readonly Polyline[];

  constructor(circles: Circle[], polylines: Polyline[]) {
    this.circles = Object.freeze(circles.map((c) => Object.freeze({ ...c })));
    this.polylines = Object.freeze(
      polylines.map((p) =>
        Object.freeze({
          ...p,
          vertices: Object.freeze(p.vertices.map((v) => Object.freeze({ ...v }))),
        })
      )
    );
  }

  circlesOnLayer(layer: string): Circle[] {
    return this.circles.filter((c) => layerMatches(layerOf(c), layer));
  }

  polylinesOnLayer(layer: string): Polyline[] {
    return this.polylines.filter((p) => layerMatches(layerOf(p), layer));
  }

  /** Polylines without a flags field, or whose flags lack the closed bit. */
  openPolylinesOnLayer(layer: string): Polyline[] {
    return this.polylinesOnLayer(layer).filter((p) => !isClosed(p));
  }

  /** Polylines whose flags field is present and has the closed bit. */
  closedPolylinesOnLayer(layer: string): Polyline[] {
    return this.polylinesOnLayer(layer).filter(isClosed);
  }

  layerNames(): Set<string> {
    const names = new Set<string>();
    for (const c of this.circles) names.add(layerOf(c));
    for (const p of this.polylines) names.add(layerOf(p));
    return names;
  }
}

export function layerOf(entity: DrawingEntity): string {
  return entity.layer ?? "";
}

export function isClosed(p: Polyline): boolean {
  return p.flags !== undefined && (p.flags & POLYLINE_FLAG_CLOSED) !== 0;
}
