// src/types/drawing.ts

export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Fields a DXF entity may carry. Every field is optional because the
 * stream only lists the group codes the authoring tool chose to write.
 *
 * Numeric fields are already quantised by the reader.
 */
export interface EntityFields {
  x?: number;
  y?: number;
  z?: number;
  /** Full diameter for circles (the reader doubles the radius). */
  diameter?: number;
  /** Stroke width ("global line width") of a polyline. */
  width?: number;
  bulge?: number;
  flags?: number;
  layer?: string;
}

export type Vertex = EntityFields;

export interface Circle extends EntityFields {
  kind: "circle";
}

export interface Polyline extends EntityFields {
  kind: "polyline";
  vertices: readonly Vertex[];
}

export type DrawingEntity = Circle | Polyline;

/** Bit 1 of group code 70 marks a closed polyline. */
export const POLYLINE_FLAG_CLOSED = 1;

/**
 * The three groups an emitter needs for one output file.
 */
export interface ClassifiedEntities {
  tracks: Polyline[];
  regions: Polyline[];
  circles: Circle[];
}
