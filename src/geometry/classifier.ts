// src/geometry/classifier.ts

import type { ClassifiedEntities } from "../types/drawing";
import type { Drawing } from "./drawing";
import { normalizeLayerName } from "../io/layer-roles";

/**
 * Collect what one output file needs from the drawing:
 * - tracks:  open polylines on any of the given layers
 * - regions: closed polylines on any of the given layers
 * - circles: circles on any of the given layers
 *
 * Aliases that normalize to the same name are only visited once, so an
 * entity never shows up twice in a single result.
 */
export function classifyForLayers(drawing: Drawing, aliases: readonly string[]): ClassifiedEntities {
  const layers = uniqueLayers(aliases);

  const tracks = layers.flatMap((layer) => drawing.openPolylinesOnLayer(layer));
  const regions = layers.flatMap((layer) => drawing.closedPolylinesOnLayer(layer));
  const circles = layers.flatMap((layer) => drawing.circlesOnLayer(layer));

  return { tracks, regions, circles };
}

export function isEmpty(entities: ClassifiedEntities): boolean {
  return entities.tracks.length === 0 && entities.regions.length === 0 && entities.circles.length === 0;
}

function uniqueLayers(aliases: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const alias of aliases) {
    const key = normalizeLayerName(alias);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(alias);
  }
  return result;
}
