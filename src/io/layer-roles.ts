// src/io/layer-roles.ts

export type ArtworkRole =
  | "bottom_copper"
  | "bottom_overlay"
  | "bottom_soldermask"
  | "top_copper"
  | "top_overlay"
  | "top_soldermask";

export type DrillRole = "drill";

export type LayerRole = ArtworkRole | DrillRole;

export type OutputKind = "artwork" | "drill";

/**
 * One fabrication file the converter can produce, and the DXF layer names
 * whose entities end up in it.
 */
export interface OutputRole {
  role: LayerRole;
  kind: OutputKind;
  /** Extension appended to the output base path, e.g. ".gtl" */
  extension: string;
  /** Literal DXF layer names accepted for this role. */
  aliases: string[];
}

/**
 * Default layer table for a two-layer board:
 *
 *   Top Overlay       -> .gto
 *   Top Soldermask    -> .gts
 *   Top Copper        -> .gtl
 *   Drill             -> .gdd (Excellon)
 *   Bottom Copper     -> .gbl
 *   Bottom Overlay    -> .gbo
 *   Bottom Soldermask -> .gbs
 */
export const DEFAULT_OUTPUT_ROLES: OutputRole[] = [
  { role: "bottom_copper", kind: "artwork", extension: ".gbl", aliases: ["Bottom Copper", "Bottom"] },
  { role: "bottom_overlay", kind: "artwork", extension: ".gbo", aliases: ["Bottom Outlines", "Bottom Overlay"] },
  { role: "bottom_soldermask", kind: "artwork", extension: ".gbs", aliases: ["Bottom Soldermask"] },
  { role: "top_copper", kind: "artwork", extension: ".gtl", aliases: ["Top Copper", "Top"] },
  { role: "top_overlay", kind: "artwork", extension: ".gto", aliases: ["Top Outlines", "Top Overlay"] },
  { role: "top_soldermask", kind: "artwork", extension: ".gts", aliases: ["Top Soldermask"] },
  { role: "drill", kind: "drill", extension: ".gdd", aliases: ["Drill"] },
];

/**
 * Canonical form used for layer comparisons: trimmed, lower case,
 * spaces replaced by underscores.
 */
export function normalizeLayerName(name: string): string {
  return name.trim().toLowerCase().replace(/ /g, "_");
}

export function layerMatches(a: string, b: string): boolean {
  return normalizeLayerName(a) === normalizeLayerName(b);
}

/**
 * All roles that claim a given DXF layer name. Usually zero or one.
 */
export function rolesForLayer(layerName: string, roles: OutputRole[]): OutputRole[] {
  return roles.filter((r) => r.aliases.some((alias) => layerMatches(alias, layerName)));
}
