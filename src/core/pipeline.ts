// src/core/pipeline.ts

import { readFileSync } from "node:fs";
import { extname } from "node:path";

import type { Drawing } from "../geometry/drawing";
import type { ConvertFileOptions } from "../types/options";
import { parseDxf, type ParseOptions } from "../parse/dxf-reader";
import { classifyForLayers, isEmpty } from "../geometry/classifier";
import { measureDrawing } from "../geometry/aperture-table";
import { GerberWriter, type ArtworkStats } from "../emit/gerber-writer";
import { ExcellonWriter, type DrillStats } from "../emit/excellon-writer";
import { rolesForLayer, type ArtworkRole, type DrillRole, type OutputRole } from "../io/layer-roles";
import { writeCamFiles, type WrittenFile } from "../io/cam-writer";
import { DEFAULT_CONVERTER_CONFIG, resolveConfig, type ConverterConfig } from "./config";
import { ParseError, createErrorDetails, type CamWarning } from "./errors";
import { getLogger } from "./logger";

const log = getLogger("Pipeline");

/**
 * How many entities of each kind were classified onto an output's layers.
 */
export interface EntityCounts {
  tracks: number;
  regions: number;
  circles: number;
}

interface CamOutputBase {
  extension: string;
  /** File text, or null when no entity landed on the role's layers. */
  content: string | null;
  counts: EntityCounts;
  warnings: CamWarning[];
}

export interface ArtworkOutput extends CamOutputBase {
  kind: "artwork";
  role: ArtworkRole;
  stats: ArtworkStats;
}

export interface DrillOutput extends CamOutputBase {
  kind: "drill";
  role: DrillRole;
  stats: DrillStats;
}

export type CamOutput = ArtworkOutput | DrillOutput;

export interface ConvertFileResult {
  outputs: CamOutput[];
  files: WrittenFile[];
}

/**
 * Produce the text of every configured output role from one drawing.
 *
 * Each role gets its own writer instance, built from the diameter set of
 * the whole drawing, so aperture and tool numbering is the same in every
 * file of the run. Nothing is written to disk here.
 */
export function convertDrawing(drawing: Drawing, config: ConverterConfig = DEFAULT_CONVERTER_CONFIG): CamOutput[] {
  const diameters = measureDrawing(drawing);
  log.debug(`Drawing uses ${diameters.length} distinct diameters`);

  for (const layer of drawing.layerNames()) {
    if (rolesForLayer(layer, config.roles).length === 0) {
      log.warn(`Layer "${layer}" is not mapped to any output and will be ignored`);
    }
  }

  return config.roles.map((role) => convertRole(drawing, role, diameters, config));
}

function convertRole(
  drawing: Drawing,
  role: OutputRole,
  diameters: number[],
  config: ConverterConfig
): CamOutput {
  const entities = classifyForLayers(drawing, role.aliases);
  const counts: EntityCounts = {
    tracks: entities.tracks.length,
    regions: entities.regions.length,
    circles: entities.circles.length,
  };

  log.info(
    `${role.extension} (${role.aliases[0]}) will contain ${counts.regions} regions, ${counts.tracks} tracks and ${counts.circles} circles`
  );

  const empty = isEmpty(entities);

  if (role.role === "drill") {
    if (empty) {
      return {
        kind: "drill",
        role: role.role,
        extension: role.extension,
        content: null,
        counts,
        stats: { holes: 0 },
        warnings: [],
      };
    }
    const result = new ExcellonWriter(config, diameters).write(entities);
    return { kind: "drill", role: role.role, extension: role.extension, counts, ...result };
  }

  if (empty) {
    return {
      kind: "artwork",
      role: role.role,
      extension: role.extension,
      content: null,
      counts,
      stats: { tracks: 0, regions: 0, flashes: 0 },
      warnings: [],
    };
  }
  const result = new GerberWriter(config, diameters).write(entities);
  return { kind: "artwork", role: role.role, extension: role.extension, counts, ...result };
}

/**
 * Read and parse a DXF file from disk. An unreadable file is reported as a
 * ParseError, same as a malformed one.
 */
export function readDrawingFile(path: string, options: ParseOptions = {}): Drawing {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (err) {
    throw new ParseError(
      `Cannot read DXF file ${path}`,
      "UNREADABLE_INPUT",
      err instanceof Error ? err : undefined,
      { ...createErrorDetails(err), path }
    );
  }
  return parseDxf(content, options);
}

/**
 * Full conversion of one DXF file: parse, emit every role, write the files.
 * A parse failure throws before any file is touched.
 */
export function convertDxfFile(inputPath: string, options: ConvertFileOptions = {}): ConvertFileResult {
  const config = resolveConfig(options.config);

  log.info(`Processing file ${inputPath}`);
  const drawing = readDrawingFile(inputPath, options.parse);

  const outputs = convertDrawing(drawing, config);
  const base = options.outputBase ?? stripExtension(inputPath);
  const files = writeCamFiles(outputs, base);

  return { outputs, files };
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}
