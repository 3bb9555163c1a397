// src/index.ts

export { parseDxf, type ParseOptions } from "./parse/dxf-reader";
export { Drawing } from "./geometry/drawing";
export { classifyForLayers } from "./geometry/classifier";
export { ApertureTable, measureDrawing } from "./geometry/aperture-table";
export { GerberWriter, type ArtworkResult, type ArtworkStats } from "./emit/gerber-writer";
export { ExcellonWriter, type DrillResult, type DrillStats } from "./emit/excellon-writer";
export {
  convertDrawing,
  convertDxfFile,
  readDrawingFile,
  type CamOutput,
  type ArtworkOutput,
  type DrillOutput,
  type ConvertFileResult,
} from "./core/pipeline";
export { resolveConfig, DEFAULT_CONVERTER_CONFIG, type ConverterConfig, type ConverterConfigInput } from "./core/config";
export { CamError, ParseError, LookupError, ConfigError, EmitterStateError, type CamWarning } from "./core/errors";
export { LogManager, type LogLevel, type Logger } from "./core/logger";
export { DEFAULT_OUTPUT_ROLES, normalizeLayerName, layerMatches, type OutputRole, type LayerRole } from "./io/layer-roles";
export { writeCamFiles, type WrittenFile } from "./io/cam-writer";
export { bundleCamOutputs } from "./io/zip-bundle";
export * from "./types/drawing";
export type { ConvertFileOptions, EmitterSettings } from "./types/options";
