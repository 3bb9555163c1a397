// src/types/options.ts
import type { ConverterConfig, ConverterConfigInput } from "../core/config";
import type { ParseOptions } from "../parse/dxf-reader";

/**
 * The part of the converter config an emitter reads. Handed to each
 * writer instance at construction; writers never touch shared state.
 */
export type EmitterSettings = Pick<ConverterConfig, "coordinateFormat" | "scale" | "defaultDiameter" | "comment">;

export interface ConvertFileOptions {
  /**
   * Output path without extension. Each role's extension is appended.
   * Defaults to the input path with its extension removed.
   */
  outputBase?: string;

  /** Overrides merged over DEFAULT_CONVERTER_CONFIG. */
  config?: ConverterConfigInput;

  /** Options for the DXF reader. */
  parse?: ParseOptions;
}
