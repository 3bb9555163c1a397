// src/core/config.ts

import { z } from "zod";

import { ConfigError } from "./errors";
import { DEFAULT_OUTPUT_ROLES } from "../io/layer-roles";
import { DEFAULT_FALLBACK_DIAMETER_MM } from "../geometry/constants";

const outputRoleSchema = z.object({
  role: z.enum([
    "bottom_copper",
    "bottom_overlay",
    "bottom_soldermask",
    "top_copper",
    "top_overlay",
    "top_soldermask",
    "drill",
  ]),
  kind: z.enum(["artwork", "drill"]),
  extension: z.string().regex(/^\.[A-Za-z0-9]+$/, "extension must look like .gtl"),
  aliases: z.array(z.string()).min(1),
}).refine((r) => (r.role === "drill") === (r.kind === "drill"), {
  message: "only the drill role may use kind \"drill\"",
});

export const converterConfigSchema = z.object({
  /** Integer and decimal digits written in the Gerber FS statement. */
  coordinateFormat: z.object({
    integerDigits: z.number().int().min(1).max(6),
    decimalDigits: z.number().int().min(0).max(6),
  }),
  /** Uniform factor applied to every emitted coordinate and size. */
  scale: z.number().positive(),
  /** Pen/drill size used when a width or diameter is missing (mm). */
  defaultDiameter: z.number().positive(),
  /** Text of the G04 comment at the top of each artwork file. */
  comment: z.string(),
  roles: z.array(outputRoleSchema).min(1),
});

export type ConverterConfig = z.infer<typeof converterConfigSchema>;

export type ConverterConfigInput = Partial<Omit<ConverterConfig, "coordinateFormat">> & {
  coordinateFormat?: Partial<ConverterConfig["coordinateFormat"]>;
};

export const DEFAULT_CONVERTER_CONFIG: ConverterConfig = {
  coordinateFormat: { integerDigits: 2, decimalDigits: 6 },
  scale: 1.0,
  defaultDiameter: DEFAULT_FALLBACK_DIAMETER_MM,
  comment: "dxf-cam artwork",
  roles: DEFAULT_OUTPUT_ROLES,
};

/**
 * Merge user overrides over the defaults and validate the result.
 */
export function resolveConfig(input: ConverterConfigInput = {}): ConverterConfig {
  const merged = {
    ...DEFAULT_CONVERTER_CONFIG,
    ...input,
    coordinateFormat: {
      ...DEFAULT_CONVERTER_CONFIG.coordinateFormat,
      ...input.coordinateFormat,
    },
  };

  const result = converterConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid converter config at "${issue.path.join(".")}": ${issue.message}`,
      "INVALID_CONFIG",
      result.error,
      { issues: result.error.issues }
    );
  }

  return result.data;
}
