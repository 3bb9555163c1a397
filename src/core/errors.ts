// src/core/errors.ts

/**
 * Extra context attached to an error, e.g. the line number of a bad field.
 */
export interface ErrorDetails extends Record<string, unknown> {
  originalError?: string;
}

/**
 * Base error for everything the converter throws on purpose.
 */
export class CamError extends Error {
  constructor(
    message: string,
    public code: string,
    cause?: Error,
    public details?: ErrorDetails
  ) {
    super(message, { cause });
    this.name = "CamError";
  }
}

/**
 * Thrown while reading a DXF stream. Always fatal for the load.
 */
export class ParseError extends CamError {
  constructor(message: string, code: string, cause?: Error, details?: ErrorDetails) {
    super(message, code, cause, details);
    this.name = "ParseError";
  }
}

/**
 * An entity asked for a diameter the aperture/tool table never saw.
 * Only happens if the table was built from something other than the whole drawing.
 */
export class LookupError extends CamError {
  constructor(message: string, code: string, cause?: Error, details?: ErrorDetails) {
    super(message, code, cause, details);
    this.name = "LookupError";
  }
}

export class ConfigError extends CamError {
  constructor(message: string, code: string, cause?: Error, details?: ErrorDetails) {
    super(message, code, cause, details);
    this.name = "ConfigError";
  }
}

/**
 * An emitter stage was entered out of order.
 */
export class EmitterStateError extends CamError {
  constructor(message: string, code: string, cause?: Error, details?: ErrorDetails) {
    super(message, code, cause, details);
    this.name = "EmitterStateError";
  }
}

/**
 * Non-fatal data quality problem found while emitting a file.
 * Recorded on the output and logged; never thrown.
 */
export interface CamWarning {
  code: string;
  message: string;
  details?: ErrorDetails;
}

export function createErrorDetails(originalError: unknown): ErrorDetails {
  return {
    originalError: originalError instanceof Error ? originalError.message : String(originalError),
  };
}
