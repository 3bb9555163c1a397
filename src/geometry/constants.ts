// src/geometry/constants.ts

/** First D code available for user apertures in Gerber (D00-D09 are reserved). */
export const FIRST_APERTURE_CODE = 10;

/** Excellon tools are numbered from T01. */
export const FIRST_DRILL_CODE = 1;

/**
 * Pen size in millimeters used for polylines that carry no stroke width.
 * Small enough to be obviously wrong on a plot, large enough to show up.
 */
export const DEFAULT_FALLBACK_DIAMETER_MM = 0.01;
