// src/emit/gerber-writer.ts

import type { Circle, ClassifiedEntities, Polyline, Vec2 } from "../types/drawing";
import type { EmitterSettings } from "../types/options";
import { ApertureTable } from "../geometry/aperture-table";
import { isAtOrigin, sortedUniquePoints } from "../geometry/point-order";
import { layerOf } from "../geometry/drawing";
import { EmitterStateError, type CamWarning } from "../core/errors";
import { getLogger } from "../core/logger";

const log = getLogger("GerberWriter");

type ArtworkStage = "idle" | "header" | "apertures" | "plot" | "trailer";

const STAGE_ORDER: ArtworkStage[] = ["idle", "header", "apertures", "plot", "trailer"];

/**
 * Pen state of the photoplotter. A null axis means "never emitted", so the
 * first coordinate on each axis is always written out.
 */
interface PlotterState {
  x: number | null;
  y: number | null;
  apertureCode: number | null;
  regionMode: boolean;
}

export interface ArtworkStats {
  tracks: number;
  regions: number;
  flashes: number;
}

export interface ArtworkResult {
  content: string;
  stats: ArtworkStats;
  warnings: CamWarning[];
}

/**
 * Writes one RS-274X artwork file.
 *
 * The output is produced in four stages that always run in order:
 * header, aperture table, plot (tracks, then flashes, then regions), trailer.
 * Aperture selects and coordinate axes are only written when they change.
 *
 * A writer instance owns its aperture table and plotter state and is
 * good for exactly one file.
 */
export class GerberWriter {
  private readonly apertures: ApertureTable;
  private readonly lines: string[] = [];
  private readonly warnings: CamWarning[] = [];
  private readonly stats: ArtworkStats = { tracks: 0, regions: 0, flashes: 0 };

  private stage: ArtworkStage = "idle";
  private state: PlotterState = { x: null, y: null, apertureCode: null, regionMode: false };

  constructor(
    private readonly settings: EmitterSettings,
    diameters: readonly number[]
  ) {
    this.apertures = ApertureTable.forArtwork(diameters);
  }

  write(entities: ClassifiedEntities): ArtworkResult {
    this.writeHeader();
    this.writeApertures();
    this.writePlot(entities);
    this.writeTrailer();

    return {
      content: this.lines.join("\n") + "\n",
      stats: { ...this.stats },
      warnings: [...this.warnings],
    };
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private writeHeader(): void {
    this.advance("header");

    const { integerDigits, decimalDigits } = this.settings.coordinateFormat;
    this.emitComment(this.settings.comment);
    this.emitParameter("FS", `LAX${integerDigits}${decimalDigits}Y${integerDigits}${decimalDigits}`);
    this.emitParameter("MO", "MM");
    this.emitParameter("SR", "X1Y1I0J0");
    this.emitParameter("LP", "D");

    this.state = { x: null, y: null, apertureCode: null, regionMode: false };
  }

  private writeApertures(): void {
    this.advance("apertures");

    for (const { code, diameter } of this.apertures.entries()) {
      const size = (diameter === 0 ? this.settings.defaultDiameter : diameter) * this.settings.scale;
      this.emitParameter(`ADD${code}`, `C,${size.toFixed(6)}`);
    }
  }

  private writePlot(entities: ClassifiedEntities): void {
    this.advance("plot");

    // Fail before writing anything if an entity needs an undefined aperture.
    for (const t of entities.tracks) this.apertures.codeFor(widthKey(t));
    for (const c of entities.circles) this.apertures.codeFor(diameterKey(c));

    log.debug(`Writing ${entities.tracks.length} tracks`);
    this.writeTracks(entities.tracks);

    log.debug(`Flashing ${this.apertures.size} apertures`);
    this.writeFlashes(entities.circles);

    log.debug(`Writing ${entities.regions.length} regions`);
    this.writeRegions(entities.regions);
  }

  private writeTrailer(): void {
    this.advance("trailer");
    this.ensureRegion(false);
    this.emitCommand("M02");
  }

  private advance(next: ArtworkStage): void {
    if (STAGE_ORDER.indexOf(next) !== STAGE_ORDER.indexOf(this.stage) + 1) {
      throw new EmitterStateError(
        `Cannot enter artwork stage "${next}" from "${this.stage}"`,
        "BAD_STAGE_TRANSITION",
        undefined,
        { from: this.stage, to: next }
      );
    }
    this.stage = next;
  }

  // ---------------------------------------------------------------------------
  // Plot content
  // ---------------------------------------------------------------------------

  /**
   * Tracks grouped by width, in aperture order, so each aperture is
   * selected once per group.
   */
  private writeTracks(tracks: Polyline[]): void {
    for (const d of this.apertures.diameters()) {
      for (const track of tracks) {
        if (widthKey(track) === d) {
          this.writeTrack(track);
        }
      }
    }
  }

  private writeTrack(track: Polyline): void {
    const [first, ...rest] = track.vertices;
    if (!first) {
      this.warn("EMPTY_POLYLINE", `Open polyline on layer "${layerOf(track)}" has no vertices; skipped`, {
        layer: layerOf(track),
      });
      return;
    }

    this.ensureRegion(false);

    const width = widthKey(track);
    if (width === 0) {
      this.warn(
        "ZERO_WIDTH_TRACK",
        `Open polyline on layer "${layerOf(track)}" has no stroke width; plotting with the ${this.settings.defaultDiameter} mm default aperture`,
        { layer: layerOf(track) }
      );
    }
    this.selectAperture(width);

    this.moveTo(pointOf(first));
    for (const v of rest) {
      this.drawTo(pointOf(v));
    }
    this.stats.tracks++;
  }

  /**
   * Circles sorted by position with stacked duplicates removed, then
   * flashed grouped by diameter. Circles at the origin are placeholders
   * and never flashed.
   */
  private writeFlashes(circles: Circle[]): void {
    const points = sortedUniquePoints(circles);

    for (const d of this.apertures.diameters()) {
      for (const c of points) {
        if (diameterKey(c) !== d || isAtOrigin(c)) continue;
        this.selectAperture(d);
        this.emitCommand(this.emitPoint(pointOf(c)) + "D03");
        this.stats.flashes++;
      }
    }
  }

  private writeRegions(regions: Polyline[]): void {
    for (const region of regions) {
      const [first, ...rest] = region.vertices;
      if (!first) {
        this.warn("EMPTY_POLYLINE", `Closed polyline on layer "${layerOf(region)}" has no vertices; skipped`, {
          layer: layerOf(region),
        });
        continue;
      }

      this.ensureRegion(true);
      this.moveTo(pointOf(first));
      for (const v of rest) {
        this.drawTo(pointOf(v));
      }
      this.drawTo(pointOf(first));
      this.stats.regions++;
    }
  }

  // ---------------------------------------------------------------------------
  // Plotter primitives
  // ---------------------------------------------------------------------------

  private ensureRegion(on: boolean): void {
    if (this.state.regionMode === on) return;
    this.emitCommand(on ? "G36" : "G37");
    this.state.regionMode = on;
  }

  private selectAperture(diameter: number): void {
    const code = this.apertures.codeFor(diameter);
    if (this.state.apertureCode !== code) {
      this.emitCommand(`D${code}`);
      this.state.apertureCode = code;
    }
  }

  private moveTo(p: Vec2): void {
    this.emitCommand(this.emitPoint(p) + "D02");
  }

  private drawTo(p: Vec2): void {
    this.emitCommand(this.emitPoint(p) + "D01");
  }

  /**
   * Coordinate words for p, leaving out any axis that has not moved.
   */
  private emitPoint(p: Vec2): string {
    let result = "";
    if (this.state.x !== p.x) {
      result += "X" + this.formatCoord(p.x);
      this.state.x = p.x;
    }
    if (this.state.y !== p.y) {
      result += "Y" + this.formatCoord(p.y);
      this.state.y = p.y;
    }
    return result;
  }

  /**
   * Fixed-point integer with leading zeros omitted (the "L" in FSLA).
   * Example: decimalDigits = 6, 1.5 mm -> "1500000"
   */
  private formatCoord(v: number): string {
    const scaled = v * this.settings.scale * Math.pow(10, this.settings.coordinateFormat.decimalDigits);
    return String(Math.trunc(scaled));
  }

  private emitCommand(command: string): void {
    this.lines.push(`${command}*`);
  }

  private emitComment(text: string): void {
    this.lines.push(`G04 ${text.trim()}*`);
  }

  private emitParameter(name: string, value: string): void {
    this.lines.push(`%${name}${value}*%`);
  }

  private warn(code: string, message: string, details: Record<string, unknown>): void {
    log.warn(message);
    this.warnings.push({ code, message, details });
  }
}

function widthKey(p: Polyline): number {
  return p.width ?? 0;
}

function diameterKey(c: Circle): number {
  return c.diameter ?? 0;
}

function pointOf(e: { x?: number; y?: number }): Vec2 {
  return { x: e.x ?? 0, y: e.y ?? 0 };
}
