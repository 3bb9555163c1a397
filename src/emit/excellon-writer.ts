// src/emit/excellon-writer.ts

import type { Circle, ClassifiedEntities } from "../types/drawing";
import type { EmitterSettings } from "../types/options";
import { ApertureTable } from "../geometry/aperture-table";
import { isAtOrigin, sortedUniquePoints } from "../geometry/point-order";
import { ceilToTenth, toFixedHalfEven } from "../geometry/rounding";
import { EmitterStateError, type CamWarning } from "../core/errors";
import { getLogger } from "../core/logger";

const log = getLogger("ExcellonWriter");

type DrillStage = "idle" | "header" | "tools" | "drill" | "trailer";

const STAGE_ORDER: DrillStage[] = ["idle", "header", "tools", "drill", "trailer"];

export interface DrillStats {
  holes: number;
}

export interface DrillResult {
  content: string;
  stats: DrillStats;
  warnings: CamWarning[];
}

/**
 * Writes one Excellon NC drill file.
 *
 * Holes are drilled smallest tool first, each tool's holes in X-then-Y order.
 * Tracks and regions on a drill layer would be routed cut-outs; routing
 * is not implemented, so they only produce a warning.
 */
export class ExcellonWriter {
  private readonly tools: ApertureTable;
  private readonly diameters: number[];
  private readonly lines: string[] = [];
  private readonly warnings: CamWarning[] = [];
  private readonly stats: DrillStats = { holes: 0 };

  private stage: DrillStage = "idle";
  private currentTool: number | null = null;

  constructor(
    private readonly settings: EmitterSettings,
    diameters: readonly number[]
  ) {
    this.tools = ApertureTable.forDrill(diameters);
    this.diameters = [...diameters].sort((a, b) => a - b);
  }

  write(entities: ClassifiedEntities): DrillResult {
    this.writeHeader();
    this.writeTools();
    this.writeHoles(entities.circles);
    this.reportCutouts(entities);
    this.writeTrailer();

    return {
      content: this.lines.join("\n") + "\n",
      stats: { ...this.stats },
      warnings: [...this.warnings],
    };
  }

  private writeHeader(): void {
    this.advance("header");
    this.lines.push("%", "M48", "METRIC,TZ", "M71");
    this.currentTool = null;
  }

  private writeTools(): void {
    this.advance("tools");

    for (const { code, diameter } of this.tools.entries()) {
      // Tool sizes are physical bit sizes: rounded up from the drawn diameter, not scaled.
      const size = ceilToTenth(diameter === 0 ? this.settings.defaultDiameter : diameter);
      this.lines.push(`T${formatToolCode(code)}C${size.toFixed(3)}`);
    }

    this.lines.push("%", "G05");
  }

  private writeHoles(circles: Circle[]): void {
    this.advance("drill");

    const holes = sortedUniquePoints(circles);

    for (const dia of this.diameters) {
      if (dia === 0) {
        log.debug("Skipping diameter 0 holes");
        continue;
      }

      for (const hole of holes) {
        if ((hole.diameter ?? 0) !== dia || isAtOrigin(hole)) continue;
        this.selectTool(dia);
        this.lines.push(`X${this.formatCoord(hole.x ?? 0)}Y${this.formatCoord(hole.y ?? 0)}`);
        this.stats.holes++;
      }
    }

    const undrilled = holes.filter((h) => (h.diameter ?? 0) === 0).length;
    if (undrilled > 0) {
      this.warn("UNDEFINED_HOLE_SIZE", `${undrilled} circles on the drill layer have no diameter and were not drilled`, {
        count: undrilled,
      });
    }
  }

  private reportCutouts(entities: ClassifiedEntities): void {
    const count = entities.tracks.length + entities.regions.length;
    if (count > 0) {
      this.warn("CUTOUT_NOT_IMPLEMENTED", `${count} polylines on the drill layer ignored: cut-outs are not implemented`, {
        tracks: entities.tracks.length,
        regions: entities.regions.length,
      });
    }
  }

  private writeTrailer(): void {
    this.advance("trailer");
    this.lines.push("M30");
  }

  private selectTool(diameter: number): void {
    const code = this.tools.codeFor(diameter);
    if (this.currentTool !== code) {
      this.lines.push(`T${formatToolCode(code)}`);
      this.currentTool = code;
    }
  }

  /**
   * Millimetres with two decimals, zero padded to six characters and then
   * stripped of leading zeros: 10 -> "10.00", 0.5 -> ".50".
   */
  private formatCoord(v: number): string {
    const scaled = v * this.settings.scale;
    const negative = scaled < 0;
    const body = toFixedHalfEven(Math.abs(scaled), 2);
    const padded = (negative ? "-" : "") + body.padStart(negative ? 5 : 6, "0");
    return padded.replace(/^0+/, "");
  }

  private advance(next: DrillStage): void {
    if (STAGE_ORDER.indexOf(next) !== STAGE_ORDER.indexOf(this.stage) + 1) {
      throw new EmitterStateError(
        `Cannot enter drill stage "${next}" from "${this.stage}"`,
        "BAD_STAGE_TRANSITION",
        undefined,
        { from: this.stage, to: next }
      );
    }
    this.stage = next;
  }

  private warn(code: string, message: string, details: Record<string, unknown>): void {
    log.warn(message);
    this.warnings.push({ code, message, details });
  }
}

function formatToolCode(code: number): string {
  return String(code).padStart(2, "0");
}
