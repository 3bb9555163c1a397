// src/io/cam-writer.ts

import { closeSync, existsSync, openSync, rmSync, writeSync } from "node:fs";

import type { CamOutput } from "../core/pipeline";
import type { LayerRole } from "./layer-roles";
import { getLogger } from "../core/logger";

const log = getLogger("CamWriter");

export type WriteStatus = "written" | "deleted" | "skipped";

export interface WrittenFile {
  path: string;
  role: LayerRole;
  status: WriteStatus;
}

/**
 * Put each output next to `basePath` (basePath + extension).
 *
 * Outputs without content are not written; if a file with that name is
 * left over from an earlier run it is removed, so the directory never
 * holds a stale layer.
 */
export function writeCamFiles(outputs: CamOutput[], basePath: string): WrittenFile[] {
  return outputs.map((output) => {
    const path = basePath + output.extension;

    if (output.content === null) {
      if (existsSync(path)) {
        rmSync(path);
        log.info(`File will be empty: removed stale ${path}`);
        return { path, role: output.role, status: "deleted" };
      }
      log.info(`File will be empty: skipping ${path}`);
      return { path, role: output.role, status: "skipped" };
    }

    writeTextFile(path, output.content);
    log.info(`Wrote ${path}`);
    return { path, role: output.role, status: "written" };
  });
}

/**
 * Write text through an explicitly opened handle; the handle is closed
 * even when the write throws.
 */
function writeTextFile(path: string, content: string): void {
  const fd = openSync(path, "w");
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
}
