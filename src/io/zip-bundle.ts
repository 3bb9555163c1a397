// src/io/zip-bundle.ts
import JSZip from "jszip";

import type { CamOutput } from "../core/pipeline";

/**
 * Pack the non-empty outputs into a single zip, the form most board
 * houses accept for upload. Entry names are `${baseName}${extension}`.
 */
export async function bundleCamOutputs(outputs: CamOutput[], baseName: string): Promise<Uint8Array> {
  const zip = new JSZip();

  for (const output of outputs) {
    if (output.content === null) continue;
    zip.file(normalizeZipPath(baseName + output.extension), output.content);
  }

  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}

/**
 * Normalize zip entry paths:
 * - Replace backslashes with forward slashes
 * - Remove leading "./"
 */
function normalizeZipPath(path: string): string {
  let p = path.replace(/\\/g, "/");
  if (p.startsWith("./")) {
    p = p.slice(2);
  }
  // Remove leading slash if any
  if (p.startsWith("/")) {
    p = p.slice(1);
  }
  return p;
}
