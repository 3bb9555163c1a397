// src/io/file-normalizer.ts

/**
 * Normalize DXF text before it is split into group-code/value lines:
 * - Strip UTF-8 BOM if present
 * - Normalize line endings to "\n"
 */
export function normalizeDxfText(raw: string): string {
  return normalizeLineEndings(stripBom(raw));
}

/**
 * Split normalized DXF text into lines. A trailing newline does not
 * produce an extra empty line.
 */
export function splitDxfLines(text: string): string[] {
  const lines = normalizeDxfText(text).split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Remove UTF-8 BOM if present.
 */
function stripBom(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Convert CRLF and CR line endings to LF.
 */
function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}
