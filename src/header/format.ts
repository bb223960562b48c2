/**
 * Header block formatting.
 *
 *   # XDI/1.0                      ← versions["XDI"], always first
 *   # Bluesky = # Bluesky/1.0      ← every other field, buffer order
 *   # Column.1 = energy eV
 *   # Element.symbol = A
 *   # Scan.end_time = None         ← still unresolved
 *   #----
 *   # energy	mutrans	i0         ← column labels, tab-separated
 *
 * Every line starts with the header marker, which is how finalization
 * tells the header apart from data rows.
 */

import { HEADER_MARKER, XDI_VERSION_KEY, type XdiTemplate } from "../template/schema.js";
import type { HeaderLineBuffer } from "./buffer.js";

export const SEPARATOR_LINE = `${HEADER_MARKER}----`;

export function isHeaderLine(line: string): boolean {
  return line.startsWith(HEADER_MARKER);
}

function singleLine(value: string): string {
  return value.replace(/\r?\n/g, " ");
}

/**
 * Render the complete header block, newline-terminated.
 */
export function formatHeaderBlock(template: XdiTemplate, buffer: HeaderLineBuffer): string {
  const fieldLines: string[] = [];

  for (const field of buffer.entries()) {
    if (field.section === "versions" && field.name === XDI_VERSION_KEY) {
      continue;
    }
    fieldLines.push(`${HEADER_MARKER} ${field.name} = ${singleLine(buffer.display(field.name))}`);
  }

  const labels = template.columns.map((column) => singleLine(column.label.source));

  return [
    singleLine(buffer.display(XDI_VERSION_KEY)),
    ...fieldLines,
    SEPARATOR_LINE,
    `${HEADER_MARKER} ${labels.join("\t")}`,
  ].join("\n") + "\n";
}
