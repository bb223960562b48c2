/**
 * Data row rendering.
 *
 * One row per single-row event page: each column's `column_data` template
 * rendered against the page, tab-joined, newline-terminated. A column
 * that cannot be rendered is fatal; dropping it would shift every value
 * after it into the wrong column.
 */

import { renderRequired, RenderError } from "../template/placeholder.js";
import { HEADER_MARKER, type ColumnDefinition } from "../template/schema.js";
import type { EventPage } from "../documents/schema.js";

export const COLUMN_SEPARATOR = "\t";

/**
 * @throws RenderError if a column's data is missing or cannot be formatted,
 *         or if the row would be split or mistaken for a header line
 */
export function renderRow(columns: readonly ColumnDefinition[], record: EventPage): string {
  const values = columns.map((column) =>
    renderRequired(column.data, record, `column ${column.name}`)
  );

  const line = values.join(COLUMN_SEPARATOR);
  const broken = values.findIndex((value) => /[\r\n]/.test(value));
  if (broken !== -1) {
    const column = columns[broken];
    throw new RenderError(
      column?.data.source ?? "",
      column?.name ?? "",
      "value contains a line break and would split the row"
    );
  }
  if (line.startsWith(HEADER_MARKER)) {
    throw new RenderError(
      columns[0]?.data.source ?? "",
      columns[0]?.name ?? "",
      `row starts with "${HEADER_MARKER}" and would be read back as a header line`
    );
  }
  return line + "\n";
}
