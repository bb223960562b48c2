/**
 * Event ↔ event page conversion.
 *
 * Column templates address data the way a page lays it out
 * (`{data[det][0]}`), so every data record is rendered as a single-row
 * page: a lone `event` is packed into one, and an `event_page` holding N
 * events is split into N of them.
 */

import { isRecord } from "../template/placeholder.js";
import { DocumentValidationError, type Event, type EventPage } from "./schema.js";

/** Event fields that hold one value per event when paged. */
const PER_EVENT_FIELDS = ["uid", "seq_num", "time"] as const;

/** Event fields besides `data` that map each data key to a value. */
const PER_KEY_FIELDS = ["timestamps", "filled"] as const;

function wrapValues(mapping: Record<string, unknown>): Record<string, unknown[]> {
  return Object.fromEntries(Object.entries(mapping).map(([key, value]) => [key, [value]]));
}

/**
 * Pack one event into a single-row page.
 */
export function packEvent(event: Event): EventPage {
  const page: EventPage = { ...event, descriptor: event.descriptor, data: wrapValues(event.data) };

  for (const field of PER_EVENT_FIELDS) {
    if (Object.hasOwn(event, field)) {
      page[field] = [event[field]];
    }
  }
  for (const field of PER_KEY_FIELDS) {
    const mapping = event[field];
    if (isRecord(mapping)) {
      page[field] = wrapValues(mapping);
    }
  }

  return page;
}

/**
 * Number of events in a page. All `data` columns (and `seq_num`, when
 * present) must agree.
 */
export function pageLength(page: EventPage): number {
  const lengths = new Set<number>(Object.values(page.data).map((column) => column.length));
  const seqNum = page["seq_num"];
  if (Array.isArray(seqNum)) {
    lengths.add(seqNum.length);
  }

  if (lengths.size > 1) {
    throw new DocumentValidationError("event_page", [
      `columns have different lengths: ${[...lengths].join(", ")}`,
    ]);
  }
  const [length] = lengths;
  return length ?? 0;
}

/**
 * Split a page into single-row pages, preserving event order.
 */
export function unpackEventPage(page: EventPage): EventPage[] {
  const length = pageLength(page);
  if (length === 1) {
    return [page];
  }

  const rows: EventPage[] = [];
  for (let i = 0; i < length; i++) {
    const data: Record<string, unknown[]> = {};
    for (const [key, column] of Object.entries(page.data)) {
      data[key] = [column[i]];
    }

    const row: EventPage = { ...page, descriptor: page.descriptor, data };

    for (const field of PER_EVENT_FIELDS) {
      const values = page[field];
      if (Array.isArray(values)) {
        row[field] = [values[i]];
      }
    }
    for (const field of PER_KEY_FIELDS) {
      const mapping = page[field];
      if (isRecord(mapping)) {
        const sliced: Record<string, unknown[]> = {};
        for (const [key, column] of Object.entries(mapping)) {
          if (Array.isArray(column)) {
            sliced[key] = [column[i]];
          }
        }
        row[field] = sliced;
      }
    }

    rows.push(row);
  }
  return rows;
}
