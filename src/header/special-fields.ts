/**
 * Header fields whose value never comes from their template.
 *
 * `Scan.start_time` and `Scan.end_time` are taken from the timestamps of the
 * start and stop documents. The engine consults this table before any
 * generic rendering, so a template entry for these names is ignored.
 */

import type { RunStart, EventDescriptor, RunStop } from "../documents/schema.js";
import { UNRESOLVED, type HeaderValue } from "./buffer.js";

/** A document the header engine learns from, tagged with its kind. */
export type HeaderSource =
  | { readonly kind: "start"; readonly doc: RunStart }
  | { readonly kind: "descriptor"; readonly doc: EventDescriptor }
  | { readonly kind: "stop"; readonly doc: RunStop };

export type SpecialResolver = (source: HeaderSource) => HeaderValue;

/**
 * ISO-8601 (UTC, millisecond precision) form of an epoch timestamp in seconds.
 */
export function isoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export const SPECIAL_FIELDS: ReadonlyMap<string, SpecialResolver> = new Map<
  string,
  SpecialResolver
>([
  ["Scan.start_time", (source) => (source.kind === "start" ? isoTimestamp(source.doc.time) : UNRESOLVED)],
  ["Scan.end_time", (source) => (source.kind === "stop" ? isoTimestamp(source.doc.time) : UNRESOLVED)],
]);
