/**
 * One-call export of a whole run.
 */

import type { OutputManager } from "../output/manager.js";
import { Serializer, type SerializerOptions } from "./serializer.js";

export type NamedDocument = readonly [name: string, doc: unknown];

/**
 * Feed every `[name, document]` pair through a fresh Serializer and return
 * the artifacts it produced. The output manager is closed even when a
 * document fails.
 *
 * @example
 *   const artifacts = exportDocuments(documents, "output/xdi");
 *   // { stream_data: ["/abs/path/output/xdi/<uid>-.xdi"] }
 */
export function exportDocuments(
  documents: Iterable<NamedDocument>,
  directory: string,
  options?: SerializerOptions
): Readonly<Record<string, readonly string[]>>;
export function exportDocuments<A>(
  documents: Iterable<NamedDocument>,
  manager: OutputManager<A>,
  options?: SerializerOptions
): Readonly<Record<string, readonly A[]>>;
export function exportDocuments<A>(
  documents: Iterable<NamedDocument>,
  destination: string | OutputManager<A>,
  options: SerializerOptions = {}
): Readonly<Record<string, readonly (A | string)[]>> {
  const serializer: Serializer<A> | Serializer<string> =
    typeof destination === "string"
      ? Serializer.toDirectory(destination, options)
      : new Serializer(destination, options);

  try {
    for (const [name, doc] of documents) {
      serializer.handle(name, doc);
    }
  } finally {
    serializer.close();
  }

  return serializer.artifacts;
}
