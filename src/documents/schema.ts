/**
 * Run document schemas.
 *
 * A run arrives as a sequence of `(name, document)` pairs:
 *
 *   start → (descriptor | event | event_page | resource | datum | datum_page)* → stop
 *
 * Only the fields the serializer relies on are validated; everything else
 * passes through untouched so templates can reach any metadata.
 */

import { z } from "zod";

export const DOCUMENT_NAMES = [
  "start",
  "descriptor",
  "event",
  "event_page",
  "stop",
  "resource",
  "datum",
  "datum_page",
] as const;

export type DocumentName = (typeof DOCUMENT_NAMES)[number];

export function isDocumentName(name: string): name is DocumentName {
  return DOCUMENT_NAMES.some((known) => known === name);
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const RunStartSchema = z
  .object({
    uid: z.string().min(1),
    /** Seconds since the epoch */
    time: z.number().finite(),
  })
  .passthrough();

export const EventDescriptorSchema = z
  .object({
    uid: z.string().min(1),
    data_keys: z.record(z.unknown()),
  })
  .passthrough();

export const EventSchema = z
  .object({
    descriptor: z.string().min(1),
    data: z.record(z.unknown()),
  })
  .passthrough();

export const EventPageSchema = z
  .object({
    descriptor: z.string().min(1),
    data: z.record(z.array(z.unknown())),
  })
  .passthrough();

export const RunStopSchema = z
  .object({
    uid: z.string().min(1),
    time: z.number().finite(),
  })
  .passthrough();

const AnyDocumentSchema = z.record(z.unknown());

export type RunStart = z.infer<typeof RunStartSchema>;
export type EventDescriptor = z.infer<typeof EventDescriptorSchema>;
export type Event = z.infer<typeof EventSchema>;
export type EventPage = z.infer<typeof EventPageSchema>;
export type RunStop = z.infer<typeof RunStopSchema>;

export type RunDocument =
  | { readonly kind: "start"; readonly doc: RunStart }
  | { readonly kind: "descriptor"; readonly doc: EventDescriptor }
  | { readonly kind: "event"; readonly doc: Event }
  | { readonly kind: "event_page"; readonly doc: EventPage }
  | { readonly kind: "stop"; readonly doc: RunStop }
  | {
      readonly kind: "resource" | "datum" | "datum_page";
      readonly doc: Record<string, unknown>;
    };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class DocumentValidationError extends Error {
  constructor(
    public readonly documentName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Invalid ${documentName} document: ${issues.join("; ")}`
    );
    this.name = "DocumentValidationError";
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function validate<T>(
  name: DocumentName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  doc: unknown
): T {
  const result = schema.safeParse(doc);
  if (!result.success) {
    throw new DocumentValidationError(
      name,
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

/**
 * Validate a named document and tag it with its kind.
 *
 * @throws DocumentValidationError for an unknown name or a malformed document
 */
export function parseDocument(name: string, doc: unknown): RunDocument {
  if (!isDocumentName(name)) {
    throw new DocumentValidationError(name, [
      `unknown document name; expected one of ${DOCUMENT_NAMES.join(", ")}`,
    ]);
  }

  switch (name) {
    case "start":
      return { kind: name, doc: validate(name, RunStartSchema, doc) };
    case "descriptor":
      return { kind: name, doc: validate(name, EventDescriptorSchema, doc) };
    case "event":
      return { kind: name, doc: validate(name, EventSchema, doc) };
    case "event_page":
      return { kind: name, doc: validate(name, EventPageSchema, doc) };
    case "stop":
      return { kind: name, doc: validate(name, RunStopSchema, doc) };
    case "resource":
    case "datum":
    case "datum_page":
      return { kind: name, doc: validate(name, AnyDocumentSchema, doc) };
  }
}
