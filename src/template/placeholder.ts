/**
 * Value-template parsing and rendering.
 *
 * A value-template is plain text containing replacement fields that point
 * into a document's nested key/value structure:
 *
 *   {md[XDI][Element_symbol]}          nested keys
 *   {data[det][0]}                     numeric index into an array
 *   {md.NX.Source.name}                attribute-style keys
 *   {md[NX][Beam][incident_energy]:.3f} eV   with a format spec
 *   {uid!r}                            with a conversion (s, r or a)
 *
 * `{{` and `}}` render as literal braces.
 *
 * Rendering never fails just because data is missing: a field whose path
 * is absent from the document makes the whole render *unresolved*, and the
 * caller decides whether that is fatal (data rows, file names) or simply
 * pending (header fields waiting for a later document). A value that is
 * present but of the wrong type is always a RenderError.
 */

import {
  formatScalar,
  parseFormatSpec,
  FormatSpecError,
  type FormatSpec,
} from "./format-spec.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Accessor =
  | { readonly kind: "key"; readonly key: string }
  | { readonly kind: "index"; readonly index: number };

export type Conversion = "s" | "r" | "a";

export interface FieldReference {
  /** Field text between the braces, for messages. */
  readonly source: string;
  /** Dotted/bracketed path without conversion or spec, e.g. `data[det][0]`. */
  readonly path: string;
  readonly root: string;
  readonly accessors: readonly Accessor[];
  readonly conversion: Conversion | null;
  readonly spec: FormatSpec | null;
}

export type Segment =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "field"; readonly field: FieldReference };

export interface ValueTemplate {
  readonly source: string;
  readonly segments: readonly Segment[];
}

export type RenderResult =
  | { readonly resolved: true; readonly value: string }
  | { readonly resolved: false; readonly missing: readonly string[] };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PlaceholderSyntaxError extends Error {
  constructor(
    public readonly template: string,
    public readonly position: number,
    reason: string
  ) {
    super(`Invalid value-template "${template}" at position ${position}: ${reason}`);
    this.name = "PlaceholderSyntaxError";
  }
}

export class RenderError extends Error {
  constructor(
    public readonly template: string,
    public readonly field: string,
    public readonly reason: string,
    message?: string
  ) {
    super(message ?? `Cannot render "${template}" (field ${field}): ${reason}`);
    this.name = "RenderError";
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*/;

function parseField(template: string, body: string, offset: number): FieldReference {
  const fail = (at: number, reason: string): never => {
    throw new PlaceholderSyntaxError(template, offset + at, reason);
  };

  const rootMatch = NAME_RE.exec(body);
  if (!rootMatch) {
    return fail(0, "replacement field must start with a name");
  }

  const root = rootMatch[0];
  const accessors: Accessor[] = [];
  let pos = root.length;

  while (pos < body.length) {
    if (body[pos] === "[") {
      const end = body.indexOf("]", pos + 1);
      if (end === -1) {
        fail(pos, "missing ']'");
      }
      const key = body.slice(pos + 1, end);
      if (key === "") {
        fail(pos, "empty index");
      }
      accessors.push(/^\d+$/.test(key) ? { kind: "index", index: Number(key) } : { kind: "key", key });
      pos = end + 1;
    } else if (body[pos] === ".") {
      const attr = NAME_RE.exec(body.slice(pos + 1));
      if (!attr) {
        return fail(pos, "expected a name after '.'");
      }
      accessors.push({ kind: "key", key: attr[0] });
      pos += 1 + attr[0].length;
    } else {
      break;
    }
  }

  const path = body.slice(0, pos);

  let conversion: Conversion | null = null;
  if (body[pos] === "!") {
    const flag = body[pos + 1];
    if (flag !== "s" && flag !== "r" && flag !== "a") {
      fail(pos, "conversion must be one of !s, !r, !a");
    }
    conversion = flag === "r" ? "r" : flag === "a" ? "a" : "s";
    pos += 2;
    if (pos < body.length && body[pos] !== ":") {
      fail(pos, "expected ':' after conversion");
    }
  }

  let spec: FormatSpec | null = null;
  if (body[pos] === ":") {
    const specSource = body.slice(pos + 1);
    if (specSource !== "") {
      try {
        spec = parseFormatSpec(specSource);
      } catch (err) {
        if (err instanceof FormatSpecError) {
          fail(pos + 1, err.message);
        }
        throw err;
      }
    }
    pos = body.length;
  }

  if (pos !== body.length) {
    fail(pos, `unexpected character '${body[pos]}'`);
  }

  return { source: body, path, root, accessors, conversion, spec };
}

/**
 * Parse a value-template into literal and field segments.
 *
 * @throws PlaceholderSyntaxError on unbalanced braces or a malformed field
 */
export function parseValueTemplate(source: string): ValueTemplate {
  const segments: Segment[] = [];
  let literal = "";
  let i = 0;

  const flush = (): void => {
    if (literal !== "") {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (i < source.length) {
    const ch = source[i];

    if (ch === "{") {
      if (source[i + 1] === "{") {
        literal += "{";
        i += 2;
        continue;
      }
      const close = source.indexOf("}", i + 1);
      if (close === -1) {
        throw new PlaceholderSyntaxError(source, i, "unmatched '{'");
      }
      const body = source.slice(i + 1, close);
      if (body.includes("{")) {
        throw new PlaceholderSyntaxError(source, i, "nested replacement fields are not supported");
      }
      flush();
      segments.push({ kind: "field", field: parseField(source, body, i + 1) });
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (source[i + 1] === "}") {
        literal += "}";
        i += 2;
        continue;
      }
      throw new PlaceholderSyntaxError(source, i, "single '}' encountered");
    }

    literal += ch;
    i++;
  }

  flush();
  return { source, segments };
}

/**
 * Paths referenced by a template, in order of appearance.
 */
export function referencedPaths(template: ValueTemplate): string[] {
  return template.segments.flatMap((segment) =>
    segment.kind === "field" ? [segment.field.path] : []
  );
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

type Lookup = { readonly found: true; readonly value: unknown } | { readonly found: false };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return "an array";
  }
  return `a ${typeof value} value`;
}

function lookup(
  template: ValueTemplate,
  field: FieldReference,
  document: Readonly<Record<string, unknown>>
): Lookup {
  if (!Object.hasOwn(document, field.root)) {
    return { found: false };
  }

  let current: unknown = document[field.root];

  for (const accessor of field.accessors) {
    if (current === null || current === undefined) {
      return { found: false };
    }

    if (Array.isArray(current)) {
      if (accessor.kind === "key") {
        throw new RenderError(
          template.source,
          field.path,
          `cannot look up key '${accessor.key}' in an array`
        );
      }
      if (accessor.index >= current.length) {
        return { found: false };
      }
      current = current[accessor.index];
      continue;
    }

    if (isRecord(current)) {
      const key = accessor.kind === "key" ? accessor.key : String(accessor.index);
      if (!Object.hasOwn(current, key)) {
        return { found: false };
      }
      current = current[key];
      continue;
    }

    const label = accessor.kind === "key" ? accessor.key : String(accessor.index);
    throw new RenderError(
      template.source,
      field.path,
      `cannot look up [${label}] in ${describe(current)}`
    );
  }

  if (current === null || current === undefined) {
    return { found: false };
  }
  return { found: true, value: current };
}

// ---------------------------------------------------------------------------
// Stringification
// ---------------------------------------------------------------------------

function plainText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

function convert(value: unknown, conversion: Conversion): string {
  if (conversion !== "s" && typeof value === "string") {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  }
  return plainText(value);
}

function stringify(template: ValueTemplate, field: FieldReference, value: unknown): string {
  if (field.conversion !== null) {
    const converted = convert(value, field.conversion);
    return field.spec === null ? converted : applySpec(template, field, converted, field.spec);
  }

  if (field.spec === null) {
    return plainText(value);
  }

  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return applySpec(template, field, value, field.spec);
  }

  throw new RenderError(
    template.source,
    field.path,
    `format spec ':${field.spec.source}' cannot be applied to ${describe(value)}`
  );
}

function applySpec(
  template: ValueTemplate,
  field: FieldReference,
  value: string | number | boolean,
  spec: FormatSpec
): string {
  const result = formatScalar(value, spec);
  if (!result.ok) {
    throw new RenderError(template.source, field.path, result.reason);
  }
  return result.text;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a template against a document.
 *
 * @returns the rendered text, or the list of absent paths
 * @throws RenderError if a referenced value is present but cannot be formatted
 */
export function renderValueTemplate(
  template: ValueTemplate,
  document: Readonly<Record<string, unknown>>
): RenderResult {
  const parts: string[] = [];
  const missing: string[] = [];

  for (const segment of template.segments) {
    if (segment.kind === "literal") {
      parts.push(segment.text);
      continue;
    }

    const result = lookup(template, segment.field, document);
    if (!result.found) {
      missing.push(segment.field.path);
      continue;
    }
    parts.push(stringify(template, segment.field, result.value));
  }

  if (missing.length > 0) {
    return { resolved: false, missing };
  }
  return { resolved: true, value: parts.join("") };
}

/**
 * Render a template whose every field must be present.
 *
 * @param what - What is being rendered, for the error message
 * @throws RenderError if any referenced path is absent
 */
export function renderRequired(
  template: ValueTemplate,
  document: Readonly<Record<string, unknown>>,
  what: string
): string {
  const result = renderValueTemplate(template, document);
  if (!result.resolved) {
    throw new RenderError(
      template.source,
      what,
      `missing ${result.missing.join(", ")}`,
      `Cannot render ${what} from "${template.source}": ` +
        `document has no value for ${result.missing.join(", ")}`
    );
  }
  return result.value;
}
