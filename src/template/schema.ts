/**
 * XDI template schema.
 *
 * A template is a TOML document with four tables, always in this order:
 *
 *   [versions]          name → literal comment line ("# XDI/1.0 ...")
 *   [columns]           name → {column_label, data_key, column_data, units?}
 *   [required_headers]  name → {data = value-template, ...metadata}
 *   [optional_headers]  name → {data = value-template, ...metadata}
 *
 * The raw TOML is validated here with zod, then compiled by the loader
 * into an XdiTemplate whose value-templates are already parsed. Header
 * field order in the output file is the concatenation of the four tables
 * in declaration order.
 */

import { z } from "zod";
import type { ValueTemplate } from "./placeholder.js";

/** Version line every template must carry; it is always the first line. */
export const XDI_VERSION_KEY = "XDI";

/** Prefix every header line shares, data rows never do. */
export const HEADER_MARKER = "#";

export const TEMPLATE_SECTIONS = [
  "versions",
  "columns",
  "required_headers",
  "optional_headers",
] as const;

export type TemplateSection = (typeof TEMPLATE_SECTIONS)[number];

// ---------------------------------------------------------------------------
// Raw schema
// ---------------------------------------------------------------------------

export const ColumnEntrySchema = z
  .object({
    column_label: z.string().describe("Label template shown in the header"),
    data_key: z.string().min(1).describe("Data key a descriptor must declare"),
    column_data: z.string().describe("Value-template rendered for every row"),
    units: z.string().optional().describe("Appended to the label in the header"),
  })
  .strict();

export const HeaderEntrySchema = z
  .object({
    data: z.string().optional().describe("Value-template for the header value"),
  })
  .passthrough();

export const RawTemplateSchema = z
  .object({
    versions: z.record(z.string()),
    columns: z.record(ColumnEntrySchema),
    required_headers: z.record(HeaderEntrySchema),
    optional_headers: z.record(HeaderEntrySchema),
  })
  .strict()
  .superRefine((raw, ctx) => {
    const xdiLine = raw.versions[XDI_VERSION_KEY];
    if (xdiLine === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["versions"],
        message: `must define "${XDI_VERSION_KEY}"`,
      });
    } else if (!xdiLine.startsWith(HEADER_MARKER)) {
      // Written bare as the first header line.
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["versions", XDI_VERSION_KEY],
        message: `version line must start with "${HEADER_MARKER}"`,
      });
    }

    if (Object.keys(raw.columns).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["columns"],
        message: "at least one column is required",
      });
    }

    const seen = new Map<string, TemplateSection>();
    for (const section of TEMPLATE_SECTIONS) {
      for (const name of Object.keys(raw[section])) {
        const previous = seen.get(name);
        if (previous !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [section, name],
            message: `header field already defined in [${previous}]`,
          });
        } else {
          seen.set(name, section);
        }
      }
    }
  });

export type RawTemplate = z.infer<typeof RawTemplateSchema>;

// ---------------------------------------------------------------------------
// Compiled template
// ---------------------------------------------------------------------------

export interface VersionLine {
  readonly name: string;
  readonly line: string;
}

export interface ColumnDefinition {
  readonly name: string;
  readonly label: ValueTemplate;
  readonly dataKey: string;
  readonly data: ValueTemplate;
  readonly units?: string;
}

export interface HeaderDefinition {
  readonly name: string;
  readonly section: "required_headers" | "optional_headers";
  /** Null when the entry has no `data` (special fields, placeholders). */
  readonly data: ValueTemplate | null;
  /** Any other keys on the entry; carried along, never rendered. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface XdiTemplate {
  readonly versions: readonly VersionLine[];
  readonly columns: readonly ColumnDefinition[];
  readonly requiredHeaders: readonly HeaderDefinition[];
  readonly optionalHeaders: readonly HeaderDefinition[];
  /** Distinct data keys across all columns, in first-use order. */
  readonly requiredDataKeys: readonly string[];
}
