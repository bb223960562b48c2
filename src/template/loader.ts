/**
 * XDI template loader.
 *
 * Responsible for:
 * - Picking the template source (inline TOML or a file path, exactly one)
 * - Parsing TOML and validating it against RawTemplateSchema
 * - Compiling every value-template so syntax errors surface before any
 *   output is written
 * - Freezing the result: a template is immutable for the whole run
 */

import { readFileSync } from "node:fs";
import { parse as parseToml } from "@iarna/toml";
import type { ZodIssue } from "zod";

import { ConfigError } from "../config/env.js";
import {
  parseValueTemplate,
  PlaceholderSyntaxError,
  isRecord,
  type ValueTemplate,
} from "./placeholder.js";
import {
  RawTemplateSchema,
  type ColumnDefinition,
  type HeaderDefinition,
  type RawTemplate,
  type XdiTemplate,
} from "./schema.js";

/** Key under the start document's `md` that may carry the template. */
export const TEMPLATE_METADATA_KEY = "xdi-export";

export interface TemplateSource {
  /** Inline TOML text */
  config?: string;
  /** Path to a TOML file */
  configFilePath?: string;
}

function formatZodIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function compile(source: string, where: string): ValueTemplate {
  try {
    return parseValueTemplate(source);
  } catch (err) {
    if (err instanceof PlaceholderSyntaxError) {
      throw new ConfigError(`Invalid template at ${where}`, [err.message]);
    }
    throw err;
  }
}

function compileHeaders(
  raw: RawTemplate,
  section: "required_headers" | "optional_headers"
): HeaderDefinition[] {
  return Object.entries(raw[section]).map(([name, entry]) => {
    const { data, ...metadata } = entry;
    return {
      name,
      section,
      data: data !== undefined ? compile(data, `${section}.${name}.data`) : null,
      metadata,
    };
  });
}

/**
 * Validate a parsed TOML table and compile it into an XdiTemplate.
 *
 * @param input  - Parsed TOML (any shape)
 * @param origin - Where the table came from, for error messages
 * @throws ConfigError if the table is not a valid template
 */
export function compileTemplate(input: unknown, origin: string): Readonly<XdiTemplate> {
  const result = RawTemplateSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `Invalid XDI template (${origin}): ${issues.length} validation error(s)`,
      issues
    );
  }

  const raw = result.data;

  const columns: ColumnDefinition[] = Object.entries(raw.columns).map(([name, column]) => ({
    name,
    label: compile(column.column_label, `columns.${name}.column_label`),
    dataKey: column.data_key,
    data: compile(column.column_data, `columns.${name}.column_data`),
    ...(column.units !== undefined ? { units: column.units } : {}),
  }));

  return deepFreeze({
    versions: Object.entries(raw.versions).map(([name, line]) => ({ name, line })),
    columns,
    requiredHeaders: compileHeaders(raw, "required_headers"),
    optionalHeaders: compileHeaders(raw, "optional_headers"),
    requiredDataKeys: [...new Set(columns.map((column) => column.dataKey))],
  });
}

/**
 * Load a template from exactly one of an inline string or a file.
 *
 * @throws ConfigError if neither or both sources are given, the file
 *         cannot be read, the TOML is malformed, or validation fails
 */
export function loadTemplate(source: TemplateSource): Readonly<XdiTemplate> {
  const { config, configFilePath } = source;

  if (config === undefined && configFilePath === undefined) {
    throw new ConfigError(
      "No XDI template given: pass an inline config or a config file path"
    );
  }
  if (config !== undefined && configFilePath !== undefined) {
    throw new ConfigError(
      "Both an inline XDI template and a template file path were given; pass exactly one"
    );
  }

  let text: string;
  let origin: string;
  if (configFilePath !== undefined) {
    origin = configFilePath;
    try {
      text = readFileSync(configFilePath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Cannot read XDI template file: ${configFilePath}`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }
  } else {
    origin = "inline config";
    text = config ?? "";
  }

  let parsed: unknown;
  try {
    parsed = parseToml(text);
  } catch (err) {
    throw new ConfigError(`XDI template is not valid TOML (${origin})`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  return compileTemplate(parsed, origin);
}

/**
 * Read the template source carried in a start document under
 * `md["xdi-export"]` as `config` or `config-file-path`.
 */
export function templateSourceFromStart(start: Readonly<Record<string, unknown>>): TemplateSource {
  const md = start["md"];
  if (!isRecord(md)) {
    return {};
  }
  const entry = md[TEMPLATE_METADATA_KEY];
  if (!isRecord(entry)) {
    return {};
  }

  const source: TemplateSource = {};
  const inline = entry["config"];
  const path = entry["config-file-path"];
  if (typeof inline === "string") {
    source.config = inline;
  }
  if (typeof path === "string") {
    source.configFilePath = path;
  }
  return source;
}

/**
 * Choose between an explicitly supplied source and the one in the start
 * document. Explicit options win when they name anything at all.
 */
export function resolveTemplateSource(
  explicit: TemplateSource | undefined,
  start: Readonly<Record<string, unknown>>
): TemplateSource {
  if (explicit && (explicit.config !== undefined || explicit.configFilePath !== undefined)) {
    return explicit;
  }
  return templateSourceFromStart(start);
}
