/**
 * Header resolution engine.
 *
 * Seeds the header buffer from the template and the start document, then
 * fills in whatever is still missing as descriptors and the stop document
 * arrive. Field order is fixed at initialization and a resolved field is
 * never touched again.
 *
 * Resolution per field:
 *
 *   1. SPECIAL_FIELDS entry, if any (timestamps), for every section but versions
 *   2. versions  → the literal line
 *   3. columns   → rendered label, plus " <units>" when the column has units
 *   4. headers   → rendered `data` template; entries without one stay unresolved
 */

import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { renderValueTemplate, type ValueTemplate } from "../template/placeholder.js";
import type { ColumnDefinition, HeaderDefinition, XdiTemplate } from "../template/schema.js";
import type { RunStart } from "../documents/schema.js";
import { HeaderLineBuffer, UNRESOLVED, isUnresolved, type HeaderValue } from "./buffer.js";
import { formatHeaderBlock } from "./format.js";
import { SPECIAL_FIELDS, type HeaderSource, type SpecialResolver } from "./special-fields.js";

type FieldRule =
  | { readonly section: "versions"; readonly name: string; readonly line: string }
  | { readonly section: "columns"; readonly name: string; readonly column: ColumnDefinition }
  | {
      readonly section: "required_headers" | "optional_headers";
      readonly name: string;
      readonly header: HeaderDefinition;
    };

export interface HeaderEngineOptions {
  logger?: Logger;
  /** Replaces the default special-field table */
  specialFields?: ReadonlyMap<string, SpecialResolver>;
}

function fieldRules(template: XdiTemplate): FieldRule[] {
  return [
    ...template.versions.map((version): FieldRule => ({
      section: "versions",
      name: version.name,
      line: version.line,
    })),
    ...template.columns.map((column): FieldRule => ({
      section: "columns",
      name: column.name,
      column,
    })),
    ...[...template.requiredHeaders, ...template.optionalHeaders].map(
      (header): FieldRule => ({ section: header.section, name: header.name, header })
    ),
  ];
}

export class HeaderResolutionEngine {
  readonly buffer = new HeaderLineBuffer();
  private readonly rules: readonly FieldRule[];
  private readonly logger: Logger;
  private readonly specialFields: ReadonlyMap<string, SpecialResolver>;

  private constructor(
    readonly template: XdiTemplate,
    options: HeaderEngineOptions
  ) {
    this.rules = fieldRules(template);
    this.logger = options.logger ?? silentLogger;
    this.specialFields = options.specialFields ?? SPECIAL_FIELDS;
  }

  /**
   * Build the buffer for a run: declare every field in template order and
   * resolve what the start document already provides.
   */
  static initialize(
    template: XdiTemplate,
    start: RunStart,
    options: HeaderEngineOptions = {}
  ): HeaderResolutionEngine {
    const engine = new HeaderResolutionEngine(template, options);
    const source: HeaderSource = { kind: "start", doc: start };

    for (const rule of engine.rules) {
      engine.buffer.declare(rule.name, rule.section, engine.resolveRule(rule, source));
    }

    engine.logger.debug("Header initialized", {
      fields: engine.buffer.size,
      pending: engine.buffer.pending(),
    });
    return engine;
  }

  /**
   * Try every unresolved field against a newly arrived document.
   *
   * @returns names of the fields this document resolved
   */
  update(source: HeaderSource): string[] {
    const resolved: string[] = [];

    for (const rule of this.rules) {
      if (this.buffer.isResolved(rule.name)) {
        continue;
      }
      const value = this.resolveRule(rule, source);
      if (!isUnresolved(value) && this.buffer.resolve(rule.name, value)) {
        resolved.push(rule.name);
      }
    }

    if (resolved.length > 0) {
      this.logger.debug(`Header fields resolved from ${source.kind}`, { resolved });
    }
    return resolved;
  }

  /** Required headers that no document has supplied yet. */
  unresolvedRequired(): string[] {
    return this.buffer.pending("required_headers");
  }

  /** The header block as it stands now. */
  formatHeader(): string {
    return formatHeaderBlock(this.template, this.buffer);
  }

  private resolveRule(rule: FieldRule, source: HeaderSource): HeaderValue {
    const special = rule.section !== "versions" ? this.specialFields.get(rule.name) : undefined;
    if (special !== undefined) {
      return special(source);
    }

    switch (rule.section) {
      case "versions":
        return rule.line;
      case "columns": {
        const label = this.render(rule.name, rule.column.label, source);
        if (isUnresolved(label) || rule.column.units === undefined) {
          return label;
        }
        return `${label} ${rule.column.units}`;
      }
      case "required_headers":
      case "optional_headers":
        return rule.header.data !== null
          ? this.render(rule.name, rule.header.data, source)
          : UNRESOLVED;
    }
  }

  private render(name: string, template: ValueTemplate, source: HeaderSource): HeaderValue {
    const result = renderValueTemplate(template, source.doc);
    if (result.resolved) {
      return result.value;
    }
    this.logger.debug(`Header field ${name} pending`, {
      document: source.kind,
      missing: result.missing,
    });
    return UNRESOLVED;
  }
}

