/**
 * Ordered header-field buffer.
 *
 * Holds every header field of a run, in template order, with either its
 * resolved text or the UNRESOLVED marker. A field resolves at most once:
 * the first successful value sticks for the rest of the run.
 */

import type { TemplateSection } from "../template/schema.js";

/** Marker for a field whose source data has not been seen yet. */
export const UNRESOLVED: unique symbol = Symbol("unresolved");

export type Unresolved = typeof UNRESOLVED;
export type HeaderValue = string | Unresolved;

/** How an unresolved field is written to the file. */
export const UNRESOLVED_TEXT = "None";

export function isUnresolved(value: HeaderValue): value is Unresolved {
  return value === UNRESOLVED;
}

export interface HeaderField {
  readonly name: string;
  readonly section: TemplateSection;
  readonly value: HeaderValue;
}

export class HeaderLineBuffer {
  private readonly fields = new Map<string, HeaderField>();

  /**
   * Append a field. Declaration order is output order.
   */
  declare(name: string, section: TemplateSection, value: HeaderValue = UNRESOLVED): void {
    if (this.fields.has(name)) {
      throw new Error(`Header field "${name}" is already declared`);
    }
    this.fields.set(name, { name, section, value });
  }

  /**
   * Set a field's value if it is still unresolved.
   *
   * @returns true if the value was stored, false if the field already had one
   */
  resolve(name: string, value: string): boolean {
    const field = this.fields.get(name);
    if (field === undefined) {
      throw new Error(`Header field "${name}" is not declared`);
    }
    if (!isUnresolved(field.value)) {
      return false;
    }
    this.fields.set(name, { ...field, value });
    return true;
  }

  get(name: string): HeaderValue | undefined {
    return this.fields.get(name)?.value;
  }

  isResolved(name: string): boolean {
    const value = this.get(name);
    return value !== undefined && !isUnresolved(value);
  }

  /** Text written for a field: its value, or "None" while unresolved. */
  display(name: string): string {
    const value = this.get(name);
    return value === undefined || isUnresolved(value) ? UNRESOLVED_TEXT : value;
  }

  entries(): IterableIterator<HeaderField> {
    return this.fields.values();
  }

  get size(): number {
    return this.fields.size;
  }

  /** Names of unresolved fields, optionally limited to one section. */
  pending(section?: TemplateSection): string[] {
    return [...this.fields.values()]
      .filter((field) => isUnresolved(field.value))
      .filter((field) => section === undefined || field.section === section)
      .map((field) => field.name);
  }

  /** Plain-object view, with null for unresolved fields. */
  toJSON(): Record<string, string | null> {
    return Object.fromEntries(
      [...this.fields.values()].map((field) => [
        field.name,
        isUnresolved(field.value) ? null : field.value,
      ])
    );
  }
}
