/**
 * Template system tests.
 *
 * Run: node --import tsx src/template/template.test.ts
 *
 * Tests cover:
 *   1. Format specs: parsing and number/string formatting
 *   2. Value-templates: parsing, lookup, missing paths, render errors
 *   3. Loader: source selection, TOML errors, schema validation, ordering
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";

import { formatScalar, parseFormatSpec, FormatSpecError } from "./format-spec.js";
import {
  parseValueTemplate,
  renderValueTemplate,
  renderRequired,
  referencedPaths,
  PlaceholderSyntaxError,
  RenderError,
} from "./placeholder.js";
import {
  compileTemplate,
  loadTemplate,
  resolveTemplateSource,
  templateSourceFromStart,
} from "./loader.js";
import { ConfigError } from "../config/env.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function fmt(value: string | number | boolean, spec: string): string {
  const result = formatScalar(value, parseFormatSpec(spec));
  if (!result.ok) {
    throw new Error(`formatting ${String(value)} with "${spec}" failed: ${result.reason}`);
  }
  return result.text;
}

function fmtFailure(value: string | number | boolean, spec: string): string {
  const result = formatScalar(value, parseFormatSpec(spec));
  if (result.ok) {
    throw new Error(`formatting ${String(value)} with "${spec}" should fail, got "${result.text}"`);
  }
  return result.reason;
}

function render(source: string, doc: Record<string, unknown>): string {
  return renderRequired(parseValueTemplate(source), doc, "test value");
}

function expectConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected ConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const MINIMAL_TOML = `
[versions]
XDI = "# XDI/1.0"

[columns]
"Column.1" = { column_label = "det", data_key = "det", column_data = "{data[det][0]}" }

[required_headers]

[optional_headers]
`;

const tempDir = mkdtempSync(join(tmpdir(), "xdi-template-test-"));

// ═══════════════════════════════════════════════════════════════════════════
// 1. FORMAT SPECS
// ═══════════════════════════════════════════════════════════════════════════

section("Format spec parsing");

test("parses fill, align, sign, width, grouping, precision and type", () => {
  const spec = parseFormatSpec("*>+12,.2f");
  assert.equal(spec.fill, "*");
  assert.equal(spec.align, ">");
  assert.equal(spec.sign, "+");
  assert.equal(spec.width, 12);
  assert.equal(spec.grouping, ",");
  assert.equal(spec.precision, 2);
  assert.equal(spec.type, "f");
});

test("leading zero means zero fill with sign-aware padding", () => {
  const spec = parseFormatSpec("05");
  assert.equal(spec.fill, "0");
  assert.equal(spec.align, "=");
  assert.equal(spec.width, 5);
});

test("rejects an unknown format code", () => {
  assert.throws(
    () => parseFormatSpec("z"),
    (err: unknown) =>
      err instanceof FormatSpecError &&
      err.message === 'Invalid format spec "z": unrecognized format specifier'
  );
});

test("rejects precision with 'd'", () => {
  assert.throws(
    () => parseFormatSpec(".2d"),
    (err: unknown) => err instanceof FormatSpecError && err.message.endsWith("precision not allowed with 'd'")
  );
});

test("rejects precision above 100", () => {
  assert.equal(parseFormatSpec(".100f").precision, 100);
  assert.throws(
    () => parseFormatSpec(".150f"),
    (err: unknown) =>
      err instanceof FormatSpecError &&
      err.message === 'Invalid format spec ".150f": precision must be at most 100'
  );
});

section("Number formatting");

test("precision without a type keeps a trailing .0", () => {
  assert.equal(fmt(1, ".3"), "1.0");
  assert.equal(fmt(10, ".3"), "10.0");
  assert.equal(fmt(1.23456, ".3"), "1.23");
});

test("precision without a type switches to exponent form for large values", () => {
  assert.equal(fmt(1234.5, ".3"), "1.23e+03");
  assert.equal(fmt(100, ".3"), "1e+02");
});

test("fixed point", () => {
  assert.equal(fmt(0.5, ".3f"), "0.500");
  assert.equal(fmt(2, "f"), "2.000000");
  assert.equal(fmt(-1.5, ".2f"), "-1.50");
});

test("fixed point rounds exact ties to even", () => {
  assert.equal(fmt(0.125, ".2f"), "0.12");
  assert.equal(fmt(0.375, ".2f"), "0.38");
  assert.equal(fmt(2.5, ".0f"), "2");
  assert.equal(fmt(3.5, ".0f"), "4");
  assert.equal(fmt(-0.125, ".2f"), "-0.12");
});

test("fixed point stays in positional form for large values", () => {
  assert.equal(fmt(1e21, ".2f"), "1000000000000000000000.00");
  assert.equal(fmt(1e21, ".0f"), "1000000000000000000000");
  assert.equal(fmt(1e21, "d"), "1000000000000000000000");
});

test("integers with 'd'", () => {
  assert.equal(fmt(42, "d"), "42");
  assert.equal(fmtFailure(4.2, "d"), "format code 'd' requires an integer, got 4.2");
});

test("exponent notation", () => {
  assert.equal(fmt(1234.5, "e"), "1.234500e+03");
  assert.equal(fmt(0.00012, ".2E"), "1.20E-04");
});

test("percentages", () => {
  assert.equal(fmt(0.25, "%"), "25.000000%");
  assert.equal(fmt(0.25, ".1%"), "25.0%");
});

test("width and alignment", () => {
  assert.equal(fmt(5, "4"), "   5");
  assert.equal(fmt(5, "<4"), "5   ");
  assert.equal(fmt(5, "^5"), "  5  ");
  assert.equal(fmt(5, "*^5"), "**5**");
  assert.equal(fmt(-3, "05"), "-0003");
});

test("explicit signs", () => {
  assert.equal(fmt(3, "+"), "+3");
  assert.equal(fmt(3, " "), " 3");
  assert.equal(fmt(-3, "+"), "-3");
});

test("thousands grouping", () => {
  assert.equal(fmt(1234567, ","), "1,234,567");
  assert.equal(fmt(1234567.891, ",.2f"), "1,234,567.89");
  assert.equal(fmt(1234567, "_"), "1_234_567");
});

test("non-finite values", () => {
  assert.equal(fmt(Number.NaN, "f"), "nan");
  assert.equal(fmt(Number.POSITIVE_INFINITY, "F"), "INF");
});

test("'s' on a number fails", () => {
  assert.equal(fmtFailure(1, "s"), "format code 's' requires a string, got a number");
});

section("String formatting");

test("precision truncates strings", () => {
  assert.equal(fmt("abc", ".2"), "ab");
});

test("strings pad to the left by default", () => {
  assert.equal(fmt("ab", "5"), "ab   ");
  assert.equal(fmt("ab", ">5s"), "   ab");
});

test("numeric codes on strings fail", () => {
  assert.equal(fmtFailure("abc", ".3f"), "format code 'f' requires a number, got string");
});

test("'=' alignment on strings fails", () => {
  assert.equal(fmtFailure("abc", "=5"), "'=' alignment is only allowed for numbers");
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. VALUE-TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════

section("Value-template parsing");

test("splits literals and fields", () => {
  const template = parseValueTemplate("{md[NX][energy]:.3f} eV");
  assert.equal(template.segments.length, 2);
  const [field, literal] = template.segments;
  assert.equal(field?.kind, "field");
  if (field?.kind === "field") {
    assert.equal(field.field.root, "md");
    assert.equal(field.field.path, "md[NX][energy]");
    assert.deepEqual(field.field.accessors, [
      { kind: "key", key: "NX" },
      { kind: "key", key: "energy" },
    ]);
    assert.equal(field.field.spec?.precision, 3);
  }
  assert.deepEqual(literal, { kind: "literal", text: " eV" });
});

test("numeric brackets are indexes", () => {
  const template = parseValueTemplate("{data[det][0]}");
  const [segment] = template.segments;
  assert.equal(segment?.kind, "field");
  if (segment?.kind === "field") {
    assert.deepEqual(segment.field.accessors, [
      { kind: "key", key: "det" },
      { kind: "index", index: 0 },
    ]);
  }
});

test("referencedPaths lists paths in order", () => {
  assert.deepEqual(referencedPaths(parseValueTemplate("{a.b}-{c[0]:d}-{a.b}")), ["a.b", "c[0]", "a.b"]);
});

test("doubled braces are literal", () => {
  assert.equal(render("{{x}} {x}", { x: 1 }), "{x} 1");
});

test("unmatched '{' is a syntax error", () => {
  assert.throws(
    () => parseValueTemplate("{md"),
    (err: unknown) =>
      err instanceof PlaceholderSyntaxError &&
      err.message === `Invalid value-template "{md" at position 0: unmatched '{'`
  );
});

test("single '}' is a syntax error", () => {
  assert.throws(() => parseValueTemplate("a}"), PlaceholderSyntaxError);
});

test("bad conversion is a syntax error", () => {
  assert.throws(() => parseValueTemplate("{uid!x}"), PlaceholderSyntaxError);
});

test("bad format spec is a syntax error", () => {
  assert.throws(() => parseValueTemplate("{uid:zz}"), PlaceholderSyntaxError);
  assert.throws(() => parseValueTemplate("{x:.150f}"), PlaceholderSyntaxError);
});

section("Value-template rendering");

test("nested keys and attribute access", () => {
  const doc = { md: { XDI: { Element_symbol: "Cu" }, NX: { Source: { name: "Ring" } } } };
  assert.equal(render("{md[XDI][Element_symbol]}", doc), "Cu");
  assert.equal(render("{md.NX.Source.name}", doc), "Ring");
});

test("array index", () => {
  assert.equal(render("{data[det][1]}", { data: { det: [10, 20] } }), "20");
});

test("absent path leaves the render unresolved", () => {
  const result = renderValueTemplate(parseValueTemplate("{md[nope]} and {uid}"), { md: {} });
  assert.deepEqual(result, { resolved: false, missing: ["md[nope]", "uid"] });
});

test("index past the end is unresolved", () => {
  const result = renderValueTemplate(parseValueTemplate("{data[det][3]}"), { data: { det: [1] } });
  assert.deepEqual(result, { resolved: false, missing: ["data[det][3]"] });
});

test("null values count as absent", () => {
  const result = renderValueTemplate(parseValueTemplate("{md[sample]}"), { md: { sample: null } });
  assert.deepEqual(result, { resolved: false, missing: ["md[sample]"] });
});

test("format spec on a string value is a RenderError", () => {
  assert.throws(
    () => render("{x:.3f}", { x: "abc" }),
    (err: unknown) =>
      err instanceof RenderError &&
      err.message === `Cannot render "{x:.3f}" (field x): format code 'f' requires a number, got string`
  );
});

test("key lookup in an array is a RenderError", () => {
  assert.throws(
    () => render("{data[det][name]}", { data: { det: [1] } }),
    (err: unknown) => err instanceof RenderError && err.reason === "cannot look up key 'name' in an array"
  );
});

test("descending into a string is a RenderError", () => {
  assert.throws(
    () => render("{md[a][b]}", { md: { a: "text" } }),
    (err: unknown) => err instanceof RenderError && err.reason === "cannot look up [b] in a string value"
  );
});

test("conversions", () => {
  assert.equal(render("{uid!r}", { uid: "abc" }), "'abc'");
  assert.equal(render("{uid!s}", { uid: "abc" }), "abc");
  assert.equal(render("{n!r}", { n: 3 }), "3");
});

test("booleans and objects without a spec", () => {
  assert.equal(render("{flag}", { flag: true }), "true");
  assert.equal(render("{md}", { md: { a: 1 } }), '{"a":1}');
});

test("renderRequired names the missing path", () => {
  assert.throws(
    () => renderRequired(parseValueTemplate("{uid}-"), {}, "file prefix"),
    (err: unknown) =>
      err instanceof RenderError &&
      err.message === `Cannot render file prefix from "{uid}-": document has no value for uid`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. LOADER
// ═══════════════════════════════════════════════════════════════════════════

section("Template sources");

test("neither source is a ConfigError", () => {
  const err = expectConfigError(() => loadTemplate({}));
  assert.equal(err.message, "No XDI template given: pass an inline config or a config file path");
});

test("both sources is a ConfigError", () => {
  const err = expectConfigError(() =>
    loadTemplate({ config: MINIMAL_TOML, configFilePath: "template.toml" })
  );
  assert.equal(
    err.message,
    "Both an inline XDI template and a template file path were given; pass exactly one"
  );
});

test("loads from a file", () => {
  const path = join(tempDir, "minimal.toml");
  writeFileSync(path, MINIMAL_TOML);
  const template = loadTemplate({ configFilePath: path });
  assert.deepEqual(template.requiredDataKeys, ["det"]);
});

test("unreadable file is a ConfigError", () => {
  const path = join(tempDir, "missing.toml");
  const err = expectConfigError(() => loadTemplate({ configFilePath: path }));
  assert.equal(err.message, `Cannot read XDI template file: ${path}`);
  assert.equal(err.issues.length, 1);
});

test("malformed TOML is a ConfigError", () => {
  const err = expectConfigError(() => loadTemplate({ config: "not = = toml" }));
  assert.equal(err.message, "XDI template is not valid TOML (inline config)");
});

test("bundled template loads", () => {
  const path = fileURLToPath(new URL("../../templates/xdi.toml", import.meta.url));
  const template = loadTemplate({ configFilePath: path });
  assert.deepEqual(template.requiredDataKeys, ["energy", "i0", "itrans"]);
  assert.equal(template.columns[0]?.units, "eV");
});

section("Template validation");

test("missing section is rejected", () => {
  const err = expectConfigError(() =>
    loadTemplate({ config: MINIMAL_TOML.replace("[optional_headers]", "") })
  );
  assert.ok(err.message.startsWith("Invalid XDI template (inline config):"));
  assert.ok(err.issues.includes("optional_headers: Required"));
});

test("empty columns are rejected", () => {
  const err = expectConfigError(() =>
    compileTemplate(
      { versions: { XDI: "# XDI/1.0" }, columns: {}, required_headers: {}, optional_headers: {} },
      "test"
    )
  );
  assert.equal(err.message, "Invalid XDI template (test): 1 validation error(s)");
  assert.deepEqual(err.issues, ["columns: at least one column is required"]);
});

test("XDI version line is required", () => {
  const err = expectConfigError(() =>
    loadTemplate({ config: MINIMAL_TOML.replace('XDI = "# XDI/1.0"', 'Other = "# Other/1.0"') })
  );
  assert.deepEqual(err.issues, ['versions: must define "XDI"']);
});

test("version lines must be comments", () => {
  const err = expectConfigError(() =>
    loadTemplate({ config: MINIMAL_TOML.replace('"# XDI/1.0"', '"XDI/1.0"') })
  );
  assert.deepEqual(err.issues, ['versions.XDI: version line must start with "#"']);
});

test("only the XDI version line needs the marker", () => {
  const template = loadTemplate({
    config: MINIMAL_TOML.replace('XDI = "# XDI/1.0"', 'XDI = "# XDI/1.0"\nBeamline = "BL/2"'),
  });
  assert.deepEqual(template.versions.map((v) => v.name), ["XDI", "Beamline"]);
});

test("a precision above 100 is rejected when the template loads", () => {
  const err = expectConfigError(() =>
    loadTemplate({ config: MINIMAL_TOML.replace("{data[det][0]}", "{data[det][0]:.150f}") })
  );
  assert.equal(err.issues.length, 1);
});

test("unknown top-level sections are rejected", () => {
  const err = expectConfigError(() => loadTemplate({ config: MINIMAL_TOML + "\n[extras]\n" }));
  assert.equal(err.issues.length, 1);
});

test("duplicate field names are rejected", () => {
  const config = MINIMAL_TOML.replace(
    "[optional_headers]",
    '[optional_headers]\n"Column.1" = { data = "{uid}" }'
  );
  const err = expectConfigError(() => loadTemplate({ config }));
  assert.deepEqual(err.issues, ["optional_headers.Column.1: header field already defined in [columns]"]);
});

test("bad placeholder syntax is a ConfigError", () => {
  const config = MINIMAL_TOML.replace('column_data = "{data[det][0]}"', 'column_data = "{data[det][0]"');
  const err = expectConfigError(() => loadTemplate({ config }));
  assert.equal(err.message, "Invalid template at columns.Column.1.column_data");
});

section("Compiled template");

test("declaration order is kept in every section", () => {
  const template = loadTemplate({
    config: `
[versions]
XDI = "# XDI/1.0"
Beamline = "# BL/2"

[columns]
"Column.2" = { column_label = "i0", data_key = "i0", column_data = "{data[i0][0]}" }
"Column.1" = { column_label = "energy", data_key = "energy", column_data = "{data[energy][0]}" }
"Column.3" = { column_label = "again", data_key = "i0", column_data = "{data[i0][0]}" }

[required_headers]
"Scan.start_time" = {}
"Element.symbol" = { data = "{md[symbol]}", description = "absorbing element" }

[optional_headers]
"Facility.name" = { data = "{md[facility]}" }
`,
  });

  assert.deepEqual(template.versions.map((v) => v.name), ["XDI", "Beamline"]);
  assert.deepEqual(template.columns.map((c) => c.name), ["Column.2", "Column.1", "Column.3"]);
  assert.deepEqual(template.requiredDataKeys, ["i0", "energy"]);
  assert.deepEqual(template.requiredHeaders.map((h) => h.name), ["Scan.start_time", "Element.symbol"]);
  assert.equal(template.requiredHeaders[0]?.data, null);
  assert.deepEqual(template.requiredHeaders[1]?.metadata, { description: "absorbing element" });
  assert.equal(template.optionalHeaders[0]?.section, "optional_headers");
});

test("compiled template is frozen", () => {
  const template = loadTemplate({ config: MINIMAL_TOML });
  assert.ok(Object.isFrozen(template));
  assert.ok(Object.isFrozen(template.columns));
  assert.ok(Object.isFrozen(template.columns[0]));
});

section("Template source from the start document");

test("reads md['xdi-export']", () => {
  const start = { md: { "xdi-export": { config: MINIMAL_TOML, "config-file-path": "x.toml" } } };
  assert.deepEqual(templateSourceFromStart(start), { config: MINIMAL_TOML, configFilePath: "x.toml" });
});

test("no metadata gives an empty source", () => {
  assert.deepEqual(templateSourceFromStart({ md: "nope" }), {});
  assert.deepEqual(templateSourceFromStart({}), {});
});

test("explicit source wins when it names anything", () => {
  const start = { md: { "xdi-export": { config: MINIMAL_TOML } } };
  assert.deepEqual(resolveTemplateSource({ configFilePath: "a.toml" }, start), {
    configFilePath: "a.toml",
  });
  assert.deepEqual(resolveTemplateSource({}, start), { config: MINIMAL_TOML });
  assert.deepEqual(resolveTemplateSource(undefined, start), { config: MINIMAL_TOML });
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tempDir, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
