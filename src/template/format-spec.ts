/**
 * Format specifiers for replacement fields.
 *
 * The text after `:` in a replacement field such as `{data[det][0]:.3f}`
 * controls how a value is turned into text:
 *
 *   [[fill]align][sign][0][width][grouping][.precision][type]
 *
 *   align      <  >  ^  =
 *   sign       +  -  (space)
 *   grouping   ,  _
 *   type       s d f F e E g G %   (or none)
 *
 * Numbers with a precision but no type use general format, keeping at
 * least one digit after the decimal point: `1` → `1.0`, `1.23456` → `1.23`
 * (with `.3`). Numbers without any spec are printed as JavaScript prints
 * them.
 *
 * Precision is at most 100. Fixed-point output rounds exact ties to even
 * (`0.125` with `.2f` → `0.12`) for precisions up to 80.
 */

export type FormatType = "s" | "d" | "f" | "F" | "e" | "E" | "g" | "G" | "%";
export type FormatAlign = "<" | ">" | "^" | "=";
export type FormatSign = "+" | "-" | " ";

export interface FormatSpec {
  /** The spec exactly as written, without the leading colon. */
  readonly source: string;
  readonly fill: string;
  readonly align: FormatAlign | null;
  readonly sign: FormatSign;
  readonly width: number | null;
  readonly grouping: "," | "_" | null;
  readonly precision: number | null;
  readonly type: FormatType | null;
}

export type FormatResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly reason: string };

export class FormatSpecError extends Error {
  constructor(
    public readonly spec: string,
    reason: string
  ) {
    super(`Invalid format spec "${spec}": ${reason}`);
    this.name = "FormatSpecError";
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const SPEC_RE =
  /^(?:([\s\S])?([<>^=]))?([+\- ])?(0)?(\d+)?([,_])?(?:\.(\d+))?([sdfFeEgG%])?$/;

export const MAX_PRECISION = 100;

// Above this, a tie in the last kept digit can no longer be told apart
// from a neighbouring double within toFixed's 100 digits.
const TIE_PRECISION_LIMIT = 80;

function isAlign(value: string | undefined): value is FormatAlign {
  return value === "<" || value === ">" || value === "^" || value === "=";
}

function isSign(value: string | undefined): value is FormatSign {
  return value === "+" || value === "-" || value === " ";
}

function isFormatType(value: string | undefined): value is FormatType {
  return value !== undefined && "sdfFeEgG%".includes(value) && value.length === 1;
}

/**
 * Parse a format spec.
 *
 * @throws FormatSpecError if the spec does not follow the grammar above
 */
export function parseFormatSpec(source: string): FormatSpec {
  const match = SPEC_RE.exec(source);
  if (!match) {
    throw new FormatSpecError(source, "unrecognized format specifier");
  }

  const [, fill, align, sign, zero, width, grouping, precision, type] = match;

  if (grouping !== undefined && type === "s") {
    throw new FormatSpecError(source, "cannot combine grouping with 's'");
  }
  if (precision !== undefined && type === "d") {
    throw new FormatSpecError(source, "precision not allowed with 'd'");
  }
  if (precision !== undefined && Number(precision) > MAX_PRECISION) {
    throw new FormatSpecError(source, `precision must be at most ${MAX_PRECISION}`);
  }

  return {
    source,
    fill: fill ?? (zero !== undefined ? "0" : " "),
    align: isAlign(align) ? align : zero !== undefined ? "=" : null,
    sign: isSign(sign) ? sign : "-",
    width: width !== undefined ? Number(width) : null,
    grouping: grouping === "," || grouping === "_" ? grouping : null,
    precision: precision !== undefined ? Number(precision) : null,
    type: isFormatType(type) ? type : null,
  };
}

// ---------------------------------------------------------------------------
// Number bodies
// ---------------------------------------------------------------------------

function padExponent(exponent: number): string {
  const sign = exponent < 0 ? "-" : "+";
  return `${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function stripTrailingZeros(text: string): string {
  if (!text.includes(".")) {
    return text;
  }
  return text.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * Fixed-point digits of a non-negative finite number.
 */
function fixed(x: number, precision: number): string {
  if (x >= 1e21) {
    // toFixed switches to exponent form here; doubles this large are integers.
    const fraction = precision > 0 ? "." + "0".repeat(precision) : "";
    return BigInt(x).toString() + fraction;
  }

  const rounded = x.toFixed(precision);
  if (precision > TIE_PRECISION_LIMIT) {
    return rounded;
  }

  const exact = x.toFixed(MAX_PRECISION);
  const point = exact.indexOf(".");
  const next = point + precision + 1;
  if (exact[next] !== "5" || !/^0*$/.test(exact.slice(next + 1))) {
    return rounded;
  }

  // Exact tie: toFixed rounded away from zero, keep the even neighbour.
  const truncated = exact.slice(0, precision > 0 ? next : point);
  const last = Number(truncated.charAt(truncated.length - 1));
  return last % 2 === 0 ? truncated : rounded;
}

function scientific(x: number, precision: number): string {
  const [mantissa, exponent] = x.toExponential(precision).split("e");
  return `${mantissa}e${padExponent(Number(exponent))}`;
}

/**
 * General format: significant-digit rounding, switching to scientific
 * notation for very large or very small magnitudes.
 */
function general(x: number, precision: number, keepPointZero: boolean): string {
  const significant = precision === 0 ? 1 : precision;
  const [mantissa, exponentText] = x.toExponential(significant - 1).split("e");
  const exponent = Number(exponentText);
  const decimalPoint = exponent + 1;
  const limit = keepPointZero ? significant - 1 : significant;

  if (decimalPoint <= -4 || decimalPoint > limit) {
    return `${stripTrailingZeros(mantissa)}e${padExponent(exponent)}`;
  }

  const digits = mantissa.replace(".", "");
  let text: string;
  if (exponent >= 0) {
    const intPart = digits.slice(0, exponent + 1).padEnd(exponent + 1, "0");
    const fraction = digits.slice(exponent + 1);
    text = fraction.length > 0 ? `${intPart}.${fraction}` : intPart;
  } else {
    text = `0.${"0".repeat(-exponent - 1)}${digits}`;
  }

  text = stripTrailingZeros(text);
  if (keepPointZero && !text.includes(".")) {
    text += ".0";
  }
  return text;
}

function group(body: string, separator: "," | "_"): string {
  const match = /^(\d+)(.*)$/.exec(body);
  if (!match) {
    return body;
  }
  const [, intPart, rest] = match;
  return intPart.replace(/\B(?=(\d{3})+(?!\d))/g, separator) + rest;
}

function numberBody(x: number, spec: FormatSpec): FormatResult {
  const { type, precision } = spec;

  if (type === "s") {
    return { ok: false, reason: "format code 's' requires a string, got a number" };
  }

  if (Number.isNaN(x) || !Number.isFinite(x)) {
    const text = Number.isNaN(x) ? "nan" : "inf";
    const upper = type === "F" || type === "E" || type === "G";
    return { ok: true, text: upper ? text.toUpperCase() : text };
  }

  switch (type) {
    case "d":
      if (!Number.isInteger(x)) {
        return { ok: false, reason: `format code 'd' requires an integer, got ${x}` };
      }
      return { ok: true, text: fixed(x, 0) };
    case "f":
    case "F":
      return { ok: true, text: fixed(x, precision ?? 6) };
    case "e":
      return { ok: true, text: scientific(x, precision ?? 6) };
    case "E":
      return { ok: true, text: scientific(x, precision ?? 6).toUpperCase() };
    case "g":
      return { ok: true, text: general(x, precision ?? 6, false) };
    case "G":
      return { ok: true, text: general(x, precision ?? 6, false).toUpperCase() };
    case "%":
      return { ok: true, text: `${fixed(x * 100, precision ?? 6)}%` };
    case null:
      return {
        ok: true,
        text: precision !== null ? general(x, precision, true) : String(x),
      };
  }
}

// ---------------------------------------------------------------------------
// Padding
// ---------------------------------------------------------------------------

function pad(
  sign: string,
  body: string,
  spec: FormatSpec,
  defaultAlign: FormatAlign
): string {
  const text = sign + body;
  if (spec.width === null || text.length >= spec.width) {
    return text;
  }

  const padding = spec.width - text.length;
  const align = spec.align ?? defaultAlign;

  switch (align) {
    case "<":
      return text + spec.fill.repeat(padding);
    case ">":
      return spec.fill.repeat(padding) + text;
    case "^": {
      const left = Math.floor(padding / 2);
      return spec.fill.repeat(left) + text + spec.fill.repeat(padding - left);
    }
    case "=":
      return sign + spec.fill.repeat(padding) + body;
  }
}

// ---------------------------------------------------------------------------
// Public formatting
// ---------------------------------------------------------------------------

/**
 * Format a scalar according to a spec.
 *
 * Returns a failure (rather than throwing) when the value's type does not
 * fit the spec, so the caller can attach the field it was rendering.
 */
export function formatScalar(
  value: string | number | boolean,
  spec: FormatSpec
): FormatResult {
  if (typeof value === "number") {
    const body = numberBody(Math.abs(value), spec);
    if (!body.ok) {
      return body;
    }
    const negative = value < 0 || Object.is(value, -0);
    const sign = negative ? "-" : spec.sign === "-" ? "" : spec.sign;
    const grouped = spec.grouping !== null ? group(body.text, spec.grouping) : body.text;
    return { ok: true, text: pad(sign, grouped, spec, ">") };
  }

  if (spec.type !== null && spec.type !== "s") {
    return {
      ok: false,
      reason: `format code '${spec.type}' requires a number, got ${typeof value}`,
    };
  }

  if (typeof value === "boolean") {
    if (spec.type === "s" || spec.precision !== null) {
      return { ok: false, reason: "cannot apply a string format to a boolean" };
    }
  }

  if (spec.align === "=") {
    return { ok: false, reason: "'=' alignment is only allowed for numbers" };
  }
  if (spec.grouping !== null) {
    return { ok: false, reason: "grouping is only allowed for numbers" };
  }

  const text = String(value);
  const truncated = spec.precision !== null ? text.slice(0, spec.precision) : text;
  return { ok: true, text: pad("", truncated, spec, "<") };
}
