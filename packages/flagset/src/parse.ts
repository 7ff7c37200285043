import { ValueParseError } from "./errors.js";

// ---------------------------------------------------------------------------
// Booleans
// ---------------------------------------------------------------------------

const TRUE_WORDS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_WORDS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/** Parse `1 t T TRUE true True` and `0 f F FALSE false False`. */
export function parseBool(text: string): boolean {
  if (TRUE_WORDS.has(text)) return true;
  if (FALSE_WORDS.has(text)) return false;
  throw syntaxError(text);
}

// ---------------------------------------------------------------------------
// Integers
// ---------------------------------------------------------------------------

export interface IntegerFormat {
  /** Accept a leading sign and negative values. Defaults to true. */
  readonly signed?: boolean;
  /** Width of the target integer. Defaults to 64. */
  readonly bits?: 8 | 16 | 32 | 64;
  /**
   * 10 for plain decimal; 0 to also accept `0x`, `0o`, `0b` and leading-`0`
   * octal prefixes with `_` digit separators. Defaults to 10.
   */
  readonly base?: 0 | 10;
}

const DIGITS: Record<2 | 8 | 10 | 16, string> = {
  2: "[01]",
  8: "[0-7]",
  10: "[0-9]",
  16: "[0-9a-fA-F]",
};

const RADIX_PREFIX: Record<2 | 8 | 10 | 16, string> = {
  2: "0b",
  8: "0o",
  10: "",
  16: "0x",
};

/** Parse an integer of the given width and signedness. */
export function parseInteger(text: string, format: IntegerFormat = {}): bigint {
  const { signed = true, bits = 64, base = 10 } = format;

  let body = text;
  let negative = false;
  if (signed && (body.startsWith("+") || body.startsWith("-"))) {
    negative = body[0] === "-";
    body = body.slice(1);
  }

  const magnitude = base === 0 ? parsePrefixed(text, body) : parseDecimal(text, body);
  const value = negative ? -magnitude : magnitude;

  const width = BigInt(bits);
  const max = signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n;
  const min = signed ? -(1n << (width - 1n)) : 0n;
  if (value > max || value < min) throw rangeError(text);
  return value;
}

/** Parse an integer that must fit a JavaScript number exactly. */
export function parseSafeInteger(
  text: string,
  format: Omit<IntegerFormat, "bits"> = {},
): number {
  const value = Number(parseInteger(text, { ...format, bits: 64 }));
  if (!Number.isSafeInteger(value)) throw rangeError(text);
  return value;
}

function parseDecimal(text: string, digits: string): bigint {
  if (!/^\d+$/.test(digits)) throw syntaxError(text);
  return BigInt(digits);
}

function parsePrefixed(text: string, body: string): bigint {
  let radix: 2 | 8 | 10 | 16 = 10;
  let digits = body;
  let prefixed = false;

  const prefix = body.slice(0, 2).toLowerCase();
  if (prefix === "0x" || prefix === "0o" || prefix === "0b") {
    radix = prefix === "0x" ? 16 : prefix === "0o" ? 8 : 2;
    digits = body.slice(2);
    prefixed = true;
  } else if (body.length > 1 && body.startsWith("0")) {
    radix = 8;
  }

  // Underscores may only separate digits, or follow an explicit prefix.
  const d = DIGITS[radix];
  const shape = new RegExp(`^${prefixed ? "_?" : ""}${d}+(_${d}+)*$`);
  if (!shape.test(digits)) throw syntaxError(text);

  return BigInt(RADIX_PREFIX[radix] + digits.replace(/_/g, ""));
}

// ---------------------------------------------------------------------------
// Floats
// ---------------------------------------------------------------------------

const DECIMAL_FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parse a decimal float, or `inf`/`infinity` (optionally signed) and `nan`. */
export function parseFloat64(text: string): number {
  switch (text.toLowerCase()) {
    case "inf":
    case "+inf":
    case "infinity":
    case "+infinity":
      return Infinity;
    case "-inf":
    case "-infinity":
      return -Infinity;
    case "nan":
      return NaN;
  }

  if (!DECIMAL_FLOAT.test(text)) throw syntaxError(text);
  const value = Number(text);
  if (!Number.isFinite(value)) throw rangeError(text);
  return value;
}

function syntaxError(text: string): ValueParseError {
  return new ValueParseError(text, "syntax", `parsing ${JSON.stringify(text)}: invalid syntax`);
}

function rangeError(text: string): ValueParseError {
  return new ValueParseError(text, "range", `parsing ${JSON.stringify(text)}: value out of range`);
}
