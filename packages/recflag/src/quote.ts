import { ValueParseError } from "@recflag/flagset";

const NON_PRINTABLE = /[\u007f-\u009f\u00ad\u2028\u2029\ufeff]/g;

/**
 * Quote text as a double-quoted string literal: `"` and `\` are escaped
 * with a backslash, control and other non-printing characters use their
 * escape sequences.
 */
export function quote(text: string): string {
  return JSON.stringify(text).replace(
    NON_PRINTABLE,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
}

/** Invert `quote`. */
export function unquote(token: string): string {
  if (token.length < 2 || !token.startsWith('"') || !token.endsWith('"')) {
    throw new ValueParseError(token, "syntax", `not a quoted string: ${token}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(token);
  } catch (error) {
    throw new ValueParseError(
      token,
      "syntax",
      `malformed quoted string ${token}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (typeof parsed !== "string") {
    throw new ValueParseError(token, "syntax", `not a quoted string: ${token}`);
  }
  return parsed;
}
