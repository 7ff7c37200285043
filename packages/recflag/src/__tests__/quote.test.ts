import { ValueParseError } from "@recflag/flagset";
import { describe, expect, it } from "vitest";
import { quote, unquote } from "../quote.js";

describe("quote", () => {
  it("wraps text in double quotes and escapes embedded quotes", () => {
    expect(quote('some "string" with spaces')).toBe('"some \\"string\\" with spaces"');
  });

  it("escapes backslashes and control characters", () => {
    expect(quote("a\\b\n\tc")).toBe('"a\\\\b\\n\\tc"');
    expect(quote("")).toBe('""');
  });

  it("escapes non-printing characters that JSON leaves raw", () => {
    expect(quote("a\u007fb\u0085c\u2028d\u2029")).toBe('"a\\u007fb\\u0085c\\u2028d\\u2029"');
    expect(unquote(quote("del\u007f line\u2028"))).toBe("del\u007f line\u2028");
  });
});

describe("unquote", () => {
  it("inverts quote", () => {
    for (const text of ['some "string" with spaces', "a,b", "tab\there", "", "back\\slash"]) {
      expect(unquote(quote(text))).toBe(text);
    }
  });

  it("rejects unquoted or malformed tokens", () => {
    expect(() => unquote("plain")).toThrow(ValueParseError);
    expect(() => unquote('"')).toThrow("not a quoted string");
    expect(() => unquote('"\\x"')).toThrow(ValueParseError);
  });
});
