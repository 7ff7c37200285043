import { describe, expect, it } from "vitest";
import { makeFlagName, parseFlagTag, resolveFlag } from "../names.js";

describe("parseFlagTag", () => {
  it("splits the name, description and default", () => {
    expect(parseFlagTag("interval,Some description,5s")).toEqual({
      name: "interval",
      description: "Some description",
      defaultValue: "5s",
    });
  });

  it("leaves missing segments empty and ignores extra ones", () => {
    expect(parseFlagTag("port")).toEqual({ name: "port", description: "", defaultValue: "" });
    expect(parseFlagTag(",,7")).toEqual({ name: "", description: "", defaultValue: "7" });
    expect(parseFlagTag("a,b,c,d")).toEqual({ name: "a", description: "b", defaultValue: "c" });
    expect(parseFlagTag(undefined)).toEqual({ name: "", description: "", defaultValue: "" });
  });

  it("reads the object form as given", () => {
    expect(parseFlagTag({ name: "hosts", defaultValue: "a,b" })).toEqual({
      name: "hosts",
      description: "",
      defaultValue: "a,b",
    });
  });
});

describe("resolveFlag", () => {
  it("prefers the flag annotation over the json annotation", () => {
    const flag = resolveFlag({ name: "Timeout", kind: "duration", flag: "interval,poll,5s", json: "timeout" });
    expect(flag).toEqual({
      name: "interval",
      flagName: "interval",
      description: "poll",
      defaultValue: "5s",
      omitted: false,
    });
  });

  it("falls back to the first json segment, then the declared name", () => {
    expect(resolveFlag({ name: "Int", kind: "int", json: "number,omitempty" }).name).toBe("number");
    expect(resolveFlag({ name: "Int", kind: "int", flag: ",count only" }).name).toBe("Int");
    expect(resolveFlag({ name: "Int", kind: "int", json: ",omitempty" }).name).toBe("Int");
  });

  it("takes description and default only from the flag annotation", () => {
    const flag = resolveFlag({ name: "Int", kind: "int", json: "number,desc,3" });
    expect(flag.description).toBe("");
    expect(flag.defaultValue).toBe("");
  });

  it("replaces every underscore with a hyphen", () => {
    expect(resolveFlag({ name: "S", kind: "string", json: "string_with_underscores" }).flagName).toBe(
      "string-with-underscores",
    );
    expect(resolveFlag({ name: "max__depth_", kind: "int" }).flagName).toBe("max--depth-");
  });

  it("joins a non-empty prefix with a hyphen", () => {
    expect(resolveFlag({ name: "yes_no", kind: "bool" }, "test").flagName).toBe("test-yes-no");
    expect(resolveFlag({ name: "yes_no", kind: "bool" }, "").flagName).toBe("yes-no");
    expect(makeFlagName("db", "host")).toBe("db-host");
  });

  it("marks fields named - as omitted, whatever the prefix", () => {
    expect(resolveFlag({ name: "Secret", kind: "string", json: "-" }, "test").omitted).toBe(true);
    expect(resolveFlag({ name: "Secret", kind: "string", flag: "-,hidden," }).omitted).toBe(true);
    expect(resolveFlag({ name: "Secret", kind: "string", json: "-," }).omitted).toBe(true);
    expect(resolveFlag({ name: "Secret", kind: "string", json: "-x" }).omitted).toBe(false);
  });
});
