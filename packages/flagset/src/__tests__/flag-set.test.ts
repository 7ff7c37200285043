import { afterEach, describe, expect, it, vi } from "vitest";
import { Duration } from "../duration.js";
import { FlagParseError, FlagRedefinedError, HelpRequestedError } from "../errors.js";
import { commandLine, parseCommandLine } from "../command-line.js";
import { FlagSet } from "../flag-set.js";
import { ref } from "../ref.js";

function serverFlags() {
  const flags = new FlagSet("server");
  const port = ref(0);
  const verbose = ref(false);
  const interval = ref(Duration.zero);
  const host = ref("");
  flags.intVar(port, "port", 8080, "listen port");
  flags.boolVar(verbose, "verbose", false, "log every request");
  flags.durationVar(interval, "interval", Duration.seconds(5), "poll interval");
  flags.stringVar(host, "host", "localhost", "bind address");
  return { flags, port, verbose, interval, host };
}

function parseErrorOf(fn: () => void): FlagParseError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FlagParseError) return error;
    throw error;
  }
  return undefined;
}

describe("registration", () => {
  it("stores defaults through the reference immediately", () => {
    const { port, verbose, interval, host } = serverFlags();
    expect(port.get()).toBe(8080);
    expect(verbose.get()).toBe(false);
    expect(interval.get().toString()).toBe("5s");
    expect(host.get()).toBe("localhost");
  });

  it("captures the default as text", () => {
    const { flags } = serverFlags();
    expect(flags.lookup("interval")?.defValue).toBe("5s");
    expect(flags.lookup("port")?.defValue).toBe("8080");
    expect(flags.lookup("missing")).toBeUndefined();
  });

  it("refuses to register a name twice", () => {
    const { flags } = serverFlags();
    expect(() => flags.intVar(ref(0), "port", 1, "again")).toThrow(FlagRedefinedError);
    expect(() => flags.intVar(ref(0), "port", 1, "again")).toThrow("server flag redefined: port");
  });

  it("rejects names that cannot be written on a command line", () => {
    const flags = new FlagSet();
    expect(() => flags.boolVar(ref(false), "-x", false, "")).toThrow('flag "-x" begins with -');
    expect(() => flags.boolVar(ref(false), "a=b", false, "")).toThrow('flag "a=b" contains =');
  });
});

describe("parse", () => {
  it("accepts one or two dashes, with or without =", () => {
    const { flags, port, host } = serverFlags();
    flags.parse(["-port=9090", "--host", "0.0.0.0"]);
    expect(port.get()).toBe(9090);
    expect(host.get()).toBe("0.0.0.0");
    expect(flags.parsed()).toBe(true);
  });

  it("keeps the default when a flag is absent", () => {
    const { flags, interval } = serverFlags();
    flags.parse([]);
    expect(interval.get().equals(Duration.seconds(5))).toBe(true);
  });

  it("reads durations and prefixed integers", () => {
    const { flags, interval, port } = serverFlags();
    const big = ref(0n);
    flags.int64Var(big, "big", 0n, "a large number");
    flags.parse(["-interval=1m30s", "-port=0x1F91", "-big=0x7fffffffffffffff"]);
    expect(interval.get().toString()).toBe("1m30s");
    expect(port.get()).toBe(8081);
    expect(big.get()).toBe(9223372036854775807n);
  });

  it("sets boolean flags without a value and only takes one through =", () => {
    const { flags, verbose } = serverFlags();
    flags.parse(["-verbose", "false"]);
    expect(verbose.get()).toBe(true);
    expect(flags.args()).toEqual(["false"]);

    const second = serverFlags();
    second.flags.parse(["-verbose=true", "-verbose=false"]);
    expect(second.verbose.get()).toBe(false);
  });

  it("stops at the first non-flag argument", () => {
    const { flags, verbose } = serverFlags();
    flags.parse(["-port=1", "serve", "-verbose"]);
    expect(verbose.get()).toBe(false);
    expect(flags.args()).toEqual(["serve", "-verbose"]);
    expect(flags.nArg()).toBe(2);
    expect(flags.arg(0)).toBe("serve");
    expect(flags.arg(5)).toBe("");
  });

  it("stops after -- and at a lone -", () => {
    const { flags, port } = serverFlags();
    flags.parse(["--", "-port=1"]);
    expect(port.get()).toBe(8080);
    expect(flags.args()).toEqual(["-port=1"]);

    const other = serverFlags();
    other.flags.parse(["-", "-port=1"]);
    expect(other.flags.args()).toEqual(["-", "-port=1"]);
  });

  it("reports unknown flags", () => {
    const { flags } = serverFlags();
    const error = parseErrorOf(() => flags.parse(["-nope"]));
    expect(error?.reason).toBe("not_defined");
    expect(error?.message).toBe("flag provided but not defined: -nope");
  });

  it("reports a missing value", () => {
    const { flags } = serverFlags();
    const error = parseErrorOf(() => flags.parse(["-port"]));
    expect(error?.reason).toBe("missing_value");
    expect(error?.message).toBe("flag needs an argument: -port");
  });

  it("reports an invalid value with the parser's message", () => {
    const { flags } = serverFlags();
    const error = parseErrorOf(() => flags.parse(["-port=abc"]));
    expect(error?.reason).toBe("invalid_value");
    expect(error?.message).toBe('invalid value "abc" for flag -port: parsing "abc": invalid syntax');
  });

  it("reports bad syntax", () => {
    const { flags } = serverFlags();
    const error = parseErrorOf(() => flags.parse(["---port=1"]));
    expect(error?.reason).toBe("bad_syntax");
    expect(error?.message).toBe("bad flag syntax: ---port=1");
  });

  it("signals a help request when -h is not defined", () => {
    const { flags } = serverFlags();
    expect(() => flags.parse(["-h"])).toThrow(HelpRequestedError);
    expect(() => flags.parse(["-help"])).toThrow(HelpRequestedError);
  });
});

describe("set and visit", () => {
  it("sets a flag by name and records it as set", () => {
    const { flags, port } = serverFlags();
    flags.set("port", "7000");
    expect(port.get()).toBe(7000);
    expect(flags.nFlag()).toBe(1);
    expect(() => flags.set("nope", "1")).toThrow("no such flag -nope");
  });

  it("visits set flags and all flags in lexical order", () => {
    const { flags } = serverFlags();
    flags.parse(["-verbose", "-host=a"]);

    const set: string[] = [];
    flags.visit((flag) => set.push(flag.name));
    expect(set).toEqual(["host", "verbose"]);

    const all: string[] = [];
    flags.visitAll((flag) => all.push(flag.name));
    expect(all).toEqual(["host", "interval", "port", "verbose"]);
  });
});

describe("usage text", () => {
  it("lists flags with placeholders and non-zero defaults", () => {
    const flags = new FlagSet("greeter");
    flags.stringVar(ref(""), "name", "world", "who to `greet`");
    flags.intVar(ref(0), "n", 0, "repeat count");
    flags.durationVar(ref(Duration.zero), "interval", Duration.seconds(5), "poll interval");
    flags.boolVar(ref(false), "v", false, "verbose");

    expect(flags.defaultsText()).toBe(
      [
        "  -interval duration\n    \tpoll interval (default 5s)",
        "  -n int\n    \trepeat count",
        '  -name greet\n    \twho to greet (default "world")',
        "  -v\tverbose",
      ].join("\n"),
    );
  });

  it("writes usage through the configured writer", () => {
    const lines: string[] = [];
    const flags = new FlagSet("tool", { writer: (line) => lines.push(line) });
    flags.boolVar(ref(false), "dry-run", false, "plan only");
    flags.usage();
    expect(lines).toEqual(["Usage of tool:", "  -dry-run\n    \tplan only"]);
  });
});

describe("exit error handling", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the error and usage, then exits with status 2", () => {
    const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const lines: string[] = [];
    const flags = new FlagSet("tool", { errorHandling: "exit", writer: (line) => lines.push(line) });
    flags.boolVar(ref(false), "v", false, "verbose");

    expect(() => flags.parse(["-nope"])).toThrow("exit 2");
    expect(exit).toHaveBeenCalledWith(2);
    expect(lines).toEqual(["flag provided but not defined: -nope", "Usage of tool:", "  -v\tverbose"]);
  });

  it("exits with status 0 on a help request", () => {
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const lines: string[] = [];
    const flags = new FlagSet("", { errorHandling: "exit", writer: (line) => lines.push(line) });

    expect(() => flags.parse(["-help"])).toThrow("exit 0");
    expect(lines).toEqual(["Usage:"]);
  });
});

describe("commandLine", () => {
  it("parses process-style arguments in exit mode", () => {
    const name = ref("");
    commandLine.stringVar(name, "cl-name", "anon", "who to greet");
    parseCommandLine(["-cl-name=abc", "rest"]);

    expect(commandLine.errorHandling).toBe("exit");
    expect(name.get()).toBe("abc");
    expect(commandLine.args()).toEqual(["rest"]);
  });
});
