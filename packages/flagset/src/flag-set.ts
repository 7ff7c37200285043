import type { Duration } from "./duration.js";
import { FlagParseError, FlagRedefinedError, HelpRequestedError } from "./errors.js";
import type { Ref } from "./ref.js";
import {
  BoolValue,
  DurationValue,
  Float64Value,
  Int64Value,
  IntValue,
  StringValue,
  Uint64Value,
  UintValue,
  type FlagValue,
} from "./values.js";

/** A registered flag. */
export interface Flag {
  readonly name: string;
  readonly usage: string;
  readonly value: FlagValue;
  /** Default value as text, captured at registration. */
  readonly defValue: string;
}

/**
 * What `parse` does on a bad argument list:
 * - "throw": rethrow the error to the caller
 * - "exit": write the error and usage text, then exit the process
 *   (status 0 for a help request, 2 otherwise)
 */
export type ErrorHandling = "throw" | "exit";

export interface FlagSetOptions {
  errorHandling?: ErrorHandling;
  /** Line writer for usage and error text (default: console.error) */
  writer?: (line: string) => void;
}

const ZERO_TEXT: Record<string, string> = {
  "": "false",
  int: "0",
  uint: "0",
  float: "0",
  duration: "0s",
  string: "",
};

/**
 * A named set of flags, parsed from arguments of the form `-name=value`.
 *
 * Each typed `*Var` method stores the default through the given reference
 * immediately; `parse` later overwrites the references of the flags that
 * appear in the argument list.
 *
 * ```ts
 * const flags = new FlagSet("server");
 * const port = ref(0);
 * flags.intVar(port, "port", 8080, "listen `port`");
 * flags.parse(["-port=9090"]);
 * port.get(); // 9090
 * ```
 */
export class FlagSet {
  readonly errorHandling: ErrorHandling;
  private readonly writer: (line: string) => void;
  private readonly formal = new Map<string, Flag>();
  private readonly actual = new Map<string, Flag>();
  private remaining: string[] = [];
  private isParsed = false;

  constructor(
    readonly name: string = "",
    options: FlagSetOptions = {},
  ) {
    this.errorHandling = options.errorHandling ?? "throw";
    this.writer = options.writer ?? ((line: string) => console.error(line));
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /** Register an arbitrary flag value under `name`. */
  define(value: FlagValue, name: string, usage: string): Flag {
    if (name.startsWith("-")) {
      throw new Error(`flag ${JSON.stringify(name)} begins with -`);
    }
    if (name.includes("=")) {
      throw new Error(`flag ${JSON.stringify(name)} contains =`);
    }
    if (this.formal.has(name)) {
      throw new FlagRedefinedError(this.name, name);
    }

    const flag: Flag = { name, usage, value, defValue: value.toString() };
    this.formal.set(name, flag);
    return flag;
  }

  boolVar(ref: Ref<boolean>, name: string, value: boolean, usage: string): Flag {
    return this.bind(ref, new BoolValue(ref), name, value, usage);
  }

  intVar(ref: Ref<number>, name: string, value: number, usage: string): Flag {
    return this.bind(ref, new IntValue(ref), name, value, usage);
  }

  int64Var(ref: Ref<bigint>, name: string, value: bigint, usage: string): Flag {
    return this.bind(ref, new Int64Value(ref), name, value, usage);
  }

  uintVar(ref: Ref<number>, name: string, value: number, usage: string): Flag {
    return this.bind(ref, new UintValue(ref), name, value, usage);
  }

  uint64Var(ref: Ref<bigint>, name: string, value: bigint, usage: string): Flag {
    return this.bind(ref, new Uint64Value(ref), name, value, usage);
  }

  float64Var(ref: Ref<number>, name: string, value: number, usage: string): Flag {
    return this.bind(ref, new Float64Value(ref), name, value, usage);
  }

  durationVar(ref: Ref<Duration>, name: string, value: Duration, usage: string): Flag {
    return this.bind(ref, new DurationValue(ref), name, value, usage);
  }

  stringVar(ref: Ref<string>, name: string, value: string, usage: string): Flag {
    return this.bind(ref, new StringValue(ref), name, value, usage);
  }

  private bind<T>(ref: Ref<T>, value: FlagValue, name: string, initial: T, usage: string): Flag {
    if (this.formal.has(name)) {
      throw new FlagRedefinedError(this.name, name);
    }
    ref.set(initial);
    return this.define(value, name, usage);
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  lookup(name: string): Flag | undefined {
    return this.formal.get(name);
  }

  /** Set a flag by name as if it had appeared on the command line. */
  set(name: string, value: string): void {
    const flag = this.formal.get(name);
    if (!flag) {
      throw new FlagParseError(name, "not_defined", `no such flag -${name}`);
    }
    try {
      flag.value.set(value);
    } catch (error) {
      throw new FlagParseError(
        name,
        "invalid_value",
        `invalid value ${JSON.stringify(value)} for flag -${name}: ${messageOf(error)}`,
        error,
      );
    }
    this.actual.set(name, flag);
  }

  /** Visit the flags that have been set, in lexical order. */
  visit(fn: (flag: Flag) => void): void {
    sortedFlags(this.actual).forEach(fn);
  }

  /** Visit every registered flag, in lexical order. */
  visitAll(fn: (flag: Flag) => void): void {
    sortedFlags(this.formal).forEach(fn);
  }

  /** Number of flags that have been set. */
  nFlag(): number {
    return this.actual.size;
  }

  // -------------------------------------------------------------------------
  // Parsing
  // -------------------------------------------------------------------------

  /**
   * Parse flag definitions from the argument list, which should not
   * include the command name. Parsing stops at the first non-flag
   * argument, at a lone `-`, or after `--`.
   */
  parse(args: readonly string[]): void {
    this.isParsed = true;
    this.remaining = [...args];
    try {
      while (this.parseOne()) {
        // consume flags until a terminator
      }
    } catch (error) {
      this.fail(error);
    }
  }

  parsed(): boolean {
    return this.isParsed;
  }

  /** Arguments left over after the flags. */
  args(): string[] {
    return [...this.remaining];
  }

  nArg(): number {
    return this.remaining.length;
  }

  arg(i: number): string {
    return this.remaining[i] ?? "";
  }

  private parseOne(): boolean {
    const s = this.remaining[0];
    if (s === undefined || s.length < 2 || s[0] !== "-") return false;

    let minuses = 1;
    if (s[1] === "-") {
      minuses++;
      if (s.length === 2) {
        this.remaining.shift();
        return false;
      }
    }

    let name = s.slice(minuses);
    if (name.length === 0 || name[0] === "-" || name[0] === "=") {
      throw new FlagParseError(name, "bad_syntax", `bad flag syntax: ${s}`);
    }
    this.remaining.shift();

    let value: string | undefined;
    const eq = name.indexOf("=");
    if (eq > 0) {
      value = name.slice(eq + 1);
      name = name.slice(0, eq);
    }

    const flag = this.formal.get(name);
    if (!flag) {
      if (name === "help" || name === "h") throw new HelpRequestedError();
      throw new FlagParseError(name, "not_defined", `flag provided but not defined: -${name}`);
    }

    if (flag.value.isBoolFlag) {
      try {
        flag.value.set(value ?? "true");
      } catch (error) {
        throw new FlagParseError(
          name,
          "invalid_value",
          `invalid boolean value ${JSON.stringify(value)} for -${name}: ${messageOf(error)}`,
          error,
        );
      }
    } else {
      if (value === undefined) value = this.remaining.shift();
      if (value === undefined) {
        throw new FlagParseError(name, "missing_value", `flag needs an argument: -${name}`);
      }
      try {
        flag.value.set(value);
      } catch (error) {
        throw new FlagParseError(
          name,
          "invalid_value",
          `invalid value ${JSON.stringify(value)} for flag -${name}: ${messageOf(error)}`,
          error,
        );
      }
    }

    this.actual.set(name, flag);
    return true;
  }

  private fail(error: unknown): never {
    if (this.errorHandling === "throw") throw error;

    if (error instanceof HelpRequestedError) {
      this.usage();
      process.exit(0);
    }
    this.writer(messageOf(error));
    this.usage();
    process.exit(2);
  }

  // -------------------------------------------------------------------------
  // Usage
  // -------------------------------------------------------------------------

  /**
   * Usage text for every registered flag, one entry per flag:
   *
   * ```text
   *   -interval duration
   *     	poll interval (default 5s)
   * ```
   */
  defaultsText(): string {
    return this.defaultsEntries().join("\n");
  }

  printDefaults(): void {
    for (const entry of this.defaultsEntries()) this.writer(entry);
  }

  usage(): void {
    this.writer(this.name ? `Usage of ${this.name}:` : "Usage:");
    this.printDefaults();
  }

  private defaultsEntries(): string[] {
    const entries: string[] = [];
    this.visitAll((flag) => {
      let entry = `  -${flag.name}`;
      const { placeholder, usage } = unquoteUsage(flag);
      if (placeholder) entry += ` ${placeholder}`;
      // Single-letter names without a placeholder keep the usage on one line.
      entry += entry.length <= 4 ? "\t" : "\n    \t";
      entry += usage.split("\n").join("\n    \t");

      if (!isZeroValue(flag)) {
        const shown = flag.value instanceof StringValue ? JSON.stringify(flag.defValue) : flag.defValue;
        entry += ` (default ${shown})`;
      }
      entries.push(entry);
    });
    return entries;
  }
}

/**
 * A back-quoted word in the usage string names the flag's value in the
 * usage text; otherwise the value's type name is used.
 */
export function unquoteUsage(flag: Flag): { placeholder: string; usage: string } {
  const match = /`([^`]*)`/.exec(flag.usage);
  if (match) {
    return {
      placeholder: match[1] ?? "",
      usage: flag.usage.slice(0, match.index) + (match[1] ?? "") + flag.usage.slice(match.index + match[0].length),
    };
  }
  return { placeholder: flag.value.typeName, usage: flag.usage };
}

function isZeroValue(flag: Flag): boolean {
  return flag.defValue === (ZERO_TEXT[flag.value.typeName] ?? "");
}

function sortedFlags(flags: Map<string, Flag>): Flag[] {
  return [...flags.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
