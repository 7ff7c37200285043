import { ValueParseError } from "./errors.js";

const NANOSECOND = 1n;
const MICROSECOND = 1000n * NANOSECOND;
const MILLISECOND = 1000n * MICROSECOND;
const SECOND = 1000n * MILLISECOND;
const MINUTE = 60n * SECOND;
const HOUR = 60n * MINUTE;

const MAX_NANOSECONDS = (1n << 63n) - 1n;
const MIN_NANOSECONDS = -(1n << 63n);

const UNITS = new Map<string, bigint>([
  ["ns", NANOSECOND],
  ["us", MICROSECOND],
  ["µs", MICROSECOND], // micro sign
  ["μs", MICROSECOND], // Greek mu
  ["ms", MILLISECOND],
  ["s", SECOND],
  ["m", MINUTE],
  ["h", HOUR],
]);

/**
 * An elapsed time, stored as a signed 64-bit count of nanoseconds.
 *
 * Durations print and parse in the compact unit syntax used on command
 * lines: `300ms`, `1.5s`, `1m0s`, `1h30m0s`.
 *
 * ```ts
 * Duration.parse("1h30m").toString(); // "1h30m0s"
 * Duration.seconds(90).toString();    // "1m30s"
 * ```
 */
export class Duration {
  static readonly zero = new Duration(0n);
  static readonly nanosecond = new Duration(NANOSECOND);
  static readonly microsecond = new Duration(MICROSECOND);
  static readonly millisecond = new Duration(MILLISECOND);
  static readonly second = new Duration(SECOND);
  static readonly minute = new Duration(MINUTE);
  static readonly hour = new Duration(HOUR);

  readonly nanoseconds: bigint;

  constructor(nanoseconds: bigint) {
    if (nanoseconds > MAX_NANOSECONDS || nanoseconds < MIN_NANOSECONDS) {
      throw new RangeError(`Duration out of range: ${nanoseconds}ns`);
    }
    this.nanoseconds = nanoseconds;
  }

  static nanoseconds(n: number | bigint): Duration {
    return Duration.ofUnit(n, NANOSECOND);
  }

  static microseconds(n: number | bigint): Duration {
    return Duration.ofUnit(n, MICROSECOND);
  }

  static milliseconds(n: number | bigint): Duration {
    return Duration.ofUnit(n, MILLISECOND);
  }

  static seconds(n: number | bigint): Duration {
    return Duration.ofUnit(n, SECOND);
  }

  static minutes(n: number | bigint): Duration {
    return Duration.ofUnit(n, MINUTE);
  }

  static hours(n: number | bigint): Duration {
    return Duration.ofUnit(n, HOUR);
  }

  static isDuration(value: unknown): value is Duration {
    return value instanceof Duration;
  }

  /**
   * Parse a duration string: an optional sign followed by one or more
   * decimal numbers, each with an optional fraction and a unit suffix
   * (`ns`, `us`/`µs`, `ms`, `s`, `m`, `h`). A bare `"0"` is accepted.
   */
  static parse(text: string): Duration {
    let rest = text;
    let negative = false;
    if (rest.startsWith("-") || rest.startsWith("+")) {
      negative = rest[0] === "-";
      rest = rest.slice(1);
    }
    if (rest === "0") return Duration.zero;
    if (rest === "") throw invalidDuration(text);

    const limit = negative ? -MIN_NANOSECONDS : MAX_NANOSECONDS;
    let total = 0n;

    while (rest !== "") {
      const number = /^(\d*)(?:\.(\d*))?/.exec(rest);
      const whole = number?.[1] ?? "";
      const fraction = number?.[2] ?? "";
      if (whole === "" && fraction === "") throw invalidDuration(text);
      rest = rest.slice(number?.[0].length ?? 0);

      const suffix = /^[^\d.]+/.exec(rest)?.[0];
      if (suffix === undefined) {
        throw new ValueParseError(text, "syntax", `missing unit in duration ${JSON.stringify(text)}`);
      }
      const unit = UNITS.get(suffix);
      if (unit === undefined) {
        throw new ValueParseError(
          text,
          "syntax",
          `unknown unit ${JSON.stringify(suffix)} in duration ${JSON.stringify(text)}`,
        );
      }
      rest = rest.slice(suffix.length);

      let value = (whole === "" ? 0n : BigInt(whole)) * unit;
      if (fraction !== "") {
        value += (BigInt(fraction) * unit) / 10n ** BigInt(fraction.length);
      }
      total += value;
      if (total > limit) throw invalidDuration(text, "range");
    }

    return new Duration(negative ? -total : total);
  }

  toMilliseconds(): number {
    return Number(this.nanoseconds) / 1e6;
  }

  toSeconds(): number {
    return Number(this.nanoseconds) / 1e9;
  }

  equals(other: Duration): boolean {
    return this.nanoseconds === other.nanoseconds;
  }

  compare(other: Duration): -1 | 0 | 1 {
    if (this.nanoseconds < other.nanoseconds) return -1;
    return this.nanoseconds > other.nanoseconds ? 1 : 0;
  }

  /**
   * Format as `72h3m0.5s`. Durations under one second use a smaller unit
   * (`1.5ms`, `2µs`, `10ns`); the zero duration is `0s`.
   */
  toString(): string {
    const negative = this.nanoseconds < 0n;
    const u = negative ? -this.nanoseconds : this.nanoseconds;
    let out: string;

    if (u === 0n) {
      return "0s";
    } else if (u < MICROSECOND) {
      out = `${u}ns`;
    } else if (u < MILLISECOND) {
      out = `${formatScaled(u, 3)}µs`;
    } else if (u < SECOND) {
      out = `${formatScaled(u, 6)}ms`;
    } else {
      const [fraction, seconds] = splitFraction(u, 9);
      out = `${seconds % 60n}${fraction}s`;
      const minutes = seconds / 60n;
      if (minutes > 0n) {
        out = `${minutes % 60n}m${out}`;
        const hours = minutes / 60n;
        if (hours > 0n) out = `${hours}h${out}`;
      }
    }

    return negative ? `-${out}` : out;
  }

  private static ofUnit(n: number | bigint, unit: bigint): Duration {
    if (typeof n === "bigint") return new Duration(n * unit);
    if (Number.isInteger(n)) return new Duration(BigInt(n) * unit);
    return new Duration(BigInt(Math.round(n * Number(unit))));
  }
}

/** Split off the last `digits` decimal places, trailing zeros trimmed. */
function splitFraction(value: bigint, digits: number): [string, bigint] {
  const scale = 10n ** BigInt(digits);
  const fraction = (value % scale).toString().padStart(digits, "0").replace(/0+$/, "");
  return [fraction === "" ? "" : `.${fraction}`, value / scale];
}

function formatScaled(value: bigint, digits: number): string {
  const [fraction, whole] = splitFraction(value, digits);
  return `${whole}${fraction}`;
}

function invalidDuration(text: string, reason: "syntax" | "range" = "syntax"): ValueParseError {
  return new ValueParseError(text, reason, `invalid duration ${JSON.stringify(text)}`);
}
