import { Duration } from "./duration.js";
import { parseBool, parseFloat64, parseInteger, parseSafeInteger } from "./parse.js";
import type { Ref } from "./ref.js";

/**
 * The dynamic value behind a flag. `set` receives the raw argument text
 * and stores the parsed value through the flag's binding.
 */
export interface FlagValue {
  /** Placeholder shown in usage text, e.g. `int` or `duration`. Empty for booleans. */
  readonly typeName: string;
  /** Boolean flags may appear without `=value`. */
  readonly isBoolFlag: boolean;
  set(raw: string): void;
  get(): unknown;
  toString(): string;
}

abstract class RefValue<T> implements FlagValue {
  abstract readonly typeName: string;
  readonly isBoolFlag: boolean = false;

  constructor(protected readonly ref: Ref<T>) {}

  protected abstract parse(raw: string): T;

  set(raw: string): void {
    this.ref.set(this.parse(raw));
  }

  get(): T {
    return this.ref.get();
  }

  toString(): string {
    return String(this.ref.get());
  }
}

export class BoolValue extends RefValue<boolean> {
  readonly typeName = "";
  override readonly isBoolFlag = true;

  protected parse(raw: string): boolean {
    return parseBool(raw);
  }
}

export class IntValue extends RefValue<number> {
  readonly typeName = "int";

  protected parse(raw: string): number {
    return parseSafeInteger(raw, { signed: true, base: 0 });
  }
}

export class Int64Value extends RefValue<bigint> {
  readonly typeName = "int";

  protected parse(raw: string): bigint {
    return parseInteger(raw, { signed: true, bits: 64, base: 0 });
  }
}

export class UintValue extends RefValue<number> {
  readonly typeName = "uint";

  protected parse(raw: string): number {
    return parseSafeInteger(raw, { signed: false, base: 0 });
  }
}

export class Uint64Value extends RefValue<bigint> {
  readonly typeName = "uint";

  protected parse(raw: string): bigint {
    return parseInteger(raw, { signed: false, bits: 64, base: 0 });
  }
}

export class Float64Value extends RefValue<number> {
  readonly typeName = "float";

  protected parse(raw: string): number {
    return parseFloat64(raw);
  }
}

export class DurationValue extends RefValue<Duration> {
  readonly typeName = "duration";

  protected parse(raw: string): Duration {
    return Duration.parse(raw);
  }
}

export class StringValue extends RefValue<string> {
  readonly typeName = "string";

  protected parse(raw: string): string {
    return raw;
  }
}
