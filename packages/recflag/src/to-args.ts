import { InvalidRecordError } from "./errors.js";
import { ExclusionSet } from "./exclusion.js";
import { isRecord, zeroValue } from "./kinds.js";
import { logger } from "./logger.js";
import { resolveFlag } from "./names.js";
import { quote } from "./quote.js";
import type { FieldKind, RecordSchema, ToArgsOptions } from "./types.js";

/**
 * Convert a record into arguments of the form `-field-name=value`, in
 * field declaration order. With a prefix the form is
 * `-prefix-field-name=value`.
 *
 * Booleans, numbers, bigints and durations are written bare; strings and
 * `other` values are quoted. Not every kind written here can be bound
 * back with `bindFlags`.
 */
export function toArgs<T extends object>(
  schema: RecordSchema<T>,
  value: T,
  options: ToArgsOptions = {},
): string[] {
  if (!isRecord(value)) {
    throw new InvalidRecordError("toArgs", value);
  }
  const prefix = options.prefix ?? "";
  const excluded = ExclusionSet.from(options.exclude);

  const args: string[] = [];
  for (const field of schema.fields) {
    const flag = resolveFlag(field, prefix);
    if (flag.omitted || excluded.contains(flag.flagName)) {
      logger.debug(`toArgs: skipping ${schema.name}.${field.name}`);
      continue;
    }
    args.push(`-${flag.flagName}=${encodeValue(field.kind, value[field.name])}`);
  }
  return args;
}

/** Encode one field value. `undefined` and `null` encode as the kind's zero value. */
export function encodeValue(kind: FieldKind, value: unknown): string {
  const present = value ?? zeroValue(kind);
  switch (kind) {
    case "string":
    case "other":
      return quote(canonicalString(present));
    default:
      // String(-0) drops the sign.
      return Object.is(present, -0) ? "-0" : String(present);
  }
}

function canonicalString(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value) || isPlainObject(value)) return JSON.stringify(value);
  return String(value);
}

function isPlainObject(value: unknown): value is object {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
