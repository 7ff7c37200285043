import { Duration } from "@recflag/flagset";
import type { FieldKind } from "./types.js";

export const FIELD_KINDS: ReadonlyArray<FieldKind> = [
  "bool",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
  "duration",
  "string",
  "other",
];

export function isFieldKind(value: unknown): value is FieldKind {
  return FIELD_KINDS.some((kind) => kind === value);
}

/** The value a field of `kind` holds when nothing has been assigned. */
export function zeroValue(kind: FieldKind): unknown {
  switch (kind) {
    case "bool":
      return false;
    case "int64":
    case "uint64":
      return 0n;
    case "duration":
      return Duration.zero;
    case "string":
    case "other":
      return "";
    default:
      return 0;
  }
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

export function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

export function isBigInt(value: unknown): value is bigint {
  return typeof value === "bigint";
}

export function isString(value: unknown): value is string {
  return typeof value === "string";
}

/** Plain object records: not null, not an array. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
