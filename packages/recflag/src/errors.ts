import type { FieldKind, RecordValidationError } from "./types.js";

/** Reason codes for recflag failures. */
export type RecflagErrorReason =
  | "invalid_record"
  | "unsupported_kind"
  | "invalid_default"
  | "invalid_schema";

/** Base class for every error thrown by recflag. */
export class RecflagError extends Error {
  constructor(
    readonly reason: RecflagErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "RecflagError";
  }
}

/**
 * The value handed to `toArgs` is not an object record, or the target
 * handed to `bindFlags` is not a mutable one.
 */
export class InvalidRecordError extends RecflagError {
  constructor(
    readonly operation: "toArgs" | "bindFlags",
    value: unknown,
  ) {
    super(
      "invalid_record",
      operation === "toArgs"
        ? `Can't call toArgs with value ${describe(value)}: must be an object record`
        : `Can't call bindFlags with value ${describe(value)}: must be a mutable object record`,
    );
    this.name = "InvalidRecordError";
  }
}

/** A field's kind cannot be registered as a flag. */
export class UnsupportedFieldError extends RecflagError {
  constructor(
    readonly record: string,
    readonly field: string,
    readonly kind: FieldKind,
  ) {
    super("unsupported_kind", `Invalid field type: ${record}.${field} has unsupported kind "${kind}"`);
    this.name = "UnsupportedFieldError";
  }
}

/** A non-empty default did not parse while binding in strict mode. */
export class InvalidDefaultError extends RecflagError {
  constructor(
    readonly field: string,
    readonly flagName: string,
    readonly defaultValue: string,
    readonly cause: unknown,
  ) {
    super(
      "invalid_default",
      `Invalid default ${JSON.stringify(defaultValue)} for flag -${flagName} (field ${field}): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "InvalidDefaultError";
  }
}

/** A record schema failed validation. */
export class RecordSchemaError extends RecflagError {
  constructor(
    readonly record: string,
    readonly errors: ReadonlyArray<RecordValidationError>,
  ) {
    super(
      "invalid_schema",
      `Record "${record}" validation failed:\n${errors.map((e) => `  ${e.field}: ${e.message}`).join("\n")}`,
    );
    this.name = "RecordSchemaError";
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object" && Object.isFrozen(value)) return "frozen object";
  return typeof value;
}
