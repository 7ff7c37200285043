import type { Duration, FlagSet } from "@recflag/flagset";
import type { ExclusionSet } from "./exclusion.js";

/**
 * The closed set of field kinds a record may declare.
 *
 * `toArgs` encodes every kind; `bindFlags` registers only `bool`, `int`,
 * `int64`, `duration`, `uint`, `uint64`, `float64` and `string`.
 */
export type FieldKind =
  | "bool"
  | "int"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64"
  | "float32"
  | "float64"
  | "duration"
  | "string"
  | "other";

/** The TypeScript value type carried by each field kind. */
export interface FieldKindTypes {
  bool: boolean;
  int: number;
  int8: number;
  int16: number;
  int32: number;
  int64: bigint;
  uint: number;
  uint8: number;
  uint16: number;
  uint32: number;
  uint64: bigint;
  float32: number;
  float64: number;
  duration: Duration;
  string: string;
  other: unknown;
}

/** Kinds whose value type accepts `V`. */
export type KindsFor<V> = Extract<
  { [K in FieldKind]: V extends FieldKindTypes[K] ? K : never }[FieldKind],
  FieldKind
>;

/** Structured form of the primary `flag` annotation. */
export interface FlagTag {
  readonly name: string;
  readonly description: string;
  readonly defaultValue: string;
}

/** Per-field annotations. */
export interface FieldTags {
  /**
   * Primary annotation: `"name,description,default"` (any segment may be
   * empty), or the same triple as an object.
   */
  readonly flag?: string | Partial<FlagTag>;
  /** Secondary annotation; its first comma segment supplies a fallback name. */
  readonly json?: string;
}

/** One field of a record, in declaration order. */
export interface FieldDescriptor extends FieldTags {
  readonly name: string;
  readonly kind: FieldKind;
}

/** Ordered description of a record type's fields. `T` is the described record. */
export interface RecordSchema<T extends object = Record<string, unknown>> {
  readonly name: string;
  readonly fields: ReadonlyArray<FieldDescriptor>;
}

/** A field's external flag identity. */
export interface ResolvedFlag {
  /** Selected name with `_` replaced by `-`, before prefixing. */
  readonly name: string;
  /** `name`, prefixed with `"<prefix>-"` when a prefix is given. */
  readonly flagName: string;
  readonly description: string;
  readonly defaultValue: string;
  /** The field opted out with the name `-`. */
  readonly omitted: boolean;
}

export interface ToArgsOptions {
  readonly prefix?: string;
  /** Resolved (prefixed, hyphenated) flag names to leave out. */
  readonly exclude?: ReadonlyArray<string> | ReadonlySet<string> | ExclusionSet;
}

export interface BindOptions extends ToArgsOptions {
  /** Registry to bind into (default: the process-wide `commandLine`). */
  readonly flagSet?: FlagSet;
  /**
   * Throw `InvalidDefaultError` for a default that does not parse instead
   * of registering the zero value. Defaults to the `strict` config key.
   */
  readonly strict?: boolean;
}

/** Serializer and Binder bound to one schema. */
export interface RecordFlags<T extends object> {
  readonly schema: RecordSchema<T>;
  toArgs(value: T, options?: ToArgsOptions): string[];
  bind(target: T, options?: BindOptions): void;
}

/** A single schema validation error. */
export interface RecordValidationError {
  readonly field: string;
  readonly message: string;
}
