import { Duration } from "@recflag/flagset";
import { isFieldKind } from "./kinds.js";
import type { FieldDescriptor, FieldKind, FieldTags, RecordSchema, RecordValidationError } from "./types.js";

/** Define a record schema from field descriptors, in declaration order. */
export function defineRecord<T extends object = Record<string, unknown>>(
  name: string,
  fields: ReadonlyArray<FieldDescriptor>,
): RecordSchema<T> {
  return { name, fields };
}

/** Validate a schema, returning all detected errors. */
export function validateRecord(schema: RecordSchema<object>): RecordValidationError[] {
  const errors: RecordValidationError[] = [];
  const seen = new Set<string>();

  schema.fields.forEach((field, index) => {
    if (field.name === "") {
      errors.push({ field: `#${index}`, message: "Field name must not be empty" });
    } else if (seen.has(field.name)) {
      errors.push({ field: field.name, message: "Field is declared more than once" });
    }
    seen.add(field.name);

    if (!isFieldKind(field.kind)) {
      errors.push({
        field: field.name || `#${index}`,
        message: `Unknown field kind ${JSON.stringify(field.kind)}`,
      });
    }
  });

  return errors;
}

export interface InferRecordOptions {
  /** Schema name (default: "record"). */
  readonly name?: string;
  /** Annotations per field name. */
  readonly tags?: Readonly<Record<string, FieldTags>>;
}

/**
 * Derive a schema from a sample value's own enumerable properties, in
 * insertion order.
 *
 * Integral numbers are taken to be `int`, so a float field whose sample
 * happens to be whole must be declared explicitly.
 */
export function inferRecord<T extends object>(sample: T, options: InferRecordOptions = {}): RecordSchema<T> {
  const fields = Object.entries(sample).map(
    ([name, value]): FieldDescriptor => ({ name, kind: inferKind(value), ...options.tags?.[name] }),
  );
  return defineRecord<T>(options.name ?? "record", fields);
}

function inferKind(value: unknown): FieldKind {
  switch (typeof value) {
    case "boolean":
      return "bool";
    case "bigint":
      return "int64";
    case "string":
      return "string";
    case "number":
      return Number.isInteger(value) ? "int" : "float64";
    default:
      return Duration.isDuration(value) ? "duration" : "other";
  }
}
