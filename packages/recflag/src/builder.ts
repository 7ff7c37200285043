import { bindFlags } from "./bind-flags.js";
import { RecordSchemaError } from "./errors.js";
import { defineRecord, validateRecord } from "./schema.js";
import { toArgs } from "./to-args.js";
import type { FieldDescriptor, FieldTags, KindsFor, RecordFlags, RecordSchema } from "./types.js";

/**
 * Fluent builder for record schemas. Fields are kept in the order they
 * are added, and each field only accepts kinds matching its property type.
 *
 * ```ts
 * interface Options { host: string; port: number; timeout: Duration }
 *
 * const flags = record<Options>("Options")
 *   .field("host", "string", { flag: "host,bind address,localhost" })
 *   .field("port", "int", { flag: "port,listen port,8080" })
 *   .field("timeout", "duration", { json: "request_timeout" })
 *   .buildFlags();
 * ```
 */
export class RecordBuilder<T extends object> {
  private readonly _name: string;
  private readonly _fields: FieldDescriptor[] = [];

  constructor(name: string) {
    this._name = name;
  }

  /** Add a field with optional annotations. */
  field<K extends keyof T & string>(name: K, kind: KindsFor<T[K]>, tags?: FieldTags): this {
    this._fields.push({ name, kind, ...tags });
    return this;
  }

  /** Build the schema, throwing on validation errors. */
  build(): RecordSchema<T> {
    const s = defineRecord<T>(this._name, [...this._fields]);
    const errors = validateRecord(s);
    if (errors.length > 0) {
      throw new RecordSchemaError(this._name, errors);
    }
    return s;
  }

  /** Build the schema and pair it with `toArgs` and `bindFlags`. */
  buildFlags(): RecordFlags<T> {
    const schema = this.build();
    return {
      schema,
      toArgs: (value, options) => toArgs(schema, value, options),
      bind: (target, options) => bindFlags(schema, target, options),
    };
  }
}

/** Create a new record builder. */
export function record<T extends object>(name: string): RecordBuilder<T> {
  return new RecordBuilder<T>(name);
}
