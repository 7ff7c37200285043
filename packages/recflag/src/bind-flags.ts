import {
  commandLine,
  Duration,
  fieldRef,
  parseBool,
  parseFloat64,
  parseInteger,
  parseSafeInteger,
  type FlagSet,
} from "@recflag/flagset";
import { config } from "./config.js";
import { InvalidDefaultError, InvalidRecordError, UnsupportedFieldError } from "./errors.js";
import { ExclusionSet } from "./exclusion.js";
import { isBigInt, isBoolean, isNumber, isRecord, isString } from "./kinds.js";
import { logger } from "./logger.js";
import { resolveFlag } from "./names.js";
import type { BindOptions, FieldDescriptor, RecordSchema, ResolvedFlag } from "./types.js";

/**
 * Register the fields of `target` with a flag set so they can be set by
 * arguments of the form `-field-name=value`. Must run before the flag
 * set's `parse`.
 *
 * Each field is set to its annotated default right away. Defaults are
 * parsed with the field kind's syntax; one that does not parse registers
 * the zero value, unless strict mode is on.
 *
 * Supported kinds: bool, int, int64, uint, uint64, float64, duration,
 * string. Any other kind throws `UnsupportedFieldError`; fields before
 * it stay registered.
 */
export function bindFlags<T extends object>(
  schema: RecordSchema<T>,
  target: T,
  options: BindOptions = {},
): void {
  if (!isRecord(target) || Object.isFrozen(target)) {
    throw new InvalidRecordError("bindFlags", target);
  }
  const flagSet = options.flagSet ?? commandLine;
  const prefix = options.prefix ?? "";
  const excluded = ExclusionSet.from(options.exclude);
  const strict = options.strict ?? config.get("strict");

  for (const field of schema.fields) {
    const flag = resolveFlag(field, prefix);
    if (flag.omitted || excluded.contains(flag.flagName)) {
      logger.debug(`bindFlags: skipping ${schema.name}.${field.name}`);
      continue;
    }
    bindField({ schema: schema.name, flagSet, target, field, flag, strict });
    logger.debug(`bindFlags: registered -${flag.flagName} (${field.kind}) for ${schema.name}.${field.name}`);
  }
}

interface FieldBinding {
  readonly schema: string;
  readonly flagSet: FlagSet;
  readonly target: Record<string, unknown>;
  readonly field: FieldDescriptor;
  readonly flag: ResolvedFlag;
  readonly strict: boolean;
}

function bindField(binding: FieldBinding): void {
  const { flagSet, target, field, flag } = binding;
  const { flagName, description } = flag;
  const key = field.name;

  switch (field.kind) {
    case "bool":
      flagSet.boolVar(
        fieldRef(target, key, isBoolean, false),
        flagName,
        parseDefault(binding, parseBool, false),
        description,
      );
      return;
    case "int":
      flagSet.intVar(
        fieldRef(target, key, isNumber, 0),
        flagName,
        parseDefault(binding, (text) => parseSafeInteger(text), 0),
        description,
      );
      return;
    case "int64":
      flagSet.int64Var(
        fieldRef(target, key, isBigInt, 0n),
        flagName,
        parseDefault(binding, (text) => parseInteger(text), 0n),
        description,
      );
      return;
    case "duration":
      flagSet.durationVar(
        fieldRef(target, key, Duration.isDuration, Duration.zero),
        flagName,
        parseDefault(binding, Duration.parse, Duration.zero),
        description,
      );
      return;
    case "uint":
      flagSet.uintVar(
        fieldRef(target, key, isNumber, 0),
        flagName,
        parseDefault(binding, (text) => parseSafeInteger(text, { signed: false }), 0),
        description,
      );
      return;
    case "uint64":
      flagSet.uint64Var(
        fieldRef(target, key, isBigInt, 0n),
        flagName,
        parseDefault(binding, (text) => parseInteger(text, { signed: false }), 0n),
        description,
      );
      return;
    case "float64":
      flagSet.float64Var(
        fieldRef(target, key, isNumber, 0),
        flagName,
        parseDefault(binding, parseFloat64, 0),
        description,
      );
      return;
    case "string":
      flagSet.stringVar(fieldRef(target, key, isString, ""), flagName, flag.defaultValue, description);
      return;
    case "int8":
    case "int16":
    case "int32":
    case "uint8":
    case "uint16":
    case "uint32":
    case "float32":
    case "other":
      throw new UnsupportedFieldError(binding.schema, field.name, field.kind);
    default: {
      const unreachable: never = field.kind;
      throw new UnsupportedFieldError(binding.schema, field.name, unreachable);
    }
  }
}

function parseDefault<V>(binding: FieldBinding, parse: (text: string) => V, zero: V): V {
  const { field, flag, strict } = binding;
  if (flag.defaultValue === "") return zero;

  try {
    return parse(flag.defaultValue);
  } catch (error) {
    if (strict) {
      throw new InvalidDefaultError(field.name, flag.flagName, flag.defaultValue, error);
    }
    logger.debug(
      `bindFlags: default ${JSON.stringify(flag.defaultValue)} for -${flag.flagName} does not parse, using zero value`,
    );
    return zero;
  }
}
