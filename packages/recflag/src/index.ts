/**
 * recflag: convert typed configuration records to command-line
 * arguments, and bind them to a flag set.
 *
 * ```ts
 * const options = record<Options>("Options")
 *   .field("interval", "duration", { flag: "interval,poll interval,5s" })
 *   .buildFlags();
 *
 * options.toArgs({ interval: Duration.minutes(1) }); // ["-interval=1m0s"]
 * options.bind(target, { flagSet });
 * ```
 *
 * @packageDocumentation
 */

export type {
  FieldKind,
  FieldKindTypes,
  KindsFor,
  FlagTag,
  FieldTags,
  FieldDescriptor,
  RecordSchema,
  ResolvedFlag,
  ToArgsOptions,
  BindOptions,
  RecordFlags,
  RecordValidationError,
} from "./types.js";

export { defineRecord, validateRecord, inferRecord, type InferRecordOptions } from "./schema.js";

export { RecordBuilder, record } from "./builder.js";

export { OMIT, parseFlagTag, makeFlagName, resolveFlag } from "./names.js";

export { ExclusionSet } from "./exclusion.js";

export { toArgs, encodeValue } from "./to-args.js";

export { bindFlags } from "./bind-flags.js";

export { quote, unquote } from "./quote.js";

export { FIELD_KINDS, isFieldKind, zeroValue } from "./kinds.js";

export {
  RecflagError,
  InvalidRecordError,
  UnsupportedFieldError,
  InvalidDefaultError,
  RecordSchemaError,
  type RecflagErrorReason,
} from "./errors.js";

export { config, defineConfig, type RecflagConfig } from "./config.js";

export { Duration, FlagSet, commandLine, parseCommandLine } from "@recflag/flagset";
