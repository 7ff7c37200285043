/**
 * @recflag/flagset: a typed command-line flag registry.
 *
 * Flags are registered against mutable references and filled in by
 * parsing arguments of the form `-name=value`.
 *
 * @packageDocumentation
 */

export { Duration } from "./duration.js";

export {
  ValueParseError,
  FlagRedefinedError,
  FlagParseError,
  HelpRequestedError,
  type ValueParseErrorReason,
  type FlagParseErrorReason,
} from "./errors.js";

export { parseBool, parseInteger, parseSafeInteger, parseFloat64, type IntegerFormat } from "./parse.js";

export { ref, propertyRef, fieldRef, type Ref } from "./ref.js";

export {
  BoolValue,
  IntValue,
  Int64Value,
  UintValue,
  Uint64Value,
  Float64Value,
  DurationValue,
  StringValue,
  type FlagValue,
} from "./values.js";

export { FlagSet, unquoteUsage, type Flag, type ErrorHandling, type FlagSetOptions } from "./flag-set.js";

export { commandLine, parseCommandLine } from "./command-line.js";
