/** Why a textual value could not be converted. */
export type ValueParseErrorReason = "syntax" | "range";

/** Thrown by the value parsers when text is malformed or out of range. */
export class ValueParseError extends Error {
  constructor(
    readonly input: string,
    readonly reason: ValueParseErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "ValueParseError";
  }
}

/** Thrown when a flag name is registered twice on the same set. */
export class FlagRedefinedError extends Error {
  constructor(
    readonly setName: string,
    readonly flagName: string,
  ) {
    super(
      setName
        ? `${setName} flag redefined: ${flagName}`
        : `flag redefined: ${flagName}`,
    );
    this.name = "FlagRedefinedError";
  }
}

/** Reason codes for argument parsing failures. */
export type FlagParseErrorReason =
  | "bad_syntax"
  | "not_defined"
  | "missing_value"
  | "invalid_value";

/** Error thrown when the argument list cannot be applied to a flag set. */
export class FlagParseError extends Error {
  constructor(
    readonly flagName: string,
    readonly reason: FlagParseErrorReason,
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = "FlagParseError";
  }
}

/** Thrown when `-h` or `-help` is given and no such flag is defined. */
export class HelpRequestedError extends Error {
  constructor() {
    super("flag: help requested");
    this.name = "HelpRequestedError";
  }
}
