import * as path from "path";
import { FlagSet } from "./flag-set.js";

/**
 * The process-wide flag set. Errors print usage and exit the process, the
 * way a program's own command line is expected to behave.
 */
export const commandLine = new FlagSet(
  process.argv[1] ? path.basename(process.argv[1]) : "",
  { errorHandling: "exit" },
);

/** Parse the process arguments (excluding the node binary and script) into `commandLine`. */
export function parseCommandLine(args: readonly string[] = process.argv.slice(2)): void {
  commandLine.parse(args);
}
