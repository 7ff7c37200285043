import { config } from "./config.js";

const PREFIX = "[recflag]";

/** Console logger; lines only appear with the `debug` config key on. */
export const logger = {
  debug(...args: unknown[]): void {
    if (config.get("debug")) console.debug(PREFIX, ...args);
  },
};
