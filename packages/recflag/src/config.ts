/**
 * recflag configuration
 *
 * Loaded once, lazily, from (in priority order):
 *
 * 1. Environment variables: RECFLAG_STRICT, RECFLAG_DEBUG
 * 2. Config files: .recflagrc, .recflagrc.json, recflag.config.js, ...
 * 3. package.json: "recflag" key
 * 4. Defaults
 *
 * `config.set()` merges on top of whatever was loaded.
 *
 * @example package.json
 * ```json
 * { "recflag": { "strict": true } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

export interface RecflagConfig {
  /** Fail on malformed defaults while binding instead of using the zero value */
  strict: boolean;
  /** Write debug lines through the recflag logger */
  debug: boolean;
}

const MODULE_NAME = "recflag";

const DEFAULTS: RecflagConfig = {
  strict: false,
  debug: false,
};

let configStore: RecflagConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;

function loadConfigFromFiles(): Partial<RecflagConfig> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `.${MODULE_NAME}rc.mjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.mjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return pickKnownKeys(result.config);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    if (process.env.NODE_ENV === "development") {
      console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
    }
  }

  return {};
}

/**
 * RECFLAG_STRICT=1 → { strict: true }
 * RECFLAG_DEBUG=false → { debug: false }
 */
function loadConfigFromEnv(): Partial<RecflagConfig> {
  const envConfig: Partial<RecflagConfig> = {};
  const strict = parseEnvFlag(process.env.RECFLAG_STRICT);
  const debug = parseEnvFlag(process.env.RECFLAG_DEBUG);
  if (strict !== undefined) envConfig.strict = strict;
  if (debug !== undefined) envConfig.debug = debug;
  return envConfig;
}

function parseEnvFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false" || normalized === "") return false;
  return undefined;
}

function pickKnownKeys(raw: unknown): Partial<RecflagConfig> {
  const picked: Partial<RecflagConfig> = {};
  if (typeof raw !== "object" || raw === null) return picked;
  if ("strict" in raw && typeof raw.strict === "boolean") picked.strict = raw.strict;
  if ("debug" in raw && typeof raw.debug === "boolean") picked.debug = raw.debug;
  return picked;
}

/** Priority: env vars > config files > defaults */
function initializeConfig(): void {
  if (configLoaded) return;
  configStore = { ...DEFAULTS, ...loadConfigFromFiles(), ...loadConfigFromEnv() };
  configLoaded = true;
}

function get<K extends keyof RecflagConfig>(key: K): RecflagConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Merge values into the configuration.
 *
 * @example
 * config.set({ strict: true });
 */
function set(values: Partial<RecflagConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...values };
}

function getAll(): Readonly<RecflagConfig> {
  initializeConfig();
  return configStore;
}

function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Reset configuration to defaults (mainly for testing). */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
};

/** Typed helper for `recflag.config.js` files. */
export function defineConfig(values: Partial<RecflagConfig>): Partial<RecflagConfig> {
  return values;
}
