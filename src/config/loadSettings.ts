import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse } from "yaml";
import { ConfigError, describeError } from "../errors";
import { resolveHotkey, type ResolvedKey } from "../hotkey/hotkeySpec";
import {
  API_KEY_ENV,
  CLEANUP_PROVIDERS,
  SettingsSource,
  readSettings,
  type HoldtalkSettings,
  type SettingsLayer
} from "./settings";

export const CONFIG_CANDIDATES = ["holdtalk.yaml", "holdtalk.example.yaml"];

export interface LoadSettingsOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line overrides as dotted keys. */
  overrides?: SettingsLayer;
}

export interface LoadedSettings {
  settings: Readonly<HoldtalkSettings>;
  hotkey: ResolvedKey;
  configPath?: string;
}

/** Merges defaults, the config file, the environment and CLI overrides, in that order. */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<LoadedSettings> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const cliLayer = options.overrides ?? {};

  const configPath = await findConfigFile(options.configPath, cwd);
  const fileLayer = configPath ? await readConfigFile(configPath) : {};

  const envLayer = readEnvironment(env);
  const provider = new SettingsSource([fileLayer, envLayer, cliLayer]).getEnum(
    "cleanup.provider",
    CLEANUP_PROVIDERS,
    "anthropic"
  );
  const keyLayer = readApiKeyEnvironment(env, provider);

  const settings = readSettings(new SettingsSource([fileLayer, keyLayer, envLayer, cliLayer]));
  const hotkey = resolveHotkey(settings.hotkey);

  return { settings: freezeSettings(settings), hotkey, configPath };
}

async function findConfigFile(explicit: string | undefined, cwd: string): Promise<string | undefined> {
  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!(await fileExists(path))) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return path;
  }

  for (const candidate of CONFIG_CANDIDATES) {
    const path = resolve(cwd, candidate);
    if (await fileExists(path)) {
      return path;
    }
  }
  return undefined;
}

export async function readConfigFile(path: string): Promise<SettingsLayer> {
  let data: unknown;
  try {
    data = parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${describeError(error)}`, { cause: error });
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (!isPlainObject(data)) {
    throw new ConfigError(`${path} must contain a mapping of settings.`);
  }
  return flattenSettings(data);
}

/** `{ stt: { model: "x" } }` becomes `{ "stt.model": "x" }`. */
export function flattenSettings(data: Record<string, unknown>, prefix = ""): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(out, flattenSettings(value, path));
    } else {
      out[path] = value;
    }
  }
  return out;
}

export function readEnvironment(env: NodeJS.ProcessEnv): SettingsLayer {
  const layer: Record<string, unknown> = {};
  if (env.HOLDTALK_HOTKEY) layer.hotkey = env.HOLDTALK_HOTKEY;
  if (env.HOLDTALK_MODEL) layer["stt.model"] = env.HOLDTALK_MODEL;
  if (env.HOLDTALK_CLEANUP_PROVIDER) layer["cleanup.provider"] = env.HOLDTALK_CLEANUP_PROVIDER;
  if (env.HOLDTALK_CLEANUP_API_KEY) layer["cleanup.apiKey"] = env.HOLDTALK_CLEANUP_API_KEY;
  return layer;
}

/** The provider's conventional key variable; HOLDTALK_CLEANUP_API_KEY still wins. */
function readApiKeyEnvironment(
  env: NodeJS.ProcessEnv,
  provider: (typeof CLEANUP_PROVIDERS)[number]
): SettingsLayer {
  if (provider === "ollama") {
    return {};
  }
  const value = env[API_KEY_ENV[provider]];
  return value ? { "cleanup.apiKey": value } : {};
}

function freezeSettings(settings: HoldtalkSettings): Readonly<HoldtalkSettings> {
  Object.freeze(settings.audio);
  Object.freeze(settings.stt);
  Object.freeze(settings.cleanup);
  Object.freeze(settings.insert);
  return Object.freeze(settings);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fileExists(path: string): Promise<boolean> {
  return access(path)
    .then(() => true)
    .catch(() => false);
}
