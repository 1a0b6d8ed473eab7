import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CLEANUP_PROMPT } from "../cleanup/cleanupPrompt";
import { ConfigError } from "../errors";

export const STT_PROVIDERS = ["whisper-cpp", "http"] as const;
export type SttProviderKind = (typeof STT_PROVIDERS)[number];

export const CLEANUP_PROVIDERS = ["anthropic", "openai", "ollama"] as const;
export type CleanupProviderKind = (typeof CLEANUP_PROVIDERS)[number];

export const API_KEY_ENV = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY"
} as const;

const CLEANUP_DEFAULTS: Record<CleanupProviderKind, { model: string; baseUrl: string }> = {
  anthropic: { model: "claude-sonnet-4-20250514", baseUrl: "https://api.anthropic.com" },
  openai: { model: "gpt-4o-mini", baseUrl: "https://api.openai.com/v1" },
  ollama: { model: "llama3.2:3b", baseUrl: "http://127.0.0.1:11434" }
};

export interface AudioSettings {
  sampleRateHz: number;
  channels: number;
}

export interface SttSettings {
  provider: SttProviderKind;
  model: string;
  whisperCppPath: string;
  modelPath: string;
  modelDir: string;
  language: string;
  httpEndpoint: string;
  timeoutMs: number;
}

export interface CleanupSettings {
  enabled: boolean;
  provider: CleanupProviderKind;
  model: string;
  apiKey: string;
  baseUrl: string;
  prompt: string;
  timeoutMs: number;
}

export interface HoldtalkSettings {
  hotkey: string;
  audio: AudioSettings;
  stt: SttSettings;
  cleanup: CleanupSettings;
  insert: { trailingSpace: boolean };
}

/** Flat dotted keys (`stt.model`) to raw values from one configuration source. */
export type SettingsLayer = Readonly<Record<string, unknown>>;

/**
 * Typed reads over stacked layers; later layers override earlier ones.
 * A value of the wrong type is a ConfigError, never silently defaulted.
 */
export class SettingsSource {
  constructor(private readonly layers: readonly SettingsLayer[]) {}

  getString(key: string, fallback: string): string {
    const value = this.lookup(key);
    if (value === undefined) return fallback;
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    throw invalid(key, "a string", value);
  }

  getNumber(key: string, fallback: number, options: { min?: number; integer?: boolean } = {}): number {
    const value = this.lookup(key);
    let n: number;
    if (value === undefined) {
      n = fallback;
    } else if (typeof value === "number") {
      n = value;
    } else if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
      n = Number(value);
    } else {
      throw invalid(key, "a number", value);
    }

    if (options.integer && !Number.isInteger(n)) {
      throw invalid(key, "an integer", n);
    }
    if (options.min !== undefined && n < options.min) {
      throw invalid(key, `at least ${options.min}`, n);
    }
    return n;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.lookup(key);
    if (value === undefined) return fallback;
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      const lower = value.trim().toLowerCase();
      if (["true", "1", "yes", "on"].includes(lower)) return true;
      if (["false", "0", "no", "off"].includes(lower)) return false;
    }
    throw invalid(key, "a boolean", value);
  }

  getEnum<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.lookup(key);
    if (value === undefined) return fallback;
    const match = allowed.find((option) => option === value);
    if (match === undefined) {
      throw invalid(key, `one of ${allowed.join(", ")}`, value);
    }
    return match;
  }

  private lookup(key: string): unknown {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const value = this.layers[i][key];
      if (value !== undefined && value !== null) {
        return value;
      }
    }
    return undefined;
  }
}

function invalid(key: string, expected: string, value: unknown): ConfigError {
  return new ConfigError(`Setting "${key}" must be ${expected}, got ${JSON.stringify(value)}.`);
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function readSettings(source: SettingsSource): HoldtalkSettings {
  const cleanupProvider = source.getEnum("cleanup.provider", CLEANUP_PROVIDERS, "anthropic");
  const cleanupDefaults = CLEANUP_DEFAULTS[cleanupProvider];

  return {
    hotkey: source.getString("hotkey", "ctrl"),
    audio: {
      sampleRateHz: source.getNumber("audio.sampleRateHz", 16000, { min: 8000, integer: true }),
      channels: source.getNumber("audio.channels", 1, { min: 1, integer: true })
    },
    stt: {
      provider: source.getEnum("stt.provider", STT_PROVIDERS, "whisper-cpp"),
      model: source.getString("stt.model", "base.en"),
      whisperCppPath: expandHome(source.getString("stt.whisperCppPath", "")),
      modelPath: expandHome(source.getString("stt.modelPath", "")),
      modelDir: expandHome(
        source.getString("stt.modelDir", join(homedir(), ".cache", "holdtalk", "models"))
      ),
      language: source.getString("stt.language", "en"),
      httpEndpoint: source.getString("stt.httpEndpoint", "http://127.0.0.1:8765/transcribe"),
      timeoutMs: source.getNumber("stt.timeoutMs", 60000, { min: 1 })
    },
    cleanup: {
      enabled: source.getBoolean("cleanup.enabled", true),
      provider: cleanupProvider,
      model: source.getString("cleanup.model", cleanupDefaults.model),
      apiKey: source.getString("cleanup.apiKey", ""),
      baseUrl: source.getString("cleanup.baseUrl", cleanupDefaults.baseUrl).replace(/\/+$/, ""),
      prompt: source.getString("cleanup.prompt", DEFAULT_CLEANUP_PROMPT),
      timeoutMs: source.getNumber("cleanup.timeoutMs", 20000, { min: 1 })
    },
    insert: {
      trailingSpace: source.getBoolean("insert.trailingSpace", true)
    }
  };
}
