import type { SettingsLayer } from "./config/settings";

export interface CliOptions {
  config?: string;
  model?: string;
  hotkey?: string;
  /** Commander sets this to false for `--no-cleanup`. */
  cleanup?: boolean;
  stt?: string;
}

/** Flags become the top settings layer; flags that were not given leave the key unset. */
export function toSettingsOverrides(opts: CliOptions): SettingsLayer {
  const layer: Record<string, unknown> = {};
  if (opts.model) layer["stt.model"] = opts.model;
  if (opts.hotkey) layer.hotkey = opts.hotkey;
  if (opts.stt) layer["stt.provider"] = opts.stt;
  if (opts.cleanup === false) layer["cleanup.enabled"] = false;
  return layer;
}
