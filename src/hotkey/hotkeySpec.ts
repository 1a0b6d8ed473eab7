import { InvalidHotkeyError } from "../errors";

export const NAMED_KEYS = [
  "ctrl", "alt", "shift", "cmd",
  "f1", "f2", "f3", "f4", "f5", "f6", "f7", "f8", "f9", "f10", "f11", "f12"
] as const;

export type NamedKey = (typeof NAMED_KEYS)[number];

export type KeySide = "left" | "right";

export type ResolvedKey =
  | { kind: "named"; key: NamedKey }
  | { kind: "char"; char: string };

/** A physical key as reported by the input listener. */
export type KeyEvent =
  | { kind: "named"; key: NamedKey; side?: KeySide }
  | { kind: "char"; char: string };

const ALIASES: Record<string, NamedKey> = {
  control: "ctrl",
  option: "alt",
  opt: "alt",
  command: "cmd",
  meta: "cmd",
  super: "cmd",
  win: "cmd"
};

/** Punctuation keys the listener reports, by key name. */
export const PUNCTUATION_KEYS: Readonly<Record<string, string>> = {
  Space: " ",
  Semicolon: ";",
  Equal: "=",
  Comma: ",",
  Minus: "-",
  Period: ".",
  Slash: "/",
  Backquote: "`",
  BracketLeft: "[",
  Backslash: "\\",
  BracketRight: "]",
  Quote: "'"
};

const CHAR_KEYS = new Set(Object.values(PUNCTUATION_KEYS));

function isCharKey(char: string): boolean {
  return /^[a-z0-9]$/.test(char) || CHAR_KEYS.has(char);
}

export function isNamedKey(value: string): value is NamedKey {
  return (NAMED_KEYS as readonly string[]).includes(value);
}

export function resolveHotkey(spec: string): ResolvedKey {
  const lower = spec.trim().toLowerCase();
  if (isNamedKey(lower)) {
    return { kind: "named", key: lower };
  }
  const alias = ALIASES[lower];
  if (alias) {
    return { kind: "named", key: alias };
  }
  const char = spec.toLowerCase();
  if (isCharKey(char)) {
    return { kind: "char", char };
  }
  throw new InvalidHotkeyError(spec);
}

/** Named keys match either physical variant (left or right ctrl both match "ctrl"). */
export function keyMatches(event: KeyEvent, hotkey: ResolvedKey): boolean {
  if (event.kind === "named" && hotkey.kind === "named") {
    return event.key === hotkey.key;
  }
  if (event.kind === "char" && hotkey.kind === "char") {
    return event.char.toLowerCase() === hotkey.char;
  }
  return false;
}

export function describeHotkey(hotkey: ResolvedKey): string {
  if (hotkey.kind === "named") {
    return hotkey.key;
  }
  return hotkey.char === " " ? "space" : hotkey.char;
}
