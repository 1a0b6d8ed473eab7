import { PUNCTUATION_KEYS, isNamedKey, type KeyEvent, type KeySide, type NamedKey } from "./hotkeySpec";

const MODIFIERS: Record<string, { key: NamedKey; side: KeySide }> = {
  Ctrl: { key: "ctrl", side: "left" },
  CtrlRight: { key: "ctrl", side: "right" },
  Alt: { key: "alt", side: "left" },
  AltRight: { key: "alt", side: "right" },
  Shift: { key: "shift", side: "left" },
  ShiftRight: { key: "shift", side: "right" },
  Meta: { key: "cmd", side: "left" },
  MetaRight: { key: "cmd", side: "right" }
};

const FUNCTION_KEY = /^F([1-9]|1[0-2])$/;

/**
 * Maps hook keycodes to key events, given the hook's name-to-code table.
 * Codes for keys that cannot be a hotkey are left out.
 */
export function buildKeyCodeMap(table: Readonly<Record<string, number>>): Map<number, KeyEvent> {
  const map = new Map<number, KeyEvent>();

  for (const [name, code] of Object.entries(table)) {
    const event = keyEventForName(name);
    if (event) {
      map.set(code, event);
    }
  }
  return map;
}

function keyEventForName(name: string): KeyEvent | undefined {
  const modifier = MODIFIERS[name];
  if (modifier) {
    return { kind: "named", ...modifier };
  }
  const lower = name.toLowerCase();
  if (FUNCTION_KEY.test(name) && isNamedKey(lower)) {
    return { kind: "named", key: lower };
  }
  if (/^[A-Z0-9]$/.test(name)) {
    return { kind: "char", char: name.toLowerCase() };
  }
  const char = PUNCTUATION_KEYS[name];
  return char === undefined ? undefined : { kind: "char", char };
}
